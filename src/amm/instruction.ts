import { ByteWriter, toBuffer, unpackU64, unpackU8 } from '../core/bytes'
import { CodecError, ErrorKind } from '../core/error'
import { InstructionCode } from './constant'

export type InitializeData = {
  /** Bump seed of the pool authority */
  nonce: number
}

export type SwapData = {
  /** Source amount to transfer in */
  amount_in: bigint
  /** Minimum destination amount out, slippage guard */
  minimum_amount_out: bigint
}

export type DepositAllTokenTypesData = {
  pool_token_amount: bigint
  maximum_token_a_amount: bigint
  maximum_token_b_amount: bigint
}

export type WithdrawAllTokenTypesData = {
  pool_token_amount: bigint
  minimum_token_a_amount: bigint
  minimum_token_b_amount: bigint
}

export type DepositSingleTokenTypeExactAmountInData = {
  source_token_amount: bigint
  minimum_pool_token_amount: bigint
}

export type WithdrawSingleTokenTypeExactAmountOutData = {
  destination_token_amount: bigint
  maximum_pool_token_amount: bigint
}

export type AmmInstruction =
  | ({ code: InstructionCode.Initialize } & InitializeData)
  | ({ code: InstructionCode.Swap } & SwapData)
  | ({ code: InstructionCode.DepositAllTokenTypes } & DepositAllTokenTypesData)
  | ({
      code: InstructionCode.WithdrawAllTokenTypes
    } & WithdrawAllTokenTypesData)
  | ({
      code: InstructionCode.DepositSingleTokenTypeExactAmountIn
    } & DepositSingleTokenTypeExactAmountInData)
  | ({
      code: InstructionCode.WithdrawSingleTokenTypeExactAmountOut
    } & WithdrawSingleTokenTypeExactAmountOutData)

/**
 * Pack an instruction into its canonical payload: tag byte, then fields in declared order
 * @param instruction
 * @returns Instruction data
 */
export const encodeInstruction = (instruction: AmmInstruction): Buffer => {
  const writer = new ByteWriter().u8(instruction.code)
  switch (instruction.code) {
    case InstructionCode.Initialize:
      writer.u8(instruction.nonce)
      break
    case InstructionCode.Swap:
      writer.u64(instruction.amount_in).u64(instruction.minimum_amount_out)
      break
    case InstructionCode.DepositAllTokenTypes:
      writer
        .u64(instruction.pool_token_amount)
        .u64(instruction.maximum_token_a_amount)
        .u64(instruction.maximum_token_b_amount)
      break
    case InstructionCode.WithdrawAllTokenTypes:
      writer
        .u64(instruction.pool_token_amount)
        .u64(instruction.minimum_token_a_amount)
        .u64(instruction.minimum_token_b_amount)
      break
    case InstructionCode.DepositSingleTokenTypeExactAmountIn:
      writer
        .u64(instruction.source_token_amount)
        .u64(instruction.minimum_pool_token_amount)
      break
    case InstructionCode.WithdrawSingleTokenTypeExactAmountOut:
      writer
        .u64(instruction.destination_token_amount)
        .u64(instruction.maximum_pool_token_amount)
      break
  }
  return writer.toBuffer()
}

/**
 * Unpack instruction data.
 * Initialize must be exactly two bytes. The other instructions ignore bytes past
 * their last field; deployed callers may rely on that, so it stays.
 * @param data
 * @returns Instruction
 */
export const decodeInstruction = (data: Uint8Array): AmmInstruction => {
  const buf = toBuffer(data)
  if (!buf.length) throw new CodecError(ErrorKind.MissingDiscriminant)
  const [tag, rest] = unpackU8(buf)
  switch (tag) {
    case InstructionCode.Initialize: {
      if (rest.length !== 1)
        throw new CodecError(
          ErrorKind.MalformedPayload,
          `initialize takes 1 byte, got ${rest.length}`,
        )
      const [nonce] = unpackU8(rest)
      return { code: InstructionCode.Initialize, nonce }
    }
    case InstructionCode.Swap: {
      const [amount_in, r1] = unpackU64(rest)
      const [minimum_amount_out] = unpackU64(r1)
      return { code: InstructionCode.Swap, amount_in, minimum_amount_out }
    }
    case InstructionCode.DepositAllTokenTypes: {
      const [pool_token_amount, r1] = unpackU64(rest)
      const [maximum_token_a_amount, r2] = unpackU64(r1)
      const [maximum_token_b_amount] = unpackU64(r2)
      return {
        code: InstructionCode.DepositAllTokenTypes,
        pool_token_amount,
        maximum_token_a_amount,
        maximum_token_b_amount,
      }
    }
    case InstructionCode.WithdrawAllTokenTypes: {
      const [pool_token_amount, r1] = unpackU64(rest)
      const [minimum_token_a_amount, r2] = unpackU64(r1)
      const [minimum_token_b_amount] = unpackU64(r2)
      return {
        code: InstructionCode.WithdrawAllTokenTypes,
        pool_token_amount,
        minimum_token_a_amount,
        minimum_token_b_amount,
      }
    }
    case InstructionCode.DepositSingleTokenTypeExactAmountIn: {
      const [source_token_amount, r1] = unpackU64(rest)
      const [minimum_pool_token_amount] = unpackU64(r1)
      return {
        code: InstructionCode.DepositSingleTokenTypeExactAmountIn,
        source_token_amount,
        minimum_pool_token_amount,
      }
    }
    case InstructionCode.WithdrawSingleTokenTypeExactAmountOut: {
      const [destination_token_amount, r1] = unpackU64(rest)
      const [maximum_pool_token_amount] = unpackU64(r1)
      return {
        code: InstructionCode.WithdrawSingleTokenTypeExactAmountOut,
        destination_token_amount,
        maximum_pool_token_amount,
      }
    }
    default:
      throw new CodecError(ErrorKind.UnknownDiscriminant, `got ${tag}`)
  }
}
