import { struct, u8 } from '@solana/buffer-layout'
import { publicKey, u64 } from '@solana/buffer-layout-utils'

import { FarmProgramData } from '../schema'
import { assertU64, assertU8, toBuffer } from '../core/bytes'
import { CodecError, ErrorKind } from '../core/error'
import { encodeExact } from '../core/layout'
import { FarmInstructionCode } from './constant'

export type InitializeFarmData = {
  nonce: number
  start_timestamp: bigint
  end_timestamp: bigint
}

export type AmountData = {
  amount: bigint
}

export type FarmInstruction =
  | ({ code: FarmInstructionCode.SetProgramData } & FarmProgramData)
  | ({ code: FarmInstructionCode.InitializeFarm } & InitializeFarmData)
  | ({ code: FarmInstructionCode.Deposit } & AmountData)
  | ({ code: FarmInstructionCode.Withdraw } & AmountData)
  | ({ code: FarmInstructionCode.AddReward } & AmountData)
  | ({ code: FarmInstructionCode.PayFarmFee } & AmountData)

type Tagged<T> = { code: number } & T

const SET_PROGRAM_DATA_LAYOUT = struct<Tagged<FarmProgramData>>([
  u8('code'),
  publicKey('super_owner'),
  publicKey('fee_owner'),
  publicKey('allowed_creator'),
  publicKey('amm_program_id'),
  u64('farm_fee'),
  u64('harvest_fee_numerator'),
  u64('harvest_fee_denominator'),
])

const INITIALIZE_FARM_LAYOUT = struct<Tagged<InitializeFarmData>>([
  u8('code'),
  u8('nonce'),
  u64('start_timestamp'),
  u64('end_timestamp'),
])

const AMOUNT_LAYOUT = struct<Tagged<AmountData>>([u8('code'), u64('amount')])

export const FARM_INSTRUCTION_SPAN: Record<FarmInstructionCode, number> = {
  [FarmInstructionCode.SetProgramData]: SET_PROGRAM_DATA_LAYOUT.span,
  [FarmInstructionCode.InitializeFarm]: INITIALIZE_FARM_LAYOUT.span,
  [FarmInstructionCode.Deposit]: AMOUNT_LAYOUT.span,
  [FarmInstructionCode.Withdraw]: AMOUNT_LAYOUT.span,
  [FarmInstructionCode.AddReward]: AMOUNT_LAYOUT.span,
  [FarmInstructionCode.PayFarmFee]: AMOUNT_LAYOUT.span,
}

/**
 * Pack a farm instruction: tag byte, then fields in order
 * @param instruction
 * @returns Instruction data
 */
export const encodeFarmInstruction = (instruction: FarmInstruction): Buffer => {
  switch (instruction.code) {
    case FarmInstructionCode.SetProgramData:
      assertU64(instruction.farm_fee)
      assertU64(instruction.harvest_fee_numerator)
      assertU64(instruction.harvest_fee_denominator)
      return encodeExact(SET_PROGRAM_DATA_LAYOUT, instruction)
    case FarmInstructionCode.InitializeFarm:
      assertU8(instruction.nonce)
      assertU64(instruction.start_timestamp)
      assertU64(instruction.end_timestamp)
      return encodeExact(INITIALIZE_FARM_LAYOUT, instruction)
    case FarmInstructionCode.Deposit:
    case FarmInstructionCode.Withdraw:
    case FarmInstructionCode.AddReward:
    case FarmInstructionCode.PayFarmFee:
      assertU64(instruction.amount)
      return encodeExact(AMOUNT_LAYOUT, instruction)
  }
}

const isFarmInstructionCode = (tag: number): tag is FarmInstructionCode =>
  tag in FarmInstructionCode

/**
 * Unpack farm instruction data. The payload length must match the variant exactly.
 * @param data
 * @returns Instruction
 */
export const decodeFarmInstruction = (data: Uint8Array): FarmInstruction => {
  const buf = toBuffer(data)
  if (!buf.length) throw new CodecError(ErrorKind.MissingDiscriminant)
  const tag = buf[0]
  if (!isFarmInstructionCode(tag))
    throw new CodecError(ErrorKind.UnknownDiscriminant, `got ${tag}`)
  const span = FARM_INSTRUCTION_SPAN[tag]
  if (buf.length < span)
    throw new CodecError(
      ErrorKind.TruncatedInput,
      `expected ${span} bytes, got ${buf.length}`,
    )
  if (buf.length > span)
    throw new CodecError(
      ErrorKind.MalformedPayload,
      `expected ${span} bytes, got ${buf.length}`,
    )
  switch (tag) {
    case FarmInstructionCode.SetProgramData: {
      const raw = SET_PROGRAM_DATA_LAYOUT.decode(buf)
      return {
        code: FarmInstructionCode.SetProgramData,
        super_owner: raw.super_owner,
        fee_owner: raw.fee_owner,
        allowed_creator: raw.allowed_creator,
        amm_program_id: raw.amm_program_id,
        farm_fee: raw.farm_fee,
        harvest_fee_numerator: raw.harvest_fee_numerator,
        harvest_fee_denominator: raw.harvest_fee_denominator,
      }
    }
    case FarmInstructionCode.InitializeFarm: {
      const { nonce, start_timestamp, end_timestamp } =
        INITIALIZE_FARM_LAYOUT.decode(buf)
      return {
        code: FarmInstructionCode.InitializeFarm,
        nonce,
        start_timestamp,
        end_timestamp,
      }
    }
    case FarmInstructionCode.Deposit:
    case FarmInstructionCode.Withdraw:
    case FarmInstructionCode.AddReward:
    case FarmInstructionCode.PayFarmFee: {
      const { amount } = AMOUNT_LAYOUT.decode(buf)
      return { code: tag, amount }
    }
  }
}
