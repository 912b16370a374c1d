export enum InstructionCode {
  Initialize = 0,
  Swap = 1,
  DepositAllTokenTypes = 2,
  WithdrawAllTokenTypes = 3,
  DepositSingleTokenTypeExactAmountIn = 4,
  WithdrawSingleTokenTypeExactAmountOut = 5,
}

/**
 * Canonical payload length of each instruction, tag byte included
 */
export const INSTRUCTION_SPAN: Record<InstructionCode, number> = {
  [InstructionCode.Initialize]: 2,
  [InstructionCode.Swap]: 17,
  [InstructionCode.DepositAllTokenTypes]: 25,
  [InstructionCode.WithdrawAllTokenTypes]: 25,
  [InstructionCode.DepositSingleTokenTypeExactAmountIn]: 17,
  [InstructionCode.WithdrawSingleTokenTypeExactAmountOut]: 17,
}

export enum PoolVersion {
  V1 = 1,
}

export enum CurveType {
  ConstantProduct = 0,
  ConstantPrice = 1,
  Stable = 2,
  Offset = 3,
}

export const FEES_SPAN = 24
export const SWAP_CURVE_SPAN = 33
export const CURVE_CALCULATOR_SPAN = 32
export const PROGRAM_STATE_SPAN = 130
export const POOL_STATE_V1_SPAN = 290
export const VERSIONED_POOL_STATE_SPAN = 1 + POOL_STATE_V1_SPAN
