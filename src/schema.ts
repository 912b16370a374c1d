import { PublicKey } from '@solana/web3.js'

import { CurveType } from './amm/constant'

/**
 * AMM
 */
export type FeesData = {
  fixed_fee_numerator: bigint
  return_fee_numerator: bigint
  fee_denominator: bigint
}

export type SwapCurveData =
  | { curve_type: CurveType.ConstantProduct }
  | { curve_type: CurveType.ConstantPrice; token_b_price: bigint }
  | { curve_type: CurveType.Stable; amp: bigint }
  | { curve_type: CurveType.Offset; token_b_offset: bigint }

export type ProgramStateData = {
  is_initialized: boolean
  state_owner: PublicKey
  fee_owner: PublicKey
  initial_supply: bigint
  fees: FeesData
  swap_curve: SwapCurveData
}

export type PoolData = {
  is_initialized: boolean
  nonce: number
  amm_id: PublicKey
  dex_program_id: PublicKey
  market_id: PublicKey
  token_program_id: PublicKey
  token_a: PublicKey
  token_b: PublicKey
  pool_mint: PublicKey
  token_a_mint: PublicKey
  token_b_mint: PublicKey
}

/**
 * Farm
 */
export type FarmProgramData = {
  super_owner: PublicKey
  fee_owner: PublicKey
  allowed_creator: PublicKey
  amm_program_id: PublicKey
  farm_fee: bigint
  harvest_fee_numerator: bigint
  harvest_fee_denominator: bigint
}
