import { struct } from '@solana/buffer-layout'
import { u64 } from '@solana/buffer-layout-utils'

import { FeesData } from '../schema'
import { assertU64 } from '../core/bytes'
import { decodeExact, encodeExact } from '../core/layout'

export const feesLayout = (property?: string) =>
  struct<FeesData>(
    [
      u64('fixed_fee_numerator'),
      u64('return_fee_numerator'),
      u64('fee_denominator'),
    ],
    property,
  )

export const FEES_LAYOUT = feesLayout()

export const assertFees = (fees: FeesData): FeesData => {
  assertU64(fees.fixed_fee_numerator)
  assertU64(fees.return_fee_numerator)
  assertU64(fees.fee_denominator)
  return fees
}

export const serializeFees = (fees: FeesData): Buffer =>
  encodeExact(FEES_LAYOUT, assertFees(fees))

export const deserializeFees = (data: Uint8Array): FeesData => {
  const { fixed_fee_numerator, return_fee_numerator, fee_denominator } =
    decodeExact(FEES_LAYOUT, data)
  return { fixed_fee_numerator, return_fee_numerator, fee_denominator }
}
