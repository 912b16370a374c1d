import { blob, struct, u8 } from '@solana/buffer-layout'
import { u64 } from '@solana/buffer-layout-utils'

import { SwapCurveData } from '../schema'
import { U64_SPAN, assertU64 } from '../core/bytes'
import { CodecError, ErrorKind } from '../core/error'
import { decodeExact, describeLayout, encodeExact } from '../core/layout'
import { CURVE_CALCULATOR_SPAN, CurveType } from './constant'

const PADDING_SPAN = CURVE_CALCULATOR_SPAN - U64_SPAN

type RawSwapCurve = {
  curve_type: number
  parameter: bigint
  padding: Uint8Array
}

/**
 * Curve type, then the 32-byte calculator area: its u64 parameter, if any, then zeros
 */
export const SWAP_CURVE_LAYOUT = struct<RawSwapCurve>([
  u8('curve_type'),
  u64('parameter'),
  blob(PADDING_SPAN, 'padding'),
])

export const SWAP_CURVE_SCHEMA = describeLayout(SWAP_CURVE_LAYOUT)

const parameterOf = (curve: SwapCurveData): bigint => {
  switch (curve.curve_type) {
    case CurveType.ConstantProduct:
      return BigInt(0)
    case CurveType.ConstantPrice:
      return curve.token_b_price
    case CurveType.Stable:
      return curve.amp
    case CurveType.Offset:
      return curve.token_b_offset
  }
}

/**
 * Pack a curve selector into its 33-byte record
 * @param curve
 * @returns Buffer
 */
export const serializeSwapCurve = (curve: SwapCurveData): Buffer => {
  return encodeExact(SWAP_CURVE_LAYOUT, {
    curve_type: curve.curve_type,
    parameter: assertU64(parameterOf(curve)),
    padding: Buffer.alloc(PADDING_SPAN),
  })
}

/**
 * Unpack a 33-byte curve selector
 * @param data
 * @returns Curve
 */
export const deserializeSwapCurve = (data: Uint8Array): SwapCurveData => {
  const { curve_type, parameter } = decodeExact(SWAP_CURVE_LAYOUT, data)
  switch (curve_type) {
    case CurveType.ConstantProduct:
      return { curve_type: CurveType.ConstantProduct }
    case CurveType.ConstantPrice:
      return { curve_type: CurveType.ConstantPrice, token_b_price: parameter }
    case CurveType.Stable:
      return { curve_type: CurveType.Stable, amp: parameter }
    case CurveType.Offset:
      return { curve_type: CurveType.Offset, token_b_offset: parameter }
    default:
      throw new CodecError(ErrorKind.InvalidCurveType, `got ${curve_type}`)
  }
}
