import { Structure } from '@solana/buffer-layout'

import { toBuffer } from './bytes'
import { CodecError, ErrorKind } from './error'

export type LayoutField = {
  property: string
  offset: number
  span: number
}

/**
 * Flatten a fixed-size structure into its offset table
 * @param layout
 * @returns Fields in declared order with their byte ranges
 */
export const describeLayout = <T>(layout: Structure<T>): LayoutField[] => {
  let offset = 0
  return layout.fields.map(({ property, span }) => {
    const field = { property: property ?? '', offset, span }
    offset += span
    return field
  })
}

/**
 * Find a field in an offset table
 * @param layout
 * @param property
 * @returns Field range
 */
export const fieldOf = <T>(
  layout: Structure<T>,
  property: keyof T & string,
): LayoutField => {
  const field = describeLayout(layout).find((f) => f.property === property)
  if (!field) throw new Error(`Unknown layout field: ${property}`)
  return field
}

/**
 * Decode a fixed-size record, rejecting short buffers and ignoring trailing bytes
 * @param layout
 * @param data
 * @returns Raw record
 */
export const decodeExact = <T>(layout: Structure<T>, data: Uint8Array): T => {
  const buf = toBuffer(data)
  if (buf.length < layout.span)
    throw new CodecError(
      ErrorKind.BufferTooSmall,
      `expected ${layout.span} bytes, got ${buf.length}`,
    )
  return layout.decode(buf.subarray(0, layout.span))
}

/**
 * Encode a fixed-size record into a fresh buffer of exactly its span
 * @param layout
 * @param value
 * @returns Buffer
 */
export const encodeExact = <T>(layout: Structure<T>, value: T): Buffer => {
  const buf = Buffer.alloc(layout.span)
  layout.encode(value, buf)
  return buf
}

export const unpackFlag = (byte: number): boolean => {
  if (byte === 0) return false
  if (byte === 1) return true
  throw new CodecError(ErrorKind.InvalidFlagByte, `got ${byte}`)
}

export const packFlag = (flag: boolean): number => (flag ? 1 : 0)
