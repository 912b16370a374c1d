import { PublicKey } from '@solana/web3.js'

import { CodecError, ErrorKind } from './error'

export const U8_SPAN = 1
export const U64_SPAN = 8
export const PUBLIC_KEY_SPAN = 32

export const U8_MAX = 0xff
export const U64_MAX = BigInt('0xffffffffffffffff')

/**
 * A decoded value and the bytes left after it
 */
export type Unpacked<T> = [T, Buffer]

/**
 * View any byte array as a Buffer without copying
 * @param data
 * @returns Buffer sharing the same memory
 */
export const toBuffer = (data: Uint8Array): Buffer => {
  if (Buffer.isBuffer(data)) return data
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength)
}

export const assertU8 = (value: number): number => {
  if (!Number.isInteger(value) || value < 0 || value > U8_MAX)
    throw new CodecError(ErrorKind.ValueOutOfRange, `${value} is not a u8`)
  return value
}

export const assertU64 = (value: bigint): bigint => {
  if (value < BigInt(0) || value > U64_MAX)
    throw new CodecError(ErrorKind.ValueOutOfRange, `${value} is not a u64`)
  return value
}

/**
 * Split exactly `span` bytes off the front of the input
 * @param input
 * @param span
 * @returns The leading bytes and the remainder
 */
export const unpackBytes = (input: Uint8Array, span: number): Unpacked<Buffer> => {
  const buf = toBuffer(input)
  if (buf.length < span)
    throw new CodecError(
      ErrorKind.TruncatedInput,
      `expected ${span} bytes, got ${buf.length}`,
    )
  return [buf.subarray(0, span), buf.subarray(span)]
}

export const unpackU8 = (input: Uint8Array): Unpacked<number> => {
  const [bytes, rest] = unpackBytes(input, U8_SPAN)
  return [bytes[0], rest]
}

/**
 * Read a little-endian u64
 * @param input
 * @returns The value and the unconsumed bytes
 */
export const unpackU64 = (input: Uint8Array): Unpacked<bigint> => {
  const [bytes, rest] = unpackBytes(input, U64_SPAN)
  return [bytes.readBigUInt64LE(0), rest]
}

/**
 * Read a raw 32-byte identifier
 * @param input
 * @returns The public key (copied out of the input) and the unconsumed bytes
 */
export const unpackPublicKey = (input: Uint8Array): Unpacked<PublicKey> => {
  const [bytes, rest] = unpackBytes(input, PUBLIC_KEY_SPAN)
  return [new PublicKey(Buffer.from(bytes)), rest]
}

/**
 * Append-only little-endian writer
 */
export class ByteWriter {
  private chunks: Buffer[] = []

  get length(): number {
    return this.chunks.reduce((sum, chunk) => sum + chunk.length, 0)
  }

  u8 = (value: number): ByteWriter => {
    this.chunks.push(Buffer.from([assertU8(value)]))
    return this
  }

  u64 = (value: bigint): ByteWriter => {
    const buf = Buffer.alloc(U64_SPAN)
    buf.writeBigUInt64LE(assertU64(value))
    this.chunks.push(buf)
    return this
  }

  publicKey = (value: PublicKey): ByteWriter => {
    this.chunks.push(value.toBuffer())
    return this
  }

  bytes = (value: Uint8Array): ByteWriter => {
    this.chunks.push(Buffer.from(value))
    return this
  }

  toBuffer = (): Buffer => Buffer.concat(this.chunks)
}
