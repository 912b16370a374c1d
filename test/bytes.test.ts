import { PublicKey } from '@solana/web3.js'

import {
  ByteWriter,
  CodecError,
  ErrorKind,
  U64_MAX,
  isCodecError,
  toProgramError,
  unpackBytes,
  unpackPublicKey,
  unpackU64,
  unpackU8,
} from '../src'

describe('primitive codec', () => {
  test('unpackU64 reads little-endian and leaves the rest', () => {
    const input = Buffer.from([0x40, 0x42, 0x0f, 0, 0, 0, 0, 0, 0xaa, 0xbb])
    const [value, rest] = unpackU64(input)
    expect(value).toBe(BigInt(1000000))
    expect([...rest]).toEqual([0xaa, 0xbb])
  })

  test('unpackU64 reads the maximum value', () => {
    const [value, rest] = unpackU64(Buffer.alloc(8, 0xff))
    expect(value).toBe(U64_MAX)
    expect(rest.length).toBe(0)
  })

  test('unpackU64 fails on fewer than 8 bytes', () => {
    for (let n = 0; n < 8; n++) {
      expect(() => unpackU64(Buffer.alloc(n))).toThrow(CodecError)
      try {
        unpackU64(Buffer.alloc(n))
      } catch (er) {
        expect(isCodecError(er, ErrorKind.TruncatedInput)).toBe(true)
      }
    }
  })

  test('unpackPublicKey copies 32 raw bytes', () => {
    const raw = Buffer.alloc(33, 7)
    raw[32] = 9
    const [publicKey, rest] = unpackPublicKey(raw)
    expect(publicKey.toBuffer().equals(Buffer.alloc(32, 7))).toBe(true)
    expect([...rest]).toEqual([9])
    raw[0] = 1
    expect(publicKey.toBuffer()[0]).toBe(7)
  })

  test('unpackPublicKey fails on 31 bytes', () => {
    expect(() => unpackPublicKey(Buffer.alloc(31))).toThrow(
      'Not enough bytes: expected 32 bytes, got 31',
    )
  })

  test('unpackBytes and unpackU8 accept plain Uint8Array', () => {
    const [head, rest] = unpackBytes(new Uint8Array([1, 2, 3]), 2)
    expect([...head]).toEqual([1, 2])
    const [last, empty] = unpackU8(rest)
    expect(last).toBe(3)
    expect(empty.length).toBe(0)
  })

  test('ByteWriter appends in order', () => {
    const publicKey = new PublicKey(Buffer.alloc(32, 3))
    const buf = new ByteWriter()
      .u8(5)
      .u64(BigInt(258))
      .publicKey(publicKey)
      .toBuffer()
    expect(buf.length).toBe(1 + 8 + 32)
    expect([...buf.subarray(0, 9)]).toEqual([5, 2, 1, 0, 0, 0, 0, 0, 0])
    expect(buf.subarray(9).equals(Buffer.alloc(32, 3))).toBe(true)
  })

  test('ByteWriter rejects values wider than the field', () => {
    const writer = new ByteWriter()
    expect(() => writer.u8(256)).toThrow(CodecError)
    expect(() => writer.u8(-1)).toThrow(CodecError)
    expect(() => writer.u8(1.5)).toThrow(CodecError)
    expect(() => writer.u64(U64_MAX + BigInt(1))).toThrow(CodecError)
    expect(() => writer.u64(BigInt(-1))).toThrow(CodecError)
    expect(writer.length).toBe(0)
  })
})

describe('error taxonomy', () => {
  test('codec errors carry their kind', () => {
    const er = new CodecError(ErrorKind.UnsupportedVersion, 'got 2')
    expect(er.kind).toBe(ErrorKind.UnsupportedVersion)
    expect(er.message).toBe('Unsupported state version: got 2')
    expect(er).toBeInstanceOf(Error)
    expect(isCodecError(er)).toBe(true)
    expect(isCodecError(er, ErrorKind.TruncatedInput)).toBe(false)
    expect(isCodecError(new Error('x'))).toBe(false)
  })

  test('maps kinds to program errors', () => {
    expect(toProgramError(ErrorKind.MissingDiscriminant)).toBe(
      'InvalidInstructionData',
    )
    expect(toProgramError(ErrorKind.UnknownDiscriminant)).toBe(
      'InvalidInstructionData',
    )
    expect(toProgramError(ErrorKind.TruncatedInput)).toBe(
      'InvalidInstructionData',
    )
    expect(toProgramError(ErrorKind.MalformedPayload)).toBe(
      'InvalidInstructionData',
    )
    expect(toProgramError(ErrorKind.InvalidFlagByte)).toBe('InvalidAccountData')
    expect(toProgramError(ErrorKind.UnsupportedVersion)).toBe(
      'UninitializedAccount',
    )
  })
})
