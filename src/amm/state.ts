import { blob, struct, u8 } from '@solana/buffer-layout'
import { publicKey, u64 } from '@solana/buffer-layout-utils'
import { PublicKey } from '@solana/web3.js'

import { FeesData, PoolData, ProgramStateData } from '../schema'
import { assertU64, assertU8, toBuffer } from '../core/bytes'
import { CodecError, ErrorKind } from '../core/error'
import {
  decodeExact,
  describeLayout,
  encodeExact,
  packFlag,
  unpackFlag,
} from '../core/layout'
import {
  POOL_STATE_V1_SPAN,
  PoolVersion,
  SWAP_CURVE_SPAN,
  VERSIONED_POOL_STATE_SPAN,
} from './constant'
import { assertFees, feesLayout } from './fees'
import { deserializeSwapCurve, serializeSwapCurve } from './curve'

type RawProgramState = {
  is_initialized: number
  state_owner: PublicKey
  fee_owner: PublicKey
  initial_supply: bigint
  fees: FeesData
  swap_curve: Uint8Array
}

type RawPoolData = Omit<PoolData, 'is_initialized'> & {
  is_initialized: number
}

export const PROGRAM_STATE_LAYOUT = struct<RawProgramState>([
  u8('is_initialized'),
  publicKey('state_owner'),
  publicKey('fee_owner'),
  u64('initial_supply'),
  feesLayout('fees'),
  blob(SWAP_CURVE_SPAN, 'swap_curve'),
])

export const POOL_STATE_V1_LAYOUT = struct<RawPoolData>([
  u8('is_initialized'),
  u8('nonce'),
  publicKey('amm_id'),
  publicKey('dex_program_id'),
  publicKey('market_id'),
  publicKey('token_program_id'),
  publicKey('token_a'),
  publicKey('token_b'),
  publicKey('pool_mint'),
  publicKey('token_a_mint'),
  publicKey('token_b_mint'),
])

export const PROGRAM_STATE_SCHEMA = describeLayout(PROGRAM_STATE_LAYOUT)
export const POOL_STATE_V1_SCHEMA = describeLayout(POOL_STATE_V1_LAYOUT)

/**
 * Program state
 */
export const serializeProgramState = (state: ProgramStateData): Buffer => {
  assertU64(state.initial_supply)
  return encodeExact(PROGRAM_STATE_LAYOUT, {
    is_initialized: packFlag(state.is_initialized),
    state_owner: state.state_owner,
    fee_owner: state.fee_owner,
    initial_supply: state.initial_supply,
    fees: assertFees(state.fees),
    swap_curve: serializeSwapCurve(state.swap_curve),
  })
}

export const deserializeProgramState = (data: Uint8Array): ProgramStateData => {
  const raw = decodeExact(PROGRAM_STATE_LAYOUT, data)
  return {
    is_initialized: unpackFlag(raw.is_initialized),
    state_owner: raw.state_owner,
    fee_owner: raw.fee_owner,
    initial_supply: raw.initial_supply,
    fees: raw.fees,
    swap_curve: deserializeSwapCurve(raw.swap_curve),
  }
}

/**
 * Pool state, version 1
 */
export const serializePoolState = (pool: PoolData): Buffer => {
  assertU8(pool.nonce)
  return encodeExact(POOL_STATE_V1_LAYOUT, {
    ...pool,
    is_initialized: packFlag(pool.is_initialized),
  })
}

export const deserializePoolState = (data: Uint8Array): PoolData => {
  const { is_initialized, ...rest } = decodeExact(POOL_STATE_V1_LAYOUT, data)
  return {
    ...rest,
    is_initialized: unpackFlag(is_initialized),
  }
}

/**
 * Read access shared by every pool state version
 */
export interface PoolStatus {
  readonly version: PoolVersion
  /** Whether the pool was initialized with data written to it */
  isInitialized(): boolean
  /** Bump seed of the pool authority */
  nonce(): number
  tokenProgramId(): PublicKey
  /** Token A reserve account */
  tokenAAccount(): PublicKey
  /** Token B reserve account */
  tokenBAccount(): PublicKey
  poolMint(): PublicKey
  tokenAMint(): PublicKey
  tokenBMint(): PublicKey
}

export class PoolStateV1 implements PoolStatus {
  static readonly LEN = POOL_STATE_V1_SPAN
  readonly version = PoolVersion.V1
  readonly data: PoolData

  constructor(data: PoolData) {
    this.data = data
  }

  static unpack = (data: Uint8Array): PoolStateV1 =>
    new PoolStateV1(deserializePoolState(data))

  pack = (): Buffer => serializePoolState(this.data)

  isInitialized = () => this.data.is_initialized
  nonce = () => this.data.nonce
  ammId = () => this.data.amm_id
  dexProgramId = () => this.data.dex_program_id
  marketId = () => this.data.market_id
  tokenProgramId = () => this.data.token_program_id
  tokenAAccount = () => this.data.token_a
  tokenBAccount = () => this.data.token_b
  poolMint = () => this.data.pool_mint
  tokenAMint = () => this.data.token_a_mint
  tokenBMint = () => this.data.token_b_mint
}

/**
 * Every known pool state layout, keyed by its leading version byte
 */
export type VersionedPoolState = PoolStateV1

/**
 * Pack a pool state behind its version byte
 * @param state
 * @returns Buffer of the version's full length
 */
export const serializeVersionedPoolState = (
  state: VersionedPoolState,
): Buffer => {
  const { version } = state
  switch (version) {
    case PoolVersion.V1: {
      const buf = Buffer.alloc(VERSIONED_POOL_STATE_SPAN)
      buf[0] = version
      state.pack().copy(buf, 1)
      return buf
    }
    default:
      throw new CodecError(ErrorKind.UnsupportedVersion, `got ${version}`)
  }
}

/**
 * Unpack a pool account whatever its layout version
 * @param data
 * @returns Version-tagged pool state
 */
export const deserializeVersionedPoolState = (
  data: Uint8Array,
): VersionedPoolState => {
  const buf = toBuffer(data)
  if (!buf.length)
    throw new CodecError(ErrorKind.BufferTooSmall, 'missing version byte')
  const version = buf[0]
  switch (version) {
    case PoolVersion.V1:
      return PoolStateV1.unpack(buf.subarray(1))
    default:
      throw new CodecError(ErrorKind.UnsupportedVersion, `got ${version}`)
  }
}

/**
 * Pre-check run before any pool instruction is processed.
 * Undecodable data counts as not initialized.
 * @param data
 * @returns true/false
 */
export const isPoolInitialized = (data: Uint8Array): boolean => {
  try {
    return deserializeVersionedPoolState(data).isInitialized()
  } catch (er) {
    return false
  }
}
