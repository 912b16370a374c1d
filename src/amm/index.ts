import {
  GetProgramAccountsFilter,
  PublicKey,
  TransactionInstruction,
} from '@solana/web3.js'

import account from '../account'
import { ProgramStateData } from '../schema'
import {
  DEFAULT_AMM_PROGRAM_ADDRESS,
  DEFAULT_SPLT_PROGRAM_ADDRESS,
} from '../default'
import { InstructionCode, PoolVersion, VERSIONED_POOL_STATE_SPAN } from './constant'
import {
  AmmInstruction,
  DepositAllTokenTypesData,
  DepositSingleTokenTypeExactAmountInData,
  SwapData,
  WithdrawAllTokenTypesData,
  WithdrawSingleTokenTypeExactAmountOutData,
  decodeInstruction,
  encodeInstruction,
} from './instruction'
import {
  POOL_STATE_V1_LAYOUT,
  VersionedPoolState,
  deserializeProgramState,
  deserializeVersionedPoolState,
} from './state'
import { assertU8 } from '../core/bytes'
import { fieldOf } from '../core/layout'

export type InitializeAccounts = {
  /** New pool account, signs its own creation */
  pool: PublicKey
  authority: PublicKey
  programState: PublicKey
  ammId: PublicKey
  tokenA: PublicKey
  tokenB: PublicKey
  poolMint: PublicKey
  /** Receives the initial pool token supply */
  destination: PublicKey
  market: PublicKey
  dexProgram: PublicKey
  tokenProgram?: PublicKey
}

export type SwapAccounts = {
  pool: PublicKey
  authority: PublicKey
  userTransferAuthority: PublicKey
  /** Passed read-only and non-signing; the deployed program's own builder marks it as a signer */
  programState: PublicKey
  source: PublicKey
  /** Pool reserve receiving the source token */
  swapSource: PublicKey
  /** Pool reserve paying out the destination token */
  swapDestination: PublicKey
  destination: PublicKey
  poolMint: PublicKey
  feeAccount: PublicKey
  tokenProgram?: PublicKey
}

export type DepositAllTokenTypesAccounts = {
  pool: PublicKey
  authority: PublicKey
  userTransferAuthority: PublicKey
  programState: PublicKey
  depositTokenA: PublicKey
  depositTokenB: PublicKey
  swapTokenA: PublicKey
  swapTokenB: PublicKey
  poolMint: PublicKey
  destination: PublicKey
  tokenProgram?: PublicKey
}

export type WithdrawAllTokenTypesAccounts = {
  pool: PublicKey
  authority: PublicKey
  userTransferAuthority: PublicKey
  programState: PublicKey
  poolMint: PublicKey
  /** User pool token account to burn from */
  source: PublicKey
  swapTokenA: PublicKey
  swapTokenB: PublicKey
  destinationTokenA: PublicKey
  destinationTokenB: PublicKey
  tokenProgram?: PublicKey
}

export type DepositSingleTokenTypeExactAmountInAccounts = {
  pool: PublicKey
  authority: PublicKey
  userTransferAuthority: PublicKey
  /** User account of either token A or token B */
  sourceToken: PublicKey
  swapTokenA: PublicKey
  swapTokenB: PublicKey
  poolMint: PublicKey
  destination: PublicKey
  tokenProgram?: PublicKey
}

export type WithdrawSingleTokenTypeExactAmountOutAccounts = {
  pool: PublicKey
  authority: PublicKey
  userTransferAuthority: PublicKey
  poolMint: PublicKey
  poolTokenSource: PublicKey
  swapTokenA: PublicKey
  swapTokenB: PublicKey
  /** User account of either token A or token B */
  destination: PublicKey
  tokenProgram?: PublicKey
}

// Base58 of the single version byte
const VERSION_BYTES: Record<PoolVersion, string> = {
  [PoolVersion.V1]: '2',
}

/**
 * Call builders and account parsers of the AMM program.
 * Builders only assemble instructions; nothing here checks that the accounts exist or who owns them.
 */
class Amm {
  readonly ammProgramId: PublicKey
  readonly spltProgramId: PublicKey

  constructor(
    ammProgramAddress = DEFAULT_AMM_PROGRAM_ADDRESS,
    spltProgramAddress = DEFAULT_SPLT_PROGRAM_ADDRESS,
  ) {
    if (!account.isAddress(ammProgramAddress))
      throw new Error('Invalid amm program address')
    if (!account.isAddress(spltProgramAddress))
      throw new Error('Invalid SPL token program address')
    this.ammProgramId = account.toPublicKey(ammProgramAddress)
    this.spltProgramId = account.toPublicKey(spltProgramAddress)
  }

  private buildInstruction = (
    keys: TransactionInstruction['keys'],
    instruction: AmmInstruction,
  ): TransactionInstruction => {
    return new TransactionInstruction({
      keys,
      programId: this.ammProgramId,
      data: encodeInstruction(instruction),
    })
  }

  /**
   * Derive the pool authority from the pool address and its bump seed
   * @param poolPublicKey
   * @param nonce
   * @returns Authority public key
   */
  deriveAuthority = (poolPublicKey: PublicKey, nonce: number): PublicKey => {
    return PublicKey.createProgramAddressSync(
      [poolPublicKey.toBuffer(), Buffer.from([assertU8(nonce)])],
      this.ammProgramId,
    )
  }

  /**
   * Find the pool authority and the bump seed that derives it
   * @param poolPublicKey
   * @returns Authority public key and nonce
   */
  findAuthority = (poolPublicKey: PublicKey): [PublicKey, number] => {
    return PublicKey.findProgramAddressSync(
      [poolPublicKey.toBuffer()],
      this.ammProgramId,
    )
  }

  /**
   * Parse pool buffer data
   * @param data
   * @returns Pool state of whatever version the account holds
   */
  parsePoolData = (data: Uint8Array): VersionedPoolState => {
    return deserializeVersionedPoolState(data)
  }

  /**
   * Parse program state buffer data
   * @param data
   * @returns Program state
   */
  parseProgramState = (data: Uint8Array): ProgramStateData => {
    return deserializeProgramState(data)
  }

  /**
   * Decode an instruction addressed to this program
   * @param instruction
   * @returns Typed instruction
   */
  parseInstruction = (instruction: TransactionInstruction): AmmInstruction => {
    if (!instruction.programId.equals(this.ammProgramId))
      throw new Error('Unmatched program id')
    return decodeInstruction(instruction.data)
  }

  /**
   * Filters selecting version 1 pool accounts, optionally narrowed by token mints
   * @param mintA - Token A mint
   * @param mintB - Token B mint
   * @returns Filters for getProgramAccounts
   */
  getPoolFilters = (
    mintA?: PublicKey,
    mintB?: PublicKey,
  ): GetProgramAccountsFilter[] => {
    const filters: GetProgramAccountsFilter[] = [
      { dataSize: VERSIONED_POOL_STATE_SPAN },
      { memcmp: { offset: 0, bytes: VERSION_BYTES[PoolVersion.V1] } },
    ]
    if (mintA)
      filters.push({
        memcmp: {
          offset: 1 + fieldOf(POOL_STATE_V1_LAYOUT, 'token_a_mint').offset,
          bytes: mintA.toBase58(),
        },
      })
    if (mintB)
      filters.push({
        memcmp: {
          offset: 1 + fieldOf(POOL_STATE_V1_LAYOUT, 'token_b_mint').offset,
          bytes: mintB.toBase58(),
        },
      })
    return filters
  }

  /**
   * Initialize a pool
   * @param accounts
   * @param nonce - Bump seed of the pool authority
   * @returns Instruction
   */
  initialize = (
    {
      pool,
      authority,
      programState,
      ammId,
      tokenA,
      tokenB,
      poolMint,
      destination,
      market,
      dexProgram,
      tokenProgram = this.spltProgramId,
    }: InitializeAccounts,
    nonce: number,
  ): TransactionInstruction => {
    return this.buildInstruction(
      [
        { pubkey: pool, isSigner: true, isWritable: true },
        { pubkey: authority, isSigner: false, isWritable: false },
        { pubkey: programState, isSigner: false, isWritable: false },
        { pubkey: ammId, isSigner: false, isWritable: false },
        { pubkey: tokenA, isSigner: false, isWritable: false },
        { pubkey: tokenB, isSigner: false, isWritable: false },
        { pubkey: poolMint, isSigner: false, isWritable: true },
        { pubkey: destination, isSigner: false, isWritable: true },
        { pubkey: market, isSigner: false, isWritable: true },
        { pubkey: tokenProgram, isSigner: false, isWritable: false },
        { pubkey: dexProgram, isSigner: false, isWritable: false },
      ],
      { code: InstructionCode.Initialize, nonce },
    )
  }

  /**
   * Swap
   * @param accounts
   * @param data - Amount in and the minimum amount out
   * @returns Instruction
   */
  swap = (
    {
      pool,
      authority,
      userTransferAuthority,
      programState,
      source,
      swapSource,
      swapDestination,
      destination,
      poolMint,
      feeAccount,
      tokenProgram = this.spltProgramId,
    }: SwapAccounts,
    data: SwapData,
  ): TransactionInstruction => {
    return this.buildInstruction(
      [
        { pubkey: pool, isSigner: false, isWritable: false },
        { pubkey: authority, isSigner: false, isWritable: false },
        { pubkey: userTransferAuthority, isSigner: true, isWritable: false },
        { pubkey: programState, isSigner: false, isWritable: false },
        { pubkey: source, isSigner: false, isWritable: true },
        { pubkey: swapSource, isSigner: false, isWritable: true },
        { pubkey: swapDestination, isSigner: false, isWritable: true },
        { pubkey: destination, isSigner: false, isWritable: true },
        { pubkey: poolMint, isSigner: false, isWritable: true },
        { pubkey: feeAccount, isSigner: false, isWritable: true },
        { pubkey: tokenProgram, isSigner: false, isWritable: false },
      ],
      { code: InstructionCode.Swap, ...data },
    )
  }

  /**
   * Deposit both tokens for pool tokens at the current ratio
   * @param accounts
   * @param data
   * @returns Instruction
   */
  depositAllTokenTypes = (
    {
      pool,
      authority,
      userTransferAuthority,
      programState,
      depositTokenA,
      depositTokenB,
      swapTokenA,
      swapTokenB,
      poolMint,
      destination,
      tokenProgram = this.spltProgramId,
    }: DepositAllTokenTypesAccounts,
    data: DepositAllTokenTypesData,
  ): TransactionInstruction => {
    return this.buildInstruction(
      [
        { pubkey: pool, isSigner: false, isWritable: false },
        { pubkey: authority, isSigner: false, isWritable: false },
        { pubkey: userTransferAuthority, isSigner: true, isWritable: false },
        { pubkey: programState, isSigner: false, isWritable: false },
        { pubkey: depositTokenA, isSigner: false, isWritable: true },
        { pubkey: depositTokenB, isSigner: false, isWritable: true },
        { pubkey: swapTokenA, isSigner: false, isWritable: true },
        { pubkey: swapTokenB, isSigner: false, isWritable: true },
        { pubkey: poolMint, isSigner: false, isWritable: true },
        { pubkey: destination, isSigner: false, isWritable: true },
        { pubkey: tokenProgram, isSigner: false, isWritable: false },
      ],
      { code: InstructionCode.DepositAllTokenTypes, ...data },
    )
  }

  /**
   * Burn pool tokens for both tokens at the current ratio
   * @param accounts
   * @param data
   * @returns Instruction
   */
  withdrawAllTokenTypes = (
    {
      pool,
      authority,
      userTransferAuthority,
      programState,
      poolMint,
      source,
      swapTokenA,
      swapTokenB,
      destinationTokenA,
      destinationTokenB,
      tokenProgram = this.spltProgramId,
    }: WithdrawAllTokenTypesAccounts,
    data: WithdrawAllTokenTypesData,
  ): TransactionInstruction => {
    return this.buildInstruction(
      [
        { pubkey: pool, isSigner: false, isWritable: false },
        { pubkey: authority, isSigner: false, isWritable: false },
        { pubkey: userTransferAuthority, isSigner: true, isWritable: false },
        { pubkey: programState, isSigner: false, isWritable: false },
        { pubkey: poolMint, isSigner: false, isWritable: true },
        { pubkey: source, isSigner: false, isWritable: true },
        { pubkey: swapTokenA, isSigner: false, isWritable: true },
        { pubkey: swapTokenB, isSigner: false, isWritable: true },
        { pubkey: destinationTokenA, isSigner: false, isWritable: true },
        { pubkey: destinationTokenB, isSigner: false, isWritable: true },
        { pubkey: tokenProgram, isSigner: false, isWritable: false },
      ],
      { code: InstructionCode.WithdrawAllTokenTypes, ...data },
    )
  }

  /**
   * Deposit an exact amount of one token for pool tokens
   * @param accounts
   * @param data
   * @returns Instruction
   */
  depositSingleTokenTypeExactAmountIn = (
    {
      pool,
      authority,
      userTransferAuthority,
      sourceToken,
      swapTokenA,
      swapTokenB,
      poolMint,
      destination,
      tokenProgram = this.spltProgramId,
    }: DepositSingleTokenTypeExactAmountInAccounts,
    data: DepositSingleTokenTypeExactAmountInData,
  ): TransactionInstruction => {
    return this.buildInstruction(
      [
        { pubkey: pool, isSigner: false, isWritable: false },
        { pubkey: authority, isSigner: false, isWritable: false },
        { pubkey: userTransferAuthority, isSigner: true, isWritable: false },
        { pubkey: sourceToken, isSigner: false, isWritable: true },
        { pubkey: swapTokenA, isSigner: false, isWritable: true },
        { pubkey: swapTokenB, isSigner: false, isWritable: true },
        { pubkey: poolMint, isSigner: false, isWritable: true },
        { pubkey: destination, isSigner: false, isWritable: true },
        { pubkey: tokenProgram, isSigner: false, isWritable: false },
      ],
      { code: InstructionCode.DepositSingleTokenTypeExactAmountIn, ...data },
    )
  }

  /**
   * Withdraw an exact amount of one token, burning at most the given pool tokens
   * @param accounts
   * @param data
   * @returns Instruction
   */
  withdrawSingleTokenTypeExactAmountOut = (
    {
      pool,
      authority,
      userTransferAuthority,
      poolMint,
      poolTokenSource,
      swapTokenA,
      swapTokenB,
      destination,
      tokenProgram = this.spltProgramId,
    }: WithdrawSingleTokenTypeExactAmountOutAccounts,
    data: WithdrawSingleTokenTypeExactAmountOutData,
  ): TransactionInstruction => {
    return this.buildInstruction(
      [
        { pubkey: pool, isSigner: false, isWritable: false },
        { pubkey: authority, isSigner: false, isWritable: false },
        { pubkey: userTransferAuthority, isSigner: true, isWritable: false },
        { pubkey: poolMint, isSigner: false, isWritable: true },
        { pubkey: poolTokenSource, isSigner: false, isWritable: true },
        { pubkey: swapTokenA, isSigner: false, isWritable: true },
        { pubkey: swapTokenB, isSigner: false, isWritable: true },
        { pubkey: destination, isSigner: false, isWritable: true },
        { pubkey: tokenProgram, isSigner: false, isWritable: false },
      ],
      { code: InstructionCode.WithdrawSingleTokenTypeExactAmountOut, ...data },
    )
  }
}

export default Amm
