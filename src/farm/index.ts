import {
  PublicKey,
  SYSVAR_CLOCK_PUBKEY,
  TransactionInstruction,
} from '@solana/web3.js'

import account from '../account'
import { FarmProgramData } from '../schema'
import { DEFAULT_SPLT_PROGRAM_ADDRESS } from '../default'
import { FarmInstructionCode } from './constant'
import {
  FarmInstruction,
  InitializeFarmData,
  decodeFarmInstruction,
  encodeFarmInstruction,
} from './instruction'

export type SetProgramDataAccounts = {
  programData: PublicKey
  superOwner: PublicKey
}

export type InitializeFarmAccounts = {
  farm: PublicKey
  authority: PublicKey
  /** Creator and manager of the farm */
  owner: PublicKey
  poolLpToken: PublicKey
  /** Reward vault the creator funds */
  poolRewardToken: PublicKey
  poolMint: PublicKey
  rewardMint: PublicKey
  ammId: PublicKey
  programData: PublicKey
}

export type StakeAccounts = {
  farm: PublicKey
  authority: PublicKey
  owner: PublicKey
  userInfo: PublicKey
  userLpToken: PublicKey
  poolLpToken: PublicKey
  userRewardToken: PublicKey
  poolRewardToken: PublicKey
  poolLpMint: PublicKey
  feeRewardAta: PublicKey
  programData: PublicKey
  tokenProgram?: PublicKey
}

export type AddRewardAccounts = {
  farm: PublicKey
  authority: PublicKey
  owner: PublicKey
  userRewardToken: PublicKey
  poolRewardToken: PublicKey
  poolLpToken: PublicKey
  poolLpMint: PublicKey
  programData: PublicKey
  tokenProgram?: PublicKey
}

export type PayFarmFeeAccounts = {
  farm: PublicKey
  authority: PublicKey
  owner: PublicKey
  userUsdcToken: PublicKey
  feeUsdcAta: PublicKey
  programData: PublicKey
  tokenProgram?: PublicKey
}

class Farm {
  readonly farmProgramId: PublicKey
  readonly spltProgramId: PublicKey

  constructor(
    farmProgramAddress: string,
    spltProgramAddress = DEFAULT_SPLT_PROGRAM_ADDRESS,
  ) {
    if (!account.isAddress(farmProgramAddress))
      throw new Error('Invalid farm program address')
    if (!account.isAddress(spltProgramAddress))
      throw new Error('Invalid SPL token program address')
    this.farmProgramId = account.toPublicKey(farmProgramAddress)
    this.spltProgramId = account.toPublicKey(spltProgramAddress)
  }

  private buildInstruction = (
    keys: TransactionInstruction['keys'],
    instruction: FarmInstruction,
  ): TransactionInstruction => {
    return new TransactionInstruction({
      keys,
      programId: this.farmProgramId,
      data: encodeFarmInstruction(instruction),
    })
  }

  /**
   * Decode an instruction addressed to this program
   * @param instruction
   * @returns Typed instruction
   */
  parseInstruction = (instruction: TransactionInstruction): FarmInstruction => {
    if (!instruction.programId.equals(this.farmProgramId))
      throw new Error('Unmatched program id')
    return decodeFarmInstruction(instruction.data)
  }

  /**
   * Set the farm program data: owners, allowed creator, fees
   * @param accounts
   * @param data
   * @returns Instruction
   */
  setProgramData = (
    { programData, superOwner }: SetProgramDataAccounts,
    data: FarmProgramData,
  ): TransactionInstruction => {
    return this.buildInstruction(
      [
        { pubkey: programData, isSigner: false, isWritable: true },
        { pubkey: superOwner, isSigner: true, isWritable: true },
      ],
      { code: FarmInstructionCode.SetProgramData, ...data },
    )
  }

  /**
   * Initialize a farm over an AMM pool's LP token
   * @param accounts
   * @param data - Authority nonce and the farming window
   * @returns Instruction
   */
  initializeFarm = (
    {
      farm,
      authority,
      owner,
      poolLpToken,
      poolRewardToken,
      poolMint,
      rewardMint,
      ammId,
      programData,
    }: InitializeFarmAccounts,
    data: InitializeFarmData,
  ): TransactionInstruction => {
    return this.buildInstruction(
      [
        { pubkey: farm, isSigner: false, isWritable: true },
        { pubkey: authority, isSigner: false, isWritable: true },
        { pubkey: owner, isSigner: true, isWritable: false },
        { pubkey: poolLpToken, isSigner: false, isWritable: true },
        { pubkey: poolRewardToken, isSigner: false, isWritable: true },
        { pubkey: poolMint, isSigner: false, isWritable: false },
        { pubkey: rewardMint, isSigner: false, isWritable: false },
        { pubkey: ammId, isSigner: false, isWritable: false },
        { pubkey: programData, isSigner: false, isWritable: false },
      ],
      { code: FarmInstructionCode.InitializeFarm, ...data },
    )
  }

  private stakeKeys = (
    {
      farm,
      authority,
      owner,
      userInfo,
      userLpToken,
      poolLpToken,
      userRewardToken,
      poolRewardToken,
      poolLpMint,
      feeRewardAta,
      programData,
      tokenProgram = this.spltProgramId,
    }: StakeAccounts,
    ownerWritable: boolean,
  ): TransactionInstruction['keys'] => [
    { pubkey: farm, isSigner: false, isWritable: true },
    { pubkey: authority, isSigner: false, isWritable: false },
    { pubkey: owner, isSigner: true, isWritable: ownerWritable },
    { pubkey: userInfo, isSigner: false, isWritable: true },
    { pubkey: userLpToken, isSigner: false, isWritable: true },
    { pubkey: poolLpToken, isSigner: false, isWritable: true },
    { pubkey: userRewardToken, isSigner: false, isWritable: true },
    { pubkey: poolRewardToken, isSigner: false, isWritable: true },
    { pubkey: poolLpMint, isSigner: false, isWritable: true },
    { pubkey: feeRewardAta, isSigner: false, isWritable: true },
    { pubkey: programData, isSigner: false, isWritable: true },
    { pubkey: tokenProgram, isSigner: false, isWritable: true },
    { pubkey: SYSVAR_CLOCK_PUBKEY, isSigner: false, isWritable: false },
  ]

  /**
   * Stake LP tokens. A zero amount only harvests.
   * @param accounts
   * @param amount
   * @returns Instruction
   */
  deposit = (accounts: StakeAccounts, amount: bigint): TransactionInstruction => {
    return this.buildInstruction(this.stakeKeys(accounts, false), {
      code: FarmInstructionCode.Deposit,
      amount,
    })
  }

  /**
   * Unstake LP tokens, harvesting first
   * @param accounts
   * @param amount
   * @returns Instruction
   */
  withdraw = (accounts: StakeAccounts, amount: bigint): TransactionInstruction => {
    return this.buildInstruction(this.stakeKeys(accounts, true), {
      code: FarmInstructionCode.Withdraw,
      amount,
    })
  }

  /**
   * Top up the reward vault of a farm
   * @param accounts
   * @param amount
   * @returns Instruction
   */
  addReward = (
    {
      farm,
      authority,
      owner,
      userRewardToken,
      poolRewardToken,
      poolLpToken,
      poolLpMint,
      programData,
      tokenProgram = this.spltProgramId,
    }: AddRewardAccounts,
    amount: bigint,
  ): TransactionInstruction => {
    return this.buildInstruction(
      [
        { pubkey: farm, isSigner: false, isWritable: true },
        { pubkey: authority, isSigner: false, isWritable: false },
        { pubkey: owner, isSigner: true, isWritable: false },
        { pubkey: userRewardToken, isSigner: false, isWritable: true },
        { pubkey: poolRewardToken, isSigner: false, isWritable: true },
        { pubkey: poolLpToken, isSigner: false, isWritable: true },
        { pubkey: poolLpMint, isSigner: false, isWritable: true },
        { pubkey: programData, isSigner: false, isWritable: true },
        { pubkey: tokenProgram, isSigner: false, isWritable: true },
        { pubkey: SYSVAR_CLOCK_PUBKEY, isSigner: false, isWritable: false },
      ],
      { code: FarmInstructionCode.AddReward, amount },
    )
  }

  /**
   * Pay the farm fee so the farm is allowed to stake, unstake and harvest
   * @param accounts
   * @param amount
   * @returns Instruction
   */
  payFarmFee = (
    {
      farm,
      authority,
      owner,
      userUsdcToken,
      feeUsdcAta,
      programData,
      tokenProgram = this.spltProgramId,
    }: PayFarmFeeAccounts,
    amount: bigint,
  ): TransactionInstruction => {
    return this.buildInstruction(
      [
        { pubkey: farm, isSigner: false, isWritable: true },
        { pubkey: authority, isSigner: false, isWritable: false },
        { pubkey: owner, isSigner: true, isWritable: false },
        { pubkey: userUsdcToken, isSigner: false, isWritable: true },
        { pubkey: feeUsdcAta, isSigner: false, isWritable: true },
        { pubkey: programData, isSigner: false, isWritable: true },
        { pubkey: tokenProgram, isSigner: false, isWritable: true },
      ],
      { code: FarmInstructionCode.PayFarmFee, amount },
    )
  }
}

export default Farm
