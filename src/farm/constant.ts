export enum FarmInstructionCode {
  SetProgramData = 0,
  InitializeFarm = 1,
  Deposit = 2,
  Withdraw = 3,
  AddReward = 4,
  PayFarmFee = 5,
}
