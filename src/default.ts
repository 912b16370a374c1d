export const DEFAULT_SPLT_PROGRAM_ADDRESS: string =
  'TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA'

export const DEFAULT_AMM_PROGRAM_ADDRESS: string =
  'SwaPpA9LAaLfeLi3a68M4DjnLqgtticKg6CnyNwgAC8'
