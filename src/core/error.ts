export enum ErrorKind {
  MissingDiscriminant = 'MissingDiscriminant',
  UnknownDiscriminant = 'UnknownDiscriminant',
  TruncatedInput = 'TruncatedInput',
  MalformedPayload = 'MalformedPayload',
  BufferTooSmall = 'BufferTooSmall',
  InvalidFlagByte = 'InvalidFlagByte',
  UnsupportedVersion = 'UnsupportedVersion',
  InvalidCurveType = 'InvalidCurveType',
  ValueOutOfRange = 'ValueOutOfRange',
}

/**
 * On-chain rejections a codec failure stands for
 */
export type ProgramErrorName =
  | 'InvalidInstructionData'
  | 'InvalidAccountData'
  | 'UninitializedAccount'

const ErrorMapping: Record<ErrorKind, string> = {
  [ErrorKind.MissingDiscriminant]: 'Empty instruction data',
  [ErrorKind.UnknownDiscriminant]: 'Unknown instruction',
  [ErrorKind.TruncatedInput]: 'Not enough bytes',
  [ErrorKind.MalformedPayload]: 'Unexpected payload length',
  [ErrorKind.BufferTooSmall]: 'Account data is too small',
  [ErrorKind.InvalidFlagByte]: 'Invalid boolean flag',
  [ErrorKind.UnsupportedVersion]: 'Unsupported state version',
  [ErrorKind.InvalidCurveType]: 'Invalid curve type',
  [ErrorKind.ValueOutOfRange]: 'Value out of range',
}

export class CodecError extends Error {
  readonly kind: ErrorKind

  constructor(kind: ErrorKind, detail?: string) {
    const msg = detail ? `${ErrorMapping[kind]}: ${detail}` : ErrorMapping[kind]
    super(msg)

    this.name = 'CodecError'
    this.kind = kind
  }
}

/**
 * Check whether an unknown thrown value is a codec error, optionally of a given kind
 * @param er
 * @param kind
 * @returns true/false
 */
export const isCodecError = (er: unknown, kind?: ErrorKind): er is CodecError => {
  if (!(er instanceof CodecError)) return false
  return kind === undefined || er.kind === kind
}

/**
 * Map a codec failure to the program error the on-chain dispatcher returns for it.
 * Every instruction decoding failure rejects the whole call as invalid instruction data.
 * @param kind
 * @returns Program error name
 */
export const toProgramError = (kind: ErrorKind): ProgramErrorName => {
  switch (kind) {
    case ErrorKind.MissingDiscriminant:
    case ErrorKind.UnknownDiscriminant:
    case ErrorKind.TruncatedInput:
    case ErrorKind.MalformedPayload:
    case ErrorKind.ValueOutOfRange:
      return 'InvalidInstructionData'
    case ErrorKind.UnsupportedVersion:
      return 'UninitializedAccount'
    case ErrorKind.BufferTooSmall:
    case ErrorKind.InvalidFlagByte:
    case ErrorKind.InvalidCurveType:
      return 'InvalidAccountData'
  }
}
