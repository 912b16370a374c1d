import {
  AmmInstruction,
  ErrorKind,
  INSTRUCTION_SPAN,
  InstructionCode,
  decodeInstruction,
  encodeInstruction,
  isCodecError,
} from '../src'

const expectKind = (fn: () => unknown, kind: ErrorKind) => {
  let caught: unknown = null
  try {
    fn()
  } catch (er) {
    caught = er
  }
  expect(isCodecError(caught, kind)).toBe(true)
}

const instructions: AmmInstruction[] = [
  { code: InstructionCode.Initialize, nonce: 254 },
  {
    code: InstructionCode.Swap,
    amount_in: BigInt(1000000),
    minimum_amount_out: BigInt(990000),
  },
  {
    code: InstructionCode.DepositAllTokenTypes,
    pool_token_amount: BigInt(5),
    maximum_token_a_amount: BigInt('18446744073709551615'),
    maximum_token_b_amount: BigInt(0),
  },
  {
    code: InstructionCode.WithdrawAllTokenTypes,
    pool_token_amount: BigInt(700),
    minimum_token_a_amount: BigInt(300),
    minimum_token_b_amount: BigInt(200),
  },
  {
    code: InstructionCode.DepositSingleTokenTypeExactAmountIn,
    source_token_amount: BigInt(42),
    minimum_pool_token_amount: BigInt(41),
  },
  {
    code: InstructionCode.WithdrawSingleTokenTypeExactAmountOut,
    destination_token_amount: BigInt(9000),
    maximum_pool_token_amount: BigInt(9100),
  },
]

describe('instruction codec', () => {
  test('encodes swap to the documented bytes', () => {
    const data = encodeInstruction({
      code: InstructionCode.Swap,
      amount_in: BigInt(1000000),
      minimum_amount_out: BigInt(990000),
    })
    expect(data.toString('hex')).toBe('0140420f0000000000301b0f0000000000')
    expect(data.length).toBe(17)
  })

  test('decodes the documented swap bytes', () => {
    const data = Buffer.from('0140420f0000000000301b0f0000000000', 'hex')
    expect(decodeInstruction(data)).toEqual({
      code: InstructionCode.Swap,
      amount_in: BigInt(1000000),
      minimum_amount_out: BigInt(990000),
    })
  })

  test('encodes initialize as tag and nonce', () => {
    const data = encodeInstruction({ code: InstructionCode.Initialize, nonce: 7 })
    expect([...data]).toEqual([0, 7])
  })

  test('encodes deposit fields in declared order', () => {
    const data = encodeInstruction({
      code: InstructionCode.DepositAllTokenTypes,
      pool_token_amount: BigInt(1),
      maximum_token_a_amount: BigInt(2),
      maximum_token_b_amount: BigInt(3),
    })
    expect(data.toString('hex')).toBe(
      '02' + '0100000000000000' + '0200000000000000' + '0300000000000000',
    )
  })

  test.each(instructions)('round trips code $code', (instruction) => {
    const data = encodeInstruction(instruction)
    expect(data.length).toBe(INSTRUCTION_SPAN[instruction.code])
    expect(data[0]).toBe(instruction.code)
    expect(decodeInstruction(data)).toEqual(instruction)
  })

  test.each(instructions)('rejects every truncation of code $code', (instruction) => {
    const data = encodeInstruction(instruction)
    expectKind(() => decodeInstruction(data.subarray(0, 0)), ErrorKind.MissingDiscriminant)
    for (let n = 1; n < data.length; n++) {
      const kind =
        instruction.code === InstructionCode.Initialize
          ? ErrorKind.MalformedPayload
          : ErrorKind.TruncatedInput
      expectKind(() => decodeInstruction(data.subarray(0, n)), kind)
    }
  })

  test('rejects an empty payload', () => {
    expectKind(() => decodeInstruction(Buffer.alloc(0)), ErrorKind.MissingDiscriminant)
  })

  test('rejects unknown tags', () => {
    expectKind(() => decodeInstruction(Buffer.from([6])), ErrorKind.UnknownDiscriminant)
    expectKind(
      () => decodeInstruction(Buffer.concat([Buffer.from([6]), Buffer.alloc(24)])),
      ErrorKind.UnknownDiscriminant,
    )
    expectKind(() => decodeInstruction(Buffer.from([255, 1])), ErrorKind.UnknownDiscriminant)
  })

  test('initialize takes exactly one byte', () => {
    expectKind(() => decodeInstruction(Buffer.from([0])), ErrorKind.MalformedPayload)
    expectKind(() => decodeInstruction(Buffer.from([0, 5, 9])), ErrorKind.MalformedPayload)
    expect(decodeInstruction(Buffer.from([0, 5]))).toEqual({
      code: InstructionCode.Initialize,
      nonce: 5,
    })
  })

  test('other instructions ignore trailing bytes', () => {
    const swap = Buffer.concat([
      Buffer.from('0140420f0000000000301b0f0000000000', 'hex'),
      Buffer.from([1, 2, 3]),
    ])
    expect(decodeInstruction(swap)).toEqual({
      code: InstructionCode.Swap,
      amount_in: BigInt(1000000),
      minimum_amount_out: BigInt(990000),
    })
    const withdraw = Buffer.concat([
      encodeInstruction(instructions[3]),
      Buffer.alloc(8, 0xff),
    ])
    expect(decodeInstruction(withdraw)).toEqual(instructions[3])
  })

  test('decodes from a plain Uint8Array', () => {
    const data = new Uint8Array(encodeInstruction(instructions[4]))
    expect(decodeInstruction(data)).toEqual(instructions[4])
  })

  test('refuses to encode a nonce wider than a byte', () => {
    expectKind(
      () => encodeInstruction({ code: InstructionCode.Initialize, nonce: 256 }),
      ErrorKind.ValueOutOfRange,
    )
  })
})
