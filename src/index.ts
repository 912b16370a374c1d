export { default as account } from './account'

export * from './default'

export * from './schema'

export * from './core/error'
export * from './core/bytes'
export * from './core/layout'

export * from './amm/constant'
export * from './amm/instruction'
export * from './amm/fees'
export * from './amm/curve'
export * from './amm/state'
export * from './amm'
export { default as Amm } from './amm'

export * from './farm/constant'
export * from './farm/instruction'
export * from './farm'
export { default as Farm } from './farm'
