export * from './errors'
export * from './io'
export * from './types'
