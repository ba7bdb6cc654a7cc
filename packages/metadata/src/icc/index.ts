export * from './types'
export * from './parser'
