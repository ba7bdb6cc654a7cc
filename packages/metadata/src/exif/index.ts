export * from './types'
export * from './tags'
export * from './parser'
export * from './gps'
export * from './summary'
