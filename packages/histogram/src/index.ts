/**
 * @pixmeta/histogram - Color statistics
 */

export * from './types'
export * from './analyze'
export * from './dominant'
export * from './geometry'
