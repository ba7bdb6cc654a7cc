/**
 * @pixmeta/transform - Resampling and grayscale planes
 */

export * from './types'
export * from './resize'
export * from './grayscale'
