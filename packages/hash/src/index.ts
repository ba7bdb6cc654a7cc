/**
 * @pixmeta/hash
 *
 * Perceptual similarity hashes:
 * - average (aHash)
 * - difference (dHash)
 * - wavelet (wHash, Haar)
 * - perceptual (pHash, DCT)
 *
 * Hashes compare by Hamming distance within one algorithm only.
 */

export * from './types'
export * from './bits'
export * from './average'
export * from './wavelet'
export * from './perceptual'
export * from './compute'
export * from './compare'
