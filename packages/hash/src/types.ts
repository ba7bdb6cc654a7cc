/**
 * Hash types
 */

export type HashAlgorithm = 'average' | 'difference' | 'wavelet' | 'perceptual'

export const HASH_ALGORITHMS: readonly HashAlgorithm[] = ['average', 'difference', 'wavelet', 'perceptual']

/**
 * Fixed-length bit fingerprint
 *
 * Bits are row-major; `hex` renders them with the first bit most significant.
 */
export interface ImageHash {
	readonly algorithm: HashAlgorithm
	readonly bits: readonly boolean[]
	readonly hex: string
}

/** One hash per algorithm. Hashes of different algorithms are not comparable. */
export interface HashSet {
	readonly average: ImageHash
	readonly difference: ImageHash
	readonly wavelet: ImageHash
	readonly perceptual: ImageHash
}

/** Per-algorithm Hamming distances between two hash sets */
export type HashDistances = Record<HashAlgorithm, number>

export interface HashOptions {
	/** Hash side length; bits per hash = size² (default: 8) */
	size?: number
	/** Wavelet working resolution (default: max(64, size)) */
	waveletScale?: number
	/** DCT working resolution as a multiple of size (default: 4) */
	dctFactor?: number
}
