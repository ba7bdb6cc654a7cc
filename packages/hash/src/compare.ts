/**
 * Hamming comparison
 */

import { createHash, hexToBits } from './bits'
import { HASH_ALGORITHMS, type HashAlgorithm, type HashDistances, type HashSet, type ImageHash } from './types'

/**
 * Raised when two hashes of different algorithms or lengths are compared
 */
export class HashMismatchError extends Error {
	constructor(
		readonly left: ImageHash,
		readonly right: ImageHash
	) {
		super(
			`Cannot compare ${left.algorithm} hash of ${left.bits.length} bits with ${right.algorithm} hash of ${right.bits.length} bits`
		)
		this.name = 'HashMismatchError'
	}
}

/**
 * Number of differing bits between two hashes of the same algorithm
 */
export function hammingDistance(a: ImageHash, b: ImageHash): number {
	if (a.algorithm !== b.algorithm || a.bits.length !== b.bits.length) {
		throw new HashMismatchError(a, b)
	}

	let distance = 0
	for (let i = 0; i < a.bits.length; i++) {
		if (a.bits[i] !== b.bits[i]) distance++
	}
	return distance
}

/**
 * Per-algorithm distances; each hash is only ever compared with its
 * counterpart
 */
export function compareHashes(a: HashSet, b: HashSet): HashDistances {
	return {
		average: hammingDistance(a.average, b.average),
		difference: hammingDistance(a.difference, b.difference),
		wavelet: hammingDistance(a.wavelet, b.wavelet),
		perceptual: hammingDistance(a.perceptual, b.perceptual),
	}
}

/**
 * Rebuild a hash from its hex rendering
 */
export function hashFromHex(algorithm: string, hex: string, bitLength?: number): ImageHash {
	if (!isHashAlgorithm(algorithm)) {
		throw new RangeError(`Unknown hash algorithm: ${algorithm}`)
	}
	return createHash(algorithm, hexToBits(hex.toLowerCase(), bitLength))
}

export function isHashAlgorithm(name: string): name is HashAlgorithm {
	return HASH_ALGORITHMS.some((algorithm) => algorithm === name)
}
