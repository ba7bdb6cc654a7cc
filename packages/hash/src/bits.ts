/**
 * Bit vector encoding
 */

import type { HashAlgorithm, ImageHash } from './types'

export function createHash(algorithm: HashAlgorithm, bits: readonly boolean[]): ImageHash {
	return { algorithm, bits, hex: bitsToHex(bits) }
}

/**
 * Render bits as lowercase hex, first bit most significant
 *
 * Lengths that are not a multiple of four are zero-padded at the front.
 */
export function bitsToHex(bits: readonly boolean[]): string {
	const pad = (4 - (bits.length % 4)) % 4
	let hex = ''
	let nibble = 0

	for (let i = 0; i < pad + bits.length; i++) {
		const bit = i >= pad && bits[i - pad]
		nibble = (nibble << 1) | (bit ? 1 : 0)
		if (i % 4 === 3) {
			hex += nibble.toString(16)
			nibble = 0
		}
	}

	return hex
}

/**
 * Inverse of bitsToHex
 */
export function hexToBits(hex: string, bitLength = hex.length * 4): boolean[] {
	if (!/^[0-9a-f]*$/i.test(hex)) {
		throw new RangeError(`Invalid hash hex: ${JSON.stringify(hex)}`)
	}
	const pad = hex.length * 4 - bitLength
	if (pad < 0 || pad > 3) {
		throw new RangeError(`Hash hex of ${hex.length} digits cannot hold ${bitLength} bits`)
	}

	const bits: boolean[] = []
	for (let i = 0; i < hex.length; i++) {
		const nibble = Number.parseInt(hex[i], 16)
		for (let b = 3; b >= 0; b--) {
			bits.push(((nibble >> b) & 1) === 1)
		}
	}

	return bits.slice(pad)
}

/**
 * Median of a sample set, averaging the two middle values for even counts
 */
export function median(values: ArrayLike<number>): number {
	const sorted = Array.from(values).sort((a, b) => a - b)
	if (sorted.length === 0) return Number.NaN
	const mid = sorted.length >> 1
	return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2
}
