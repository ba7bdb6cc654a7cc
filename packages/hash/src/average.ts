/**
 * Average and difference hashes
 */

import { assertAnalyzable, type ImageData } from '@pixmeta/core'
import { resizePlane, toGrayscale } from '@pixmeta/transform'
import { createHash } from './bits'
import type { ImageHash } from './types'

/**
 * Average hash: size×size luma samples, bit set where a sample is at or
 * above the mean
 */
export function averageHash(image: ImageData, size = 8): ImageHash {
	assertAnalyzable(image.width, image.height)
	assertHashSize(size)

	const plane = resizePlane(toGrayscale(image), size, size)
	let sum = 0
	for (const value of plane.data) sum += value
	const mean = sum / plane.data.length

	return createHash(
		'average',
		Array.from(plane.data, (value) => value >= mean)
	)
}

/**
 * Difference hash: (size+1)×size luma samples, bit set where a pixel is at
 * or above its right-hand neighbour
 */
export function differenceHash(image: ImageData, size = 8): ImageHash {
	assertAnalyzable(image.width, image.height)
	assertHashSize(size)

	const width = size + 1
	const plane = resizePlane(toGrayscale(image), width, size)
	const bits: boolean[] = []

	for (let y = 0; y < size; y++) {
		const row = y * width
		for (let x = 0; x < size; x++) {
			bits.push(plane.data[row + x] >= plane.data[row + x + 1])
		}
	}

	return createHash('difference', bits)
}

export function assertHashSize(size: number): void {
	if (!Number.isInteger(size) || size < 2) {
		throw new RangeError(`Hash size must be an integer of at least 2: ${size}`)
	}
}
