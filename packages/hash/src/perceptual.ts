/**
 * DCT-based perceptual hash
 */

import { assertAnalyzable, createPlane, type ImageData, type Plane } from '@pixmeta/core'
import { resizePlane, toGrayscale } from '@pixmeta/transform'
import { assertHashSize } from './average'
import { createHash, median } from './bits'
import type { ImageHash } from './types'

/**
 * Perceptual hash: 2D DCT-II of a (size·factor)² luma plane, keeping the
 * top-left size×size coefficients. The threshold is their median with the
 * DC term left out; every coefficient above it sets a bit.
 */
export function perceptualHash(image: ImageData, size = 8, factor = 4): ImageHash {
	assertAnalyzable(image.width, image.height)
	assertHashSize(size)
	if (!Number.isInteger(factor) || factor < 1) {
		throw new RangeError(`DCT factor must be a positive integer: ${factor}`)
	}

	const n = size * factor
	const plane = resizePlane(toGrayscale(image), n, n)
	const block = dctLowFrequencies(plane, size)

	const threshold = median(block.data.subarray(1))
	return createHash(
		'perceptual',
		Array.from(block.data, (value) => value > threshold)
	)
}

/**
 * First `count`×`count` coefficients of the unnormalized 2D DCT-II
 *
 * X[k] = 2 Σ x[n] cos(πk(2n+1) / 2N), applied along rows then columns.
 */
export function dctLowFrequencies(plane: Plane, count: number): Plane {
	const { width, height, data } = plane
	const rowBasis = cosineBasis(width, count)
	const columnBasis = cosineBasis(height, count)

	// Rows: height × count
	const rows = new Float64Array(height * count)
	for (let y = 0; y < height; y++) {
		for (let k = 0; k < count; k++) {
			let sum = 0
			for (let x = 0; x < width; x++) {
				sum += data[y * width + x] * rowBasis[k * width + x]
			}
			rows[y * count + k] = 2 * sum
		}
	}

	// Columns: count × count
	const out = createPlane(count, count)
	for (let k = 0; k < count; k++) {
		for (let u = 0; u < count; u++) {
			let sum = 0
			for (let y = 0; y < height; y++) {
				sum += rows[y * count + u] * columnBasis[k * height + y]
			}
			out.data[k * count + u] = 2 * sum
		}
	}

	return out
}

function cosineBasis(length: number, count: number): Float64Array {
	const basis = new Float64Array(count * length)
	for (let k = 0; k < count; k++) {
		for (let n = 0; n < length; n++) {
			basis[k * length + n] = Math.cos((Math.PI * k * (2 * n + 1)) / (2 * length))
		}
	}
	return basis
}
