/**
 * Wavelet hash
 */

import { assertAnalyzable, createPlane, type ImageData, type Plane } from '@pixmeta/core'
import { resizePlane, toGrayscale } from '@pixmeta/transform'
import { assertHashSize } from './average'
import { createHash, median } from './bits'
import type { ImageHash } from './types'

/**
 * Wavelet hash: luma resampled to scale×scale and normalized to [0, 1],
 * reduced by log2(scale/size) levels of 2D Haar decomposition; bits set
 * where the low-frequency coefficient is above the band median
 */
export function waveletHash(image: ImageData, size = 8, scale = Math.max(64, size)): ImageHash {
	assertAnalyzable(image.width, image.height)
	assertHashSize(size)
	if (!isPowerOfTwo(size)) {
		throw new RangeError(`Wavelet hash size must be a power of two: ${size}`)
	}
	if (!isPowerOfTwo(scale) || scale < size) {
		throw new RangeError(`Wavelet scale must be a power of two no smaller than ${size}: ${scale}`)
	}

	let band = resizePlane(toGrayscale(image), scale, scale)
	for (let i = 0; i < band.data.length; i++) {
		band.data[i] /= 255
	}

	const levels = Math.log2(scale / size)
	for (let level = 0; level < levels; level++) {
		band = haarLowPass(band)
	}

	const threshold = median(band.data)
	return createHash(
		'wavelet',
		Array.from(band.data, (value) => value > threshold)
	)
}

/**
 * One level of the orthonormal 2D Haar transform, approximation band only
 */
export function haarLowPass(plane: Plane): Plane {
	const width = plane.width >> 1
	const height = plane.height >> 1
	const out = createPlane(width, height)
	const src = plane.data

	for (let y = 0; y < height; y++) {
		const top = 2 * y * plane.width
		const bottom = top + plane.width
		for (let x = 0; x < width; x++) {
			const left = 2 * x
			out.data[y * width + x] = (src[top + left] + src[top + left + 1] + src[bottom + left] + src[bottom + left + 1]) / 2
		}
	}

	return out
}

function isPowerOfTwo(value: number): boolean {
	return Number.isInteger(value) && value > 0 && (value & (value - 1)) === 0
}
