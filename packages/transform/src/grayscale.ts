/**
 * Grayscale conversion
 */

import { createPlane, type ImageData, type Plane } from '@pixmeta/core'

/**
 * ITU-R 601-2 luma of an RGB triple
 */
export function luma(r: number, g: number, b: number): number {
	return (r * 299 + g * 587 + b * 114) / 1000
}

/**
 * Convert RGBA pixels to a luma plane, ignoring alpha
 */
export function toGrayscale(image: ImageData): Plane {
	const plane = createPlane(image.width, image.height)
	const { data } = image

	for (let i = 0; i < plane.data.length; i++) {
		const idx = i * 4
		plane.data[i] = luma(data[idx], data[idx + 1], data[idx + 2])
	}

	return plane
}
