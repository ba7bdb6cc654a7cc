/**
 * Dominant colors
 */

import { assertAnalyzable, type ImageData, type Rgb } from '@pixmeta/core'
import { resize } from '@pixmeta/transform'
import type { DominantColor, DominantColorOptions } from './types'

/**
 * Most frequent exact colors in a nearest-neighbor sample of the image
 *
 * Sorted by count, most frequent first; equal counts keep the order in
 * which the colors were first met scanning the sample row by row.
 */
export function dominantColors(image: ImageData, options: DominantColorOptions = {}): DominantColor[] {
	const { topK = 5, sampleSize = 100 } = options
	assertAnalyzable(image.width, image.height)
	if (!Number.isInteger(topK) || topK < 1) {
		throw new RangeError(`topK must be a positive integer: ${topK}`)
	}

	const sample = resize(image, sampleSize, sampleSize, { method: 'nearest' })
	const counts = new Map<number, number>()
	const { data } = sample

	for (let i = 0; i < data.length; i += 4) {
		const key = (data[i] << 16) | (data[i + 1] << 8) | data[i + 2]
		counts.set(key, (counts.get(key) ?? 0) + 1)
	}

	return [...counts]
		.sort((a, b) => b[1] - a[1])
		.slice(0, topK)
		.map(([key, count]) => {
			const rgb: Rgb = [(key >> 16) & 0xff, (key >> 8) & 0xff, key & 0xff]
			return { color: toHexColor(rgb), rgb, count }
		})
}

export function toHexColor([r, g, b]: Rgb): string {
	return `#${[r, g, b].map((v) => v.toString(16).padStart(2, '0')).join('')}`
}
