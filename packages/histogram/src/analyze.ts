/**
 * Histogram analysis
 */

import { assertAnalyzable, type ImageData } from '@pixmeta/core'
import type { ChannelStats, ColorStats, Histogram } from './types'

/**
 * Calculate RGB histograms for an image, ignoring alpha
 */
export function calculateHistogram(image: ImageData): Histogram {
	const { data } = image
	const red = new Uint32Array(256)
	const green = new Uint32Array(256)
	const blue = new Uint32Array(256)

	for (let i = 0; i < data.length; i += 4) {
		red[data[i]]++
		green[data[i + 1]]++
		blue[data[i + 2]]++
	}

	return { red, green, blue }
}

/**
 * Per-channel statistics and the 768-bin histogram
 */
export function calculateColorStats(image: ImageData): ColorStats {
	assertAnalyzable(image.width, image.height)

	const histogram = calculateHistogram(image)

	return {
		red: calculateChannelStats(histogram.red),
		green: calculateChannelStats(histogram.green),
		blue: calculateChannelStats(histogram.blue),
		histogram: [...histogram.red, ...histogram.green, ...histogram.blue],
	}
}

/**
 * Calculate statistics for a single channel
 */
export function calculateChannelStats(histogram: Uint32Array): ChannelStats {
	let min = 255
	let max = 0
	let sum = 0
	let sumSquares = 0
	let count = 0

	// Find min, max, sums, count
	for (let i = 0; i < 256; i++) {
		const freq = histogram[i]
		if (freq > 0) {
			if (i < min) min = i
			if (i > max) max = i
			sum += i * freq
			sumSquares += i * i * freq
			count += freq
		}
	}

	if (count === 0) {
		return { min: 0, max: 0, mean: 0, median: 0, stdDev: 0, rms: 0, count: 0 }
	}

	const mean = sum / count

	// Calculate standard deviation
	let variance = 0
	for (let i = 0; i < 256; i++) {
		const freq = histogram[i]
		if (freq > 0) {
			const diff = i - mean
			variance += diff * diff * freq
		}
	}
	const stdDev = Math.sqrt(variance / count)
	const rms = Math.sqrt(sumSquares / count)

	// Calculate median
	let median = 0
	let cumulative = 0
	const half = Math.floor(count / 2)
	for (let i = 0; i < 256; i++) {
		cumulative += histogram[i]
		if (cumulative > half) {
			median = i
			break
		}
	}

	return { min, max, mean, median, stdDev, rms, count }
}
