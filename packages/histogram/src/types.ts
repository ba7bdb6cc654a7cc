/**
 * Histogram types
 */

import type { Rgb } from '@pixmeta/core'

/** Histogram data (256 bins per channel) */
export interface Histogram {
	/** Red channel histogram */
	red: Uint32Array
	/** Green channel histogram */
	green: Uint32Array
	/** Blue channel histogram */
	blue: Uint32Array
}

/** Channel statistics */
export interface ChannelStats {
	/** Minimum value */
	min: number
	/** Maximum value */
	max: number
	/** Mean (average) value */
	mean: number
	/** First value whose cumulative count exceeds half the pixels */
	median: number
	/** Population standard deviation */
	stdDev: number
	/** Root mean square */
	rms: number
	/** Total pixel count */
	count: number
}

/** Color statistics of an RGB image */
export interface ColorStats {
	red: ChannelStats
	green: ChannelStats
	blue: ChannelStats
	/** Red, green and blue histograms concatenated (768 bins) */
	histogram: number[]
}

export interface DominantColor {
	/** Hex color, `#rrggbb` */
	color: string
	rgb: Rgb
	/** Occurrences in the sample grid */
	count: number
}

export interface DominantColorOptions {
	/** Number of colors to return (default: 5) */
	topK?: number
	/** Side of the square sample grid (default: 100) */
	sampleSize?: number
}
