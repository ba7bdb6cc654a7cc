/**
 * Metadata record
 */

import type { Field, PixelFormat } from '@pixmeta/core'
import type { HashAlgorithm } from '@pixmeta/hash'
import type { ColorStats, DominantColor } from '@pixmeta/histogram'
import type { ExifSummary, GpsCoordinate, IccDescription, SerializedTagValue } from '@pixmeta/metadata'

/** Hex digest per hash algorithm */
export type HashDigest = Record<HashAlgorithm, string>

/**
 * Normalized metadata for one image
 *
 * Format, dimensions and file size are always present. Every other
 * analysis reports independently: `absent` when the source has nothing to
 * analyze, `error` when the analysis failed.
 */
export interface MetadataRecord {
	filename: string | null
	format: string
	/** PIL-style channel layout of the source, e.g. "RGB", "RGBA", "L" */
	mode: string
	width: number
	height: number
	fileSize: number | null
	aspectRatio: string | null
	megapixels: number
	pixelFormat: PixelFormat
	icc: IccDescription
	exif: Field<ExifSummary>
	tags: Field<Record<string, SerializedTagValue>>
	gps: Field<GpsCoordinate>
	hashes: Field<HashDigest>
	colorStats: Field<ColorStats>
	dominantColors: Field<DominantColor[]>
}

export interface ExtractOptions {
	/** Dominant colors to report (default: 5) */
	topColors?: number
	/** Side of the dominant-color sample grid (default: 100) */
	sampleSize?: number
	/** Hash side length (default: 8) */
	hashSize?: number
}
