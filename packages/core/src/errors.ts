/**
 * Error taxonomy
 *
 * - malformed-container: the codec cannot produce a pixel grid (fatal)
 * - malformed-metadata: an EXIF/ICC block does not parse (degrades one field)
 * - degenerate-geometry: zero or single-pixel image (disables pixel analysis)
 * - unsupported-input: file type outside the accepted set (rejected up front)
 */

export type ErrorCategory =
	| 'malformed-container'
	| 'malformed-metadata'
	| 'degenerate-geometry'
	| 'unsupported-input'

export abstract class PixmetaError extends Error {
	abstract readonly category: ErrorCategory

	constructor(message: string) {
		super(message)
		this.name = new.target.name
	}
}

export class DecodeError extends PixmetaError {
	readonly category = 'malformed-container'
}

export class MalformedMetadataError extends PixmetaError {
	readonly category = 'malformed-metadata'
}

export class DegenerateGeometryError extends PixmetaError {
	readonly category = 'degenerate-geometry'

	constructor(
		readonly width: number,
		readonly height: number
	) {
		super(`degenerate geometry: ${width}x${height}`)
	}
}

export class UnsupportedFormatError extends PixmetaError {
	readonly category = 'unsupported-input'
}

/**
 * Throw unless the image has enough pixels for hashing and statistics
 */
export function assertAnalyzable(width: number, height: number): void {
	if (width <= 0 || height <= 0 || width * height === 1) {
		throw new DegenerateGeometryError(width, height)
	}
}
