import { UnsupportedFormatError } from './errors'
import type { ImageFormat } from './types'

/**
 * Magic bytes for format detection
 */
const MAGIC_BYTES: Record<string, { bytes: number[]; offset?: number }> = {
	png: { bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
	jpeg: { bytes: [0xff, 0xd8, 0xff] },
	riff: { bytes: [0x52, 0x49, 0x46, 0x46] }, // "RIFF"
	webp: { bytes: [0x57, 0x45, 0x42, 0x50], offset: 8 }, // "WEBP"
	tiff_le: { bytes: [0x49, 0x49, 0x2a, 0x00] }, // Little endian
	tiff_be: { bytes: [0x4d, 0x4d, 0x00, 0x2a] }, // Big endian
}

/**
 * File extensions accepted at the service boundary
 */
const EXTENSION_FORMATS: Record<string, ImageFormat> = {
	jpg: 'jpeg',
	jpeg: 'jpeg',
	png: 'png',
	webp: 'webp',
	tif: 'tiff',
	tiff: 'tiff',
}

export const SUPPORTED_EXTENSIONS: readonly string[] = Object.keys(EXTENSION_FORMATS).map(
	(ext) => `.${ext}`
)

function matchMagic(data: Uint8Array, magic: { bytes: number[]; offset?: number }): boolean {
	const offset = magic.offset ?? 0
	if (data.length < offset + magic.bytes.length) return false

	for (let i = 0; i < magic.bytes.length; i++) {
		if (data[offset + i] !== magic.bytes[i]) return false
	}
	return true
}

/**
 * Detect container format from binary data
 */
export function detectFormat(data: Uint8Array): ImageFormat | null {
	if (matchMagic(data, MAGIC_BYTES.png)) return 'png'
	if (matchMagic(data, MAGIC_BYTES.jpeg)) return 'jpeg'
	if (matchMagic(data, MAGIC_BYTES.riff) && matchMagic(data, MAGIC_BYTES.webp)) return 'webp'
	if (matchMagic(data, MAGIC_BYTES.tiff_le) || matchMagic(data, MAGIC_BYTES.tiff_be)) return 'tiff'
	return null
}

/**
 * Map a filename to its format by extension (case-insensitive)
 */
export function getFormatFromFilename(filename: string): ImageFormat | null {
	const dot = filename.lastIndexOf('.')
	if (dot < 0) return null
	const ext = filename.slice(dot + 1).toLowerCase()
	return EXTENSION_FORMATS[ext] ?? null
}

export function isSupportedFile(filename: string): boolean {
	return getFormatFromFilename(filename) !== null
}

/**
 * Reject filenames outside the accepted extension set
 */
export function assertSupportedFile(filename: string): ImageFormat {
	const format = getFormatFromFilename(filename)
	if (!format) {
		throw new UnsupportedFormatError(
			`Unsupported file type: ${filename} (expected ${SUPPORTED_EXTENSIONS.join(', ')})`
		)
	}
	return format
}
