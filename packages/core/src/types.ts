/**
 * Raw image data in RGBA format
 * Each pixel is 4 bytes: R, G, B, A (0-255)
 */
export interface ImageData {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGBA, length = width * height * 4
}

/**
 * Single-channel floating point plane (grayscale samples, coefficients)
 */
export interface Plane {
	readonly width: number
	readonly height: number
	readonly data: Float64Array // length = width * height
}

/**
 * Container formats accepted at the service boundary
 */
export type ImageFormat = 'jpeg' | 'png' | 'webp' | 'tiff'

/**
 * Pixel layout as reported by the codec, before RGBA normalization
 */
export interface PixelFormat {
	readonly channels: number
	readonly bitDepth: number
	readonly space: string
}

/**
 * Decoded image handed to the extraction pipeline
 *
 * The pixel grid is always RGBA 8-bit; `pixelFormat` keeps what the source
 * actually carried. `exif` and `icc` are the raw blocks still attached to
 * the file, or null when the container has none.
 */
export interface DecodedImage {
	readonly filename: string | null
	readonly format: string
	readonly fileSize: number | null
	readonly pixelFormat: PixelFormat
	readonly image: ImageData
	readonly exif: Uint8Array | null
	readonly icc: Uint8Array | null
}

/** RGB triple (0-255) */
export type Rgb = [number, number, number]

/**
 * Create empty ImageData
 */
export function createImageData(width: number, height: number): ImageData {
	return {
		width,
		height,
		data: new Uint8Array(width * height * 4),
	}
}

/**
 * Create empty Plane
 */
export function createPlane(width: number, height: number): Plane {
	return { width, height, data: new Float64Array(width * height) }
}

/**
 * Get pixel at (x, y)
 */
export function getPixel(image: ImageData, x: number, y: number): [number, number, number, number] {
	const idx = (y * image.width + x) * 4
	return [image.data[idx], image.data[idx + 1], image.data[idx + 2], image.data[idx + 3]]
}

/**
 * Set pixel at (x, y)
 */
export function setPixel(
	image: ImageData,
	x: number,
	y: number,
	r: number,
	g: number,
	b: number,
	a: number
): void {
	const idx = (y * image.width + x) * 4
	image.data[idx] = r
	image.data[idx + 1] = g
	image.data[idx + 2] = b
	image.data[idx + 3] = a
}

/**
 * PIL-style mode name for a channel layout
 */
export function describeMode(format: PixelFormat): string {
	if (format.space === 'cmyk') return 'CMYK'
	switch (format.channels) {
		case 1:
			return 'L'
		case 2:
			return 'LA'
		case 3:
			return 'RGB'
		case 4:
			return 'RGBA'
		default:
			return `${format.channels}ch`
	}
}
