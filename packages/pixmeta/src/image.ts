import { readFile } from 'node:fs/promises'
import { basename } from 'node:path'
import {
	assertSupportedFile,
	type DecodedImage,
	DecodeError,
	describeError,
	detectFormat,
	type PixelFormat,
} from '@pixmeta/core'
import sharp from 'sharp'

export interface LoadOptions {
	/** Original file name, checked against the accepted extensions */
	filename?: string
}

/**
 * Decode an image into RGBA 8-bit pixels plus its raw EXIF and ICC blocks
 */
export async function loadImage(data: Uint8Array, options: LoadOptions = {}): Promise<DecodedImage> {
	const filename = options.filename ?? null
	if (filename) {
		assertSupportedFile(filename)
	}

	const format = detectFormat(data)
	if (!format) {
		throw new DecodeError('Unknown or unsupported image format')
	}

	try {
		const input = sharp(data)
		const metadata = await input.metadata()
		const { data: pixels, info } = await input
			.clone()
			.toColourspace('srgb')
			.ensureAlpha()
			.raw({ depth: 'uchar' })
			.toBuffer({ resolveWithObject: true })

		const pixelFormat: PixelFormat = {
			channels: metadata.channels ?? info.channels,
			bitDepth: depthBits(metadata.depth),
			space: metadata.space ?? 'srgb',
		}

		return {
			filename,
			format,
			fileSize: data.length,
			pixelFormat,
			image: { width: info.width, height: info.height, data: pixels },
			exif: metadata.exif ?? null,
			icc: metadata.icc ?? null,
		}
	} catch (err) {
		throw new DecodeError(`Cannot decode ${format} image: ${describeError(err)}`)
	}
}

/**
 * Read and decode an image file
 */
export async function loadImageFile(path: string): Promise<DecodedImage> {
	const filename = basename(path)
	assertSupportedFile(filename)
	const data = await readFile(path)
	return loadImage(data, { filename })
}

/**
 * Bits per sample for a libvips band format
 */
function depthBits(depth: string | undefined): number {
	switch (depth) {
		case 'char':
		case 'uchar':
			return 8
		case 'short':
		case 'ushort':
			return 16
		case 'int':
		case 'uint':
		case 'float':
			return 32
		case 'double':
		case 'complex':
			return 64
		case 'dpcomplex':
			return 128
		default:
			return 8
	}
}
