import sharp from 'sharp'
import { describe, expect, it } from 'vitest'
import { DecodeError, extractMetadata, loadImage, UnsupportedFormatError } from '../src'

describe('loadImage', () => {
	const solid = (width: number, height: number) =>
		sharp({ create: { width, height, channels: 3, background: { r: 255, g: 0, b: 0 } } })

	it('should decode PNG to RGBA pixels', async () => {
		const png = await solid(4, 3).png().toBuffer()
		const decoded = await loadImage(png, { filename: 'red.png' })

		expect(decoded.format).toBe('png')
		expect(decoded.filename).toBe('red.png')
		expect(decoded.fileSize).toBe(png.length)
		expect(decoded.image.width).toBe(4)
		expect(decoded.image.height).toBe(3)
		expect(decoded.image.data.length).toBe(4 * 3 * 4)
		expect(Array.from(decoded.image.data.subarray(0, 4))).toEqual([255, 0, 0, 255])
		expect(decoded.pixelFormat).toEqual({ channels: 3, bitDepth: 8, space: 'srgb' })
		expect(decoded.exif).toBeNull()
		expect(decoded.icc).toBeNull()
	})

	it('should keep the EXIF block of a JPEG', async () => {
		const jpeg = await solid(8, 8)
			.jpeg()
			.withExif({ IFD0: { Make: 'TestMake', Model: 'TestModel' } })
			.toBuffer()
		const record = extractMetadata(await loadImage(jpeg, { filename: 'photo.jpg' }))

		expect(record.format).toBe('jpeg')
		expect(record.mode).toBe('RGB')
		expect(record.exif.status === 'ok' && record.exif.value.cameraMake).toBe('TestMake')
		expect(record.exif.status === 'ok' && record.exif.value.cameraModel).toBe('TestModel')
	})

	it('should read the description of an embedded profile', async () => {
		const jpeg = await solid(8, 8).jpeg().withIccProfile('srgb').toBuffer()
		const record = extractMetadata(await loadImage(jpeg))

		expect(record.icc.status).toBe('ok')
	})

	it('should reject unsupported file names before decoding', async () => {
		const png = await solid(2, 2).png().toBuffer()
		await expect(loadImage(png, { filename: 'anim.gif' })).rejects.toThrow(UnsupportedFormatError)
	})

	it('should reject unknown content', async () => {
		await expect(loadImage(new Uint8Array([1, 2, 3, 4]))).rejects.toThrow('Unknown or unsupported image format')
	})

	it('should reject a truncated container', async () => {
		const png = await solid(16, 16).png().toBuffer()
		await expect(loadImage(png.subarray(0, 40))).rejects.toThrow(DecodeError)
	})
})
