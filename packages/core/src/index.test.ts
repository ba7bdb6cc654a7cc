import { describe, expect, it } from 'vitest'
import {
	assertAnalyzable,
	assertSupportedFile,
	capture,
	createImageData,
	DecodeError,
	DegenerateGeometryError,
	describeMode,
	detectFormat,
	getFormatFromFilename,
	getPixel,
	isSupportedFile,
	ok,
	setPixel,
	UnsupportedFormatError,
	valueOf,
} from './index'

describe('core', () => {
	describe('ImageData', () => {
		it('should set and get pixels', () => {
			const img = createImageData(2, 2)
			setPixel(img, 1, 1, 10, 20, 30, 255)
			expect(getPixel(img, 1, 1)).toEqual([10, 20, 30, 255])
			expect(getPixel(img, 0, 0)).toEqual([0, 0, 0, 0])
		})

		it('should name pixel modes', () => {
			expect(describeMode({ channels: 3, bitDepth: 8, space: 'srgb' })).toBe('RGB')
			expect(describeMode({ channels: 1, bitDepth: 8, space: 'b-w' })).toBe('L')
			expect(describeMode({ channels: 4, bitDepth: 8, space: 'cmyk' })).toBe('CMYK')
		})
	})

	describe('detectFormat', () => {
		it('should detect supported containers by magic bytes', () => {
			expect(detectFormat(new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]))).toBe('png')
			expect(detectFormat(new Uint8Array([0xff, 0xd8, 0xff, 0xe0]))).toBe('jpeg')
			expect(detectFormat(new Uint8Array([0x49, 0x49, 0x2a, 0x00]))).toBe('tiff')
			expect(detectFormat(new Uint8Array([0x4d, 0x4d, 0x00, 0x2a]))).toBe('tiff')
			const webp = new Uint8Array([0x52, 0x49, 0x46, 0x46, 0, 0, 0, 0, 0x57, 0x45, 0x42, 0x50])
			expect(detectFormat(webp)).toBe('webp')
		})

		it('should return null for anything else', () => {
			expect(detectFormat(new Uint8Array([0x47, 0x49, 0x46, 0x38]))).toBeNull()
			expect(detectFormat(new Uint8Array([]))).toBeNull()
		})
	})

	describe('extension gate', () => {
		it('should accept the supported extensions case-insensitively', () => {
			expect(getFormatFromFilename('IMG_0001.JPG')).toBe('jpeg')
			expect(getFormatFromFilename('scan.tif')).toBe('tiff')
			expect(isSupportedFile('photo.webp')).toBe(true)
			expect(isSupportedFile('anim.gif')).toBe(false)
			expect(isSupportedFile('README')).toBe(false)
		})

		it('should throw UnsupportedFormatError for other types', () => {
			expect(() => assertSupportedFile('anim.gif')).toThrow(UnsupportedFormatError)
			expect(assertSupportedFile('a.png')).toBe('png')
		})
	})

	describe('fields', () => {
		it('should capture thrown errors as error fields', () => {
			const field = capture(() => {
				throw new DecodeError('bad container')
			})
			expect(field).toEqual({ status: 'error', error: 'bad container' })
			expect(valueOf(field)).toBeNull()
		})

		it('should pass values through', () => {
			expect(valueOf(capture(() => ok(42)))).toBe(42)
		})
	})

	describe('assertAnalyzable', () => {
		it('should reject zero-area and single-pixel images', () => {
			expect(() => assertAnalyzable(0, 10)).toThrow(DegenerateGeometryError)
			expect(() => assertAnalyzable(1, 1)).toThrow('degenerate geometry: 1x1')
			expect(() => assertAnalyzable(2, 1)).not.toThrow()
		})

		it('should tag errors with their category', () => {
			const err = new DegenerateGeometryError(0, 0)
			expect(err.category).toBe('degenerate-geometry')
			expect(err.name).toBe('DegenerateGeometryError')
		})
	})
})
