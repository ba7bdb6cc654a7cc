import { createPlane, getPixel } from '@pixmeta/core'
import { describe, expect, it } from 'vitest'
import { luma, toGrayscale } from './grayscale'
import { resize, resizePlane } from './resize'

describe('Transform', () => {
	// Helper to create test image
	function createTestImage(
		width: number,
		height: number,
		fill?: number
	): {
		width: number
		height: number
		data: Uint8Array
	} {
		const data = new Uint8Array(width * height * 4)
		if (fill !== undefined) {
			data.fill(fill)
		} else {
			// Create gradient pattern for testing
			for (let y = 0; y < height; y++) {
				for (let x = 0; x < width; x++) {
					const idx = (y * width + x) * 4
					data[idx] = x * 10 // R
					data[idx + 1] = y * 10 // G
					data[idx + 2] = 128 // B
					data[idx + 3] = 255 // A
				}
			}
		}
		return { width, height, data }
	}

	describe('resize', () => {
		it('should average 2x2 blocks when halving with area resampling', () => {
			const img = createTestImage(4, 4)
			const result = resize(img, 2, 2)

			expect(result.width).toBe(2)
			expect(result.height).toBe(2)
			expect(result.data.length).toBe(2 * 2 * 4)
			// Columns 0-1 average R 0 and 10, rows 2-3 average G 20 and 30
			expect(getPixel(result, 0, 1)).toEqual([5, 25, 128, 255])
			expect(getPixel(result, 1, 0)).toEqual([25, 5, 128, 255])
		})

		it('should weight partially covered pixels', () => {
			const plane = createPlane(3, 1)
			plane.data.set([0, 30, 60])
			const result = resizePlane(plane, 2, 1)

			// Each output covers 1.5 source pixels
			expect(result.data[0]).toBeCloseTo(10, 10)
			expect(result.data[1]).toBeCloseTo(50, 10)
		})

		it('should sample pixel centres with nearest neighbor', () => {
			const img = createTestImage(4, 4)
			const result = resize(img, 2, 2, { method: 'nearest' })

			expect(getPixel(result, 0, 0)).toEqual([10, 10, 128, 255])
			expect(getPixel(result, 1, 1)).toEqual([30, 30, 128, 255])
		})

		it('should upscale with nearest neighbor', () => {
			const img = createTestImage(2, 2)
			const result = resize(img, 4, 4, { method: 'nearest' })

			expect(getPixel(result, 0, 0)).toEqual([0, 0, 128, 255])
			expect(getPixel(result, 1, 1)).toEqual([0, 0, 128, 255])
			expect(getPixel(result, 3, 2)).toEqual([10, 10, 128, 255])
		})

		it('should keep uniform images uniform', () => {
			const img = createTestImage(7, 5, 200)
			for (const method of ['nearest', 'area'] as const) {
				const result = resize(img, 3, 3, { method })
				expect(result.data.every((v) => v === 200)).toBe(true)
			}
		})

		it('should reject empty sources and invalid targets', () => {
			expect(() => resize(createTestImage(0, 4), 2, 2)).toThrow('degenerate geometry: 0x4')
			expect(() => resize(createTestImage(4, 4), 0, 2)).toThrow('Invalid target size: 0x2')
		})
	})

	describe('grayscale', () => {
		it('should use ITU-R 601-2 luma weights', () => {
			expect(luma(255, 0, 0)).toBeCloseTo(76.245, 10)
			expect(luma(0, 255, 0)).toBeCloseTo(149.685, 10)
			expect(luma(0, 0, 255)).toBeCloseTo(29.07, 10)
			expect(luma(100, 100, 100)).toBeCloseTo(100, 10)
		})

		it('should convert RGBA pixels to a plane, ignoring alpha', () => {
			const img = createTestImage(2, 1)
			img.data[3] = 0
			const plane = toGrayscale(img)

			expect(plane.width).toBe(2)
			expect(plane.height).toBe(1)
			expect(plane.data[0]).toBeCloseTo(14.592, 10)
			expect(plane.data[1]).toBeCloseTo(17.582, 10)
		})
	})
})
