import { DegenerateGeometryError } from '@pixmeta/core'
import { describe, expect, it } from 'vitest'
import { calculateChannelStats, calculateColorStats, calculateHistogram } from './analyze'
import { dominantColors, toHexColor } from './dominant'
import { aspectRatio, megapixels } from './geometry'

describe('Histogram', () => {
	// Helper to create test image
	function createTestImage(
		width: number,
		height: number,
		fill: [number, number, number, number]
	): {
		width: number
		height: number
		data: Uint8Array
	} {
		const data = new Uint8Array(width * height * 4)
		for (let i = 0; i < width * height; i++) {
			data.set(fill, i * 4)
		}
		return { width, height, data }
	}

	// Create gradient image
	function createGradientImage(
		width: number,
		height: number
	): {
		width: number
		height: number
		data: Uint8Array
	} {
		const data = new Uint8Array(width * height * 4)
		for (let y = 0; y < height; y++) {
			for (let x = 0; x < width; x++) {
				const i = (y * width + x) * 4
				const value = Math.round((x / (width - 1)) * 255)
				data[i] = value
				data[i + 1] = value
				data[i + 2] = value
				data[i + 3] = 255
			}
		}
		return { width, height, data }
	}

	describe('calculateHistogram', () => {
		it('should calculate histogram for solid image', () => {
			const img = createTestImage(4, 4, [128, 64, 32, 255])
			const hist = calculateHistogram(img)

			expect(hist.red[128]).toBe(16)
			expect(hist.green[64]).toBe(16)
			expect(hist.blue[32]).toBe(16)
		})

		it('should calculate histogram for gradient', () => {
			const img = createGradientImage(256, 1)
			const hist = calculateHistogram(img)

			// Each value should appear once
			for (let i = 0; i < 256; i++) {
				expect(hist.red[i]).toBe(1)
			}
		})

		it('should ignore alpha', () => {
			const opaque = calculateColorStats(createTestImage(3, 3, [10, 20, 30, 255]))
			const clear = calculateColorStats(createTestImage(3, 3, [10, 20, 30, 0]))
			expect(clear).toEqual(opaque)
		})
	})

	describe('calculateChannelStats', () => {
		it('should calculate statistics correctly', () => {
			const hist = new Uint32Array(256)
			hist[100] = 10
			hist[150] = 10
			hist[200] = 10

			const stats = calculateChannelStats(hist)

			expect(stats.min).toBe(100)
			expect(stats.max).toBe(200)
			expect(stats.count).toBe(30)
			expect(stats.mean).toBeCloseTo(150, 10)
			expect(stats.median).toBe(150)
		})

		it('should take the first bin past half the count as median', () => {
			const hist = new Uint32Array(256)
			hist[0] = 1
			hist[10] = 1
			hist[20] = 1
			hist[30] = 1

			const stats = calculateChannelStats(hist)

			expect(stats.median).toBe(20)
			expect(stats.mean).toBe(15)
			expect(stats.stdDev).toBeCloseTo(Math.sqrt(125), 10)
			expect(stats.rms).toBeCloseTo(Math.sqrt(350), 10)
		})

		it('should report zeros for an empty histogram', () => {
			expect(calculateChannelStats(new Uint32Array(256))).toEqual({
				min: 0,
				max: 0,
				mean: 0,
				median: 0,
				stdDev: 0,
				rms: 0,
				count: 0,
			})
		})
	})

	describe('calculateColorStats', () => {
		it('should calculate per-channel statistics', () => {
			const stats = calculateColorStats(createTestImage(4, 4, [128, 64, 0, 255]))

			expect(stats.red.mean).toBe(128)
			expect(stats.red.stdDev).toBe(0)
			expect(stats.red.rms).toBe(128)
			expect(stats.green.median).toBe(64)
			expect(stats.blue.max).toBe(0)
		})

		it('should concatenate the channel histograms', () => {
			const stats = calculateColorStats(createTestImage(4, 4, [128, 64, 0, 255]))

			expect(stats.histogram.length).toBe(768)
			expect(stats.histogram[128]).toBe(16)
			expect(stats.histogram[256 + 64]).toBe(16)
			expect(stats.histogram[512]).toBe(16)
			expect(stats.histogram.reduce((a, b) => a + b, 0)).toBe(48)
		})

		it('should reject degenerate images', () => {
			expect(() => calculateColorStats(createTestImage(1, 1, [0, 0, 0, 255]))).toThrow(DegenerateGeometryError)
			expect(() => calculateColorStats(createTestImage(0, 5, [0, 0, 0, 255]))).toThrow(
				'degenerate geometry: 0x5'
			)
		})
	})

	describe('dominantColors', () => {
		it('should return one entry for a uniform image', () => {
			for (const [width, height] of [
				[3, 2],
				[640, 480],
			]) {
				expect(dominantColors(createTestImage(width, height, [200, 16, 0, 255]))).toEqual([
					{ color: '#c81000', rgb: [200, 16, 0], count: 10000 },
				])
			}
		})

		it('should order by count', () => {
			// Left quarter red, rest blue
			const img = createTestImage(100, 100, [0, 0, 255, 255])
			for (let y = 0; y < 100; y++) {
				for (let x = 0; x < 25; x++) {
					img.data.set([255, 0, 0, 255], (y * 100 + x) * 4)
				}
			}

			expect(dominantColors(img)).toEqual([
				{ color: '#0000ff', rgb: [0, 0, 255], count: 7500 },
				{ color: '#ff0000', rgb: [255, 0, 0], count: 2500 },
			])
		})

		it('should break ties by first occurrence', () => {
			const img = createTestImage(2, 2, [0, 0, 0, 255])
			img.data.set([9, 9, 9, 255], 0)
			img.data.set([5, 5, 5, 255], 4)
			img.data.set([7, 7, 7, 255], 8)

			const colors = dominantColors(img, { sampleSize: 2, topK: 3 })
			expect(colors.map((c) => c.color)).toEqual(['#090909', '#050505', '#070707'])
			expect(colors.every((c) => c.count === 1)).toBe(true)
		})

		it('should reject a non-positive top-K', () => {
			expect(() => dominantColors(createTestImage(2, 2, [0, 0, 0, 255]), { topK: 0 })).toThrow(
				'topK must be a positive integer: 0'
			)
		})

		it('should format hex colors', () => {
			expect(toHexColor([0, 128, 255])).toBe('#0080ff')
		})
	})

	describe('geometry', () => {
		it('should reduce aspect ratios', () => {
			expect(aspectRatio(1920, 1080)).toBe('16:9')
			expect(aspectRatio(1024, 768)).toBe('4:3')
			expect(aspectRatio(7, 5)).toBe('7:5')
			expect(aspectRatio(0, 5)).toBeNull()
		})

		it('should round megapixels to two decimals', () => {
			expect(megapixels(1920, 1080)).toBe(2.07)
			expect(megapixels(4000, 3000)).toBe(12)
			expect(megapixels(0, 100)).toBe(0)
		})
	})
})
