/**
 * Image resampling
 * Nearest neighbor and area-averaging for RGBA images and planes
 */

import { DegenerateGeometryError, type ImageData, type Plane } from '@pixmeta/core'
import type { ResizeMethod, ResizeOptions } from './types'

type Samples = Uint8Array | Float64Array

/** Source index and weight contributing to one destination column or row */
type Tap = [index: number, weight: number]

/**
 * Resize an RGBA image
 */
export function resize(image: ImageData, width: number, height: number, options: ResizeOptions = {}): ImageData {
	const data = new Uint8Array(width * height * 4)
	resample(image.data, image.width, image.height, data, width, height, 4, options.method ?? 'area')
	return { width, height, data }
}

/**
 * Resize a single-channel plane
 */
export function resizePlane(plane: Plane, width: number, height: number, options: ResizeOptions = {}): Plane {
	const data = new Float64Array(width * height)
	resample(plane.data, plane.width, plane.height, data, width, height, 1, options.method ?? 'area')
	return { width, height, data }
}

function resample(
	src: Samples,
	srcW: number,
	srcH: number,
	dst: Samples,
	dstW: number,
	dstH: number,
	channels: number,
	method: ResizeMethod
): void {
	if (srcW <= 0 || srcH <= 0) {
		throw new DegenerateGeometryError(srcW, srcH)
	}
	if (!Number.isInteger(dstW) || !Number.isInteger(dstH) || dstW <= 0 || dstH <= 0) {
		throw new RangeError(`Invalid target size: ${dstW}x${dstH}`)
	}

	// Byte output is rounded and clamped, planes keep full precision
	const store = dst instanceof Uint8Array ? toByte : (v: number) => v

	switch (method) {
		case 'nearest':
			resizeNearest(src, srcW, srcH, dst, dstW, dstH, channels)
			break
		case 'area':
			resizeArea(src, srcW, srcH, dst, dstW, dstH, channels, store)
			break
	}
}

/**
 * Nearest neighbor interpolation, sampling at destination pixel centres
 */
function resizeNearest(
	src: Samples,
	srcW: number,
	srcH: number,
	dst: Samples,
	dstW: number,
	dstH: number,
	channels: number
): void {
	const scaleX = srcW / dstW
	const scaleY = srcH / dstH

	for (let y = 0; y < dstH; y++) {
		const srcY = Math.min(Math.floor((y + 0.5) * scaleY), srcH - 1)
		for (let x = 0; x < dstW; x++) {
			const srcX = Math.min(Math.floor((x + 0.5) * scaleX), srcW - 1)
			const srcIdx = (srcY * srcW + srcX) * channels
			const dstIdx = (y * dstW + x) * channels

			for (let c = 0; c < channels; c++) {
				dst[dstIdx + c] = src[srcIdx + c]
			}
		}
	}
}

/**
 * Area averaging: each destination pixel is the coverage-weighted mean of
 * the source pixels under it. Separable, so weights are computed per axis.
 */
function resizeArea(
	src: Samples,
	srcW: number,
	srcH: number,
	dst: Samples,
	dstW: number,
	dstH: number,
	channels: number,
	store: (value: number) => number
): void {
	const columns = areaTaps(srcW, dstW)
	const rows = areaTaps(srcH, dstH)
	const sums = new Float64Array(channels)

	for (let y = 0; y < dstH; y++) {
		for (let x = 0; x < dstW; x++) {
			sums.fill(0)

			for (const [sy, wy] of rows[y]) {
				for (const [sx, wx] of columns[x]) {
					const w = wx * wy
					const srcIdx = (sy * srcW + sx) * channels
					for (let c = 0; c < channels; c++) {
						sums[c] += src[srcIdx + c] * w
					}
				}
			}

			const dstIdx = (y * dstW + x) * channels
			for (let c = 0; c < channels; c++) {
				dst[dstIdx + c] = store(sums[c])
			}
		}
	}
}

function areaTaps(srcSize: number, dstSize: number): Tap[][] {
	const scale = srcSize / dstSize
	const taps: Tap[][] = []

	for (let d = 0; d < dstSize; d++) {
		const start = d * scale
		const end = (d + 1) * scale
		const last = Math.min(Math.ceil(end), srcSize)
		const row: Tap[] = []

		for (let s = Math.floor(start); s < last; s++) {
			const overlap = Math.min(end, s + 1) - Math.max(start, s)
			if (overlap > 0) row.push([s, overlap / scale])
		}
		taps.push(row)
	}

	return taps
}

function toByte(value: number): number {
	return Math.max(0, Math.min(255, Math.round(value)))
}
