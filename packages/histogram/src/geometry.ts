/**
 * Image geometry helpers
 */

function gcd(a: number, b: number): number {
	while (b !== 0) {
		;[a, b] = [b, a % b]
	}
	return a
}

/**
 * Reduced width:height ratio, e.g. "16:9"; null when a side is zero
 */
export function aspectRatio(width: number, height: number): string | null {
	if (width <= 0 || height <= 0) return null
	const divisor = gcd(width, height)
	return `${width / divisor}:${height / divisor}`
}

/**
 * Pixel count in millions, rounded to two decimals
 */
export function megapixels(width: number, height: number): number {
	return Math.round((width * height) / 10_000) / 100
}
