/**
 * Full hash set
 */

import type { ImageData } from '@pixmeta/core'
import { averageHash, differenceHash } from './average'
import { perceptualHash } from './perceptual'
import type { HashOptions, HashSet } from './types'
import { waveletHash } from './wavelet'

/**
 * Compute all four hashes of an image
 */
export function computeHashes(image: ImageData, options: HashOptions = {}): HashSet {
	const { size = 8, waveletScale = Math.max(64, size), dctFactor = 4 } = options

	return {
		average: averageHash(image, size),
		difference: differenceHash(image, size),
		wavelet: waveletHash(image, size, waveletScale),
		perceptual: perceptualHash(image, size, dctFactor),
	}
}
