/**
 * Metadata assembly
 */

import {
	absent,
	capture,
	type DecodedImage,
	describeError,
	describeMode,
	failed,
	type Field,
	ok,
} from '@pixmeta/core'
import { computeHashes, type HashSet } from '@pixmeta/hash'
import { aspectRatio, calculateColorStats, dominantColors, megapixels } from '@pixmeta/histogram'
import {
	decodeExif,
	type IccDescription,
	readIccDescription,
	serializeTagTable,
	summarizeExif,
} from '@pixmeta/metadata'
import type { ExtractOptions, HashDigest, MetadataRecord } from './record'

type ExifFields = Pick<MetadataRecord, 'exif' | 'tags' | 'gps'>

/**
 * Build the metadata record for a decoded image
 *
 * Each analysis runs on its own; a failure in one is recorded in its field
 * and never affects the others.
 */
export function extractMetadata(decoded: DecodedImage, options: ExtractOptions = {}): MetadataRecord {
	const { topColors = 5, sampleSize = 100, hashSize = 8 } = options
	const { image } = decoded
	const { width, height } = image

	return {
		filename: decoded.filename,
		format: decoded.format,
		mode: describeMode(decoded.pixelFormat),
		width,
		height,
		fileSize: decoded.fileSize,
		aspectRatio: aspectRatio(width, height),
		megapixels: megapixels(width, height),
		pixelFormat: decoded.pixelFormat,
		icc: readIcc(decoded.icc),
		...readExif(decoded.exif),
		hashes: capture(() => ok(toDigest(computeHashes(image, { size: hashSize })))),
		colorStats: capture(() => ok(calculateColorStats(image))),
		dominantColors: capture(() => ok(dominantColors(image, { topK: topColors, sampleSize }))),
	}
}

function readIcc(block: Uint8Array | null): IccDescription {
	try {
		return readIccDescription(block)
	} catch (err) {
		return { status: 'unparsable', error: describeError(err) }
	}
}

/**
 * Summary, tag table and GPS fields for an EXIF block
 *
 * A block that yields no tags at all fails all three fields; partial
 * decodes keep their tags and list the problems in the summary.
 */
function readExif(block: Uint8Array | null): ExifFields {
	if (!block || block.length === 0) {
		return { exif: absent(), tags: absent(), gps: absent() }
	}

	try {
		const { tags, gps, errors } = decodeExif(block)

		if (tags.size === 0 && errors.length > 0) {
			const error = errors.join('; ')
			return { exif: failed(error), tags: failed(error), gps: gps.status === 'absent' ? failed(error) : gps }
		}

		return {
			exif: ok(summarizeExif(tags, errors)),
			tags: ok(serializeTagTable(tags)),
			gps,
		}
	} catch (err) {
		const error: Field<never> = failed(err)
		return { exif: error, tags: error, gps: error }
	}
}

function toDigest(hashes: HashSet): HashDigest {
	return {
		average: hashes.average.hex,
		difference: hashes.difference.hex,
		wavelet: hashes.wavelet.hex,
		perceptual: hashes.perceptual.hex,
	}
}
