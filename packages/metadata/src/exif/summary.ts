/**
 * Tag table views: camera summary and JSON serialization
 */

import type { ExifOrientation, ExifSummary, SerializedTagValue, TagTable, TagValue } from './types'

/**
 * Pull the commonly used camera fields out of a tag table
 */
export function summarizeExif(tags: TagTable, errors: string[] = []): ExifSummary {
	return {
		cameraMake: getString(tags, 'Make'),
		cameraModel: getString(tags, 'Model'),
		software: getString(tags, 'Software'),
		orientation: getOrientation(tags),
		iso: getInteger(tags, 'ISOSpeedRatings'),
		exposureTime: getNumber(tags, 'ExposureTime'),
		aperture: getNumber(tags, 'FNumber'),
		focalLength: getNumber(tags, 'FocalLength'),
		dateTaken: getString(tags, 'DateTimeOriginal'),
		shutterSpeed: getNumber(tags, 'ShutterSpeedValue'),
		brightness: getNumber(tags, 'BrightnessValue'),
		whiteBalance: getInteger(tags, 'WhiteBalance'),
		meteringMode: getInteger(tags, 'MeteringMode'),
		lensModel: getString(tags, 'LensModel'),
		exposureProgram: getInteger(tags, 'ExposureProgram'),
		flash: getInteger(tags, 'Flash'),
		errors,
	}
}

export function getString(tags: TagTable, name: string): string | null {
	const value = tags.get(name)
	if (value?.kind !== 'string' || value.value === '') return null
	return value.value
}

export function getInteger(tags: TagTable, name: string): number | null {
	const value = tags.get(name)
	if (value?.kind !== 'integer' || value.values.length === 0) return null
	return value.values[0]
}

/**
 * First value of an integer, float or rational tag as a number
 *
 * Rationals with a zero denominator read as null.
 */
export function getNumber(tags: TagTable, name: string): number | null {
	const value = tags.get(name)
	if (!value) return null

	switch (value.kind) {
		case 'integer':
		case 'float':
			return value.values.length > 0 ? value.values[0] : null
		case 'rational': {
			if (value.values.length === 0) return null
			const { numerator, denominator } = value.values[0]
			return denominator === 0 ? null : numerator / denominator
		}
		default:
			return null
	}
}

function getOrientation(tags: TagTable): ExifOrientation | null {
	const value = getInteger(tags, 'Orientation')
	if (value === null || value < 1 || value > 8) return null
	return value
}

/**
 * Convert a tag table to a plain JSON-safe object
 *
 * Single-element lists collapse to scalars, rationals become
 * `[numerator, denominator]` pairs and byte strings become hex.
 */
export function serializeTagTable(tags: TagTable): Record<string, SerializedTagValue> {
	const result: Record<string, SerializedTagValue> = {}
	for (const [name, value] of tags) {
		result[name] = serializeValue(value)
	}
	return result
}

function serializeValue(value: TagValue): SerializedTagValue {
	switch (value.kind) {
		case 'string':
			return value.value
		case 'bytes':
			return Buffer.from(value.value).toString('hex')
		case 'integer':
		case 'float':
			return value.values.length === 1 ? value.values[0] : [...value.values]
		case 'rational': {
			const pairs = value.values.map((r): [number, number] => [r.numerator, r.denominator])
			return pairs.length === 1 ? pairs[0] : pairs
		}
	}
}
