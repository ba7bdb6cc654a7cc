/**
 * GPS coordinate conversion
 * Sexagesimal (degrees, minutes, seconds) rationals to signed decimal degrees
 */

import { absent, failed, type Field, MalformedMetadataError, ok } from '@pixmeta/core'
import type { GpsCoordinate, Rational, TagTable } from './types'

/**
 * Reduce a rational, failing on a zero denominator
 */
export function rationalToNumber(value: Rational, label = 'rational'): number {
	if (value.denominator === 0) {
		throw new MalformedMetadataError(`${label}: zero denominator`)
	}
	return value.numerator / value.denominator
}

/**
 * Convert a (degrees, minutes, seconds) triple to decimal degrees
 *
 * `S` and `W` references negate the result.
 */
export function toDecimalDegrees(
	triple: readonly Rational[],
	ref: string | null,
	label = 'GPS coordinate'
): number {
	if (triple.length < 3) {
		throw new MalformedMetadataError(`${label}: expected 3 rationals, got ${triple.length}`)
	}

	const degrees = rationalToNumber(triple[0], `${label} degrees`)
	const minutes = rationalToNumber(triple[1], `${label} minutes`)
	const seconds = rationalToNumber(triple[2], `${label} seconds`)
	const value = degrees + minutes / 60 + seconds / 3600

	const hemisphere = ref?.trim().toUpperCase()
	return hemisphere === 'S' || hemisphere === 'W' ? -value : value
}

/**
 * Lookup URL for a coordinate
 */
export function googleMapsUrl(latitude: number, longitude: number): string {
	return `https://www.google.com/maps/search/?api=1&query=${latitude},${longitude}`
}

/**
 * Derive the GPS position from a decoded tag table
 *
 * Absent when neither GPSLatitude nor GPSLongitude was decoded.
 */
export function readGps(tags: TagTable): Field<GpsCoordinate> {
	if (!tags.has('GPSLatitude') && !tags.has('GPSLongitude')) {
		return absent()
	}

	try {
		const latitude = toDecimalDegrees(
			rationalList(tags, 'GPSLatitude'),
			textTag(tags, 'GPSLatitudeRef'),
			'GPSLatitude'
		)
		const longitude = toDecimalDegrees(
			rationalList(tags, 'GPSLongitude'),
			textTag(tags, 'GPSLongitudeRef'),
			'GPSLongitude'
		)

		if (!(latitude >= -90 && latitude <= 90)) {
			throw new MalformedMetadataError(`GPSLatitude out of range: ${latitude}`)
		}
		if (!(longitude >= -180 && longitude <= 180)) {
			throw new MalformedMetadataError(`GPSLongitude out of range: ${longitude}`)
		}

		return ok({
			latitude,
			longitude,
			altitude: readAltitude(tags),
			googleMaps: googleMapsUrl(latitude, longitude),
		})
	} catch (err) {
		return failed(err)
	}
}

function readAltitude(tags: TagTable): number | null {
	const altitude = tags.get('GPSAltitude')
	if (altitude?.kind !== 'rational' || altitude.values.length === 0) return null

	const { numerator, denominator } = altitude.values[0]
	if (denominator === 0) return null

	const meters = numerator / denominator
	const ref = tags.get('GPSAltitudeRef')
	const belowSeaLevel = ref?.kind === 'integer' && ref.values[0] === 1
	return belowSeaLevel ? -meters : meters
}

function rationalList(tags: TagTable, name: string): readonly Rational[] {
	const value = tags.get(name)
	if (!value) {
		throw new MalformedMetadataError(`${name} missing`)
	}
	if (value.kind !== 'rational') {
		throw new MalformedMetadataError(`${name} has kind ${value.kind}, expected rational`)
	}
	return value.values
}

function textTag(tags: TagTable, name: string): string | null {
	const value = tags.get(name)
	return value?.kind === 'string' ? value.value : null
}
