/**
 * EXIF metadata types
 */

import type { Field } from '@pixmeta/core'

/** EXIF data types */
export enum ExifType {
	BYTE = 1,
	ASCII = 2,
	SHORT = 3,
	LONG = 4,
	RATIONAL = 5,
	SBYTE = 6,
	UNDEFINED = 7,
	SSHORT = 8,
	SLONG = 9,
	SRATIONAL = 10,
	FLOAT = 11,
	DOUBLE = 12,
}

/** Tag ID namespaces: 0th and Exif IFDs share one, GPS has its own */
export type TagNamespace = 'image' | 'gps'

/** Orientation values */
export enum ExifOrientation {
	NORMAL = 1,
	FLIP_HORIZONTAL = 2,
	ROTATE_180 = 3,
	FLIP_VERTICAL = 4,
	TRANSPOSE = 5,
	ROTATE_90 = 6,
	TRANSVERSE = 7,
	ROTATE_270 = 8,
}

/** Unreduced rational as stored in the block */
export interface Rational {
	readonly numerator: number
	readonly denominator: number
}

/** Decoded tag value, tagged by kind */
export type TagValue =
	| { readonly kind: 'integer'; readonly values: readonly number[] }
	| { readonly kind: 'rational'; readonly values: readonly Rational[] }
	| { readonly kind: 'float'; readonly values: readonly number[] }
	| { readonly kind: 'string'; readonly value: string }
	| { readonly kind: 'bytes'; readonly value: Uint8Array }

export type TagKind = TagValue['kind']

/** Dictionary entry for a known tag ID */
export interface TagDefinition {
	readonly id: number
	readonly name: string
	readonly kind: TagKind
}

/** Canonical tag name (or decimal ID for unknown tags) to value */
export type TagTable = Map<string, TagValue>

/** Signed decimal GPS position */
export interface GpsCoordinate {
	latitude: number
	longitude: number
	/** Meters, negative below sea level */
	altitude: number | null
	googleMaps: string
}

/** Result of decoding one EXIF block */
export interface ExifResult {
	tags: TagTable
	gps: Field<GpsCoordinate>
	/** One message per IFD that stopped early */
	errors: string[]
}

/** Camera fields pulled out of the tag table */
export interface ExifSummary {
	cameraMake: string | null
	cameraModel: string | null
	software: string | null
	orientation: ExifOrientation | null
	iso: number | null
	exposureTime: number | null
	aperture: number | null
	focalLength: number | null
	dateTaken: string | null
	shutterSpeed: number | null
	brightness: number | null
	whiteBalance: number | null
	meteringMode: number | null
	lensModel: string | null
	exposureProgram: number | null
	flash: number | null
	errors: string[]
}

/** JSON-safe tag value */
export type SerializedTagValue = number | string | number[] | [number, number] | Array<[number, number]>
