/**
 * EXIF parser
 * Decodes a TIFF-structured EXIF block into a normalized tag table
 */

import { failed } from '@pixmeta/core'
import { readGps } from './gps'
import { EXIF_IFD_POINTER, GPS_IFD_POINTER, lookupTag, tagName } from './tags'
import { ExifType, type ExifResult, type Rational, type TagNamespace, type TagTable, type TagValue } from './types'

/** APP1 identifier that precedes the TIFF header in JPEG files */
const EXIF_IDENTIFIER = [0x45, 0x78, 0x69, 0x66, 0x00, 0x00] // "Exif\0\0"

const TIFF_MAGIC = 0x002a
const ENTRY_SIZE = 12

const utf8 = new TextDecoder('utf-8')

/**
 * Bounds-checked view over the TIFF block
 */
class TiffReader {
	private readonly view: DataView

	constructor(
		readonly data: Uint8Array,
		readonly littleEndian: boolean
	) {
		this.view = new DataView(data.buffer, data.byteOffset, data.byteLength)
	}

	fits(offset: number, size: number): boolean {
		return offset >= 0 && size >= 0 && offset + size <= this.data.length
	}

	i8(offset: number): number {
		return this.view.getInt8(offset)
	}

	u16(offset: number): number {
		return this.view.getUint16(offset, this.littleEndian)
	}

	i16(offset: number): number {
		return this.view.getInt16(offset, this.littleEndian)
	}

	u32(offset: number): number {
		return this.view.getUint32(offset, this.littleEndian)
	}

	i32(offset: number): number {
		return this.view.getInt32(offset, this.littleEndian)
	}

	f32(offset: number): number {
		return this.view.getFloat32(offset, this.littleEndian)
	}

	f64(offset: number): number {
		return this.view.getFloat64(offset, this.littleEndian)
	}

	bytes(offset: number, length: number): Uint8Array {
		return this.data.slice(offset, offset + length)
	}
}

/** Raw directory entry */
interface IfdEntry {
	tag: number
	type: ExifType
	count: number
	value: TagValue
}

/** Thrown inside an IFD walk to stop that directory */
class IfdError extends Error {}

/**
 * Decode an EXIF block
 *
 * Accepts a bare TIFF structure or one prefixed with the JPEG APP1
 * `Exif\0\0` identifier. Decoding of a directory stops at the first bad
 * entry; tags read before it are kept and the problem is listed in
 * `errors`.
 */
export function decodeExif(block: Uint8Array): ExifResult {
	const data = stripIdentifier(block)
	const tags: TagTable = new Map()
	const errors: string[] = []

	const reader = openTiff(data)
	if (typeof reader === 'string') {
		return { tags, gps: failed(reader), errors: [reader] }
	}

	const ifd0Offset = reader.u32(4)
	const visited = new Set<number>()
	let exifIfdOffset = 0
	let gpsIfdOffset = 0

	const ifd0Error = walkIfd(reader, ifd0Offset, 'IFD0', 'image', tags, visited, (entry) => {
		if (entry.tag === EXIF_IFD_POINTER) exifIfdOffset = pointerValue(entry)
		if (entry.tag === GPS_IFD_POINTER) gpsIfdOffset = pointerValue(entry)
	})
	if (ifd0Error) errors.push(ifd0Error)

	if (exifIfdOffset > 0) {
		const exifError = walkIfd(reader, exifIfdOffset, 'Exif IFD', 'image', tags, visited)
		if (exifError) errors.push(exifError)
	}

	let gpsError: string | null = null
	if (gpsIfdOffset > 0) {
		gpsError = walkIfd(reader, gpsIfdOffset, 'GPS IFD', 'gps', tags, visited)
		if (gpsError) errors.push(gpsError)
	}

	const gps = readGps(tags)
	if (gps.status === 'absent' && gpsError) {
		return { tags, gps: failed(gpsError), errors }
	}

	return { tags, gps, errors }
}

/**
 * Check if data starts with a TIFF header
 */
export function isTiffStructure(data: Uint8Array): boolean {
	return typeof openTiff(stripIdentifier(data)) !== 'string'
}

function stripIdentifier(block: Uint8Array): Uint8Array {
	if (block.length < EXIF_IDENTIFIER.length) return block
	for (let i = 0; i < EXIF_IDENTIFIER.length; i++) {
		if (block[i] !== EXIF_IDENTIFIER[i]) return block
	}
	return block.subarray(EXIF_IDENTIFIER.length)
}

/**
 * Validate the TIFF header, returning a reader or an error message
 */
function openTiff(data: Uint8Array): TiffReader | string {
	if (data.length < 8) {
		return `EXIF block too short: ${data.length} bytes`
	}

	// Check byte order (II = little endian, MM = big endian)
	const byteOrder = String.fromCharCode(data[0], data[1])
	if (byteOrder !== 'II' && byteOrder !== 'MM') {
		return `Invalid TIFF byte order marker: ${JSON.stringify(byteOrder)}`
	}

	const reader = new TiffReader(data, byteOrder === 'II')
	const magic = reader.u16(2)
	if (magic !== TIFF_MAGIC) {
		return `Invalid TIFF magic: 0x${magic.toString(16).padStart(4, '0')}`
	}

	return reader
}

function walkIfd(
	reader: TiffReader,
	offset: number,
	label: string,
	namespace: TagNamespace,
	result: TagTable,
	visited: Set<number>,
	callback?: (entry: IfdEntry) => void
): string | null {
	if (visited.has(offset)) {
		return `${label}: directory at offset ${offset} already read`
	}
	visited.add(offset)

	if (offset < 8 || !reader.fits(offset, 2)) {
		return `${label}: offset ${offset} out of bounds`
	}

	const entryCount = reader.u16(offset)

	try {
		for (let i = 0; i < entryCount; i++) {
			const pos = offset + 2 + i * ENTRY_SIZE
			if (!reader.fits(pos, ENTRY_SIZE)) {
				throw new IfdError(`entry ${i} of ${entryCount} truncated`)
			}

			const entry = parseEntry(reader, pos, namespace)
			result.set(tagName(namespace, entry.tag), entry.value)
			callback?.(entry)
		}
	} catch (err) {
		if (err instanceof IfdError) return `${label}: ${err.message}`
		throw err
	}

	return null
}

function parseEntry(reader: TiffReader, offset: number, namespace: TagNamespace): IfdEntry {
	const tag = reader.u16(offset)
	const type = reader.u16(offset + 2)
	const count = reader.u32(offset + 4)

	const typeSize = getTypeSize(type)
	if (typeSize === 0) {
		throw new IfdError(`unsupported type ${type} for tag ${tag}`)
	}

	const valueSize = typeSize * count
	const valueOffset = valueSize <= 4 ? offset + 8 : reader.u32(offset + 8)
	if (!reader.fits(valueOffset, valueSize)) {
		throw new IfdError(`value of tag ${tag} at offset ${valueOffset} out of bounds`)
	}

	const declared = lookupTag(namespace, tag)?.kind
	const value = readValue(reader, valueOffset, type, count, declared === 'string')

	return { tag, type, count, value }
}

function readValue(
	reader: TiffReader,
	offset: number,
	type: ExifType,
	count: number,
	asText: boolean
): TagValue {
	switch (type) {
		case ExifType.ASCII:
			return { kind: 'string', value: decodeText(reader.bytes(offset, count)) }

		case ExifType.BYTE:
		case ExifType.UNDEFINED: {
			const bytes = reader.bytes(offset, count)
			if (asText) return { kind: 'string', value: decodeText(bytes) }
			if (type === ExifType.UNDEFINED) return { kind: 'bytes', value: bytes }
			return { kind: 'integer', values: Array.from(bytes) }
		}

		case ExifType.SBYTE:
			return { kind: 'integer', values: readList(count, 1, (i) => reader.i8(offset + i)) }

		case ExifType.SHORT:
			return { kind: 'integer', values: readList(count, 2, (i) => reader.u16(offset + i)) }

		case ExifType.SSHORT:
			return { kind: 'integer', values: readList(count, 2, (i) => reader.i16(offset + i)) }

		case ExifType.LONG:
			return { kind: 'integer', values: readList(count, 4, (i) => reader.u32(offset + i)) }

		case ExifType.SLONG:
			return { kind: 'integer', values: readList(count, 4, (i) => reader.i32(offset + i)) }

		case ExifType.RATIONAL:
			return {
				kind: 'rational',
				values: readList<Rational>(count, 8, (i) => ({
					numerator: reader.u32(offset + i),
					denominator: reader.u32(offset + i + 4),
				})),
			}

		case ExifType.SRATIONAL:
			return {
				kind: 'rational',
				values: readList<Rational>(count, 8, (i) => ({
					numerator: reader.i32(offset + i),
					denominator: reader.i32(offset + i + 4),
				})),
			}

		case ExifType.FLOAT:
			return { kind: 'float', values: readList(count, 4, (i) => reader.f32(offset + i)) }

		case ExifType.DOUBLE:
			return { kind: 'float', values: readList(count, 8, (i) => reader.f64(offset + i)) }

		default:
			throw new IfdError(`unsupported type ${type}`)
	}
}

function readList<T = number>(count: number, size: number, read: (byteOffset: number) => T): T[] {
	const values: T[] = []
	for (let i = 0; i < count; i++) {
		values.push(read(i * size))
	}
	return values
}

/**
 * UTF-8 with replacement, cut at the first NUL, trailing whitespace trimmed
 */
function decodeText(bytes: Uint8Array): string {
	const nul = bytes.indexOf(0)
	const text = utf8.decode(nul >= 0 ? bytes.subarray(0, nul) : bytes)
	return text.replace(/\s+$/, '')
}

function pointerValue(entry: IfdEntry): number {
	if (entry.value.kind !== 'integer' || entry.value.values.length !== 1) {
		throw new IfdError(`pointer tag ${entry.tag} has type ${entry.type}`)
	}
	return entry.value.values[0]
}

function getTypeSize(type: number): number {
	switch (type) {
		case ExifType.BYTE:
		case ExifType.ASCII:
		case ExifType.SBYTE:
		case ExifType.UNDEFINED:
			return 1
		case ExifType.SHORT:
		case ExifType.SSHORT:
			return 2
		case ExifType.LONG:
		case ExifType.SLONG:
		case ExifType.FLOAT:
			return 4
		case ExifType.RATIONAL:
		case ExifType.SRATIONAL:
		case ExifType.DOUBLE:
			return 8
		default:
			return 0
	}
}
