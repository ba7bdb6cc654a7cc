/**
 * ICC profile parser
 * Recovers the profile description and header fields from an embedded profile
 */

import { describeError, MalformedMetadataError } from '@pixmeta/core'
import type { IccDescription, IccHeader, IccProfile, IccTag } from './types'

const HEADER_SIZE = 128
const TAG_ENTRY_SIZE = 12
const MLUC_RECORD_SIZE = 12

/**
 * Check if data is an ICC profile
 */
export function isIcc(data: Uint8Array): boolean {
	if (data.length < HEADER_SIZE) return false
	// Check 'acsp' signature at offset 36
	return (
		data[36] === 0x61 && // 'a'
		data[37] === 0x63 && // 'c'
		data[38] === 0x73 && // 's'
		data[39] === 0x70 // 'p'
	)
}

/**
 * Parse ICC profile from data
 *
 * Throws MalformedMetadataError when the header, tag table or the `desc`
 * tag does not fit in the data. An unreadable `cprt` tag leaves the
 * copyright null.
 */
export function parseIcc(data: Uint8Array): IccProfile {
	if (!isIcc(data)) {
		throw new MalformedMetadataError('ICC profile: missing acsp signature')
	}

	const header = parseHeader(data)
	const tags = parseTags(data)

	const descTag = tags.get('desc')
	const cprtTag = tags.get('cprt')

	return {
		header,
		tags,
		description: descTag ? parseTextTag(data, descTag) : null,
		copyright: cprtTag ? readOptionalText(data, cprtTag) : null,
	}
}

function readOptionalText(data: Uint8Array, tag: IccTag): string | null {
	try {
		return parseTextTag(data, tag)
	} catch (err) {
		if (err instanceof MalformedMetadataError) return null
		throw err
	}
}

/**
 * Read the human-readable description of an embedded profile
 */
export function readIccDescription(block: Uint8Array | null): IccDescription {
	if (!block || block.length === 0) return { status: 'absent' }

	let profile: IccProfile
	try {
		profile = parseIcc(block)
	} catch (err) {
		return { status: 'unparsable', error: describeError(err) }
	}

	const summary = {
		version: profile.header.version,
		profileClass: profile.header.profileClass,
		colorSpace: profile.header.colorSpace,
		pcs: profile.header.pcs,
		copyright: profile.copyright || null,
	}

	if (!profile.description) {
		return { status: 'empty', profile: summary }
	}
	return { status: 'ok', description: profile.description, profile: summary }
}

function parseHeader(data: Uint8Array): IccHeader {
	const size = readU32BE(data, 0)
	const versionMajor = data[8]
	const versionMinor = (data[9] >> 4) & 0x0f
	const versionPatch = data[9] & 0x0f
	const version = `${versionMajor}.${versionMinor}.${versionPatch}`

	const profileClass = readSignature(data, 12)
	const colorSpace = readSignature(data, 16)
	const pcs = readSignature(data, 20)

	return { size, version, profileClass, colorSpace, pcs }
}

function parseTags(data: Uint8Array): Map<string, IccTag> {
	const tags = new Map<string, IccTag>()
	if (data.length < HEADER_SIZE + 4) {
		throw new MalformedMetadataError('ICC profile: tag table missing')
	}

	const tagCount = readU32BE(data, HEADER_SIZE)
	if (HEADER_SIZE + 4 + tagCount * TAG_ENTRY_SIZE > data.length) {
		throw new MalformedMetadataError(`ICC profile: tag table of ${tagCount} entries truncated`)
	}

	for (let i = 0; i < tagCount; i++) {
		const tagOffset = HEADER_SIZE + 4 + i * TAG_ENTRY_SIZE
		const signature = readSignature(data, tagOffset)
		const offset = readU32BE(data, tagOffset + 4)
		const size = readU32BE(data, tagOffset + 8)

		tags.set(signature, { signature, offset, size })
	}

	return tags
}

/**
 * Decode a textDescriptionType, multiLocalizedUnicodeType or textType tag
 */
function parseTextTag(data: Uint8Array, tag: IccTag): string {
	const end = tag.offset + tag.size
	if (tag.size < 8 || end > data.length) {
		throw new MalformedMetadataError(`ICC profile: '${tag.signature}' tag out of bounds`)
	}

	const typeSignature = readSignature(data, tag.offset)

	if (typeSignature === 'desc') {
		// textDescriptionType: ASCII count (including NUL) then the string
		if (tag.size < 12) {
			throw new MalformedMetadataError(`ICC profile: '${tag.signature}' tag out of bounds`)
		}
		const length = readU32BE(data, tag.offset + 8)
		if (tag.offset + 12 + length > end) {
			throw new MalformedMetadataError(`ICC profile: '${tag.signature}' text overruns tag`)
		}
		return trimText(readString(data, tag.offset + 12, length))
	}

	if (typeSignature === 'mluc') {
		// multiLocalizedUnicodeType: records of (language, country, length, offset)
		if (tag.size < 16) {
			throw new MalformedMetadataError(`ICC profile: '${tag.signature}' tag out of bounds`)
		}
		const recordSize = readU32BE(data, tag.offset + 12)
		if (recordSize < MLUC_RECORD_SIZE) {
			throw new MalformedMetadataError(`ICC profile: '${tag.signature}' record size ${recordSize} too small`)
		}
		// Only records that lie inside the tag are read
		const recordCount = Math.min(readU32BE(data, tag.offset + 8), Math.floor((tag.size - 16) / recordSize))
		for (let i = 0; i < recordCount; i++) {
			const record = tag.offset + 16 + i * recordSize
			const stringLength = readU32BE(data, record + 4)
			const stringOffset = tag.offset + readU32BE(data, record + 8)
			if (stringOffset + stringLength > end) {
				throw new MalformedMetadataError(`ICC profile: '${tag.signature}' string ${i} out of bounds`)
			}
			const text = trimText(readUtf16BE(data, stringOffset, stringLength))
			if (text) return text
		}
		return ''
	}

	if (typeSignature === 'text') {
		// textType
		return trimText(readString(data, tag.offset + 8, tag.size - 8))
	}

	throw new MalformedMetadataError(
		`ICC profile: unsupported '${tag.signature}' tag type '${typeSignature}'`
	)
}

function trimText(text: string): string {
	return text.replace(/[\s\0]+$/, '')
}

// Binary reading helpers
function readU32BE(data: Uint8Array, offset: number): number {
	return ((data[offset] << 24) | (data[offset + 1] << 16) | (data[offset + 2] << 8) | data[offset + 3]) >>> 0
}

function readString(data: Uint8Array, offset: number, length: number): string {
	let str = ''
	for (let i = 0; i < length; i++) {
		const char = data[offset + i]
		if (char === 0) break
		str += String.fromCharCode(char)
	}
	return str
}

function readSignature(data: Uint8Array, offset: number): string {
	return trimText(readString(data, offset, 4))
}

function readUtf16BE(data: Uint8Array, offset: number, byteLength: number): string {
	let str = ''
	for (let i = 0; i + 1 < byteLength; i += 2) {
		const code = (data[offset + i] << 8) | data[offset + i + 1]
		if (code === 0) break
		str += String.fromCharCode(code)
	}
	return str
}
