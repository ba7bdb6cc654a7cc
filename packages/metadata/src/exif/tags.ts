/**
 * Tag dictionary
 * Numeric EXIF/GPS tag IDs to canonical names and declared value kinds
 */

import dictionary from './tags.json'
import type { TagDefinition, TagKind, TagNamespace } from './types'

const TAG_KINDS: readonly TagKind[] = ['integer', 'rational', 'float', 'string', 'bytes']

function isTagKind(kind: string): kind is TagKind {
	return TAG_KINDS.some((known) => known === kind)
}

function buildTable(entries: Record<string, string[]>): ReadonlyMap<number, TagDefinition> {
	const table = new Map<number, TagDefinition>()
	for (const [key, [name, kind]] of Object.entries(entries)) {
		const id = Number(key)
		if (!Number.isInteger(id) || !name || !kind || !isTagKind(kind)) {
			throw new Error(`Invalid tag dictionary entry: ${key}`)
		}
		table.set(id, Object.freeze({ id, name, kind }))
	}
	return table
}

const TAGS: Record<TagNamespace, ReadonlyMap<number, TagDefinition>> = {
	image: buildTable(dictionary.image),
	gps: buildTable(dictionary.gps),
}

/** Pointer from the 0th IFD to the Exif sub-IFD */
export const EXIF_IFD_POINTER = 0x8769

/** Pointer from the 0th IFD to the GPS sub-IFD */
export const GPS_IFD_POINTER = 0x8825

/**
 * Look up a tag definition
 */
export function lookupTag(namespace: TagNamespace, id: number): TagDefinition | undefined {
	return TAGS[namespace].get(id)
}

/**
 * Canonical tag name, or the decimal ID for tags outside the dictionary
 */
export function tagName(namespace: TagNamespace, id: number): string {
	return lookupTag(namespace, id)?.name ?? String(id)
}

/**
 * All known tags in a namespace, in ID order
 */
export function listTags(namespace: TagNamespace): TagDefinition[] {
	return [...TAGS[namespace].values()].sort((a, b) => a.id - b.id)
}
