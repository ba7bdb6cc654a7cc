/**
 * ICC profile types
 */

/** ICC profile header */
export interface IccHeader {
	size: number
	version: string
	profileClass: string
	colorSpace: string
	pcs: string
}

/** ICC tag table entry */
export interface IccTag {
	signature: string
	offset: number
	size: number
}

/** Parsed ICC profile */
export interface IccProfile {
	header: IccHeader
	tags: Map<string, IccTag>
	description: string | null
	copyright: string | null
}

/** Profile fields reported alongside the description */
export interface IccProfileSummary {
	version: string
	profileClass: string
	colorSpace: string
	pcs: string
	copyright: string | null
}

/**
 * Outcome of reading a profile description
 *
 * `absent` means no profile was embedded, `unparsable` that one was but its
 * bytes do not parse, `empty` that it parsed without a usable description.
 */
export type IccDescription =
	| { readonly status: 'absent' }
	| { readonly status: 'unparsable'; readonly error: string }
	| { readonly status: 'empty'; readonly profile: IccProfileSummary }
	| { readonly status: 'ok'; readonly description: string; readonly profile: IccProfileSummary }
