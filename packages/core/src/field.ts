/**
 * Per-field extraction results
 *
 * Every optional part of a metadata record carries one of these so that
 * "not present in the source" and "present but failed" stay distinct
 * once serialized.
 */

export type Field<T> =
	| { readonly status: 'ok'; readonly value: T }
	| { readonly status: 'absent' }
	| { readonly status: 'error'; readonly error: string }

export function ok<T>(value: T): Field<T> {
	return { status: 'ok', value }
}

export function absent<T>(): Field<T> {
	return { status: 'absent' }
}

export function failed<T>(error: unknown): Field<T> {
	return { status: 'error', error: describeError(error) }
}

/**
 * Run an analyzer, turning anything it throws into an error field
 */
export function capture<T>(analyze: () => Field<T>): Field<T> {
	try {
		return analyze()
	} catch (err) {
		return failed(err)
	}
}

/**
 * Unwrap a field value, or null when absent/failed
 */
export function valueOf<T>(field: Field<T>): T | null {
	return field.status === 'ok' ? field.value : null
}

export function describeError(error: unknown): string {
	if (error instanceof Error) return error.message
	return String(error)
}
