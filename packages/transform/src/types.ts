/**
 * Resampling types and options
 */

/**
 * - `nearest`: source pixel under the destination pixel centre
 * - `area`: average of every source pixel the destination pixel covers
 */
export type ResizeMethod = 'nearest' | 'area'

export interface ResizeOptions {
	/** Resize method (default: area) */
	method?: ResizeMethod
}

