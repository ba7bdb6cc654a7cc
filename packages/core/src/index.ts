/**
 * @pixmeta/core
 *
 * Shared types for the extraction pipeline:
 * - RGBA pixel grids and decoded images
 * - Per-field results
 * - Error taxonomy
 * - Container format gate
 */

export * from './types'
export * from './field'
export * from './errors'
export * from './format'
