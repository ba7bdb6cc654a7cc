/**
 * pixmeta - Image metadata extraction
 *
 * Decodes an image once and reports geometry, the ICC profile description,
 * EXIF/GPS tags, perceptual hashes and color statistics.
 */

// Re-export the building blocks
export * from '@pixmeta/core'
export * from '@pixmeta/metadata'
export * from '@pixmeta/hash'
export * from '@pixmeta/histogram'

// Main API
export { extractMetadata } from './extract'
export { loadImage, loadImageFile, type LoadOptions } from './image'
export type { ExtractOptions, HashDigest, MetadataRecord } from './record'
