/**
 * @pixmeta/metadata
 *
 * Metadata block decoding
 *
 * Features:
 * - EXIF tag table from TIFF-structured blocks
 * - GPS coordinate conversion
 * - Camera settings summary
 * - ICC profile description
 */

export * from './exif'
export * from './icc'
