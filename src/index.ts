/**
 * TAGDEN extractor - Main entry point
 *
 * Extracts TAGDEN.BIN assets and decodes the packed run-length images among them.
 */

// Archive directory parsing
export { TagdenBinary, readFrame, readDirectory, readDirectoryEntries } from './tagden-binary.js';

// Extraction pipeline
export {
  extractAll,
  extractEntries,
  listEntries,
  convertPackedImageFile,
  isPackedImagePath,
  decodedImagePath,
} from './extract.js';
export type { ExtractOptions, ExtractionSummary, ConvertImageOptions } from './extract.js';

// Packed image decoding
export { decodePackedImage, parsePackedImageHeader, isPackedImage } from './packed-image.js';
export { unpackPixel } from './utils/pixel.js';
export { normalizeInternalPath } from './utils/path-normalizer.js';
export { writePng } from './png-writer.js';
export type { RasterEncoder } from './png-writer.js';
export { createConsoleReporter, silentReporter } from './reporter.js';
export type { Reporter } from './reporter.js';

export * from './constants/tagden.js';
export * from './types/errors.js';
export type * from './types/directory-entry.js';
export type * from './types/raster.js';
