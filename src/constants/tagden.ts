/**
 * Layout constants and defaults for TAGDEN.BIN and its packed images.
 */

export const TAGDEN_FILENAME = 'TAGDEN.BIN';

/** Type tag of a directory entry frame; any other tag ends the directory. */
export const DIRECTORY_ENTRY_TAG = 16;

/** Skipped pair plus the big-endian tag/offset/size/reserved/frame-size fields. */
export const FRAME_HEADER_SIZE = 16;

/**
 * Prefix every stored path carries from the developer machine.
 */
export const DEVELOPER_PATH_PREFIX: readonly string[] = ['l:', 'scorpc', 'game'];

export const DEFAULT_OUTPUT_DIR = 'output';

export const DEFAULT_IMAGE_EXTENSION = '.rle';

export const DECODED_IMAGE_EXTENSION = '.png';

/**
 * Expected signature of a packed image. Override with `PackedImageOptions.signature`
 * (or `--image-signature` on the command line) for archives using a different one.
 */
export const PACKED_IMAGE_SIGNATURE: Buffer = Buffer.from('RLE15BPP', 'ascii');

export const PACKED_IMAGE_SIGNATURE_SIZE = 8;

/**
 * Largest image (width * height) decoded. Blank rows cost no payload, so a header of a few
 * bytes can declare any size; this bounds the raster allocated for it (4096 x 4096).
 */
export const MAX_IMAGE_PIXELS = 4096 * 4096;

/** Run offset marking a row without any opaque pixels. */
export const BLANK_ROW_OFFSET = 0xffffffff;
