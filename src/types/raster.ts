/**
 * Types for the packed run-length image format and its decoded form.
 */

export interface DecodedImageHeader {
  readonly magic: Buffer;
  readonly width: number;
  readonly height: number;
  /** Per-row offset into the payload in 2-byte units; null marks a blank row. */
  readonly scanlineRunOffsets: readonly (number | null)[];
  /** Byte offset where the pixel payload starts. */
  readonly payloadOffset: number;
}

/**
 * Row-major RGB raster, 3 bytes per pixel.
 */
export interface Raster {
  readonly width: number;
  readonly height: number;
  readonly channels: 3;
  readonly data: Buffer;
}

export type Rgb = readonly [red: number, green: number, blue: number];

export interface PackedImageOptions {
  /** Expected 8-byte signature. Defaults to PACKED_IMAGE_SIGNATURE. */
  readonly signature?: Buffer;
  /** Largest width * height accepted before allocating the raster. Defaults to MAX_IMAGE_PIXELS. */
  readonly maxPixels?: number;
}

export interface ConvertedImage {
  readonly source: string;
  readonly output: string;
  readonly width: number;
  readonly height: number;
}
