/**
 * Decoder for the packed run-length image format.
 *
 * Layout (big-endian): 8-byte signature, width (u32), height (u32), one u32 run offset per
 * row, then the pixel payload. A row's offset counts 2-byte units into the payload, where
 * the row's runs are stored as `xStart, runCount, pixels..., xDelta, runCount, pixels...,
 * 0`. Each following run starts `xDelta + runCount` columns after the previous start.
 */
import { constants as bufferConstants } from 'node:buffer';
import {
  BLANK_ROW_OFFSET,
  MAX_IMAGE_PIXELS,
  PACKED_IMAGE_SIGNATURE,
  PACKED_IMAGE_SIGNATURE_SIZE,
} from './constants/tagden.js';
import { InvalidFormatError, RasterBoundsError, TruncatedImageError } from './types/errors.js';
import type { DecodedImageHeader, PackedImageOptions, Raster, Rgb } from './types/raster.js';
import { unpackPixel } from './utils/pixel.js';

const DIMENSIONS_SIZE = 8;
const BYTES_PER_PIXEL = 3;

/**
 * Forward-only big-endian reader over the pixel payload.
 */
class PayloadCursor {
  private offset: number;

  constructor(private readonly payload: Buffer, offset: number) {
    this.offset = offset;
  }

  readUint16(): number {
    if (this.offset + 2 > this.payload.length) {
      throw new TruncatedImageError(
        `Read at payload offset ${this.offset} extends beyond payload end (${this.payload.length} bytes)`,
        this.offset
      );
    }
    const value: number = this.payload.readUInt16BE(this.offset);
    this.offset += 2;
    return value;
  }
}

function resolveSignature(options: PackedImageOptions): Buffer {
  const signature: Buffer = options.signature ?? PACKED_IMAGE_SIGNATURE;
  if (signature.length !== PACKED_IMAGE_SIGNATURE_SIZE) {
    throw new InvalidFormatError(`Image signature must be ${PACKED_IMAGE_SIGNATURE_SIZE} bytes, got ${signature.length}`);
  }
  return signature;
}

/**
 * Checks whether a buffer starts with the packed image signature.
 */
export function isPackedImage(buffer: Buffer, options: PackedImageOptions = {}): boolean {
  const signature: Buffer = resolveSignature(options);
  return buffer.length >= signature.length && buffer.subarray(0, signature.length).equals(signature);
}

/**
 * Parses the signature, dimensions and per-row run offsets.
 *
 * @throws {InvalidFormatError} If the signature does not match
 * @throws {TruncatedImageError} If the header extends beyond the buffer
 */
export function parsePackedImageHeader(buffer: Buffer, options: PackedImageOptions = {}): DecodedImageHeader {
  const signature: Buffer = resolveSignature(options);
  if (buffer.length < signature.length) {
    throw new TruncatedImageError(`Image of ${buffer.length} bytes is too small to hold a signature`, 0);
  }
  const magic: Buffer = buffer.subarray(0, signature.length);
  if (!magic.equals(signature)) {
    throw new InvalidFormatError(
      `Invalid image signature: expected ${signature.toString('hex')}, found ${magic.toString('hex')}`
    );
  }

  const dimensionsOffset: number = signature.length;
  if (dimensionsOffset + DIMENSIONS_SIZE > buffer.length) {
    throw new TruncatedImageError('Image dimensions extend beyond end of file', dimensionsOffset);
  }
  const width: number = buffer.readUInt32BE(dimensionsOffset);
  const height: number = buffer.readUInt32BE(dimensionsOffset + 4);

  const offsetsStart: number = dimensionsOffset + DIMENSIONS_SIZE;
  const payloadOffset: number = offsetsStart + height * 4;
  if (payloadOffset > buffer.length) {
    throw new TruncatedImageError(
      `Run offset table for ${height} rows extends beyond end of file (${buffer.length} bytes)`,
      offsetsStart
    );
  }

  const scanlineRunOffsets: (number | null)[] = [];
  for (let row = 0; row < height; row++) {
    const value: number = buffer.readUInt32BE(offsetsStart + row * 4);
    scanlineRunOffsets.push(value === BLANK_ROW_OFFSET ? null : value);
  }

  return { magic, width, height, scanlineRunOffsets, payloadOffset };
}

function createRaster(width: number, height: number, maxPixels: number): Raster {
  if (width * height > maxPixels) {
    throw new InvalidFormatError(`Image of ${width}x${height} pixels exceeds the limit of ${maxPixels} pixels`);
  }
  const size: number = width * height * BYTES_PER_PIXEL;
  if (size > bufferConstants.MAX_LENGTH) {
    throw new InvalidFormatError(`Image of ${width}x${height} pixels is too large to decode`);
  }
  return { width, height, channels: 3, data: Buffer.alloc(size) };
}

function decodeRow(raster: Raster, row: number, payload: Buffer, runOffset: number): void {
  const cursor = new PayloadCursor(payload, runOffset * 2);
  let xStart: number = cursor.readUint16();
  let runCount: number = cursor.readUint16();

  for (;;) {
    const runEnd: number = xStart + runCount;
    if (runEnd > raster.width) {
      throw new RasterBoundsError(row, runEnd - 1, raster.width);
    }

    let index: number = (row * raster.width + xStart) * BYTES_PER_PIXEL;
    for (let i = 0; i < runCount; i++) {
      const [red, green, blue]: Rgb = unpackPixel(cursor.readUint16());
      raster.data[index] = red;
      raster.data[index + 1] = green;
      raster.data[index + 2] = blue;
      index += BYTES_PER_PIXEL;
    }

    const xDelta: number = cursor.readUint16();
    if (xDelta === 0) {
      return;
    }
    xStart += xDelta + runCount;
    runCount = cursor.readUint16();
  }
}

/**
 * Decodes a packed image into an RGB raster. Rows without a run offset and the gaps
 * between runs stay black.
 *
 * @throws {InvalidFormatError} If the signature does not match
 * @throws {TruncatedImageError} If any read runs past the end of the payload
 * @throws {RasterBoundsError} If a run extends past the declared width
 * @throws {InvalidFormatError} If the image has more pixels than `options.maxPixels`
 */
export function decodePackedImage(buffer: Buffer, options: PackedImageOptions = {}): Raster {
  const header: DecodedImageHeader = parsePackedImageHeader(buffer, options);
  const payload: Buffer = buffer.subarray(header.payloadOffset);
  const raster: Raster = createRaster(header.width, header.height, options.maxPixels ?? MAX_IMAGE_PIXELS);

  header.scanlineRunOffsets.forEach((runOffset: number | null, row: number) => {
    if (runOffset !== null) {
      decodeRow(raster, row, payload, runOffset);
    }
  });
  return raster;
}
