import { BLANK_ROW_OFFSET, DIRECTORY_ENTRY_TAG, PACKED_IMAGE_SIGNATURE } from '../../constants/tagden.js';

export interface FrameSpec {
  readonly path: string | Buffer;
  readonly payloadOffset: number;
  readonly payloadSize: number;
  readonly typeTag?: number;
  readonly reserved?: number;
  /** Overrides the computed frame size. */
  readonly frameSize?: number;
  /** Appends a NUL after the path (default true). */
  readonly terminate?: boolean;
}

export function buildFrame(spec: FrameSpec): Buffer {
  const pathBytes: Buffer = typeof spec.path === 'string' ? Buffer.from(spec.path, 'utf8') : spec.path;
  const pathField: Buffer = spec.terminate === false ? pathBytes : Buffer.concat([pathBytes, Buffer.from([0])]);
  const header = Buffer.alloc(16);
  header.writeUInt16BE(spec.typeTag ?? DIRECTORY_ENTRY_TAG, 2);
  header.writeUInt32BE(spec.payloadOffset, 4);
  header.writeUInt32BE(spec.payloadSize, 8);
  header.writeUInt16BE(spec.reserved ?? 0, 12);
  header.writeUInt16BE(spec.frameSize ?? 16 + pathField.length, 14);
  return Buffer.concat([header, pathField]);
}

/** A 16-byte frame whose type tag ends the directory. */
export function buildTerminator(typeTag = 0): Buffer {
  const frame = Buffer.alloc(16);
  frame.writeUInt16BE(typeTag, 2);
  return frame;
}

export interface ArchiveFile {
  readonly path: string;
  readonly data: Buffer;
}

/**
 * Builds an archive: directory frames, a terminator, then each file's payload in order.
 */
export function buildArchive(files: readonly ArchiveFile[]): Buffer {
  const pathFields: number[] = files.map((file: ArchiveFile) => Buffer.byteLength(file.path, 'utf8') + 1);
  const directorySize: number = pathFields.reduce((total: number, size: number) => total + 16 + size, 16);

  let payloadOffset: number = directorySize;
  const frames: Buffer[] = files.map((file: ArchiveFile) => {
    const frame = buildFrame({ path: file.path, payloadOffset, payloadSize: file.data.length });
    payloadOffset += file.data.length;
    return frame;
  });
  return Buffer.concat([...frames, buildTerminator(), ...files.map((file: ArchiveFile) => file.data)]);
}

/**
 * Builds a packed image. Each row is the list of u16 words of its run chain
 * (`xStart, runCount, pixels..., xDelta, [runCount, pixels..., xDelta]...`), or null for a blank row.
 */
export function buildPackedImage({
  width,
  height,
  rows,
  signature = PACKED_IMAGE_SIGNATURE,
}: {
  readonly width: number;
  readonly height: number;
  readonly rows: readonly (readonly number[] | null)[];
  readonly signature?: Buffer;
}): Buffer {
  const header = Buffer.alloc(8 + rows.length * 4);
  header.writeUInt32BE(width, 0);
  header.writeUInt32BE(height, 4);

  const words: number[] = [];
  rows.forEach((row: readonly number[] | null, index: number) => {
    const offset: number = row === null ? BLANK_ROW_OFFSET : words.length;
    header.writeUInt32BE(offset, 8 + index * 4);
    if (row !== null) {
      words.push(...row);
    }
  });

  const payload = Buffer.alloc(words.length * 2);
  words.forEach((word: number, index: number) => payload.writeUInt16BE(word, index * 2));
  return Buffer.concat([signature, header, payload]);
}

/** RGB triple of a raster pixel. */
export function pixelAt(data: Buffer, width: number, x: number, y: number): number[] {
  const index: number = (y * width + x) * 3;
  return [data[index], data[index + 1], data[index + 2]];
}
