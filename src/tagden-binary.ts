/**
 * TAGDEN.BIN binary helpers.
 *
 * The archive starts with a flat run of directory frames. Each frame is 2 skipped bytes,
 * a big-endian header (type tag, payload offset, payload size, reserved, frame size) and
 * a NUL-terminated path filling the rest of the frame. The first frame whose tag is not
 * a directory entry ends the directory.
 */
import { readFile } from 'node:fs/promises';
import { TextDecoder } from 'node:util';
import { DIRECTORY_ENTRY_TAG, FRAME_HEADER_SIZE } from './constants/tagden.js';
import type { DirectoryEntry, EndOfDirectory, FrameReadResult, TagdenArchive } from './types/directory-entry.js';
import { ArchiveNotFoundError, InvalidFormatError, InvalidPathError, TruncatedArchiveError } from './types/errors.js';

const TYPE_TAG_OFFSET = 2;
const PAYLOAD_OFFSET_OFFSET = 4;
const PAYLOAD_SIZE_OFFSET = 8;
const RESERVED_OFFSET = 12;
const FRAME_SIZE_OFFSET = 14;

const pathDecoder = new TextDecoder('utf-8', { fatal: true });

function decodePath(raw: Buffer, frameOffset: number): string {
  const nul: number = raw.indexOf(0);
  const pathBytes: Buffer = nul === -1 ? raw : raw.subarray(0, nul);
  try {
    return pathDecoder.decode(pathBytes);
  } catch (error) {
    throw new InvalidPathError(`Path in frame at offset ${frameOffset} is not valid UTF-8`, undefined, { cause: error });
  }
}

/**
 * Reads one frame starting at `offset`.
 *
 * @returns The parsed entry and the offset of the next frame, or the end of the directory
 *   when the frame's type tag is not a directory entry (nothing past its header is read)
 * @throws {TruncatedArchiveError} If the frame runs past the end of the buffer
 * @throws {InvalidFormatError} If the frame is shorter than its own header
 * @throws {InvalidPathError} If the stored path is not valid UTF-8
 */
export function readFrame(buffer: Buffer, offset: number): FrameReadResult {
  if (offset + FRAME_HEADER_SIZE > buffer.length) {
    throw new TruncatedArchiveError(
      `Frame header at offset ${offset} extends beyond archive bounds (size ${buffer.length})`,
      offset
    );
  }

  const typeTag: number = buffer.readUInt16BE(offset + TYPE_TAG_OFFSET);
  if (typeTag !== DIRECTORY_ENTRY_TAG) {
    return { kind: 'end-of-directory', offset, typeTag };
  }

  const payloadOffset: number = buffer.readUInt32BE(offset + PAYLOAD_OFFSET_OFFSET);
  const payloadSize: number = buffer.readUInt32BE(offset + PAYLOAD_SIZE_OFFSET);
  const reserved: number = buffer.readUInt16BE(offset + RESERVED_OFFSET);
  const frameSize: number = buffer.readUInt16BE(offset + FRAME_SIZE_OFFSET);

  if (frameSize < FRAME_HEADER_SIZE) {
    throw new InvalidFormatError(`Frame at offset ${offset} declares size ${frameSize}, smaller than its header`);
  }
  const frameEnd: number = offset + frameSize;
  if (frameEnd > buffer.length) {
    throw new TruncatedArchiveError(
      `Frame at offset ${offset} extends beyond archive bounds: frameSize=${frameSize}, archiveSize=${buffer.length}`,
      offset
    );
  }

  const internalPath: string = decodePath(buffer.subarray(offset + FRAME_HEADER_SIZE, frameEnd), offset);
  const entry: DirectoryEntry = {
    internalPath,
    typeTag,
    payloadOffset,
    payloadSize,
    reserved,
    frameOffset: offset,
  };
  return { kind: 'entry', entry, nextOffset: frameEnd };
}

/**
 * Walks frames from the start of the buffer, yielding each entry and returning the frame
 * that ended the directory.
 */
function* walkDirectory(buffer: Buffer): Generator<DirectoryEntry, EndOfDirectory, undefined> {
  let result: FrameReadResult = readFrame(buffer, 0);
  while (result.kind === 'entry') {
    yield result.entry;
    result = readFrame(buffer, result.nextOffset);
  }
  return result;
}

/**
 * Lazily yields directory entries in archive order, stopping at the first frame that is
 * not a directory entry.
 */
export function* readDirectoryEntries(buffer: Buffer): Generator<DirectoryEntry, void, undefined> {
  yield* walkDirectory(buffer);
}

/**
 * Reads the whole directory section.
 *
 * @returns The entries and the offset of the frame that ended the directory
 */
export function readDirectory(buffer: Buffer): { readonly entries: DirectoryEntry[]; readonly directoryEnd: number } {
  const entries: DirectoryEntry[] = [];
  const walker = walkDirectory(buffer);
  let step: IteratorResult<DirectoryEntry, EndOfDirectory> = walker.next();
  while (!step.done) {
    entries.push(step.value);
    step = walker.next();
  }
  return { entries, directoryEnd: step.value.offset };
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * TAGDEN.BIN archive access.
 */
export class TagdenBinary {
  /**
   * Reads an archive from disk and parses its directory.
   *
   * @throws {ArchiveNotFoundError} If the file does not exist
   */
  static async read({ filePath }: { readonly filePath: string }): Promise<TagdenArchive> {
    let buffer: Buffer;
    try {
      buffer = await readFile(filePath);
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new ArchiveNotFoundError(filePath, { cause: error });
      }
      throw error;
    }
    const { entries, directoryEnd } = readDirectory(buffer);
    return { filePath, buffer, entries, directoryEnd };
  }

  /**
   * Returns the payload bytes of an entry as a view into the archive buffer.
   *
   * @throws {TruncatedArchiveError} If the payload range exceeds the buffer
   */
  static extractPayload({ buffer, entry }: { readonly buffer: Buffer; readonly entry: DirectoryEntry }): Buffer {
    const end: number = entry.payloadOffset + entry.payloadSize;
    if (end > buffer.length) {
      throw new TruncatedArchiveError(
        `Payload of '${entry.internalPath}' extends beyond archive bounds: offset=${entry.payloadOffset}, size=${entry.payloadSize}, archiveSize=${buffer.length}`,
        entry.payloadOffset
      );
    }
    return buffer.subarray(entry.payloadOffset, end);
  }
}
