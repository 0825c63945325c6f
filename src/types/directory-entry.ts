/**
 * Directory entry parsed from a TAGDEN.BIN frame.
 */
export interface DirectoryEntry {
  /** Absolute path the asset had on the developer machine, e.g. `l:\scorpc\game\gfx\logo.rle`. */
  readonly internalPath: string;
  readonly typeTag: number;
  /** Byte offset of the payload inside the archive buffer. */
  readonly payloadOffset: number;
  readonly payloadSize: number;
  readonly reserved: number;
  /** Byte offset of the frame this entry was read from. */
  readonly frameOffset: number;
}

/**
 * Outcome of reading one frame: either a directory entry or the end of the directory section.
 */
export type FrameReadResult =
  | { readonly kind: 'entry'; readonly entry: DirectoryEntry; readonly nextOffset: number }
  | EndOfDirectory;

/**
 * The frame whose type tag ended the directory section.
 */
export interface EndOfDirectory {
  readonly kind: 'end-of-directory';
  readonly offset: number;
  readonly typeTag: number;
}

/**
 * An archive loaded from disk with its directory parsed.
 */
export interface TagdenArchive {
  readonly filePath: string;
  readonly buffer: Buffer;
  readonly entries: readonly DirectoryEntry[];
  /** Offset of the frame that ended the directory section. */
  readonly directoryEnd: number;
}

/**
 * A written asset and the entry it came from.
 */
export interface ExtractedAsset {
  readonly entry: DirectoryEntry;
  readonly destination: string;
}
