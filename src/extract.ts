/**
 * Extraction orchestrator - writes every TAGDEN.BIN asset below an output directory and
 * converts the packed images among them to PNG.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, format, join, parse } from 'node:path';
import {
  DECODED_IMAGE_EXTENSION,
  DEFAULT_IMAGE_EXTENSION,
  DEFAULT_OUTPUT_DIR,
} from './constants/tagden.js';
import { decodePackedImage } from './packed-image.js';
import { writePng, type RasterEncoder } from './png-writer.js';
import { silentReporter, type Reporter } from './reporter.js';
import { TagdenBinary } from './tagden-binary.js';
import type { DirectoryEntry, ExtractedAsset, TagdenArchive } from './types/directory-entry.js';
import type { ConvertedImage, Raster } from './types/raster.js';
import { normalizeInternalPath } from './utils/path-normalizer.js';

export interface ExtractOptions {
  readonly archivePath: string;
  /** Defaults to `output` relative to the working directory. */
  readonly outputDir?: string;
  /** Suffix of embedded paths holding packed images, matched case-insensitively. */
  readonly imageExtension?: string;
  /** Overrides the expected 8-byte packed image signature. */
  readonly imageSignature?: Buffer;
  /** Set to false to skip image conversion. */
  readonly convertImages?: boolean;
  readonly reporter?: Reporter;
  readonly encoder?: RasterEncoder;
}

export interface ExtractionSummary {
  readonly archivePath: string;
  readonly outputDir: string;
  readonly assets: readonly ExtractedAsset[];
  readonly images: readonly ConvertedImage[];
}

export interface ConvertImageOptions {
  readonly inputPath: string;
  readonly outputPath: string;
  readonly signature?: Buffer;
  readonly reporter?: Reporter;
  readonly encoder?: RasterEncoder;
}

function normalizeExtension(extension: string): string {
  return (extension.startsWith('.') ? extension : `.${extension}`).toLowerCase();
}

/**
 * Whether an embedded path names a packed image.
 */
export function isPackedImagePath(internalPath: string, imageExtension: string = DEFAULT_IMAGE_EXTENSION): boolean {
  return internalPath.toLowerCase().endsWith(normalizeExtension(imageExtension));
}

/**
 * Path of the decoded image written next to an extracted packed image.
 */
export function decodedImagePath(destination: string): string {
  const { dir, name } = parse(destination);
  return format({ dir, name, ext: DECODED_IMAGE_EXTENSION });
}

async function ensureOutputDir(outputDir: string, reporter: Reporter): Promise<void> {
  const created: string | undefined = await mkdir(outputDir, { recursive: true });
  if (created !== undefined) {
    reporter.info(`Creating output directory '${outputDir}'`);
  }
}

/**
 * Writes each entry's payload to `outputDir`, in archive order, overwriting existing files.
 *
 * @returns The destination written for each entry
 * @throws {InvalidPathError} If an entry's path lacks the developer prefix
 * @throws {TruncatedArchiveError} If a payload extends beyond the archive
 */
export async function extractEntries({
  buffer,
  entries,
  outputDir,
  reporter = silentReporter,
}: {
  readonly buffer: Buffer;
  readonly entries: Iterable<DirectoryEntry>;
  readonly outputDir: string;
  readonly reporter?: Reporter;
}): Promise<ExtractedAsset[]> {
  const assets: ExtractedAsset[] = [];
  for (const entry of entries) {
    const destination: string = join(outputDir, normalizeInternalPath(entry.internalPath));
    const payload: Buffer = TagdenBinary.extractPayload({ buffer, entry });

    const parent: string = dirname(destination);
    const created: string | undefined = await mkdir(parent, { recursive: true });
    if (created !== undefined) {
      reporter.debug(`Creating directory '${parent}' for extraction`);
    }

    await writeFile(destination, payload);
    reporter.debug(`Extracted file '${destination}'`);
    assets.push({ entry, destination });
  }
  return assets;
}

/**
 * Decodes one packed image file and writes it through the encoder.
 *
 * @returns The converted image, or null when the image has no pixels to encode
 */
export async function convertPackedImageFile({
  inputPath,
  outputPath,
  signature,
  reporter = silentReporter,
  encoder = writePng,
}: ConvertImageOptions): Promise<ConvertedImage | null> {
  const buffer: Buffer = await readFile(inputPath);
  const raster: Raster = decodePackedImage(buffer, { signature });
  if (raster.width === 0 || raster.height === 0) {
    reporter.warn(`Skipping empty ${raster.width}x${raster.height} image '${inputPath}'`);
    return null;
  }
  await encoder(raster, outputPath);
  reporter.info(`Decoded ${raster.width}x${raster.height} image '${inputPath}' to '${outputPath}'`);
  return { source: inputPath, output: outputPath, width: raster.width, height: raster.height };
}

async function convertExtractedImages(
  assets: readonly ExtractedAsset[],
  options: {
    readonly imageExtension: string;
    readonly signature?: Buffer;
    readonly reporter: Reporter;
    readonly encoder: RasterEncoder;
  }
): Promise<ConvertedImage[]> {
  const images: ConvertedImage[] = [];
  const candidates = assets.filter((asset: ExtractedAsset) =>
    isPackedImagePath(asset.entry.internalPath, options.imageExtension)
  );
  options.reporter.info(`Found ${candidates.length} packed images, decoding...`);

  for (const asset of candidates) {
    const converted = await convertPackedImageFile({
      inputPath: asset.destination,
      outputPath: decodedImagePath(asset.destination),
      signature: options.signature,
      reporter: options.reporter,
      encoder: options.encoder,
    });
    if (converted) {
      images.push(converted);
    }
  }
  return images;
}

/**
 * Extracts every asset of an archive and converts its packed images.
 *
 * @throws {ArchiveNotFoundError} If the archive does not exist
 */
export async function extractAll(options: ExtractOptions): Promise<ExtractionSummary> {
  const {
    archivePath,
    outputDir = DEFAULT_OUTPUT_DIR,
    imageExtension = DEFAULT_IMAGE_EXTENSION,
    imageSignature,
    convertImages = true,
    reporter = silentReporter,
    encoder = writePng,
  } = options;

  reporter.info(`Extracting assets from file '${archivePath}'`);
  const archive: TagdenArchive = await TagdenBinary.read({ filePath: archivePath });
  await ensureOutputDir(outputDir, reporter);

  for (const entry of archive.entries) {
    reporter.debug(`Found file '${entry.internalPath}'`);
  }
  reporter.info(`Found ${archive.entries.length} files in '${archivePath}', extracting...`);

  const assets: ExtractedAsset[] = await extractEntries({
    buffer: archive.buffer,
    entries: archive.entries,
    outputDir,
    reporter,
  });
  reporter.info('All files extracted');

  const images: ConvertedImage[] = convertImages
    ? await convertExtractedImages(assets, { imageExtension, signature: imageSignature, reporter, encoder })
    : [];

  return { archivePath, outputDir, assets, images };
}

/**
 * Reads an archive's directory without writing anything.
 */
export async function listEntries({
  archivePath,
  reporter = silentReporter,
}: {
  readonly archivePath: string;
  readonly reporter?: Reporter;
}): Promise<readonly DirectoryEntry[]> {
  const archive: TagdenArchive = await TagdenBinary.read({ filePath: archivePath });
  for (const entry of archive.entries) {
    reporter.info(`${entry.internalPath}  offset=${entry.payloadOffset} size=${entry.payloadSize}`);
  }
  reporter.info(`${archive.entries.length} entries, directory ends at offset ${archive.directoryEnd}`);
  return archive.entries;
}
