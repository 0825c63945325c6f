/**
 * Command-line program for the TAGDEN extractor.
 */

import { Command, InvalidArgumentError } from 'commander';
import { resolve } from 'node:path';
import {
  DEFAULT_IMAGE_EXTENSION,
  DEFAULT_OUTPUT_DIR,
  PACKED_IMAGE_SIGNATURE,
  PACKED_IMAGE_SIGNATURE_SIZE,
  TAGDEN_FILENAME,
} from './constants/tagden.js';
import { extractAll, listEntries } from './extract.js';
import { createConsoleReporter } from './reporter.js';

const VERSION = '0.1.0';

interface CliOptions {
  readonly output: string;
  readonly imageExt: string;
  readonly imageSignature?: Buffer;
  readonly images: boolean;
  readonly list?: boolean;
  readonly verbose?: boolean;
}

/**
 * Parses a `--image-signature` value of 16 hex digits.
 */
export function parseSignature(value: string): Buffer {
  if (!new RegExp(`^[0-9a-fA-F]{${PACKED_IMAGE_SIGNATURE_SIZE * 2}}$`).test(value)) {
    throw new InvalidArgumentError(`Expected ${PACKED_IMAGE_SIGNATURE_SIZE * 2} hex digits.`);
  }
  return Buffer.from(value, 'hex');
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('tagden-extract')
    .description(`Extract the assets stored in ${TAGDEN_FILENAME} and decode its packed images`)
    .version(VERSION)
    .argument('<archive>', `Path to ${TAGDEN_FILENAME}`)
    .allowExcessArguments(false)
    .option('-o, --output <dir>', 'Directory where assets will be written', DEFAULT_OUTPUT_DIR)
    .option(
      '--image-ext <ext>',
      'Extension of packed images to decode (the default is a guess; use --no-images if decoding fails)',
      DEFAULT_IMAGE_EXTENSION
    )
    .option(
      '--image-signature <hex>',
      `Expected 8-byte packed image signature, as hex (the built-in ${PACKED_IMAGE_SIGNATURE.toString('hex')}, ` +
        `"${PACKED_IMAGE_SIGNATURE.toString('ascii')}", is a placeholder and may not match real images)`,
      parseSignature
    )
    .option('--no-images', 'Extract files without decoding packed images')
    .option('--list', 'List the archive directory without extracting')
    .option('-v, --verbose', 'Report every directory entry and written file')
    .action(async (archive: string, options: CliOptions) => {
      const reporter = createConsoleReporter({ verbose: options.verbose });
      try {
        if (options.list) {
          await listEntries({ archivePath: resolve(archive), reporter });
          return;
        }

        console.log(`Extracting archive: ${archive}`);
        console.log(`Output will be written to: ${options.output}`);
        console.log('');

        const summary = await extractAll({
          archivePath: resolve(archive),
          outputDir: resolve(options.output),
          imageExtension: options.imageExt,
          imageSignature: options.imageSignature,
          convertImages: options.images,
          reporter,
        });

        console.log('');
        console.log(`✅ Extracted ${summary.assets.length} files and decoded ${summary.images.length} images`);

      } catch (error) {
        console.error('❌ Extraction failed:', error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });

  return program;
}
