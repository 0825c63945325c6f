#!/usr/bin/env node
/**
 * TAGDEN extractor - CLI Interface
 *
 * Extracts the assets stored in TAGDEN.BIN and converts its packed images to PNG.
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
