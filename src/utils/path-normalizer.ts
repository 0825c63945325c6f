/**
 * Stored paths are absolute paths from a developer computer. Convert them to
 * something that can be written below the output directory.
 */
import { join } from 'node:path';
import { DEVELOPER_PATH_PREFIX } from '../constants/tagden.js';
import { InvalidPathError } from '../types/errors.js';

function splitWindowsPath(internalPath: string): string[] {
  return internalPath.split(/[\\/]/).filter((segment: string) => segment.length > 0);
}

/**
 * Removes the developer-machine prefix from a stored path.
 *
 * @param internalPath - Windows-style path, e.g. `l:\scorpc\game\gfx\logo.rle`
 * @returns Relative path joined with the native separator
 * @throws {InvalidPathError} If the prefix does not match, nothing follows it, or a segment is `.` or `..`
 */
export function normalizeInternalPath(internalPath: string, prefix: readonly string[] = DEVELOPER_PATH_PREFIX): string {
  const segments = splitWindowsPath(internalPath);
  const matchesPrefix = prefix.every(
    (expected: string, index: number) => segments[index]?.toLowerCase() === expected.toLowerCase()
  );
  if (!matchesPrefix) {
    throw new InvalidPathError(`Path '${internalPath}' does not start with '${prefix.join('\\')}\\'`, internalPath);
  }

  const relative = segments.slice(prefix.length);
  if (relative.length === 0) {
    throw new InvalidPathError(`Path '${internalPath}' names no file below the developer prefix`, internalPath);
  }
  if (relative.some((segment: string) => segment === '.' || segment === '..')) {
    throw new InvalidPathError(`Path '${internalPath}' contains relative segments`, internalPath);
  }
  return join(...relative);
}
