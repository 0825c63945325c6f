/**
 * Error classes for archive extraction and image decoding.
 */

export class TagdenError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TagdenError';
  }
}

export class ArchiveNotFoundError extends TagdenError {
  constructor(public readonly filePath: string, options?: ErrorOptions) {
    super(`Failed to find archive '${filePath}'`, options);
    this.name = 'ArchiveNotFoundError';
  }
}

/**
 * A read ran past the end of the archive buffer.
 */
export class TruncatedArchiveError extends TagdenError {
  constructor(message: string, public readonly offset: number) {
    super(message);
    this.name = 'TruncatedArchiveError';
  }
}

/**
 * A read ran past the end of a packed image.
 */
export class TruncatedImageError extends TagdenError {
  constructor(message: string, public readonly offset: number) {
    super(message);
    this.name = 'TruncatedImageError';
  }
}

export class InvalidFormatError extends TagdenError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidFormatError';
  }
}

export class InvalidPathError extends TagdenError {
  constructor(message: string, public readonly path?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InvalidPathError';
  }
}

/**
 * A run would place pixels outside the declared image width.
 */
export class RasterBoundsError extends TagdenError {
  constructor(public readonly row: number, public readonly column: number, public readonly width: number) {
    super(`Run on row ${row} reaches column ${column}, beyond image width ${width}`);
    this.name = 'RasterBoundsError';
  }
}
