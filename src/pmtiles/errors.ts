export type PMTilesErrorCode =
  | 'HEADER_PARSE'
  | 'ARCHIVE_READ'
  | 'DECOMPRESSION'
  | 'INVALID_TILE_ID'
  | 'DIRECTORY_PARSE';

/** Base class for every failure raised while reading an archive. */
export class PMTilesError extends Error {
  readonly code: PMTilesErrorCode;
  override readonly cause?: unknown;

  constructor(code: PMTilesErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'PMTilesError';
    this.code = code;
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

/** The fixed header region is truncated, has the wrong magic, or points outside the archive. */
export class HeaderParseError extends PMTilesError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('HEADER_PARSE', message, options);
    this.name = 'HeaderParseError';
  }
}

export class ArchiveReadError extends PMTilesError {
  readonly offset: number;
  readonly length: number;

  constructor(message: string, range: { offset: number; length: number }, options?: { cause?: unknown }) {
    super('ARCHIVE_READ', message, options);
    this.name = 'ArchiveReadError';
    this.offset = range.offset;
    this.length = range.length;
  }
}

export class DecompressionError extends PMTilesError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DECOMPRESSION', message, options);
    this.name = 'DecompressionError';
  }
}

export class InvalidTileIdError extends PMTilesError {
  constructor(message: string) {
    super('INVALID_TILE_ID', message);
    this.name = 'InvalidTileIdError';
  }
}

export class DirectoryParseError extends PMTilesError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DIRECTORY_PARSE', message, options);
    this.name = 'DirectoryParseError';
  }
}
