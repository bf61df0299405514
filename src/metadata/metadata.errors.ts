/**
 * Error codes specific to metadata loading and artwork resolution
 * This module is framework-agnostic and does not depend on NestJS or CLI context
 */
export enum MetadataErrorCode {
  READ_ERROR = "READ_ERROR",
  INVALID_ROOT = "INVALID_ROOT",
  INVALID_ENTRY = "INVALID_ENTRY",
  ARTWORK_NOT_FOUND = "ARTWORK_NOT_FOUND",
}

/**
 * Base error class for metadata errors
 */
export class MetadataError extends Error {
  constructor(
    public readonly code: MetadataErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "MetadataError";
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MetadataError);
    }
  }
}

/**
 * Error thrown when the metadata file cannot be read or parsed as JSON
 */
export class MetadataReadError extends MetadataError {
  constructor(message: string, public readonly filePath: string) {
    super(MetadataErrorCode.READ_ERROR, message);
    this.name = "MetadataReadError";
  }
}

/**
 * Error thrown when the JSON root is not an array
 */
export class InvalidMetadataRootError extends MetadataError {
  constructor(message: string = "JSON root must be an array (list) of metadata objects.") {
    super(MetadataErrorCode.INVALID_ROOT, message);
    this.name = "InvalidMetadataRootError";
  }
}

/**
 * Error thrown when an array item is not a plain object
 */
export class InvalidMetadataEntryError extends MetadataError {
  constructor(public readonly index: number) {
    super(
      MetadataErrorCode.INVALID_ENTRY,
      `Metadata entry at index ${index} is not an object/dict.`,
    );
    this.name = "InvalidMetadataEntryError";
  }
}

/**
 * Error thrown when an explicitly referenced artwork file does not exist
 */
export class ArtworkNotFoundError extends MetadataError {
  constructor(message: string, public readonly imagePath: string) {
    super(MetadataErrorCode.ARTWORK_NOT_FOUND, message);
    this.name = "ArtworkNotFoundError";
  }
}
