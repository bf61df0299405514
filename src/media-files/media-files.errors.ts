/**
 * Error codes specific to input file discovery
 */
export enum MediaFilesErrorCode {
  MISSING_INPUT_SOURCE = "MISSING_INPUT_SOURCE",
  NO_INPUT_FILES = "NO_INPUT_FILES",
  DIRECTORY_READ_ERROR = "DIRECTORY_READ_ERROR",
}

/**
 * Base error class for input discovery errors
 */
export class MediaFilesError extends Error {
  constructor(
    public readonly code: MediaFilesErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "MediaFilesError";
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MediaFilesError);
    }
  }
}

/**
 * Error thrown when neither a directory nor a file list was given
 */
export class MissingInputSourceError extends MediaFilesError {
  constructor(message: string = "Provide either --dir or --files.") {
    super(MediaFilesErrorCode.MISSING_INPUT_SOURCE, message);
    this.name = "MissingInputSourceError";
  }
}

/**
 * Error thrown when no existing input file remains after filtering
 */
export class NoInputFilesError extends MediaFilesError {
  constructor(message: string = "No input files found.") {
    super(MediaFilesErrorCode.NO_INPUT_FILES, message);
    this.name = "NoInputFilesError";
  }
}

/**
 * Error thrown when the input directory cannot be listed
 */
export class DirectoryReadError extends MediaFilesError {
  constructor(message: string, public readonly directory: string) {
    super(MediaFilesErrorCode.DIRECTORY_READ_ERROR, message);
    this.name = "DirectoryReadError";
  }
}
