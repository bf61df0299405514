/**
 * Error codes specific to transient image storage
 */
export enum TempStorageErrorCode {
  WRITE_ERROR = "WRITE_ERROR",
}

/**
 * Base error class for transient storage errors
 */
export class TempStorageError extends Error {
  constructor(
    public readonly code: TempStorageErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "TempStorageError";
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TempStorageError);
    }
  }
}

/**
 * Error thrown when an extracted image cannot be persisted
 */
export class TempWriteError extends TempStorageError {
  constructor(message: string) {
    super(TempStorageErrorCode.WRITE_ERROR, message);
    this.name = "TempWriteError";
  }
}
