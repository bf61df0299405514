/**
 * Error codes specific to running the external transcoder
 */
export enum TranscodeErrorCode {
  TRANSCODE_FAILED = "TRANSCODE_FAILED",
  TRANSCODER_UNAVAILABLE = "TRANSCODER_UNAVAILABLE",
}

/**
 * Base error class for transcoder errors
 */
export class TranscodeError extends Error {
  constructor(
    public readonly code: TranscodeErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "TranscodeError";
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TranscodeError);
    }
  }
}

/**
 * Error thrown when ffmpeg exits with a non-zero status
 */
export class TranscodeFailedError extends TranscodeError {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
  ) {
    super(TranscodeErrorCode.TRANSCODE_FAILED, message);
    this.name = "TranscodeFailedError";
  }
}

/**
 * Error thrown when the ffmpeg process cannot be started
 */
export class TranscoderUnavailableError extends TranscodeError {
  constructor(message: string) {
    super(TranscodeErrorCode.TRANSCODER_UNAVAILABLE, message);
    this.name = "TranscoderUnavailableError";
  }
}
