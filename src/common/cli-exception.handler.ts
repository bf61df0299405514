import { Logger } from "@nestjs/common";
import { MediaFilesError } from "../media-files/media-files.errors";
import { MetadataError } from "../metadata/metadata.errors";
import { TempStorageError } from "../temp-storage/temp-storage.errors";
import { TranscodeError } from "../transcode/transcode.errors";

/**
 * Process exit codes used by the command-line entry point
 */
export enum ExitCode {
  SUCCESS = 0,
  FAILURE = 1,
  INTERNAL_ERROR = 2,
}

export interface CliFailure {
  exitCode: ExitCode;
  code: string;
  message: string;
}

type DomainError = MetadataError | MediaFilesError | TranscodeError | TempStorageError;

/**
 * Formats every error that escapes a run into a message and an exit code.
 * Domain errors report their own message; anything else is logged and
 * reported as a generic internal error.
 */
export class CliExceptionHandler {
  private readonly logger = new Logger(CliExceptionHandler.name);

  handle(exception: unknown): CliFailure {
    if (this.isDomainError(exception)) {
      return {
        exitCode: ExitCode.FAILURE,
        code: exception.code,
        message: exception.message,
      };
    }

    this.logger.error(
      "Unexpected error",
      exception instanceof Error ? exception.stack : String(exception),
    );
    return {
      exitCode: ExitCode.INTERNAL_ERROR,
      code: "INTERNAL_ERROR",
      message: "Internal error",
    };
  }

  private isDomainError(exception: unknown): exception is DomainError {
    return (
      exception instanceof MetadataError ||
      exception instanceof MediaFilesError ||
      exception instanceof TranscodeError ||
      exception instanceof TempStorageError
    );
  }
}
