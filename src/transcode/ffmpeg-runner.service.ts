import { Injectable, Logger } from "@nestjs/common";
import { spawn } from "child_process";
import { TranscodeFailedError, TranscoderUnavailableError } from "./transcode.errors";
import { TranscodeCommand } from "./types";

/**
 * Cap on the stderr tail kept for error reports
 */
const MAX_STDERR_LENGTH = 4000;

/**
 * Service responsible for executing ffmpeg and surfacing failures as hard errors.
 */
@Injectable()
export class FfmpegRunnerService {
  private readonly logger = new Logger(FfmpegRunnerService.name);

  /**
   * Runs the command to completion
   * @throws TranscoderUnavailableError if the process cannot be spawned
   * @throws TranscodeFailedError if the process exits with a non-zero status
   */
  run(command: TranscodeCommand): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const child = spawn(command.command, command.args, {
        stdio: ["ignore", "ignore", "pipe"],
      });

      let stderr = "";
      child.stderr.on("data", (chunk: Buffer) => {
        stderr += chunk.toString("utf8");
        if (stderr.length > MAX_STDERR_LENGTH) {
          stderr = stderr.slice(-MAX_STDERR_LENGTH);
        }
      });

      child.on("error", (error: Error) => {
        this.logger.error(`Failed to start '${command.command}': ${error.message}`);
        reject(
          new TranscoderUnavailableError(
            `Failed to start '${command.command}': ${error.message}`,
          ),
        );
      });

      child.on("close", (exitCode: number | null) => {
        if (exitCode === 0) {
          resolve();
          return;
        }
        reject(
          new TranscodeFailedError(
            `${command.command} exited with code ${exitCode}`,
            exitCode,
            stderr,
          ),
        );
      });
    });
  }
}
