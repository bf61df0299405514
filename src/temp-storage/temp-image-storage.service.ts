import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigType } from "@nestjs/config";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { appConfig } from "../config/app.config";
import { ExtractedImage } from "../id3-analysis/types";
import { TempWriteError } from "./temp-storage.errors";

/**
 * Base name of persisted images; the extension comes from the sniffed format
 */
export const TEMP_IMAGE_BASENAME = "cover";

/**
 * Service responsible for persisting extracted images for the lifetime of one callback.
 * The file and its directory are removed on every exit path.
 */
@Injectable()
export class TempImageStorageService {
  private readonly logger = new Logger(TempImageStorageService.name);

  constructor(
    @Inject(appConfig.KEY)
    private readonly config: ConfigType<typeof appConfig>,
  ) {}

  /**
   * Writes the image to a fresh temporary directory and hands its path to fn
   *
   * @param image - Image bytes and extension
   * @param fn - Consumer of the temporary path
   * @returns Whatever fn resolves to
   * @throws TempWriteError if the image cannot be written
   */
  async withTempImage<T>(
    image: ExtractedImage,
    fn: (imagePath: string) => Promise<T>,
  ): Promise<T> {
    let directory: string;
    try {
      directory = await mkdtemp(join(tmpdir(), this.config.tempPrefix));
    } catch (error: unknown) {
      throw new TempWriteError(
        `Failed to create temporary directory: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    try {
      const imagePath = join(directory, `${TEMP_IMAGE_BASENAME}${image.extension}`);
      try {
        await writeFile(imagePath, image.data);
      } catch (error: unknown) {
        throw new TempWriteError(
          `Failed to write temporary image '${imagePath}': ${error instanceof Error ? error.message : String(error)}`,
        );
      }
      this.logger.debug(`Wrote ${image.data.length} bytes to '${imagePath}'`);

      return await fn(imagePath);
    } finally {
      await this.remove(directory);
    }
  }

  private async remove(directory: string): Promise<void> {
    try {
      await rm(directory, { recursive: true, force: true });
    } catch (error: unknown) {
      this.logger.warn(
        `Failed to remove temporary directory '${directory}': ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
