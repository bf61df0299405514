import { Injectable, Logger } from "@nestjs/common";
import { readdir, stat } from "fs/promises";
import { extname, join, resolve } from "path";
import { MEDIA_EXTENSIONS } from "./consts";
import {
  DirectoryReadError,
  MissingInputSourceError,
  NoInputFilesError,
} from "./media-files.errors";
import { naturalCompare } from "./natural-sort";

export interface InputSource {
  /**
   * Explicit files, processed in the given order. Takes precedence over dir.
   */
  files?: string[];

  /**
   * Directory whose media files are processed in natural file-name order
   */
  dir?: string;
}

/**
 * Service responsible for turning the CLI input options into an ordered file list.
 */
@Injectable()
export class MediaFileResolverService {
  private readonly logger = new Logger(MediaFileResolverService.name);

  static isMediaFile(filePath: string): boolean {
    return MEDIA_EXTENSIONS.has(extname(filePath).toLowerCase());
  }

  /**
   * Resolves the ordered list of existing input files
   * @throws MissingInputSourceError if neither files nor dir is given
   * @throws NoInputFilesError if no existing regular file remains
   */
  async resolveInputs(source: InputSource): Promise<string[]> {
    let candidates: string[];
    if (source.files && source.files.length > 0) {
      candidates = this.fromList(source.files);
    } else if (source.dir) {
      candidates = await this.fromDirectory(source.dir);
    } else {
      throw new MissingInputSourceError();
    }

    const inputs: string[] = [];
    for (const candidate of candidates) {
      if (await this.isRegularFile(candidate)) {
        inputs.push(candidate);
      } else {
        this.logger.debug(`Ignoring missing input '${candidate}'`);
      }
    }

    if (inputs.length === 0) {
      throw new NoInputFilesError();
    }
    return inputs;
  }

  /**
   * Absolute paths of explicitly listed files, order kept.
   * The extension is not checked for explicit files.
   */
  fromList(paths: string[]): string[] {
    return paths.map((file) => resolve(file));
  }

  /**
   * Lists media files in a directory, naturally sorted by file name
   * @throws DirectoryReadError if the directory cannot be read
   */
  async fromDirectory(dir: string): Promise<string[]> {
    const directory = resolve(dir);

    let names: string[];
    try {
      names = await readdir(directory);
    } catch (error: unknown) {
      throw new DirectoryReadError(
        `Failed to list directory '${directory}': ${error instanceof Error ? error.message : String(error)}`,
        directory,
      );
    }

    const files: string[] = [];
    for (const name of names) {
      const filePath = join(directory, name);
      if (
        MediaFileResolverService.isMediaFile(name) &&
        (await this.isRegularFile(filePath))
      ) {
        files.push(name);
      }
    }

    return files.sort(naturalCompare).map((name) => join(directory, name));
  }

  private async isRegularFile(filePath: string): Promise<boolean> {
    try {
      return (await stat(filePath)).isFile();
    } catch {
      return false;
    }
  }
}
