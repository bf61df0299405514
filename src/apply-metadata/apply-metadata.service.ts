import { Injectable, Logger } from "@nestjs/common";
import { access, mkdir } from "fs/promises";
import { basename, extname, join, parse, resolve } from "path";
import { CoverArtExtractorService } from "../id3-analysis/cover-art-extractor.service";
import { MediaFileResolverService } from "../media-files/media-file-resolver.service";
import { MetadataSourceService } from "../metadata/metadata-source.service";
import { ArtworkNotFoundError } from "../metadata/metadata.errors";
import { MetadataTag } from "../metadata/types";
import { TempImageStorageService } from "../temp-storage/temp-image-storage.service";
import { FfmpegCommandBuilder } from "../transcode/ffmpeg-command.builder";
import { FfmpegRunnerService } from "../transcode/ffmpeg-runner.service";
import { TranscodeFailedError } from "../transcode/transcode.errors";
import {
  ApplyMetadataOptions,
  ApplyMetadataSummary,
  ArtworkSource,
  PairResult,
} from "./types";

/**
 * Only MP3 inputs are searched for embedded artwork
 */
const EMBEDDED_ART_EXTENSION = ".mp3";

interface PairJob {
  index: number;
  total: number;
  input: string;
  output: string;
  tags: MetadataTag[];
}

/**
 * Service responsible for applying ordered metadata entries to ordered media files.
 * Handles pairing, artwork selection, dry runs and ffmpeg execution.
 */
@Injectable()
export class ApplyMetadataService {
  private readonly logger = new Logger(ApplyMetadataService.name);

  constructor(
    private readonly metadataSource: MetadataSourceService,
    private readonly mediaFileResolver: MediaFileResolverService,
    private readonly coverArtExtractor: CoverArtExtractorService,
    private readonly tempImageStorage: TempImageStorageService,
    private readonly commandBuilder: FfmpegCommandBuilder,
    private readonly ffmpegRunner: FfmpegRunnerService,
  ) {}

  /**
   * Runs the whole job: entry i is applied to input file i.
   *
   * @param options - Run options
   * @returns Summary of the processed pairs
   * @throws ArtworkNotFoundError when the global cover or an entry's image is missing
   * @throws MetadataError when the metadata file or an entry is invalid
   * @throws MediaFilesError when no inputs can be resolved
   * @throws TranscodeError when ffmpeg fails
   */
  async run(options: ApplyMetadataOptions): Promise<ApplyMetadataSummary> {
    const outDir = resolve(options.outDir);
    await mkdir(outDir, { recursive: true });

    const globalCover = options.cover ? resolve(options.cover) : undefined;
    if (globalCover !== undefined) {
      await this.assertExists(globalCover, `Global cover not found: ${globalCover}`);
    }

    const document = await this.metadataSource.load(options.jsonFile);
    const inputs = await this.mediaFileResolver.resolveInputs({
      files: options.files,
      dir: options.dir,
    });

    const total = Math.min(inputs.length, document.items.length);
    if (inputs.length !== document.items.length) {
      this.logger.warn(
        `files=${inputs.length} metadata_entries=${document.items.length}; applying first ${total} pairs in order.`,
      );
    }

    const results: PairResult[] = [];
    for (let index = 0; index < total; index++) {
      const input = inputs[index];
      const entry = this.metadataSource.getEntry(document, index);
      const cover = await this.metadataSource.resolveCover(
        entry,
        document.baseDir,
        globalCover,
      );

      const { name, ext } = parse(input);
      const job: PairJob = {
        index,
        total,
        input,
        output: join(outDir, `${name}${options.suffix}${ext}`),
        tags: this.metadataSource.toMetadataTags(entry),
      };

      if (cover !== undefined) {
        results.push(await this.applyPair(job, options, cover, ArtworkSource.FILE));
        continue;
      }

      results.push(await this.applyWithEmbeddedArt(job, options));
    }

    return {
      processed: results.length,
      skippedFiles: inputs.length - total,
      skippedEntries: document.items.length - total,
      dryRun: options.dryRun,
      results,
    };
  }

  /**
   * Re-attaches the input's own cover when it has one, so re-muxing keeps the artwork.
   * The extracted image only lives for the duration of the invocation.
   */
  private async applyWithEmbeddedArt(
    job: PairJob,
    options: ApplyMetadataOptions,
  ): Promise<PairResult> {
    if (extname(job.input).toLowerCase() !== EMBEDDED_ART_EXTENSION) {
      return this.applyPair(job, options, undefined, ArtworkSource.NONE);
    }

    const lookup = await this.coverArtExtractor.extractFromFile(job.input);
    if (!lookup.found) {
      this.logger.debug(`No embedded artwork in '${job.input}' (${lookup.reason})`);
      return this.applyPair(job, options, undefined, ArtworkSource.NONE);
    }

    return this.tempImageStorage.withTempImage(lookup.image, (imagePath) =>
      this.applyPair(job, options, imagePath, ArtworkSource.EMBEDDED),
    );
  }

  private async applyPair(
    job: PairJob,
    options: ApplyMetadataOptions,
    cover: string | undefined,
    artwork: ArtworkSource,
  ): Promise<PairResult> {
    const command = this.commandBuilder.build({
      input: job.input,
      output: job.output,
      tags: job.tags,
      cover,
      overwrite: options.overwrite,
    });
    const result: PairResult = {
      index: job.index,
      input: job.input,
      output: job.output,
      artwork,
      command,
      executed: false,
    };

    if (options.dryRun) {
      process.stdout.write(`${this.commandBuilder.toShellString(command)}\n`);
      return result;
    }

    this.logger.log(
      `[${job.index + 1}/${job.total}] ${basename(job.input)} -> ${basename(job.output)}${this.artworkLabel(artwork, cover)}`,
    );

    try {
      await this.ffmpegRunner.run(command);
    } catch (error: unknown) {
      if (error instanceof TranscodeFailedError) {
        if (error.stderr) {
          this.logger.error(error.stderr);
        }
        throw new TranscodeFailedError(
          `ffmpeg failed on: ${job.input}`,
          error.exitCode,
          error.stderr,
        );
      }
      throw error;
    }

    return { ...result, executed: true };
  }

  private artworkLabel(artwork: ArtworkSource, cover: string | undefined): string {
    switch (artwork) {
      case ArtworkSource.EMBEDDED:
        return " (art: existing)";
      case ArtworkSource.FILE:
        return cover !== undefined ? ` (art: ${basename(cover)})` : "";
      case ArtworkSource.NONE:
        return "";
    }
  }

  private async assertExists(filePath: string, message: string): Promise<void> {
    try {
      await access(filePath);
    } catch {
      throw new ArtworkNotFoundError(message, filePath);
    }
  }
}
