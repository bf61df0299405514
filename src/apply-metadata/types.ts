import { TranscodeCommand } from "../transcode/types";

/**
 * Options for one run, as collected from the command line
 */
export interface ApplyMetadataOptions {
  jsonFile: string;
  dir?: string;
  files?: string[];
  outDir: string;

  /**
   * Inserted between the input's stem and extension, e.g. "_tagged"
   */
  suffix: string;

  /**
   * Default artwork for entries without an "image"
   */
  cover?: string;

  /**
   * Print commands instead of running them
   */
  dryRun: boolean;

  /**
   * Overwrite existing outputs
   */
  overwrite: boolean;
}

export enum ArtworkSource {
  FILE = "FILE",
  EMBEDDED = "EMBEDDED",
  NONE = "NONE",
}

/**
 * Outcome for one file/entry pair
 */
export interface PairResult {
  index: number;
  input: string;
  output: string;
  artwork: ArtworkSource;
  command: TranscodeCommand;
  executed: boolean;
}

/**
 * Domain result of a run.
 * Framework-agnostic result that the CLI layer reports on.
 */
export interface ApplyMetadataSummary {
  processed: number;
  skippedFiles: number;
  skippedEntries: number;
  dryRun: boolean;
  results: PairResult[];
}
