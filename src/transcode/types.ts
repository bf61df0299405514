import { MetadataTag } from "../metadata/types";

/**
 * Inputs for one ffmpeg invocation
 */
export interface TranscodeRequest {
  input: string;
  output: string;
  tags: MetadataTag[];

  /**
   * Artwork attached as the front cover; the input's own video streams are dropped either way
   */
  cover?: string;

  /**
   * Overwrite an existing output (-y) instead of refusing (-n)
   */
  overwrite: boolean;
}

/**
 * Program and argument vector, never joined through a shell
 */
export interface TranscodeCommand {
  command: string;
  args: string[];
}
