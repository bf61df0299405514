import { Inject, Injectable } from "@nestjs/common";
import { ConfigType } from "@nestjs/config";
import { extname } from "path";
import { quote } from "shell-quote";
import { appConfig } from "../config/app.config";
import { TranscodeCommand, TranscodeRequest } from "./types";

/**
 * Output extensions whose muxer needs use_metadata_tags to keep custom keys
 */
const MP4_FAMILY_EXTENSIONS: ReadonlySet<string> = new Set([".m4a", ".mp4", ".mov"]);

/**
 * Builds ffmpeg invocations that re-mux audio untouched, attach artwork and apply tags.
 */
@Injectable()
export class FfmpegCommandBuilder {
  constructor(
    @Inject(appConfig.KEY)
    private readonly config: ConfigType<typeof appConfig>,
  ) {}

  build(request: TranscodeRequest): TranscodeCommand {
    const args = ["-hide_banner", request.overwrite ? "-y" : "-n"];

    args.push("-i", request.input);

    if (request.cover !== undefined) {
      // Audio from the input, artwork from the cover file
      args.push("-i", request.cover);
      args.push("-map", "0:a", "-map", "1");
      args.push("-c", "copy");
      args.push("-disposition:v:0", "attached_pic");
    } else {
      args.push("-map", "0:a");
      args.push("-c", "copy");
    }

    // Keep existing metadata; -metadata flags below override individual keys
    args.push("-map_metadata", "0");

    for (const tag of request.tags) {
      args.push("-metadata", `${tag.key}=${tag.value}`);
    }

    if (MP4_FAMILY_EXTENSIONS.has(extname(request.output).toLowerCase())) {
      args.push("-movflags", "use_metadata_tags");
    }

    args.push(request.output);

    return { command: this.config.ffmpegPath, args };
  }

  /**
   * Renders a command as a single POSIX-shell-quoted line, for dry runs
   */
  toShellString(command: TranscodeCommand): string {
    return quote([command.command, ...command.args]);
  }
}
