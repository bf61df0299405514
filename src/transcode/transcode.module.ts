import { Module } from "@nestjs/common";
import { FfmpegCommandBuilder } from "./ffmpeg-command.builder";
import { FfmpegRunnerService } from "./ffmpeg-runner.service";

@Module({
  providers: [FfmpegCommandBuilder, FfmpegRunnerService],
  exports: [FfmpegCommandBuilder, FfmpegRunnerService],
})
export class TranscodeModule {}
