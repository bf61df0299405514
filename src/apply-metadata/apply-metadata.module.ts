import { Module } from "@nestjs/common";
import { Id3AnalysisModule } from "../id3-analysis/id3-analysis.module";
import { MediaFilesModule } from "../media-files/media-files.module";
import { MetadataModule } from "../metadata/metadata.module";
import { TempStorageModule } from "../temp-storage/temp-storage.module";
import { TranscodeModule } from "../transcode/transcode.module";
import { ApplyMetadataService } from "./apply-metadata.service";

@Module({
  imports: [
    Id3AnalysisModule,
    MetadataModule,
    MediaFilesModule,
    TempStorageModule,
    TranscodeModule,
  ],
  providers: [ApplyMetadataService],
  exports: [ApplyMetadataService],
})
export class ApplyMetadataModule {}
