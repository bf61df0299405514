import { Module } from "@nestjs/common";
import { CoverArtExtractorService } from "./cover-art-extractor.service";

@Module({
  providers: [CoverArtExtractorService],
  exports: [CoverArtExtractorService],
})
export class Id3AnalysisModule {}
