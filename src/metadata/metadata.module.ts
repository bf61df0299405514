import { Module } from "@nestjs/common";
import { MetadataSourceService } from "./metadata-source.service";

@Module({
  providers: [MetadataSourceService],
  exports: [MetadataSourceService],
})
export class MetadataModule {}
