import { Module } from "@nestjs/common";
import { MediaFileResolverService } from "./media-file-resolver.service";

@Module({
  providers: [MediaFileResolverService],
  exports: [MediaFileResolverService],
})
export class MediaFilesModule {}
