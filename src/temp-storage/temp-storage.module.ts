import { Module } from "@nestjs/common";
import { TempImageStorageService } from "./temp-image-storage.service";

@Module({
  providers: [TempImageStorageService],
  exports: [TempImageStorageService],
})
export class TempStorageModule {}
