import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { ApplyMetadataModule } from "../../apply-metadata/apply-metadata.module";
import { appConfig } from "../../config/app.config";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ".env",
      load: [appConfig],
    }),
    ApplyMetadataModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
