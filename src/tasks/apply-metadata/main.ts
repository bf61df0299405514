#!/usr/bin/env node
import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { ConfigType } from "@nestjs/config";
import { NestFactory } from "@nestjs/core";
import { ApplyMetadataService } from "../../apply-metadata/apply-metadata.service";
import { CliExceptionHandler, ExitCode } from "../../common/cli-exception.handler";
import { appConfig, enabledLogLevels } from "../../config/app.config";
import { AppModule } from "./app.module";
import { parseCliArguments } from "./cli";

async function bootstrap(argv: string[]): Promise<ExitCode> {
  const options = parseCliArguments(argv);

  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });
  const config = app.get<ConfigType<typeof appConfig>>(appConfig.KEY);
  app.useLogger(enabledLogLevels(config.logLevel));
  app.flushLogs();

  try {
    await app.get(ApplyMetadataService).run(options);
    process.stdout.write("Done.\n");
    return ExitCode.SUCCESS;
  } catch (error: unknown) {
    const failure = new CliExceptionHandler().handle(error);
    process.stderr.write(`${failure.message}\n`);
    return failure.exitCode;
  } finally {
    try {
      await app.close();
    } catch (error: unknown) {
      new Logger("Bootstrap").warn(
        `Failed to shut down cleanly: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}

bootstrap(process.argv.slice(2)).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = ExitCode.INTERNAL_ERROR;
  },
);
