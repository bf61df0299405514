import { registerAs } from "@nestjs/config";
import { LogLevel } from "@nestjs/common";

export const APP_CONFIG_NAMESPACE = "coverTagger";

export interface AppConfig {
  ffmpegPath: string;
  logLevel: LogLevel;
  tempPrefix: string;
}

const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "log", "debug", "verbose"];

/**
 * Parses LOG_LEVEL, falling back to "log" for unknown values
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value?.trim().toLowerCase()) ?? "log";
}

/**
 * Levels enabled for a minimum level, most severe first
 */
export function enabledLogLevels(minimum: LogLevel): LogLevel[] {
  const index = LOG_LEVELS.indexOf(minimum);
  return LOG_LEVELS.slice(0, index === -1 ? 3 : index + 1);
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    ffmpegPath: env.FFMPEG_PATH || "ffmpeg",
    logLevel: parseLogLevel(env.LOG_LEVEL),
    tempPrefix: env.COVER_TAGGER_TMP_PREFIX || "cover-tagger-",
  };
}

export const appConfig = registerAs(APP_CONFIG_NAMESPACE, () => loadAppConfig());
