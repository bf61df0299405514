/**
 * File extensions treated as media inputs when scanning a directory
 */
export const MEDIA_EXTENSIONS: ReadonlySet<string> = new Set([
  ".mp3",
  ".m4a",
  ".mp4",
  ".mov",
  ".mkv",
  ".flac",
  ".wav",
  ".ogg",
  ".opus",
  ".aac",
  ".webm",
]);
