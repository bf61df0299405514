/**
 * One metadata object from the JSON array.
 * Keys are ffmpeg metadata keys, plus the optional "image" artwork path.
 */
export type MetadataEntry = Record<string, unknown>;

/**
 * A scalar metadata field ready to be passed to ffmpeg as key=value
 */
export interface MetadataTag {
  key: string;
  value: string;
}

/**
 * Loaded metadata document
 */
export interface MetadataDocument {
  /**
   * Absolute path of the JSON file
   */
  filePath: string;

  /**
   * Directory relative artwork paths are resolved against
   */
  baseDir: string;

  /**
   * Array items, unvalidated until they are used
   */
  items: unknown[];
}
