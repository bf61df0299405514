import { Injectable, Logger } from "@nestjs/common";
import { access, readFile } from "fs/promises";
import { dirname, isAbsolute, resolve } from "path";
import { z } from "zod";
import {
  ArtworkNotFoundError,
  InvalidMetadataEntryError,
  InvalidMetadataRootError,
  MetadataReadError,
} from "./metadata.errors";
import { MetadataDocument, MetadataEntry, MetadataTag } from "./types";

/**
 * Key holding the per-entry artwork path; never applied as a metadata tag
 */
export const IMAGE_KEY = "image";

const metadataRootSchema = z.array(z.unknown());

const metadataEntrySchema = z.record(z.string(), z.unknown());

/**
 * Service responsible for reading the metadata document and interpreting its entries.
 */
@Injectable()
export class MetadataSourceService {
  private readonly logger = new Logger(MetadataSourceService.name);

  /**
   * Reads and parses the JSON metadata file.
   * Items are validated later, one by one, as they are paired with files.
   *
   * @param jsonFile - Path to the JSON file, relative to the working directory or absolute
   * @throws MetadataReadError if the file cannot be read or is not valid JSON
   * @throws InvalidMetadataRootError if the root is not an array
   */
  async load(jsonFile: string): Promise<MetadataDocument> {
    const filePath = resolve(jsonFile);

    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(filePath, "utf-8"));
    } catch (error: unknown) {
      throw new MetadataReadError(
        `Failed to read metadata file '${filePath}': ${error instanceof Error ? error.message : String(error)}`,
        filePath,
      );
    }

    const root = metadataRootSchema.safeParse(parsed);
    if (!root.success) {
      throw new InvalidMetadataRootError();
    }

    this.logger.debug(
      `Loaded ${root.data.length} metadata entries from '${filePath}'`,
    );

    return {
      filePath,
      baseDir: dirname(filePath),
      items: root.data,
    };
  }

  /**
   * Validates a single array item
   * @throws InvalidMetadataEntryError if the item is not a plain object
   */
  getEntry(document: MetadataDocument, index: number): MetadataEntry {
    const entry = metadataEntrySchema.safeParse(document.items[index]);
    if (!entry.success) {
      throw new InvalidMetadataEntryError(index);
    }
    return entry.data;
  }

  /**
   * Resolves the artwork for an entry.
   * An explicit "image" takes precedence over the global cover; relative paths
   * are resolved against the metadata file's directory.
   *
   * @param entry - Metadata entry
   * @param baseDir - Directory of the metadata file
   * @param globalCover - Default cover, if one was given
   * @returns Absolute artwork path, or undefined when there is none
   * @throws ArtworkNotFoundError if the explicit image does not exist
   */
  async resolveCover(
    entry: MetadataEntry,
    baseDir: string,
    globalCover?: string,
  ): Promise<string | undefined> {
    const image = entry[IMAGE_KEY];
    if (image === undefined || image === null || String(image).trim() === "") {
      return globalCover;
    }

    const imagePath = isAbsolute(String(image))
      ? String(image)
      : resolve(baseDir, String(image));

    try {
      await access(imagePath);
    } catch {
      throw new ArtworkNotFoundError(
        `Artwork image not found: ${imagePath}`,
        imagePath,
      );
    }

    return imagePath;
  }

  /**
   * Converts an entry into the scalar tags to apply, in insertion order.
   * Skips the image key, null values, objects, arrays and blank strings.
   */
  toMetadataTags(entry: MetadataEntry): MetadataTag[] {
    const tags: MetadataTag[] = [];

    for (const [key, raw] of Object.entries(entry)) {
      if (key === IMAGE_KEY || raw === null || raw === undefined) {
        continue;
      }
      if (typeof raw === "object") {
        continue;
      }

      const value = String(raw).trim();
      if (!value) {
        continue;
      }
      tags.push({ key, value });
    }

    return tags;
  }
}
