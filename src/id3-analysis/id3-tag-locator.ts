import { Logger } from "@nestjs/common";
import { FileHandle, open } from "fs/promises";
import { ID3V2_CONSTANTS } from "./consts";
import { decodeSyncsafe, sizeEncodingForVersion } from "./size-encoding";
import { RawTag } from "./types";

/**
 * Locates the ID3v2 tag at the start of a media file and materializes its body.
 * A missing or unrecognizable header is a normal outcome and yields null.
 */
export class Id3TagLocator {
  private static readonly logger = new Logger(Id3TagLocator.name);

  /**
   * Checks the 10-byte header for the "ID3" marker
   * @param header - At least the first 10 bytes of the source
   */
  static hasTagHeader(header: Buffer): boolean {
    return (
      header.length >= ID3V2_CONSTANTS.HEADER_SIZE &&
      header[0] === ID3V2_CONSTANTS.MAGIC[0] &&
      header[1] === ID3V2_CONSTANTS.MAGIC[1] &&
      header[2] === ID3V2_CONSTANTS.MAGIC[2]
    );
  }

  /**
   * Declared tag body size, excluding the header itself
   */
  static readTagSize(header: Buffer): number {
    return decodeSyncsafe(header, ID3V2_CONSTANTS.SIZE_OFFSET);
  }

  /**
   * Locates the tag in an in-memory buffer holding the leading bytes of a file
   * @returns The tag, or null if the buffer does not start with an ID3v2 header
   */
  static locate(buffer: Buffer): RawTag | null {
    if (!this.hasTagHeader(buffer)) {
      return null;
    }

    const bodyStart = ID3V2_CONSTANTS.HEADER_SIZE;
    const bodyEnd = Math.min(
      buffer.length,
      bodyStart + this.readTagSize(buffer),
    );

    return this.createTag(buffer, buffer.subarray(bodyStart, bodyEnd));
  }

  /**
   * Locates the tag in a file, reading only the header and the declared body
   * @param filePath - Path of the media file
   * @returns The tag, or null if the file has no ID3v2 header or cannot be read
   */
  static async locateFile(filePath: string): Promise<RawTag | null> {
    let handle: FileHandle;
    try {
      handle = await open(filePath, "r");
    } catch (error: unknown) {
      this.logger.debug(
        `Cannot open '${filePath}' for tag lookup: ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }

    try {
      const header = Buffer.alloc(ID3V2_CONSTANTS.HEADER_SIZE);
      const { bytesRead: headerBytes } = await handle.read(
        header,
        0,
        ID3V2_CONSTANTS.HEADER_SIZE,
        0,
      );

      if (!this.hasTagHeader(header.subarray(0, headerBytes))) {
        return null;
      }

      const { size: fileSize } = await handle.stat();
      const available = Math.max(0, fileSize - ID3V2_CONSTANTS.HEADER_SIZE);
      const body = Buffer.alloc(Math.min(this.readTagSize(header), available));
      let filled = 0;
      while (filled < body.length) {
        const { bytesRead } = await handle.read(
          body,
          filled,
          body.length - filled,
          ID3V2_CONSTANTS.HEADER_SIZE + filled,
        );
        if (bytesRead === 0) {
          break;
        }
        filled += bytesRead;
      }

      return this.createTag(header, body.subarray(0, filled));
    } catch (error: unknown) {
      this.logger.debug(
        `Failed to read tag from '${filePath}': ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    } finally {
      await this.closeQuietly(handle, filePath);
    }
  }

  private static async closeQuietly(
    handle: FileHandle,
    filePath: string,
  ): Promise<void> {
    try {
      await handle.close();
    } catch (error: unknown) {
      this.logger.debug(
        `Failed to close '${filePath}': ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private static createTag(header: Buffer, body: Buffer): RawTag {
    const version = header[ID3V2_CONSTANTS.VERSION_OFFSET];
    return {
      version,
      sizeEncoding: sizeEncodingForVersion(version),
      body,
    };
  }
}
