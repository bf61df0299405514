import { Injectable, Logger } from "@nestjs/common";
import { APIC_CONSTANTS } from "./consts";
import { ApicFrameDecoder, decodeText } from "./apic-frame-decoder";
import { Id3FrameIterator } from "./id3-frame-iterator";
import { Id3TagLocator } from "./id3-tag-locator";
import { ImageTypeDetector } from "./image-type-detector";
import {
  CoverArtLookup,
  CoverArtMissReason,
  IFrameIterator,
  RawTag,
} from "./types";

/**
 * Service responsible for recovering embedded cover art from MP3 files.
 * Locates the ID3v2 tag, scans its frames and decodes the first usable
 * attached-picture frame. Malformed input always degrades to "not found".
 */
@Injectable()
export class CoverArtExtractorService {
  private readonly logger = new Logger(CoverArtExtractorService.name);

  /**
   * Extracts cover art from the leading bytes of a media file held in memory
   * @param buffer - File contents (the tag region is enough)
   */
  extractFromBuffer(buffer: Buffer): CoverArtLookup {
    const tag = Id3TagLocator.locate(buffer);
    if (!tag) {
      return { found: false, reason: CoverArtMissReason.CONTAINER_ABSENT };
    }
    return this.scan(tag);
  }

  /**
   * Extracts cover art from a media file on disk.
   * Only the tag header and body are read.
   * @param filePath - Path of the media file
   */
  async extractFromFile(filePath: string): Promise<CoverArtLookup> {
    const tag = await Id3TagLocator.locateFile(filePath);
    if (!tag) {
      this.logger.debug(`No ID3v2 tag in '${filePath}'`);
      return { found: false, reason: CoverArtMissReason.CONTAINER_ABSENT };
    }

    const lookup = this.scan(tag);
    if (lookup.found) {
      this.logger.debug(
        `Found ${lookup.image.extension} cover (${lookup.image.data.length} bytes) in '${filePath}'`,
      );
    }
    return lookup;
  }

  /**
   * Scans the frames of a tag and returns the first decodable picture
   * @param tag - Located tag body
   */
  scan(tag: RawTag): CoverArtLookup {
    const iterator: IFrameIterator = new Id3FrameIterator(tag);

    for (
      let frame = iterator.next();
      frame !== null;
      frame = iterator.next()
    ) {
      if (
        frame.id !== APIC_CONSTANTS.FRAME_ID ||
        frame.payload.length <= APIC_CONSTANTS.MIN_PAYLOAD_SIZE
      ) {
        continue;
      }

      const result = ApicFrameDecoder.decode(frame.payload);
      if (!result.ok) {
        this.logger.debug(
          `Skipping undecodable APIC frame at offset ${frame.position}: ${result.failure}`,
        );
        continue;
      }

      const { picture, image } = result;
      if (
        image.extension === ".jpg" &&
        !ImageTypeDetector.isJpeg(image.data)
      ) {
        this.logger.debug(
          `APIC image at offset ${frame.position} has no recognized signature; treating it as JPEG`,
        );
      }
      this.logger.debug(
        `APIC frame: mime='${picture.mimeType}', type=${picture.pictureType}, description='${decodeText(picture.description, picture.encoding)}'`,
      );

      return { found: true, image, frame: picture };
    }

    return { found: false, reason: CoverArtMissReason.NO_PICTURE_FRAME };
  }
}
