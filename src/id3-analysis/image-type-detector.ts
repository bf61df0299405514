import { APIC_CONSTANTS, JPEG_SIGNATURE, PNG_SIGNATURE } from "./consts";
import { ImageExtension } from "./types";

/**
 * Detects the format of embedded image bytes by magic-number sniffing.
 * Only PNG is recognized explicitly; everything else is treated as JPEG.
 */
export class ImageTypeDetector {
  /**
   * Detects the file extension from the leading bytes
   * @param data - Image bytes (at least 4 bytes to be recognized as PNG)
   */
  static detect(data: Buffer): ImageExtension {
    return this.isPng(data) ? ".png" : ".jpg";
  }

  static isPng(data: Buffer): boolean {
    if (data.length < APIC_CONSTANTS.MIN_IMAGE_SIZE) {
      return false;
    }
    return PNG_SIGNATURE.every((byte, index) => data[index] === byte);
  }

  static isJpeg(data: Buffer): boolean {
    return (
      data.length >= JPEG_SIGNATURE.length &&
      JPEG_SIGNATURE.every((byte, index) => data[index] === byte)
    );
  }
}
