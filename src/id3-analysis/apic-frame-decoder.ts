import { APIC_CONSTANTS } from "./consts";
import { ImageTypeDetector } from "./image-type-detector";
import {
  PictureDecodeFailure,
  PictureDecodeResult,
  TextEncoding,
} from "./types";

/**
 * UTF-16 variants terminate strings with an aligned 0x00 0x00 pair;
 * every other marker, known or not, uses a single 0x00.
 */
export function isDoubleByteEncoding(encoding: number): boolean {
  return encoding === TextEncoding.Utf16 || encoding === TextEncoding.Utf16BE;
}

export function terminatorLength(encoding: number): number {
  return isDoubleByteEncoding(encoding) ? 2 : 1;
}

/**
 * Finds the first string terminator at or after start.
 * Double-byte terminators are searched in steps of two from start, so alignment
 * is relative to where the string begins, not to the buffer.
 * @returns Offset of the terminator, or bytes.length if there is none
 */
export function findTerminator(
  bytes: Buffer,
  start: number,
  encoding: number,
): number {
  if (!isDoubleByteEncoding(encoding)) {
    const index = bytes.indexOf(0, start);
    return index === -1 ? bytes.length : index;
  }

  for (let offset = start; offset + 1 < bytes.length; offset += 2) {
    if (bytes[offset] === 0 && bytes[offset + 1] === 0) {
      return offset;
    }
  }
  return bytes.length;
}

/**
 * Decodes a string field for display. Only used for diagnostics.
 */
export function decodeText(bytes: Buffer, encoding: number): string {
  switch (encoding) {
    case TextEncoding.Utf8:
      return bytes.toString("utf8");
    case TextEncoding.Utf16: {
      // BOM decides byte order; little-endian when it is missing
      if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) {
        return swapToLittleEndian(bytes.subarray(2)).toString("utf16le");
      }
      const hasLeBom = bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe;
      return bytes.subarray(hasLeBom ? 2 : 0).toString("utf16le");
    }
    case TextEncoding.Utf16BE:
      return swapToLittleEndian(bytes).toString("utf16le");
    default:
      return bytes.toString("latin1");
  }
}

function swapToLittleEndian(bytes: Buffer): Buffer {
  const copy = Buffer.from(bytes.subarray(0, bytes.length - (bytes.length % 2)));
  return copy.swap16();
}

/**
 * Decodes the payload of an attached-picture (APIC) frame:
 * encoding marker, MIME string, picture type, description, image bytes.
 * Pure; never throws for malformed payloads.
 */
export class ApicFrameDecoder {
  static decode(payload: Buffer): PictureDecodeResult {
    const encoding = payload[0];

    // MIME type is always a single-byte string starting after the marker
    const mimeEnd = payload.indexOf(0, 1);
    if (mimeEnd === -1) {
      return { ok: false, failure: PictureDecodeFailure.MISSING_MIME_TERMINATOR };
    }

    const pictureTypeOffset = mimeEnd + 1;
    const pictureType =
      pictureTypeOffset < payload.length ? payload[pictureTypeOffset] : 0;

    const descriptionStart = pictureTypeOffset + 1;
    let descriptionEnd = findTerminator(payload, descriptionStart, encoding);
    if (descriptionEnd >= payload.length) {
      // No terminator: the description is empty and its terminator is presumed
      descriptionEnd = descriptionStart;
    }

    const imageData = payload.subarray(
      descriptionEnd + terminatorLength(encoding),
    );
    if (imageData.length < APIC_CONSTANTS.MIN_IMAGE_SIZE) {
      return { ok: false, failure: PictureDecodeFailure.NO_IMAGE_BYTES };
    }

    return {
      ok: true,
      picture: {
        encoding,
        mimeType: payload.subarray(1, mimeEnd).toString("latin1"),
        pictureType,
        description: payload.subarray(
          Math.min(descriptionStart, payload.length),
          descriptionEnd,
        ),
        imageData,
      },
      image: {
        data: imageData,
        extension: ImageTypeDetector.detect(imageData),
      },
    };
  }
}
