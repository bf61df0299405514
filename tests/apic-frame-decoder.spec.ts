import {
  ApicFrameDecoder,
  decodeText,
  findTerminator,
} from "../src/id3-analysis/apic-frame-decoder";
import { PictureDecodeFailure, TextEncoding } from "../src/id3-analysis/types";
import { buildApicPayload, JPEG_BYTES, PNG_BYTES } from "./helpers/id3-builder";

describe("ApicFrameDecoder", () => {
  describe("decode", () => {
    it("should decode a Latin-1 frame with a description", () => {
      const payload = buildApicPayload({
        description: Buffer.from("Cover", "latin1"),
        image: PNG_BYTES,
      });

      const result = ApicFrameDecoder.decode(payload);

      if (!result.ok) {
        throw new Error(`unexpected failure ${result.failure}`);
      }
      expect(result.picture.encoding).toBe(TextEncoding.Latin1);
      expect(result.picture.mimeType).toBe("image/png");
      expect(result.picture.pictureType).toBe(3);
      expect(result.picture.description.toString("latin1")).toBe("Cover");
      expect(result.image.extension).toBe(".png");
      expect(result.image.data.equals(PNG_BYTES)).toBe(true);
    });

    it("should align UTF-16 terminators to the start of the description", () => {
      // mime ends at 11, so the description starts at the odd offset 13
      const payload = buildApicPayload({
        encoding: TextEncoding.Utf16,
        mimeType: "image/jpeg",
        description: Buffer.from([0xff, 0xfe, 0x41, 0x00]),
        image: JPEG_BYTES,
      });

      const result = ApicFrameDecoder.decode(payload);

      if (!result.ok) {
        throw new Error(`unexpected failure ${result.failure}`);
      }
      expect(result.picture.description.equals(Buffer.from([0xff, 0xfe, 0x41, 0x00]))).toBe(true);
      expect(result.image.extension).toBe(".jpg");
      expect(result.image.data.equals(JPEG_BYTES)).toBe(true);
    });

    it("should use a double-byte terminator for UTF-16BE", () => {
      const payload = buildApicPayload({
        encoding: TextEncoding.Utf16BE,
        mimeType: "image/png",
        description: Buffer.from([0x00, 0x41]),
        image: PNG_BYTES,
      });

      const result = ApicFrameDecoder.decode(payload);

      expect(result.ok && result.image.data.equals(PNG_BYTES)).toBe(true);
    });

    it.each([TextEncoding.Utf8, 7])(
      "should use a single-byte terminator for encoding %d",
      (encoding) => {
        const payload = buildApicPayload({
          encoding,
          description: Buffer.from("x", "latin1"),
          image: PNG_BYTES,
        });

        const result = ApicFrameDecoder.decode(payload);

        expect(result.ok && result.image.data.equals(PNG_BYTES)).toBe(true);
      },
    );

    it("should fail when the MIME type is unterminated", () => {
      const payload = Buffer.from([0x00, 0x69, 0x6d, 0x61, 0x67, 0x65]);

      expect(ApicFrameDecoder.decode(payload)).toEqual({
        ok: false,
        failure: PictureDecodeFailure.MISSING_MIME_TERMINATOR,
      });
    });

    it("should fail when fewer than four image bytes follow", () => {
      const payload = buildApicPayload({ image: Buffer.from([0x89, 0x50, 0x4e]) });

      expect(ApicFrameDecoder.decode(payload)).toEqual({
        ok: false,
        failure: PictureDecodeFailure.NO_IMAGE_BYTES,
      });
    });

    it("should treat a missing description terminator as an empty description", () => {
      const payload = Buffer.concat([
        Buffer.from([0x00]),
        Buffer.from("image/png", "latin1"),
        Buffer.from([0x00, 0x03]),
        Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a]),
      ]);

      const result = ApicFrameDecoder.decode(payload);

      if (!result.ok) {
        throw new Error(`unexpected failure ${result.failure}`);
      }
      expect(result.picture.description.length).toBe(0);
      expect(result.image.data.equals(Buffer.from([0x50, 0x4e, 0x47, 0x0d, 0x0a]))).toBe(true);
      expect(result.image.extension).toBe(".jpg");
    });

    it("should treat a missing UTF-16 description terminator as an empty description", () => {
      const payload = Buffer.concat([
        Buffer.from([TextEncoding.Utf16]),
        Buffer.from("image/png", "latin1"),
        Buffer.from([0x00, 0x03]),
        Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a]),
      ]);

      const result = ApicFrameDecoder.decode(payload);

      if (!result.ok) {
        throw new Error(`unexpected failure ${result.failure}`);
      }
      expect(result.picture.description.length).toBe(0);
      expect(result.image.data.equals(Buffer.from([0x4e, 0x47, 0x0d, 0x0a, 0x1a]))).toBe(true);
      expect(result.image.extension).toBe(".jpg");
    });

    it("should fail when the payload ends after the MIME type", () => {
      const payload = Buffer.from([0x00, 0x78, 0x00]);

      expect(ApicFrameDecoder.decode(payload)).toEqual({
        ok: false,
        failure: PictureDecodeFailure.NO_IMAGE_BYTES,
      });
    });
  });

  describe("findTerminator", () => {
    it("should find the first zero byte for single-byte encodings", () => {
      expect(findTerminator(Buffer.from([1, 2, 0, 3, 0]), 0, TextEncoding.Latin1)).toBe(2);
    });

    it("should skip zero pairs that are not aligned to the start", () => {
      const bytes = Buffer.from([0x41, 0x00, 0x00, 0x42, 0x00, 0x00]);

      expect(findTerminator(bytes, 0, TextEncoding.Utf16)).toBe(4);
      expect(findTerminator(bytes, 1, TextEncoding.Utf16)).toBe(1);
    });

    it("should return the buffer length when there is no terminator", () => {
      expect(findTerminator(Buffer.from([1, 2, 3]), 0, TextEncoding.Utf8)).toBe(3);
      expect(findTerminator(Buffer.from([1, 0, 0]), 0, TextEncoding.Utf16)).toBe(3);
    });
  });

  describe("decodeText", () => {
    it("should honor UTF-16 byte order marks", () => {
      expect(decodeText(Buffer.from([0xff, 0xfe, 0x41, 0x00]), TextEncoding.Utf16)).toBe("A");
      expect(decodeText(Buffer.from([0xfe, 0xff, 0x00, 0x41]), TextEncoding.Utf16)).toBe("A");
    });

    it("should decode UTF-16BE without a byte order mark", () => {
      expect(decodeText(Buffer.from([0x00, 0x41, 0x00, 0x42]), TextEncoding.Utf16BE)).toBe("AB");
    });

    it("should decode Latin-1 and UTF-8", () => {
      expect(decodeText(Buffer.from([0x63, 0x61, 0x66, 0xe9]), TextEncoding.Latin1)).toBe("café");
      expect(decodeText(Buffer.from("café", "utf8"), TextEncoding.Utf8)).toBe("café");
    });
  });
});
