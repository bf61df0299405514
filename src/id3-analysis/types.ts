/**
 * Frame size encoding used by an ID3v2 container
 */
export enum SizeEncoding {
  Syncsafe = "SYNCSAFE",
  BigEndian = "BIG_ENDIAN",
}

/**
 * Text encoding marker carried in the first byte of text-bearing frames
 */
export enum TextEncoding {
  Latin1 = 0,
  Utf16 = 1,
  Utf16BE = 2,
  Utf8 = 3,
}

/**
 * The body of an ID3v2 tag, without its 10-byte header
 */
export interface RawTag {
  /**
   * Major version from header byte 3 (3 for ID3v2.3, 4 for ID3v2.4)
   */
  readonly version: number;

  /**
   * Frame size encoding resolved once from the major version
   */
  readonly sizeEncoding: SizeEncoding;

  /**
   * Tag body, clamped to the bytes that were actually available
   */
  readonly body: Buffer;
}

/**
 * A single frame inside a tag body
 */
export interface Id3Frame {
  /**
   * Frame identifier decoded as latin1 (e.g. "APIC", "TIT2")
   */
  id: string;

  /**
   * Offset of the frame header within the tag body
   */
  position: number;

  /**
   * Payload size as declared by the frame header
   */
  declaredSize: number;

  /**
   * Payload view, clamped to the end of the tag body
   */
  payload: Buffer;
}

export type ImageExtension = ".png" | ".jpg";

/**
 * Decoded layout of an attached-picture frame
 */
export interface PictureFrame {
  encoding: number;
  mimeType: string;
  pictureType: number;
  description: Buffer;
  imageData: Buffer;
}

/**
 * Image bytes recovered from a tag, with the extension sniffed from its leading bytes
 */
export interface ExtractedImage {
  data: Buffer;
  extension: ImageExtension;
}

export enum PictureDecodeFailure {
  MISSING_MIME_TERMINATOR = "MISSING_MIME_TERMINATOR",
  NO_IMAGE_BYTES = "NO_IMAGE_BYTES",
}

export type PictureDecodeResult =
  | { ok: true; picture: PictureFrame; image: ExtractedImage }
  | { ok: false; failure: PictureDecodeFailure };

export enum CoverArtMissReason {
  CONTAINER_ABSENT = "CONTAINER_ABSENT",
  NO_PICTURE_FRAME = "NO_PICTURE_FRAME",
}

export type CoverArtLookup =
  | { found: true; image: ExtractedImage; frame: PictureFrame }
  | { found: false; reason: CoverArtMissReason };

/**
 * Interface for iterating through the frames of a tag
 * Abstracts frame traversal logic from frame interpretation
 */
export interface IFrameIterator {
  /**
   * Gets the next frame from the iterator
   * @returns the next frame, or null once padding or the end of the body is reached
   */
  next(): Id3Frame | null;

  /**
   * Checks if there are more frames to iterate
   */
  hasNext(): boolean;

  /**
   * Resets the iterator to the first frame
   */
  reset(): void;
}
