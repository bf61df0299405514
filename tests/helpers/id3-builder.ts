import { TextEncoding } from "../../src/id3-analysis/types";

export const PNG_BYTES = Buffer.from([
  0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x01, 0x02, 0x03, 0x04,
]);

export const JPEG_BYTES = Buffer.from([
  0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46, 0x49, 0x46,
]);

export function syncsafe(size: number): Buffer {
  return Buffer.from([
    (size >> 21) & 0x7f,
    (size >> 14) & 0x7f,
    (size >> 7) & 0x7f,
    size & 0x7f,
  ]);
}

export function bigEndian(size: number): Buffer {
  const buffer = Buffer.alloc(4);
  buffer.writeUInt32BE(size, 0);
  return buffer;
}

interface FrameOptions {
  version?: number;
  declaredSize?: number;
}

/**
 * Frame header (id, size, two flag bytes) followed by the payload
 */
export function buildFrame(
  id: string,
  payload: Buffer,
  { version = 4, declaredSize = payload.length }: FrameOptions = {},
): Buffer {
  const size = version === 4 ? syncsafe(declaredSize) : bigEndian(declaredSize);
  return Buffer.concat([
    Buffer.from(id, "latin1"),
    size,
    Buffer.from([0, 0]),
    payload,
  ]);
}

interface TagOptions {
  version?: number;
  padding?: number;
  declaredSize?: number;
}

export function buildTag(
  frames: Buffer[],
  { version = 4, padding = 0, declaredSize }: TagOptions = {},
): Buffer {
  const body = Buffer.concat([...frames, Buffer.alloc(padding)]);
  const header = Buffer.concat([
    Buffer.from("ID3", "latin1"),
    Buffer.from([version, 0, 0]),
    syncsafe(declaredSize ?? body.length),
  ]);
  return Buffer.concat([header, body]);
}

interface ApicOptions {
  encoding?: number;
  mimeType?: string;
  pictureType?: number;
  description?: Buffer;
  image: Buffer;
}

export function buildApicPayload({
  encoding = TextEncoding.Latin1,
  mimeType = "image/png",
  pictureType = 3,
  description = Buffer.alloc(0),
  image,
}: ApicOptions): Buffer {
  const doubleByte =
    encoding === TextEncoding.Utf16 || encoding === TextEncoding.Utf16BE;
  return Buffer.concat([
    Buffer.from([encoding]),
    Buffer.from(mimeType, "latin1"),
    Buffer.from([0, pictureType]),
    description,
    Buffer.alloc(doubleByte ? 2 : 1),
    image,
  ]);
}
