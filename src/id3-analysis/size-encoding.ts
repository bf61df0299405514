import { ID3V2_CONSTANTS } from "./consts";
import { SizeEncoding } from "./types";

/**
 * Picks the frame size encoding for a container major version
 */
export function sizeEncodingForVersion(version: number): SizeEncoding {
  return version === ID3V2_CONSTANTS.SYNCSAFE_VERSION
    ? SizeEncoding.Syncsafe
    : SizeEncoding.BigEndian;
}

/**
 * Decodes four 7-bit fields into a 28-bit integer.
 * The top bit of each byte is masked off rather than rejected.
 */
export function decodeSyncsafe(buffer: Buffer, offset: number): number {
  const mask = ID3V2_CONSTANTS.SYNCSAFE_MASK;
  return (
    ((buffer[offset] & mask) << 21) |
    ((buffer[offset + 1] & mask) << 14) |
    ((buffer[offset + 2] & mask) << 7) |
    (buffer[offset + 3] & mask)
  );
}

/**
 * Reads a 4-byte size field at offset with the given encoding.
 * Callers guarantee four readable bytes.
 */
export function decodeSize(
  buffer: Buffer,
  offset: number,
  encoding: SizeEncoding,
): number {
  switch (encoding) {
    case SizeEncoding.Syncsafe:
      return decodeSyncsafe(buffer, offset);
    case SizeEncoding.BigEndian:
      return buffer.readUInt32BE(offset);
  }
}
