/**
 * ID3v2 container constants
 */
export const ID3V2_CONSTANTS = {
  MAGIC: [0x49, 0x44, 0x33] as const, // "ID3"
  HEADER_SIZE: 10,
  VERSION_OFFSET: 3,
  SIZE_OFFSET: 6,
  FRAME_HEADER_SIZE: 10,
  FRAME_ID_LENGTH: 4,
  FRAME_SIZE_OFFSET: 4,
  SYNCSAFE_VERSION: 4, // ID3v2.4 frame sizes are syncsafe, earlier versions are plain big-endian
  SYNCSAFE_MASK: 0x7f,
} as const;

/**
 * Attached-picture (APIC) frame constants
 */
export const APIC_CONSTANTS = {
  FRAME_ID: "APIC",
  MIN_PAYLOAD_SIZE: 4, // Payloads must be strictly longer than this to be decoded
  MIN_IMAGE_SIZE: 4, // Enough bytes to sniff a magic number
} as const;

export const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47] as const; // "\x89PNG"

export const JPEG_SIGNATURE = [0xff, 0xd8, 0xff] as const;
