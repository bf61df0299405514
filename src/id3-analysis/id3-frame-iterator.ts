import { ID3V2_CONSTANTS } from "./consts";
import { decodeSize } from "./size-encoding";
import { Id3Frame, IFrameIterator, RawTag } from "./types";

/**
 * Iterator for traversing the frames of an ID3v2 tag body.
 * Frames are produced lazily; nothing is materialized ahead of the cursor.
 */
export class Id3FrameIterator implements IFrameIterator {
  private currentPosition: number = 0;
  private isEnded: boolean = false;

  constructor(private readonly tag: RawTag) {}

  /**
   * Gets the next frame from the tag body
   * @returns The next frame, or null once padding or the end of the body is reached
   */
  next(): Id3Frame | null {
    if (!this.hasNext()) {
      this.isEnded = true;
      return null;
    }

    const body = this.tag.body;
    const position = this.currentPosition;

    // A zero first id byte marks the start of padding
    if (body[position] === 0) {
      this.isEnded = true;
      return null;
    }

    const declaredSize = decodeSize(
      body,
      position + ID3V2_CONSTANTS.FRAME_SIZE_OFFSET,
      this.tag.sizeEncoding,
    );
    const payloadStart = position + ID3V2_CONSTANTS.FRAME_HEADER_SIZE;
    const payload = body.subarray(
      payloadStart,
      Math.min(body.length, payloadStart + declaredSize),
    );

    // Jump by the declared size even when the payload was clamped
    this.currentPosition = payloadStart + declaredSize;

    return {
      id: body.toString(
        "latin1",
        position,
        position + ID3V2_CONSTANTS.FRAME_ID_LENGTH,
      ),
      position,
      declaredSize,
      payload,
    };
  }

  /**
   * Checks if another frame header fits in the remaining body
   */
  hasNext(): boolean {
    return (
      !this.isEnded &&
      this.tag.body.length - this.currentPosition >=
        ID3V2_CONSTANTS.FRAME_HEADER_SIZE
    );
  }

  /**
   * Resets the iterator to the first frame
   */
  reset(): void {
    this.currentPosition = 0;
    this.isEnded = false;
  }
}
