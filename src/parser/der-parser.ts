import type { BufferReader } from "../common/buffer.js";
import { toHex } from "../common/codecs.js";
import { InvalidEncodingError, TruncatedInputError } from "../common/errors.js";
import { MAX_LENGTH_BYTES } from "../common/types.js";
import type { DerItem } from "../common/types.js";

export class DerParser {
  /**
   * Decode a definite-length DER length field and move the reader past it.
   * Only the canonical encoding of each value is accepted.
   * @param reader - Cursor positioned at the first length byte.
   * @returns The number of content bytes that follow.
   */
  public static readLength(reader: BufferReader): number {
    const start = reader.position;
    const first = reader.readByte();

    let length: number;
    if (first < 0x80) {
      length = first;
    } else {
      // DER forbids indefinite length (0x80)
      if (first === 0x80) {
        throw new InvalidEncodingError(
          `Indefinite length encoding is not allowed (DER) at offset ${start}`,
        );
      }
      const numBytes = first & 0x7f;
      if (numBytes > MAX_LENGTH_BYTES) {
        throw new InvalidEncodingError(
          `Length-of-length ${numBytes} exceeds ${MAX_LENGTH_BYTES} at offset ${start}`,
        );
      }
      const bytes = reader.readBytes(numBytes);
      if (numBytes > 1 && bytes[0] === 0x00) {
        throw new InvalidEncodingError(
          `Non-minimal long-form length ${toHex(bytes)} (leading zero) at offset ${start}`,
        );
      }
      length = 0;
      for (const b of bytes) {
        // multiply, not shift: (x << 8) goes negative past 2^31
        length = length * 256 + b;
      }
      if (length < 0x80) {
        throw new InvalidEncodingError(
          `Long-form length ${length} fits the short form at offset ${start}`,
        );
      }
    }

    if (length > reader.remaining()) {
      throw new TruncatedInputError(
        `Declared length ${length} exceeds available bytes (${reader.remaining()}) at offset ${start}`,
      );
    }
    return length;
  }

  /**
   * Read one tag-length-value item.
   * The content is a sub-cursor over the parent's memory; nested items are
   * read by calling this again on `content`.
   * On failure the reader's position is unspecified and it must be discarded.
   */
  public static readItem(reader: BufferReader): DerItem {
    const tag = reader.readByte();
    const length = this.readLength(reader);
    const content = reader.slice(length);
    return { tag, content };
  }

  /**
   * Read one item and require its tag to be `tag`.
   */
  public static readExpected(reader: BufferReader, tag: number): DerItem {
    const start = reader.position;
    const item = this.readItem(reader);
    if (item.tag !== tag) {
      throw new InvalidEncodingError(
        `Expected tag 0x${toHex(Uint8Array.of(tag))}, got 0x${toHex(Uint8Array.of(item.tag))} at offset ${start}`,
      );
    }
    return item;
  }
}
