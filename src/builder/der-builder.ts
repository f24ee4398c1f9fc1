import type { BufferWriter } from "../common/buffer.js";
import { BufferFullError } from "../common/errors.js";
import { MAX_LENGTH } from "../common/types.js";

function assertLength(length: number): void {
  if (!Number.isInteger(length) || length < 0 || length >= MAX_LENGTH) {
    throw new RangeError(
      `Invalid length: ${length}. Expected integer in range [0, ${MAX_LENGTH - 1}]`,
    );
  }
}

/**
 * Writes canonical DER length fields and items into a fixed output region.
 */
export class DerBuilder {
  /**
   * Number of bytes the canonical encoding of `length` occupies.
   */
  public static lengthSize(length: number): number {
    assertLength(length);
    if (length < 0x80) return 1;
    let n = 0;
    for (let tmp = length; tmp > 0; tmp = Math.floor(tmp / 256)) n++;
    return 1 + n;
  }

  /**
   * Write the shortest valid encoding of `length`. Nothing is written when
   * the writer lacks room for the whole field.
   */
  public static writeLength(writer: BufferWriter, length: number): void {
    const size = this.lengthSize(length);
    if (size > writer.remainingCapacity()) {
      throw new BufferFullError(
        `Length field of ${size} bytes does not fit, capacity left ${writer.remainingCapacity()}`,
      );
    }
    if (size === 1) {
      writer.writeByte(length);
      return;
    }

    const numBytes = size - 1;
    writer.writeByte(0x80 | numBytes);
    for (let i = numBytes - 1; i >= 0; i--) {
      writer.writeByte(Math.floor(length / 256 ** i) % 256);
    }
  }

  /**
   * Write tag, canonical length and content as one item. Capacity for the
   * whole item is checked before the first byte goes out.
   */
  public static writeItem(
    writer: BufferWriter,
    tag: number,
    content: Uint8Array,
  ): void {
    if (!Number.isInteger(tag) || tag < 0 || tag > 0xff) {
      throw new RangeError(`Invalid tag: ${tag} (expected 0..255)`);
    }
    const total = 1 + this.lengthSize(content.byteLength) + content.byteLength;
    if (total > writer.remainingCapacity()) {
      throw new BufferFullError(
        `Item of ${total} bytes does not fit, capacity left ${writer.remainingCapacity()}`,
      );
    }
    writer.writeByte(tag);
    this.writeLength(writer, content.byteLength);
    writer.writeBytes(content);
  }
}
