import { BufferFullError, TruncatedInputError } from "./errors.js";

function assertCount(n: number): void {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new RangeError(`Invalid byte count: ${n}`);
  }
}

/**
 * Bounds-checked read cursor over a byte region it does not own.
 * Reads return views into the region; nothing is copied.
 */
export class BufferReader {
  private readonly data: Uint8Array;
  private offset = 0;

  public constructor(data: Uint8Array) {
    this.data = data;
  }

  /** Offset of the next unread byte, relative to the start of the region. */
  public get position(): number {
    return this.offset;
  }

  public remaining(): number {
    return this.data.byteLength - this.offset;
  }

  public peekByte(): number {
    if (this.remaining() < 1) {
      throw new TruncatedInputError(
        `Expected 1 byte at offset ${this.offset}, none remain`,
      );
    }
    return this.data[this.offset];
  }

  public readByte(): number {
    const b = this.peekByte();
    this.offset += 1;
    return b;
  }

  /**
   * Read the next n bytes.
   * @returns A view sharing memory with the underlying region.
   */
  public readBytes(n: number): Uint8Array {
    this.ensure(n);
    const view = this.data.subarray(this.offset, this.offset + n);
    this.offset += n;
    return view;
  }

  public advance(n: number): void {
    this.ensure(n);
    this.offset += n;
  }

  /**
   * Split off a cursor over the next n bytes and move past them.
   * The returned cursor starts at position 0 and cannot see beyond n bytes.
   */
  public slice(n: number): BufferReader {
    return new BufferReader(this.readBytes(n));
  }

  /** View of the bytes not yet read. */
  public bytes(): Uint8Array {
    return this.data.subarray(this.offset);
  }

  private ensure(n: number): void {
    assertCount(n);
    if (n > this.remaining()) {
      throw new TruncatedInputError(
        `Expected ${n} bytes at offset ${this.offset}, ${this.remaining()} remain`,
      );
    }
  }
}

/**
 * Bounds-checked append cursor over a fixed byte region.
 */
export class BufferWriter {
  private readonly data: Uint8Array;
  private offset = 0;

  public constructor(data: Uint8Array) {
    this.data = data;
  }

  public get position(): number {
    return this.offset;
  }

  public remainingCapacity(): number {
    return this.data.byteLength - this.offset;
  }

  public writeByte(b: number): void {
    if (!Number.isInteger(b) || b < 0 || b > 0xff) {
      throw new RangeError(`Invalid byte value: ${b}`);
    }
    this.reserve(1);
    this.data[this.offset++] = b;
  }

  // All-or-nothing: a write that does not fit leaves the region untouched.
  public writeBytes(bytes: Uint8Array): void {
    this.reserve(bytes.byteLength);
    this.data.set(bytes, this.offset);
    this.offset += bytes.byteLength;
  }

  /** View of the bytes written so far. */
  public written(): Uint8Array {
    return this.data.subarray(0, this.offset);
  }

  private reserve(n: number): void {
    if (n > this.remainingCapacity()) {
      throw new BufferFullError(
        `Cannot write ${n} bytes at offset ${this.offset}, capacity left ${this.remainingCapacity()}`,
      );
    }
  }
}
