// tests/unit/common/buffer.test.ts
import { describe, it } from "vitest";
import assert from "assert";
import {
  BufferFullError,
  BufferReader,
  BufferWriter,
  TruncatedInputError,
} from "../../../src/common";

describe("BufferReader", () => {
  it("reads bytes in order and tracks position", () => {
    const reader = new BufferReader(Uint8Array.of(1, 2, 3, 4));
    assert.strictEqual(reader.peekByte(), 1);
    assert.strictEqual(reader.readByte(), 1);
    assert.deepStrictEqual(Array.from(reader.readBytes(2)), [2, 3]);
    assert.strictEqual(reader.position, 3);
    assert.strictEqual(reader.remaining(), 1);
  });

  it("readBytes returns a view, not a copy", () => {
    const data = Uint8Array.of(1, 2, 3);
    const view = new BufferReader(data).readBytes(2);
    data[1] = 0xaa;
    assert.strictEqual(view[1], 0xaa);
    assert.strictEqual(view.buffer, data.buffer);
  });

  it("throws TruncatedInputError past the end", () => {
    const reader = new BufferReader(Uint8Array.of(1));
    assert.throws(() => reader.readBytes(2), TruncatedInputError);
    reader.advance(1);
    assert.throws(() => reader.readByte(), TruncatedInputError);
    assert.throws(() => reader.peekByte(), TruncatedInputError);
  });

  it("rejects negative and fractional counts with RangeError", () => {
    const reader = new BufferReader(Uint8Array.of(1, 2));
    assert.throws(() => reader.readBytes(-1), RangeError);
    assert.throws(() => reader.advance(0.5), RangeError);
  });

  it("slice restricts the sub-cursor and advances the parent", () => {
    const reader = new BufferReader(Uint8Array.of(9, 8, 7, 6));
    reader.advance(1);
    const sub = reader.slice(2);
    assert.strictEqual(reader.position, 3);
    assert.strictEqual(sub.position, 0);
    assert.strictEqual(sub.remaining(), 2);
    assert.deepStrictEqual(Array.from(sub.bytes()), [8, 7]);
    sub.advance(2);
    assert.throws(() => sub.readByte(), TruncatedInputError);
    assert.strictEqual(reader.readByte(), 6);
  });
});

describe("BufferWriter", () => {
  it("appends bytes and exposes what was written", () => {
    const writer = new BufferWriter(new Uint8Array(4));
    writer.writeByte(0x30);
    writer.writeBytes(Uint8Array.of(0x01, 0x02));
    assert.strictEqual(writer.position, 3);
    assert.strictEqual(writer.remainingCapacity(), 1);
    assert.deepStrictEqual(Array.from(writer.written()), [0x30, 0x01, 0x02]);
  });

  it("throws BufferFullError and writes nothing when bytes do not fit", () => {
    const region = new Uint8Array(2);
    const writer = new BufferWriter(region);
    writer.writeByte(0x01);
    assert.throws(() => writer.writeBytes(Uint8Array.of(2, 3)), BufferFullError);
    assert.strictEqual(writer.position, 1);
    assert.deepStrictEqual(Array.from(region), [0x01, 0x00]);
  });

  it("rejects values that are not a byte", () => {
    const writer = new BufferWriter(new Uint8Array(1));
    assert.throws(() => writer.writeByte(256), RangeError);
    assert.throws(() => writer.writeByte(-1), RangeError);
  });
});
