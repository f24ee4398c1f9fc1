import { BufferReader, BufferWriter, fromHex } from "../../src/common";

export function readerFromHex(hex: string): BufferReader {
  return new BufferReader(fromHex(hex));
}

export function writerOfSize(size: number): BufferWriter {
  return new BufferWriter(new Uint8Array(size));
}
