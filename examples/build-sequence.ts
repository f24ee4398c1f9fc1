import { BufferWriter, DerBuilder, DerTag, toHex } from "../src/builder/index.js";

const inner = new BufferWriter(new Uint8Array(16));
DerBuilder.writeItem(inner, DerTag.Integer, Uint8Array.of(0x05));
DerBuilder.writeItem(inner, DerTag.Integer, Uint8Array.of(0x07));

const out = new BufferWriter(new Uint8Array(32));
DerBuilder.writeItem(out, DerTag.Sequence, inner.written());
console.log(toHex(out.written()));
// 3006020105020107
