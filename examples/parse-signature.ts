import { BufferReader, DerParser, DerTag, fromHex, toHex } from "../src/parser/index.js";

// ECDSA signature: SEQUENCE { INTEGER r, INTEGER s }
const signature = fromHex("3006020105020107");

const outer = new BufferReader(signature);
const seq = DerParser.readExpected(outer, DerTag.Sequence);
const r = DerParser.readExpected(seq.content, DerTag.Integer);
const s = DerParser.readExpected(seq.content, DerTag.Integer);
if (seq.content.remaining() !== 0 || outer.remaining() !== 0) {
  throw new Error("Trailing bytes after signature");
}
console.log({ r: toHex(r.content.bytes()), s: toHex(s.content.bytes()) });
// { r: '05', s: '07' }
