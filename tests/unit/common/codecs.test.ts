// tests/unit/common/codecs.test.ts
import { describe, it } from "vitest";
import assert from "assert";
import { fromHex, toHex } from "../../../src/common/codecs";

describe("codecs: hex helpers", () => {
  it("toHex pads every byte to two digits", () => {
    const u8 = new Uint8Array([0xde, 0x0a, 0x00, 0xef]);
    assert.strictEqual(toHex(u8), "de0a00ef");
  });

  it("fromHex accepts mixed case and whitespace", () => {
    assert.deepStrictEqual(Array.from(fromHex("30 0A ff")), [0x30, 0x0a, 0xff]);
  });

  it("fromHex rejects odd length and non-hex characters", () => {
    assert.throws(() => fromHex("abc"), /Invalid hex string/);
    assert.throws(() => fromHex("zz"), /Invalid hex string/);
  });
});
