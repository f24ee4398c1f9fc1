import type { BufferReader } from "./buffer.js";

/**
 * Universal tags the codec knows by name. Any other tag byte is passed
 * through to the caller unchanged.
 */
export const DerTag = {
  Integer: 0x02,
  Sequence: 0x30,
} as const;
export type DerTag = (typeof DerTag)[keyof typeof DerTag];

/**
 * Largest long-form length-of-length accepted or produced. Lengths are
 * therefore limited to [0, 2^32).
 */
export const MAX_LENGTH_BYTES = 4;

/** Exclusive upper bound of an encodable length. */
export const MAX_LENGTH = 2 ** (8 * MAX_LENGTH_BYTES);

export interface DerItem {
  /** Raw tag byte; class and constructed bits are not decoded. */
  tag: number;
  /** Cursor over exactly the item's content, sharing the parent buffer. */
  content: BufferReader;
}
