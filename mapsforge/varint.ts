// varint.ts
//
// Variable-length integers as stored in map files:
// - unsigned: little-endian base-128 groups, high bit = continuation, 1..5 bytes
// - signed: the unsigned value ZigZag-mapped (0, -1, 1, -2, ...)
//
// Values can reach 35 bits, so accumulation uses arithmetic rather than 32-bit shifts.

import { MapsforgeError } from "./errors";

export const MAX_VARINT_BYTES = 5;

export type VarintResult = { value: number; offset: number };

export function readUnsignedVarint(buf: Uint8Array, off: number, end: number = buf.length): VarintResult {
  let result = 0;
  let scale = 1;
  for (let i = 0; i < MAX_VARINT_BYTES; i++) {
    if (off >= end) throw new MapsforgeError("TruncatedData", `uvarint runs past offset ${end}`);
    const b = buf[off++];
    result += (b & 0x7f) * scale;
    if ((b & 0x80) === 0) return { value: result, offset: off };
    scale *= 0x80;
  }
  throw new MapsforgeError("MalformedData", `uvarint longer than ${MAX_VARINT_BYTES} bytes at offset ${off - MAX_VARINT_BYTES}`);
}

export function readSignedVarint(buf: Uint8Array, off: number, end: number = buf.length): VarintResult {
  const { value: u, offset } = readUnsignedVarint(buf, off, end);
  return { value: zigzagDecode(u), offset };
}

export function zigzagDecode(u: number): number {
  return u % 2 === 0 ? u / 2 : -(u + 1) / 2;
}
