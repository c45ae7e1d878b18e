import { describe, it, expect } from "vitest";
import { ByteCursor } from "./byte-cursor";
import { MapsforgeError } from "./errors";
import { ByteWriter } from "./test/map-builder";

describe("ByteCursor", () => {
  it("reads big-endian fixed-width values in order", () => {
    const bytes = new ByteWriter().u8(7).u16(0x1234).i32(-2).u64(2 ** 40 + 3).u40(0x8000000001).toUint8Array();
    const cur = new ByteCursor(bytes);
    expect(cur.readUint8()).toBe(7);
    expect(cur.readUint16()).toBe(0x1234);
    expect(cur.readInt32()).toBe(-2);
    expect(cur.readUint64()).toBe(2 ** 40 + 3);
    expect(cur.readUint40()).toBe(0x8000000001);
    expect(cur.remaining).toBe(0);
  });

  it("reads signed 8- and 16-bit values and floats", () => {
    const cur = new ByteCursor(Uint8Array.of(0xff, 0xff, 0x85, 0x3f, 0xc0, 0x00, 0x00));
    expect(cur.readInt8()).toBe(-1);
    expect(cur.readInt16()).toBe(-123);
    expect(cur.readFloat32()).toBe(1.5);
  });

  it("reads length-prefixed UTF-8 strings", () => {
    const cur = new ByteCursor(new ByteWriter().string("Straße").string("").toUint8Array());
    expect(cur.readString()).toBe("Straße");
    expect(cur.readString()).toBe("");
    expect(cur.remaining).toBe(0);
  });

  it("respects the window it was given", () => {
    const cur = new ByteCursor(Uint8Array.of(1, 2, 3, 4), 1, 3);
    expect(cur.readUint16()).toBe(0x0203);
    expect(cur.offset).toBe(3);
    expect(() => cur.readUint8()).toThrow(MapsforgeError);
  });

  it("fails with TruncatedData when a string runs past the end", () => {
    const cur = new ByteCursor(Uint8Array.of(5, 0x68, 0x69));
    expect(() => cur.readString()).toThrow(expect.objectContaining({ kind: "TruncatedData" }));
  });

  it("rejects invalid UTF-8 as MalformedData", () => {
    const cur = new ByteCursor(Uint8Array.of(2, 0xc3, 0x28));
    expect(() => cur.readString()).toThrow(expect.objectContaining({ kind: "MalformedData" }));
  });

  it("rejects 64-bit values beyond 2^53", () => {
    const cur = new ByteCursor(Uint8Array.of(0x00, 0x20, 0, 0, 0, 0, 0, 0));
    expect(() => cur.readUint64()).toThrow(expect.objectContaining({ kind: "MalformedData" }));
  });
});
