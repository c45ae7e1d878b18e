import { MapsforgeError } from "./errors";
import { readSignedVarint, readUnsignedVarint } from "./varint";

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Forward-only reader over `buf[start, end)`. Fixed-width values are big-endian.
 * Every read is bounds-checked through `take()`; running past `end` throws TruncatedData.
 */
export class ByteCursor {
  private readonly buf: Uint8Array;
  private readonly dv: DataView;
  private readonly end: number;
  private pos: number;

  constructor(buf: Uint8Array, start = 0, end: number = buf.length) {
    if (start < 0 || end > buf.length || start > end) {
      throw new RangeError(`ByteCursor: bad range [${start}, ${end}) for ${buf.length} bytes`);
    }
    this.buf = buf;
    this.dv = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
    this.pos = start;
    this.end = end;
  }

  get offset(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.end - this.pos;
  }

  // The single checked primitive: reserves n bytes and returns where they start.
  private take(n: number): number {
    if (n < 0 || this.pos + n > this.end) {
      throw new MapsforgeError(
        "TruncatedData",
        `need ${n} bytes at offset ${this.pos}, only ${this.end - this.pos} left`,
      );
    }
    const at = this.pos;
    this.pos += n;
    return at;
  }

  skip(n: number): void {
    this.take(n);
  }

  readUint8(): number {
    return this.dv.getUint8(this.take(1));
  }

  readInt8(): number {
    return this.dv.getInt8(this.take(1));
  }

  readUint16(): number {
    return this.dv.getUint16(this.take(2));
  }

  readInt16(): number {
    return this.dv.getInt16(this.take(2));
  }

  readUint32(): number {
    return this.dv.getUint32(this.take(4));
  }

  readInt32(): number {
    return this.dv.getInt32(this.take(4));
  }

  readFloat32(): number {
    return this.dv.getFloat32(this.take(4));
  }

  // 5-byte unsigned, as used by tile index entries.
  readUint40(): number {
    const at = this.take(5);
    return this.dv.getUint8(at) * 0x100000000 + this.dv.getUint32(at + 1);
  }

  readUint64(): number {
    const at = this.take(8);
    const hi = this.dv.getUint32(at);
    const lo = this.dv.getUint32(at + 4);
    if (hi > 0x1fffff) throw new MapsforgeError("MalformedData", `u64 at offset ${at} exceeds 2^53`);
    return hi * 0x100000000 + lo;
  }

  readBytes(n: number): Uint8Array {
    const at = this.take(n);
    return this.buf.subarray(at, at + n);
  }

  readUnsignedVarint(): number {
    const { value, offset } = readUnsignedVarint(this.buf, this.pos, this.end);
    this.pos = offset;
    return value;
  }

  readSignedVarint(): number {
    const { value, offset } = readSignedVarint(this.buf, this.pos, this.end);
    this.pos = offset;
    return value;
  }

  // Fixed-length ASCII, used for magic bytes and debug signatures.
  readAscii(n: number): string {
    return String.fromCharCode(...this.readBytes(n));
  }

  // uvarint byte length + UTF-8 payload.
  readString(): string {
    const start = this.pos;
    const bytes = this.readBytes(this.readUnsignedVarint());
    try {
      return utf8.decode(bytes);
    } catch (err) {
      throw new MapsforgeError("MalformedData", `invalid UTF-8 in string at offset ${start}`, { cause: err });
    }
  }
}
