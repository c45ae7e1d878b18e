// byte-source.ts
//
// Positioned, read-only access to map bytes. Each read names its own offset, so
// concurrent tile requests never share a cursor.

import { open as openFile, type FileHandle } from "node:fs/promises";

export interface ByteSource {
  readonly size: number;
  /** Up to `length` bytes at `offset`; shorter only when the data ends first. */
  read(offset: number, length: number): Promise<Uint8Array>;
  close(): Promise<void>;
}

export class MemoryByteSource implements ByteSource {
  private readonly bytes: Uint8Array;

  constructor(bytes: Uint8Array | ArrayBuffer) {
    this.bytes = bytes instanceof Uint8Array ? bytes : new Uint8Array(bytes);
  }

  get size(): number {
    return this.bytes.length;
  }

  async read(offset: number, length: number): Promise<Uint8Array> {
    const start = Math.min(offset, this.bytes.length);
    return this.bytes.subarray(start, Math.min(start + length, this.bytes.length));
  }

  async close(): Promise<void> {}
}

export class FileByteSource implements ByteSource {
  readonly size: number;
  private readonly handle: FileHandle;

  private constructor(handle: FileHandle, size: number) {
    this.handle = handle;
    this.size = size;
  }

  static async open(filePath: string): Promise<FileByteSource> {
    const handle = await openFile(filePath, "r");
    try {
      const stats = await handle.stat();
      return new FileByteSource(handle, stats.size);
    } catch (err) {
      await handle.close();
      throw err;
    }
  }

  async read(offset: number, length: number): Promise<Uint8Array> {
    const out = new Uint8Array(Math.max(0, Math.min(length, this.size - offset)));
    let filled = 0;
    while (filled < out.length) {
      const { bytesRead } = await this.handle.read(out, filled, out.length - filled, offset + filled);
      if (bytesRead === 0) break; // file shrank underneath us
      filled += bytesRead;
    }
    return filled === out.length ? out : out.subarray(0, filled);
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}
