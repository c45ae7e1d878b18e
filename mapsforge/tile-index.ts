// tile-index.ts
//
// Per-subfile tile index. One 5-byte big-endian entry per tile of the interval's
// grid (the bounding box at base zoom), row-major:
//   bit 39      water tile (the whole tile is sea)
//   bits 0..38  block offset relative to the subfile start
// Offsets are made absolute here. A block runs to the next entry's offset, or to
// the subfile end for the last entry.

import { ByteCursor } from "./byte-cursor";
import { rangeHeight, rangeWidth } from "./coordinates";
import { MapsforgeError, rethrowAs } from "./errors";
import type { ZoomInterval } from "./header";

export const INDEX_ENTRY_SIZE = 5;
export const INDEX_SIGNATURE = "+++IndexStart+++";

const WATER_BIT = 0x8000000000;

export interface TileIndexEntry {
  /** Absolute file offset of the tile block. */
  offset: number;
  isWater: boolean;
  isLast: boolean;
}

export class TileIndex {
  readonly interval: ZoomInterval;
  readonly gridWidth: number;
  readonly gridHeight: number;
  private readonly offsets: Float64Array;
  private readonly water: Uint8Array;

  private constructor(interval: ZoomInterval, offsets: Float64Array, water: Uint8Array) {
    this.interval = interval;
    this.gridWidth = rangeWidth(interval.tileRange);
    this.gridHeight = rangeHeight(interval.tileRange);
    this.offsets = offsets;
    this.water = water;
  }

  /** Size of the index at the start of the interval's subfile. */
  static byteLength(interval: ZoomInterval, debug: boolean): number {
    return (debug ? INDEX_SIGNATURE.length : 0) + interval.entryCount * INDEX_ENTRY_SIZE;
  }

  /** `bytes` holds the index region, starting at the subfile start. */
  static fromBytes(bytes: Uint8Array, interval: ZoomInterval, debug: boolean): TileIndex {
    const count = interval.entryCount;
    const needed = TileIndex.byteLength(interval, debug);
    if (bytes.length < needed) {
      throw new MapsforgeError(
        "CorruptHeader",
        `tile index of zoom interval ${interval.baseZoom} needs ${needed} bytes, got ${bytes.length}`,
      );
    }
    const offsets = new Float64Array(count);
    const water = new Uint8Array(count);
    const cur = new ByteCursor(bytes);

    try {
      if (debug) {
        const sig = cur.readAscii(INDEX_SIGNATURE.length);
        if (sig !== INDEX_SIGNATURE) {
          throw new MapsforgeError("CorruptHeader", `missing index signature at ${interval.subfileStart}`);
        }
      }
      for (let i = 0; i < count; i++) {
        const raw = cur.readUint40();
        water[i] = raw >= WATER_BIT ? 1 : 0;
        offsets[i] = interval.subfileStart + (raw % WATER_BIT);
      }
    } catch (err) {
      rethrowAs(err, { TruncatedData: "CorruptHeader" }, `tile index of zoom interval ${interval.baseZoom}`);
    }

    const indexEnd = interval.subfileStart + TileIndex.byteLength(interval, debug);
    const subfileEnd = interval.subfileStart + interval.subfileLength;
    let prev = indexEnd - 1;
    for (let i = 0; i < count; i++) {
      if (offsets[i] <= prev || offsets[i] >= subfileEnd) {
        throw new MapsforgeError(
          "CorruptHeader",
          `tile index entry ${i} of zoom interval ${interval.baseZoom} points to ${offsets[i]}, ` +
            `expected (${prev}, ${subfileEnd})`,
        );
      }
      prev = offsets[i];
    }

    return new TileIndex(interval, offsets, water);
  }

  get size(): number {
    return this.offsets.length;
  }

  /** Row-major position of a grid cell; TileOutOfRange outside the grid. */
  position(row: number, col: number): number {
    if (
      !Number.isInteger(row) || !Number.isInteger(col) ||
      row < 0 || row >= this.gridHeight || col < 0 || col >= this.gridWidth
    ) {
      throw new MapsforgeError(
        "TileOutOfRange",
        `grid cell (${row}, ${col}) outside ${this.gridHeight}x${this.gridWidth} index of zoom ${this.interval.baseZoom}`,
      );
    }
    return row * this.gridWidth + col;
  }

  lookup(row: number, col: number): number {
    return this.offsets[this.position(row, col)];
  }

  entry(row: number, col: number): TileIndexEntry {
    return this.entryAt(this.position(row, col));
  }

  entryAt(position: number): TileIndexEntry {
    if (!Number.isInteger(position) || position < 0 || position >= this.offsets.length) {
      throw new MapsforgeError("TileOutOfRange", `index position ${position} outside 0..${this.offsets.length - 1}`);
    }
    return {
      offset: this.offsets[position],
      isWater: this.water[position] === 1,
      isLast: position === this.offsets.length - 1,
    };
  }

  isLastTile(entry: TileIndexEntry): boolean {
    return entry.isLast;
  }

  /** Absolute [start, end) of a tile block. */
  blockRange(row: number, col: number): { start: number; end: number } {
    const p = this.position(row, col);
    const end = p + 1 < this.offsets.length
      ? this.offsets[p + 1]
      : this.interval.subfileStart + this.interval.subfileLength;
    return { start: this.offsets[p], end };
  }

  *entries(): IterableIterator<TileIndexEntry & { row: number; col: number }> {
    for (let p = 0; p < this.offsets.length; p++) {
      yield { ...this.entryAt(p), row: Math.floor(p / this.gridWidth), col: p % this.gridWidth };
    }
  }
}
