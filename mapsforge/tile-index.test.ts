import { describe, it, expect } from "vitest";
import { parseFileHeader } from "./header";
import { TileIndex } from "./tile-index";
import { buildMapLayout, type MapLayout, type MapSpec } from "./test/map-builder";

// 3 rows (336..338) x 2 cols (549..550) at zoom 10
function spec(overrides: Partial<MapSpec> = {}): MapSpec {
  return {
    boundingBox: { minLat: 52.0, minLon: 13.2, maxLat: 52.3, maxLon: 13.6 },
    intervals: [{ baseZoom: 10, minZoom: 10, maxZoom: 12 }],
    ...overrides,
  };
}

function indexOf(layout: MapLayout, debug = false): TileIndex {
  const interval = parseFileHeader(layout.bytes).zoomIntervals[0];
  const start = interval.subfileStart;
  return TileIndex.fromBytes(
    layout.bytes.subarray(start, start + TileIndex.byteLength(interval, debug)),
    interval,
    debug,
  );
}

describe("TileIndex", () => {
  it("covers the bounding box grid at base zoom", () => {
    const index = indexOf(buildMapLayout(spec()));
    expect(index.gridHeight).toBe(3);
    expect(index.gridWidth).toBe(2);
    expect(index.size).toBe(6);
  });

  it("returns absolute block offsets in row-major order", () => {
    const layout = buildMapLayout(spec());
    const index = indexOf(layout);
    const offsets: number[] = [];
    for (let row = 0; row < 3; row++) {
      for (let col = 0; col < 2; col++) offsets.push(index.lookup(row, col));
    }
    expect(offsets).toEqual(layout.subfiles[0].blockOffsets);
    // 30 index bytes, then 2-byte empty blocks
    expect(offsets[0]).toBe(layout.headerEnd + 30);
    expect(offsets[5]).toBe(layout.headerEnd + 40);
  });

  it("ends the last block at the subfile end", () => {
    const layout = buildMapLayout(spec());
    const index = indexOf(layout);
    const { start, length } = layout.subfiles[0];
    expect(index.entry(2, 1).isLast).toBe(true);
    expect(index.isLastTile(index.entry(2, 1))).toBe(true);
    expect(index.isLastTile(index.entry(2, 0))).toBe(false);
    expect(index.blockRange(2, 1)).toEqual({ start: start + 40, end: start + length });
    expect(index.blockRange(0, 0)).toEqual({ start: start + 30, end: start + 32 });
  });

  it("reads the water flag apart from the offset", () => {
    const layout = buildMapLayout(
      spec({ intervals: [{ baseZoom: 10, minZoom: 10, maxZoom: 12, tiles: [{ row: 336, col: 550, water: true }] }] }),
    );
    const index = indexOf(layout);
    expect(index.entry(0, 1)).toEqual({ offset: layout.subfiles[0].blockOffsets[1], isWater: true, isLast: false });
    expect(index.entry(0, 0).isWater).toBe(false);
  });

  it("rejects cells outside the grid", () => {
    const index = indexOf(buildMapLayout(spec()));
    for (const [row, col] of [[3, 0], [0, 2], [-1, 0], [0.5, 0]]) {
      expect(() => index.lookup(row, col)).toThrow(expect.objectContaining({ kind: "TileOutOfRange" }));
    }
    expect(() => index.entryAt(6)).toThrow(expect.objectContaining({ kind: "TileOutOfRange" }));
  });

  it("enumerates entries with their grid cell", () => {
    const cells = [...indexOf(buildMapLayout(spec())).entries()].map((e) => [e.row, e.col]);
    expect(cells).toEqual([[0, 0], [0, 1], [1, 0], [1, 1], [2, 0], [2, 1]]);
  });

  it("rejects offsets that do not increase", () => {
    const layout = buildMapLayout(spec());
    const at = layout.subfiles[0].start;
    layout.bytes.copyWithin(at + 5, at, at + 5); // entry 1 = entry 0
    expect(() => indexOf(layout)).toThrow(expect.objectContaining({ kind: "CorruptHeader" }));
  });

  it("rejects offsets pointing into the index itself", () => {
    const layout = buildMapLayout(spec());
    layout.bytes.fill(0, layout.subfiles[0].start, layout.subfiles[0].start + 5);
    expect(() => indexOf(layout)).toThrow(expect.objectContaining({ kind: "CorruptHeader" }));
  });

  it("rejects offsets past the subfile end", () => {
    const layout = buildMapLayout(spec());
    const last = layout.subfiles[0].start + 25;
    layout.bytes[last + 3] = 0xff; // relative offset 0xff28
    expect(() => indexOf(layout)).toThrow(expect.objectContaining({ kind: "CorruptHeader" }));
  });

  it("rejects a truncated index", () => {
    const layout = buildMapLayout(spec());
    const interval = parseFileHeader(layout.bytes).zoomIntervals[0];
    const start = interval.subfileStart;
    expect(() => TileIndex.fromBytes(layout.bytes.subarray(start, start + 12), interval, false)).toThrow(
      expect.objectContaining({ kind: "CorruptHeader" }),
    );
  });

  it("checks the index length before allocating it", () => {
    const layout = buildMapLayout(spec());
    const interval = parseFileHeader(layout.bytes).zoomIntervals[0];
    const start = interval.subfileStart;
    const huge = { ...interval, entryCount: 2 ** 44 };
    expect(() => TileIndex.fromBytes(layout.bytes.subarray(start, start + 30), huge, false)).toThrow(
      expect.objectContaining({ kind: "CorruptHeader" }),
    );
  });

  describe("debug files", () => {
    it("skips the index signature", () => {
      const layout = buildMapLayout(spec({ debug: true }));
      const index = indexOf(layout, true);
      expect(index.lookup(0, 0)).toBe(layout.subfiles[0].blockOffsets[0]);
      expect(index.lookup(0, 0)).toBe(layout.subfiles[0].start + 16 + 30);
    });

    it("rejects a missing index signature", () => {
      const layout = buildMapLayout(spec({ debug: true }));
      layout.bytes[layout.subfiles[0].start] = 0x2d;
      expect(() => indexOf(layout, true)).toThrow(expect.objectContaining({ kind: "CorruptHeader" }));
    });
  });
});
