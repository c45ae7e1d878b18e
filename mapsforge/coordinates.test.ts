import { describe, it, expect } from "vitest";
import {
  LATITUDE_MAX,
  latLonToTile,
  quantize,
  tileOrigin,
  tileRangeForBoundingBox,
  tileToLatLon,
} from "./coordinates";

function bbox(minLat: number, minLon: number, maxLat: number, maxLon: number) {
  return { minLatQ: quantize(minLat), minLonQ: quantize(minLon), maxLatQ: quantize(maxLat), maxLonQ: quantize(maxLon) };
}

describe("latLonToTile", () => {
  it.each([
    [0, 90, -180, { row: 0, col: 0 }],
    [0, -90, 180, { row: 0, col: 0 }],
    [1, 0, 0, { row: 1, col: 1 }],
    [1, 1, 0, { row: 0, col: 1 }],
    [1, 0, -1, { row: 1, col: 0 }],
    [1, -90, 180, { row: 1, col: 1 }],
    [2, 80, -100, { row: 0, col: 0 }],
    [2, 45, -90, { row: 1, col: 1 }],
    [2, 10, -10, { row: 1, col: 1 }],
    [10, 52.1, 13.3, { row: 337, col: 549 }],
    // a microdegree or so short of an edge stays on its own side
    [1, 0.5, -0.0001, { row: 0, col: 0 }],
    [1, 0.0001, 10, { row: 0, col: 1 }],
    [3, 0.5, -0.00002, { row: 3, col: 3 }],
    [3, 0.5, -0.000001, { row: 3, col: 3 }],
    [3, 0.5, 0, { row: 3, col: 4 }],
  ])("zoom %i, (%d, %d) -> %o", (zoom, lat, lon, expected) => {
    expect(latLonToTile(lat, lon, zoom)).toEqual(expected);
  });

  it("rejects unsupported zoom levels", () => {
    expect(() => latLonToTile(0, 0, 23)).toThrow(expect.objectContaining({ kind: "InvalidZoom" }));
    expect(() => latLonToTile(0, 0, -1)).toThrow(expect.objectContaining({ kind: "InvalidZoom" }));
    expect(() => latLonToTile(0, 0, 1.5)).toThrow(expect.objectContaining({ kind: "InvalidZoom" }));
  });
});

describe("tileToLatLon", () => {
  it("returns the north-west corner", () => {
    const corner = tileToLatLon(0, 0, 0);
    expect(corner.lon).toBe(-180);
    expect(corner.lat).toBeCloseTo(LATITUDE_MAX, 9);
    expect(tileToLatLon(1, 1, 1)).toEqual({ lat: 0, lon: 0 });
  });

  it("maps back to the same tile", () => {
    for (const zoom of [0, 1, 5, 10, 16, 22]) {
      const n = 2 ** zoom;
      for (const row of [0, Math.floor(n / 3), Math.floor(n / 2), n - 1]) {
        for (const col of [0, Math.floor(n / 7), n - 1]) {
          const { lat, lon } = tileToLatLon(row, col, zoom);
          expect(latLonToTile(lat, lon, zoom)).toEqual({ row, col });
        }
      }
    }
  });

  it("rejects unsupported zoom levels", () => {
    expect(() => tileToLatLon(0, 0, 30)).toThrow(expect.objectContaining({ kind: "InvalidZoom" }));
  });
});

describe("tileOrigin", () => {
  it("quantizes the corner to microdegrees", () => {
    expect(tileOrigin(1, 1, 1)).toEqual({ latQ: 0, lonQ: 0 });
    expect(tileOrigin(0, 3, 2)).toEqual({ latQ: quantize(LATITUDE_MAX), lonQ: 90_000_000 });
  });
});

describe("tileRangeForBoundingBox", () => {
  it("excludes tiles a corner only touches", () => {
    expect(tileRangeForBoundingBox(bbox(-50, -90, 50, 90), 2)).toEqual({
      zoom: 2,
      minRow: 1,
      minCol: 1,
      maxRow: 2,
      maxCol: 2,
    });
  });

  it("covers a box spanning several rows", () => {
    expect(tileRangeForBoundingBox(bbox(-50, -100, 80, 90), 2)).toEqual({
      zoom: 2,
      minRow: 0,
      minCol: 0,
      maxRow: 2,
      maxCol: 2,
    });
  });

  it("covers the whole world at zoom 1", () => {
    expect(tileRangeForBoundingBox(bbox(-85.0511, -180, 85.0511, 180), 1)).toEqual({
      zoom: 1,
      minRow: 0,
      minCol: 0,
      maxRow: 1,
      maxCol: 1,
    });
  });

  it("keeps a column the box reaches into by a few microdegrees", () => {
    expect(tileRangeForBoundingBox(bbox(1, -0.0001, 2, 10), 1)).toEqual({
      zoom: 1,
      minRow: 0,
      minCol: 0,
      maxRow: 0,
      maxCol: 1,
    });
  });

  it("covers a city-sized box at zoom 10", () => {
    expect(tileRangeForBoundingBox(bbox(52.0, 13.2, 52.3, 13.6), 10)).toEqual({
      zoom: 10,
      minRow: 336,
      minCol: 549,
      maxRow: 338,
      maxCol: 550,
    });
  });
});
