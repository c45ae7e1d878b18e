// coordinates.ts
//
// Web Mercator tile pyramid helpers (2^zoom tiles per axis). Pure functions, no I/O.
// Geometry is accumulated in microdegrees ("Q" values, round(deg * 1e6)) and only
// turned back into degrees at the edge of the API.

import { MapsforgeError } from "./errors";

export const MIN_ZOOM = 0;
export const MAX_ZOOM = 22;
export const LATITUDE_MAX = 85.0511287798066;
export const LONGITUDE_MAX = 180;

export type LatLon = { lat: number; lon: number }; // degrees

export type QuantizedLatLon = { latQ: number; lonQ: number }; // microdegrees

export type TilePosition = { row: number; col: number };

export interface BoundingBox {
  minLatQ: number;
  minLonQ: number;
  maxLatQ: number;
  maxLonQ: number;
}

/** Inclusive range of tile rows and columns at one zoom level. */
export interface TileRange {
  zoom: number;
  minRow: number;
  minCol: number;
  maxRow: number;
  maxCol: number;
}

function clamp(v: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, v));
}

export function quantize(deg: number): number {
  return Math.round(deg * 1_000_000);
}

export function dequantize(q: number): number {
  return q / 1_000_000;
}

export function assertZoom(zoom: number): void {
  if (!Number.isInteger(zoom) || zoom < MIN_ZOOM || zoom > MAX_ZOOM) {
    throw new MapsforgeError("InvalidZoom", `zoom ${zoom} outside supported range ${MIN_ZOOM}..${MAX_ZOOM}`);
  }
}

export function tilesPerAxis(zoom: number): number {
  assertZoom(zoom);
  return 2 ** zoom;
}

/**
 * Tile holding a point. A point on a tile's top or left edge belongs to that tile:
 * when float error lands it in the tile before, it moves on only if it matches the
 * next tile's origin to the microdegree.
 */
export function latLonToTile(lat: number, lon: number, zoom: number): TilePosition {
  const n = tilesPerAxis(zoom);
  const latDeg = clamp(lat, -LATITUDE_MAX, LATITUDE_MAX);
  const lonDeg = clamp(lon, -LONGITUDE_MAX, LONGITUDE_MAX);
  const latRad = (latDeg * Math.PI) / 180;
  let col = Math.floor(((lonDeg + 180) / 360) * n);
  let row = Math.floor(((1 - Math.asinh(Math.tan(latRad)) / Math.PI) / 2) * n);

  const next = tileOrigin(row + 1, col + 1, zoom);
  if (next.latQ === quantize(latDeg)) row++;
  if (next.lonQ === quantize(lonDeg)) col++;
  return { row: clamp(row, 0, n - 1), col: clamp(col, 0, n - 1) };
}

/** Top-left (north-west) corner of a tile. Row/col equal to 2^zoom give the far edges. */
export function tileToLatLon(row: number, col: number, zoom: number): LatLon {
  const n = tilesPerAxis(zoom);
  const lon = (col / n) * 360 - 180;
  const lat = (Math.atan(Math.sinh(Math.PI * (1 - (2 * row) / n))) * 180) / Math.PI;
  return { lat, lon };
}

/** Tile origin in microdegrees; the anchor for first-point deltas in a tile block. */
export function tileOrigin(row: number, col: number, zoom: number): QuantizedLatLon {
  const { lat, lon } = tileToLatLon(row, col, zoom);
  return { latQ: quantize(lat), lonQ: quantize(lon) };
}

/**
 * Tiles at `zoom` touched by a bounding box. A bottom-right corner lying exactly on
 * a tile's top or left edge does not pull that tile in.
 */
export function tileRangeForBoundingBox(bbox: BoundingBox, zoom: number): TileRange {
  const topLeft = latLonToTile(dequantize(bbox.maxLatQ), dequantize(bbox.minLonQ), zoom);
  const bottomRight = latLonToTile(dequantize(bbox.minLatQ), dequantize(bbox.maxLonQ), zoom);

  let maxRow = bottomRight.row;
  let maxCol = bottomRight.col;
  const edge = tileOrigin(maxRow, maxCol, zoom);
  if (edge.latQ === bbox.minLatQ && maxRow > topLeft.row) maxRow--;
  if (edge.lonQ === bbox.maxLonQ && maxCol > topLeft.col) maxCol--;

  return { zoom, minRow: topLeft.row, minCol: topLeft.col, maxRow, maxCol };
}

export function rangeWidth(range: TileRange): number {
  return range.maxCol - range.minCol + 1;
}

export function rangeHeight(range: TileRange): number {
  return range.maxRow - range.minRow + 1;
}
