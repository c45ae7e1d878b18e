/**
 * Read-only access to a Mapsforge .map file.
 *
 * - Parses the header and every zoom interval's tile index once, at open
 * - Serves the features of any tile z/x/y with one positioned read per block
 * - Never mutates header or indexes, so concurrent featuresForTile calls are safe
 *
 * Typical usage:
 *
 * import { MapReader } from "./map-reader";
 *
 * const map = await MapReader.open("berlin.map");
 * const { row, col } = latLonToTile(52.52, 13.405, 14);
 * for (const f of await map.featuresForTile(14, col, row)) {
 *   if (f.kind === "way") drawPath(f.subPaths, f.isArea);
 * }
 * await map.close();
 */

import { FileByteSource, MemoryByteSource, type ByteSource } from "./byte-source";
import { assertZoom, tileRangeForBoundingBox, tilesPerAxis, type TilePosition, type TileRange } from "./coordinates";
import { MapsforgeError } from "./errors";
import { readFileHeader, type FileHeader, type ZoomInterval } from "./header";
import { decodeTileBlock, type Feature } from "./tile-decoder";
import { TileIndex } from "./tile-index";

export type TileRequestOptions = {
  /** Checked before each block read; an aborted request rejects with the signal's reason. */
  signal?: AbortSignal;
};

export class MapReader {
  readonly header: FileHeader;
  private readonly source: ByteSource;
  // Parallel to header.zoomIntervals
  private readonly indexes: readonly TileIndex[];

  private constructor(header: FileHeader, source: ByteSource, indexes: TileIndex[]) {
    this.header = header;
    this.source = source;
    this.indexes = indexes;
  }

  /** Open a map file by path. On any failure the file is closed again and nothing is returned. */
  static async open(filePath: string): Promise<MapReader> {
    const source = await FileByteSource.open(filePath);
    try {
      return await MapReader.fromSource(source);
    } catch (err) {
      await source.close();
      throw err;
    }
  }

  static async fromBytes(bytes: Uint8Array | ArrayBuffer): Promise<MapReader> {
    return MapReader.fromSource(new MemoryByteSource(bytes));
  }

  static async fromSource(source: ByteSource): Promise<MapReader> {
    const header = await readFileHeader(source);
    const indexes: TileIndex[] = [];
    for (const interval of header.zoomIntervals) {
      const bytes = await source.read(interval.subfileStart, TileIndex.byteLength(interval, header.debug));
      indexes.push(TileIndex.fromBytes(bytes, interval, header.debug));
    }
    return new MapReader(header, source, indexes);
  }

  zoomIntervalFor(zoom: number): ZoomInterval {
    return this.header.zoomIntervals[this.intervalPosition(zoom)];
  }

  tileIndexFor(zoom: number): TileIndex {
    return this.indexes[this.intervalPosition(zoom)];
  }

  /** Tiles at `zoom` that intersect the map's bounding box. */
  tileRange(zoom: number): TileRange {
    return tileRangeForBoundingBox(this.header.boundingBox, zoom);
  }

  /**
   * Features stored for tile z/x/y (x = column, y = row).
   *
   * Above the interval's base zoom the covering base tile is returned whole; below it,
   * every base tile underneath is decoded and the results concatenated row by row.
   * Tiles outside the map's bounding box have no data and yield [].
   */
  async featuresForTile(zoom: number, x: number, y: number, options: TileRequestOptions = {}): Promise<Feature[]> {
    const { index, tiles } = this.baseTiles(zoom, x, y);
    const features: Feature[] = [];
    for (const { row, col } of tiles) {
      options.signal?.throwIfAborted();
      for (const f of await this.readBlock(index, row, col)) features.push(f);
    }
    return features;
  }

  /**
   * True when tile z/x/y is all sea: every base tile under it that the map stores is
   * flagged as water in the index. Tiles outside the bounding box are not water.
   */
  isWaterTile(zoom: number, x: number, y: number): boolean {
    const { index, tiles } = this.baseTiles(zoom, x, y);
    const { minRow, minCol } = index.interval.tileRange;
    return tiles.length > 0 && tiles.every(({ row, col }) => index.entry(row - minRow, col - minCol).isWater);
  }

  async close(): Promise<void> {
    await this.source.close();
  }

  // Base-zoom tiles under z/x/y, clipped to the index grid, in row-major order.
  private baseTiles(zoom: number, x: number, y: number): { index: TileIndex; tiles: TilePosition[] } {
    const n = tilesPerAxis(zoom);
    if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= n || y >= n) {
      throw new MapsforgeError("TileOutOfRange", `tile ${zoom}/${x}/${y} outside the ${n}x${n} grid`);
    }
    const index = this.indexes[this.intervalPosition(zoom)];
    const { baseZoom, tileRange } = index.interval;

    let firstRow: number, lastRow: number, firstCol: number, lastCol: number;
    if (zoom >= baseZoom) {
      const scale = 2 ** (zoom - baseZoom);
      firstRow = lastRow = Math.floor(y / scale);
      firstCol = lastCol = Math.floor(x / scale);
    } else {
      const scale = 2 ** (baseZoom - zoom);
      firstRow = y * scale;
      lastRow = firstRow + scale - 1;
      firstCol = x * scale;
      lastCol = firstCol + scale - 1;
    }
    firstRow = Math.max(firstRow, tileRange.minRow);
    lastRow = Math.min(lastRow, tileRange.maxRow);
    firstCol = Math.max(firstCol, tileRange.minCol);
    lastCol = Math.min(lastCol, tileRange.maxCol);

    const tiles: TilePosition[] = [];
    for (let row = firstRow; row <= lastRow; row++) {
      for (let col = firstCol; col <= lastCol; col++) tiles.push({ row, col });
    }
    return { index, tiles };
  }

  private async readBlock(index: TileIndex, row: number, col: number): Promise<Feature[]> {
    const { baseZoom, tileRange } = index.interval;
    const { start, end } = index.blockRange(row - tileRange.minRow, col - tileRange.minCol);
    // A short read (file cut off) surfaces as TruncatedTileBlock from the decoder.
    const bytes = await this.source.read(start, end - start);
    return decodeTileBlock(bytes, 0, end - start, this.header, { zoom: baseZoom, row, col });
  }

  private intervalPosition(zoom: number): number {
    assertZoom(zoom);
    const i = this.header.zoomIntervals.findIndex((z) => z.minZoom <= zoom && zoom <= z.maxZoom);
    if (i < 0) {
      const zs = this.header.zoomIntervals;
      throw new MapsforgeError(
        "NoCoverage",
        `zoom ${zoom} outside the map's zoom range ${zs[0].minZoom}..${zs[zs.length - 1].maxZoom}`,
      );
    }
    return i;
  }
}
