// tile-decoder.ts
//
// Decodes one tile block into features.
//
// Block:   [debug sig 32B] poiCount:uvarint POI* wayCount:uvarint Way*
// POI:     [debug sig 32B] dLat:svarint dLon:svarint layer:u8 tagCount:uvarint tagId:uvarint*
//          tagValue* flags:u8 [name] [houseNumber] [elevation:svarint]
// Way:     [debug sig 32B] dLat dLon layer:u8 tagCount tagId* tagValue* flags:u8
//          [name] [houseNumber] [reference] [labelLat labelLon] [elevation]
//          [subPathCount:uvarint] ([dLat dLon] pointCount:uvarint delta*)+
//
// The leading delta of a record is relative to the tile's top-left origin. For ways it
// is the first point of the first sub-path; later sub-paths open with their own
// origin-relative delta, ahead of their point count. Other points are deltas from
// the previous point (or, with double-delta encoding, from the previous step).

import { ByteCursor } from "./byte-cursor";
import { dequantize, tileOrigin, type LatLon, type QuantizedLatLon } from "./coordinates";
import { MapsforgeError, rethrowAs } from "./errors";
import type { FileHeader, TagDescriptor } from "./header";

export const TILE_SIGNATURE = "###TileStart";
export const POI_SIGNATURE = "***POIStart";
export const WAY_SIGNATURE = "---WayStart";
export const SIGNATURE_SIZE = 32;

export const MIN_LAYER = 0;
export const MAX_LAYER = 10;

const POI_NAME = 0x80;
const POI_HOUSE_NUMBER = 0x40;
const POI_ELEVATION = 0x20;

const WAY_NAME = 0x80;
const WAY_HOUSE_NUMBER = 0x40;
const WAY_REFERENCE = 0x20;
const WAY_LABEL_POSITION = 0x10;
const WAY_SUBPATH_COUNT = 0x08;
const WAY_DOUBLE_DELTA = 0x04;
const WAY_AREA = 0x02;
const WAY_ELEVATION = 0x01;

/** Fields shared by every feature. `layer` is 0..10, 5 being ground level. */
export interface FeatureProperties {
  layer: number;
  /** Resolved "key=value" strings in record order. */
  tags: string[];
  name?: string;
  houseNumber?: string;
  elevation?: number;
}

export interface PointOfInterest {
  kind: "poi";
  properties: FeatureProperties;
  position: LatLon;
}

export interface Way {
  kind: "way";
  properties: FeatureProperties;
  reference?: string;
  labelPosition?: LatLon;
  /** One or more polylines/rings; several for multipolygons and split lines. */
  subPaths: LatLon[][];
  isArea: boolean;
}

export type Feature = PointOfInterest | Way;

/** The tile a block belongs to, at the zoom interval's base zoom. */
export type BlockTile = { zoom: number; row: number; col: number };

export function decodeTileBlock(
  bytes: Uint8Array,
  startOffset: number,
  endOffset: number,
  header: FileHeader,
  tile: BlockTile,
): Feature[] {
  const ctx = `tile ${tile.zoom}/${tile.col}/${tile.row}`;
  const end = Math.min(endOffset, bytes.length);
  if (startOffset < 0 || startOffset > end) {
    throw new MapsforgeError("TruncatedTileBlock", `${ctx}: block start ${startOffset} beyond data end ${end}`);
  }
  const cur = new ByteCursor(bytes, startOffset, end);
  try {
    return new BlockReader(cur, header, tileOrigin(tile.row, tile.col, tile.zoom), ctx).read();
  } catch (err) {
    rethrowAs(err, { TruncatedData: "TruncatedTileBlock", MalformedData: "CorruptTileBlock" }, ctx);
  }
}

class BlockReader {
  constructor(
    private readonly cur: ByteCursor,
    private readonly header: FileHeader,
    private readonly origin: QuantizedLatLon,
    private readonly ctx: string,
  ) {}

  read(): Feature[] {
    if (this.header.debug) this.signature(TILE_SIGNATURE);

    const features: Feature[] = [];
    const poiCount = this.cur.readUnsignedVarint();
    for (let i = 0; i < poiCount; i++) features.push(this.poi());
    const wayCount = this.cur.readUnsignedVarint();
    for (let i = 0; i < wayCount; i++) features.push(this.way());
    return features;
  }

  private poi(): PointOfInterest {
    if (this.header.debug) this.signature(POI_SIGNATURE);

    const latQ = this.origin.latQ + this.cur.readSignedVarint();
    const lonQ = this.origin.lonQ + this.cur.readSignedVarint();
    const layer = this.layer();
    const tags = this.tags(this.header.poiTags, "POI");
    const flags = this.cur.readUint8();

    const properties: FeatureProperties = { layer, tags };
    if (flags & POI_NAME) properties.name = this.cur.readString();
    if (flags & POI_HOUSE_NUMBER) properties.houseNumber = this.cur.readString();
    if (flags & POI_ELEVATION) properties.elevation = this.cur.readSignedVarint();

    return { kind: "poi", properties, position: toLatLon({ latQ, lonQ }) };
  }

  private way(): Way {
    if (this.header.debug) this.signature(WAY_SIGNATURE);

    const first: QuantizedLatLon = {
      latQ: this.origin.latQ + this.cur.readSignedVarint(),
      lonQ: this.origin.lonQ + this.cur.readSignedVarint(),
    };
    const layer = this.layer();
    const tags = this.tags(this.header.wayTags, "way");
    const flags = this.cur.readUint8();

    const properties: FeatureProperties = { layer, tags };
    if (flags & WAY_NAME) properties.name = this.cur.readString();
    if (flags & WAY_HOUSE_NUMBER) properties.houseNumber = this.cur.readString();
    const reference = flags & WAY_REFERENCE ? this.cur.readString() : undefined;
    let labelPosition: LatLon | undefined;
    if (flags & WAY_LABEL_POSITION) {
      const latQ = first.latQ + this.cur.readSignedVarint();
      const lonQ = first.lonQ + this.cur.readSignedVarint();
      labelPosition = toLatLon({ latQ, lonQ });
    }
    if (flags & WAY_ELEVATION) properties.elevation = this.cur.readSignedVarint();

    const subPathCount = flags & WAY_SUBPATH_COUNT ? this.cur.readUnsignedVarint() : 1;
    if (subPathCount === 0) throw new MapsforgeError("CorruptTileBlock", `${this.ctx}: way without sub-paths`);

    const doubleDelta = (flags & WAY_DOUBLE_DELTA) !== 0;
    const subPaths: LatLon[][] = [];
    for (let i = 0; i < subPathCount; i++) {
      const start: QuantizedLatLon = i === 0
        ? first
        : { latQ: this.origin.latQ + this.cur.readSignedVarint(), lonQ: this.origin.lonQ + this.cur.readSignedVarint() };
      subPaths.push(this.subPath(start, doubleDelta));
    }

    const way: Way = { kind: "way", properties, subPaths, isArea: (flags & WAY_AREA) !== 0 };
    if (reference !== undefined) way.reference = reference;
    if (labelPosition) way.labelPosition = labelPosition;
    return way;
  }

  private subPath(start: QuantizedLatLon, doubleDelta: boolean): LatLon[] {
    const pointCount = this.cur.readUnsignedVarint();
    if (pointCount === 0) throw new MapsforgeError("CorruptTileBlock", `${this.ctx}: empty sub-path`);

    const points: LatLon[] = [toLatLon(start)];
    let latQ = start.latQ;
    let lonQ = start.lonQ;
    let stepLat = 0;
    let stepLon = 0;
    for (let i = 1; i < pointCount; i++) {
      const dLat = this.cur.readSignedVarint();
      const dLon = this.cur.readSignedVarint();
      if (doubleDelta) {
        stepLat += dLat;
        stepLon += dLon;
      } else {
        stepLat = dLat;
        stepLon = dLon;
      }
      latQ += stepLat;
      lonQ += stepLon;
      points.push(toLatLon({ latQ, lonQ }));
    }
    return points;
  }

  private layer(): number {
    return Math.max(MIN_LAYER, Math.min(MAX_LAYER, this.cur.readUint8()));
  }

  private tags(table: readonly TagDescriptor[], tableName: string): string[] {
    const count = this.cur.readUnsignedVarint();
    const descriptors: TagDescriptor[] = [];
    for (let i = 0; i < count; i++) {
      const id = this.cur.readUnsignedVarint();
      if (id >= table.length) {
        throw new MapsforgeError(
          "CorruptHeader",
          `${this.ctx}: ${tableName} tag id ${id} out of range (table has ${table.length} entries)`,
        );
      }
      descriptors.push(table[id]);
    }
    return descriptors.map((d) => `${d.key}=${this.tagValue(d)}`);
  }

  private tagValue(d: TagDescriptor): string {
    switch (d.valueType) {
      case null:
        return d.value;
      case "byte":
        return String(this.cur.readInt8());
      case "short":
        return String(this.cur.readInt16());
      case "int":
        return String(this.cur.readInt32());
      case "float":
        return String(this.cur.readFloat32());
      case "string":
        return this.cur.readString();
    }
  }

  private signature(prefix: string): void {
    const at = this.cur.offset;
    const sig = this.cur.readAscii(SIGNATURE_SIZE);
    if (!sig.startsWith(prefix)) {
      throw new MapsforgeError("CorruptTileBlock", `${this.ctx}: expected ${prefix} signature at offset ${at}`);
    }
  }
}

function toLatLon(q: QuantizedLatLon): LatLon {
  return { lat: dequantize(q.latQ), lon: dequantize(q.lonQ) };
}
