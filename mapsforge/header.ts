// header.ts
//
// Mapsforge file header: magic, fixed-width fields, optional fields selected by a
// flag byte, the POI and way tag tables, and the zoom-interval table.
// The parse is all-or-nothing: a header either validates completely or throws.

import { ByteCursor } from "./byte-cursor";
import type { ByteSource } from "./byte-source";
import {
  MAX_ZOOM,
  rangeHeight,
  rangeWidth,
  tileRangeForBoundingBox,
  type BoundingBox,
  type QuantizedLatLon,
  type TileRange,
} from "./coordinates";
import { MapsforgeError, rethrowAs } from "./errors";
import { TileIndex } from "./tile-index";

export const MAGIC = "mapsforge binary OSM";
// magic + u32 header size
export const HEADER_PREFIX_SIZE = MAGIC.length + 4;
export const SUPPORTED_VERSIONS: readonly number[] = [3, 4, 5];
export const SUPPORTED_PROJECTION = "Mercator";

const FLAG_DEBUG = 0x80;
const FLAG_START_POSITION = 0x40;
const FLAG_START_ZOOM = 0x20;
const FLAG_LANGUAGES = 0x10;
const FLAG_COMMENT = 0x08;
const FLAG_CREATED_BY = 0x04;

export type TagValueType = "byte" | "short" | "int" | "float" | "string";

const PLACEHOLDERS: Record<string, TagValueType> = {
  "%b": "byte",
  "%h": "short",
  "%i": "int",
  "%f": "float",
  "%s": "string",
};

/**
 * One entry of a tag table. `valueType` is set when the table only names the key
 * and each feature stores its own value ("ele=%i").
 */
export interface TagDescriptor {
  readonly key: string;
  readonly value: string;
  readonly valueType: TagValueType | null;
}

export interface ZoomInterval {
  readonly baseZoom: number;
  readonly minZoom: number;
  readonly maxZoom: number;
  readonly subfileStart: number;
  readonly subfileLength: number;
  /** Tiles of the bounding box at baseZoom; the tile index covers exactly these. */
  readonly tileRange: TileRange;
  readonly entryCount: number;
}

export interface FileHeader {
  readonly version: number;
  readonly headerSize: number;
  readonly fileSize: number;
  readonly creationDate: number; // ms since epoch
  readonly boundingBox: BoundingBox;
  readonly tileSize: number;
  readonly projection: string;
  readonly debug: boolean;
  readonly startPosition?: QuantizedLatLon;
  readonly startZoom?: number;
  readonly preferredLanguages?: string;
  readonly comment?: string;
  readonly createdBy?: string;
  readonly poiTags: readonly TagDescriptor[];
  readonly wayTags: readonly TagDescriptor[];
  /** Sorted by baseZoom; together they partition [zoomIntervals[0].minZoom, last.maxZoom]. */
  readonly zoomIntervals: readonly ZoomInterval[];
}

/** Bytes the full header occupies (prefix included), from its first 24 bytes. */
export function readHeaderLength(prefix: Uint8Array): number {
  if (prefix.length < MAGIC.length || String.fromCharCode(...prefix.subarray(0, MAGIC.length)) !== MAGIC) {
    throw new MapsforgeError("UnsupportedFormat", "bad magic");
  }
  try {
    const cur = new ByteCursor(prefix);
    cur.skip(MAGIC.length);
    return HEADER_PREFIX_SIZE + cur.readUint32();
  } catch (err) {
    rethrowAs(err, { TruncatedData: "CorruptHeader" }, "header size");
  }
}

/** Reads and parses the header from a source. A bad magic stops after the first read. */
export async function readFileHeader(source: ByteSource): Promise<FileHeader> {
  const prefix = await source.read(0, HEADER_PREFIX_SIZE);
  const length = readHeaderLength(prefix);
  if (length > source.size) {
    throw new MapsforgeError("CorruptHeader", `header of ${length} bytes exceeds file of ${source.size} bytes`);
  }
  return parseFileHeader(await source.read(0, length));
}

export function parseFileHeader(bytes: Uint8Array): FileHeader {
  const end = readHeaderLength(bytes);
  if (end > bytes.length) {
    throw new MapsforgeError("CorruptHeader", `header declares ${end} bytes, only ${bytes.length} available`);
  }
  const cur = new ByteCursor(bytes, HEADER_PREFIX_SIZE, end);

  let header: FileHeader;
  try {
    header = readFields(cur, end);
  } catch (err) {
    rethrowAs(err, { TruncatedData: "CorruptHeader", MalformedData: "CorruptHeader" }, "file header");
  }
  if (cur.remaining !== 0) {
    throw new MapsforgeError("CorruptHeader", `header size mismatch: ${cur.remaining} unread bytes`);
  }
  return header;
}

function readFields(cur: ByteCursor, headerEnd: number): FileHeader {
  const version = cur.readUint32();
  if (!SUPPORTED_VERSIONS.includes(version)) {
    throw new MapsforgeError("UnsupportedFormat", `unsupported file version ${version}`);
  }
  const fileSize = cur.readUint64();
  const creationDate = cur.readUint64();

  const boundingBox: BoundingBox = {
    minLatQ: cur.readInt32(),
    minLonQ: cur.readInt32(),
    maxLatQ: cur.readInt32(),
    maxLonQ: cur.readInt32(),
  };
  validateBoundingBox(boundingBox);

  const tileSize = cur.readUint16();
  if (tileSize === 0) throw new MapsforgeError("CorruptHeader", "tile size is 0");

  const projection = cur.readString();
  if (projection !== SUPPORTED_PROJECTION) {
    throw new MapsforgeError("UnsupportedFormat", `unsupported projection "${projection}"`);
  }

  const flags = cur.readUint8();
  const startPosition =
    flags & FLAG_START_POSITION ? { latQ: cur.readInt32(), lonQ: cur.readInt32() } : undefined;
  const startZoom = flags & FLAG_START_ZOOM ? cur.readUint8() : undefined;
  const preferredLanguages = flags & FLAG_LANGUAGES ? cur.readString() : undefined;
  const comment = flags & FLAG_COMMENT ? cur.readString() : undefined;
  const createdBy = flags & FLAG_CREATED_BY ? cur.readString() : undefined;

  const poiTags = readTagTable(cur, "POI");
  const wayTags = readTagTable(cur, "way");

  const intervalCount = cur.readUint8();
  if (intervalCount === 0) throw new MapsforgeError("CorruptHeader", "no zoom intervals");
  const raw: RawInterval[] = [];
  for (let i = 0; i < intervalCount; i++) {
    raw.push({
      baseZoom: cur.readUint8(),
      minZoom: cur.readUint8(),
      maxZoom: cur.readUint8(),
      subfileStart: cur.readUint64(),
      subfileLength: cur.readUint64(),
    });
  }

  const debug = (flags & FLAG_DEBUG) !== 0;
  const zoomIntervals = validateZoomIntervals(raw, headerEnd, fileSize).map((r) => {
    const tileRange = tileRangeForBoundingBox(boundingBox, r.baseZoom);
    const interval: ZoomInterval = { ...r, tileRange, entryCount: rangeWidth(tileRange) * rangeHeight(tileRange) };
    const indexLength = TileIndex.byteLength(interval, debug);
    if (indexLength > r.subfileLength) {
      throw new MapsforgeError(
        "CorruptHeader",
        `zoom interval ${r.baseZoom}: tile index of ${interval.entryCount} entries (${indexLength} bytes) ` +
          `exceeds its subfile of ${r.subfileLength} bytes`,
      );
    }
    return interval;
  });

  return {
    version,
    headerSize: headerEnd - HEADER_PREFIX_SIZE,
    fileSize,
    creationDate,
    boundingBox,
    tileSize,
    projection,
    debug,
    startPosition,
    startZoom,
    preferredLanguages,
    comment,
    createdBy,
    poiTags,
    wayTags,
    zoomIntervals,
  };
}

function validateBoundingBox(b: BoundingBox): void {
  const inRange =
    b.minLatQ >= -90_000_000 && b.maxLatQ <= 90_000_000 &&
    b.minLonQ >= -180_000_000 && b.maxLonQ <= 180_000_000;
  if (!inRange || b.minLatQ > b.maxLatQ || b.minLonQ > b.maxLonQ) {
    throw new MapsforgeError(
      "CorruptHeader",
      `invalid bounding box ${b.minLatQ},${b.minLonQ},${b.maxLatQ},${b.maxLonQ}`,
    );
  }
}

function readTagTable(cur: ByteCursor, table: string): TagDescriptor[] {
  const count = cur.readUint16();
  const tags: TagDescriptor[] = [];
  for (let i = 0; i < count; i++) tags.push(parseTagDescriptor(cur.readString(), table, i));
  return tags;
}

export function parseTagDescriptor(entry: string, table = "tag", id = 0): TagDescriptor {
  const eq = entry.indexOf("=");
  if (eq < 0) throw new MapsforgeError("CorruptHeader", `${table} tag ${id} "${entry}" has no "="`);
  const key = entry.slice(0, eq);
  const value = entry.slice(eq + 1);
  if (value.length === 2 && value[0] === "%") {
    const valueType = PLACEHOLDERS[value];
    if (!valueType) throw new MapsforgeError("CorruptHeader", `${table} tag ${id} has unknown placeholder ${value}`);
    return { key, value, valueType };
  }
  return { key, value, valueType: null };
}

type RawInterval = Omit<ZoomInterval, "tileRange" | "entryCount">;

function validateZoomIntervals(raw: RawInterval[], headerEnd: number, fileSize: number): RawInterval[] {
  for (const z of raw) {
    if (!(z.minZoom <= z.baseZoom && z.baseZoom <= z.maxZoom && z.maxZoom <= MAX_ZOOM)) {
      throw new MapsforgeError(
        "CorruptHeader",
        `zoom interval base=${z.baseZoom} min=${z.minZoom} max=${z.maxZoom} is inconsistent`,
      );
    }
    if (z.subfileStart < headerEnd || z.subfileStart + z.subfileLength > fileSize) {
      throw new MapsforgeError(
        "CorruptHeader",
        `subfile [${z.subfileStart}, ${z.subfileStart + z.subfileLength}) outside [${headerEnd}, ${fileSize})`,
      );
    }
  }

  const sorted = raw.slice().sort((a, b) => a.baseZoom - b.baseZoom);
  for (let i = 1; i < sorted.length; i++) {
    const prev = sorted[i - 1];
    const next = sorted[i];
    if (next.minZoom <= prev.maxZoom) {
      throw new MapsforgeError(
        "CorruptHeader",
        `zoom intervals ${prev.minZoom}-${prev.maxZoom} and ${next.minZoom}-${next.maxZoom} overlap`,
      );
    }
    if (next.minZoom !== prev.maxZoom + 1) {
      throw new MapsforgeError("CorruptHeader", `zoom levels ${prev.maxZoom + 1}-${next.minZoom - 1} have no interval`);
    }
  }

  const byStart = raw.slice().sort((a, b) => a.subfileStart - b.subfileStart);
  for (let i = 1; i < byStart.length; i++) {
    const prev = byStart[i - 1];
    if (prev.subfileStart + prev.subfileLength > byStart[i].subfileStart) {
      throw new MapsforgeError("CorruptHeader", `subfiles at ${prev.subfileStart} and ${byStart[i].subfileStart} overlap`);
    }
  }
  return sorted;
}
