#!/usr/bin/env node
// mapsforge-cli.ts
//
// Inspect Mapsforge .map files from the command line.
// - info: header summary (bounds, zoom intervals, tag tables)
// - tile: features of one tile as JSON
//
// Usage:
//   tsx mapsforge-cli.ts info berlin.map
//   tsx mapsforge-cli.ts tile berlin.map 14 8802 5373

import { dequantize } from "./coordinates";
import { isMapsforgeError } from "./errors";
import type { FileHeader } from "./header";
import { MapReader } from "./map-reader";

export type Command =
  | { kind: "info"; file: string }
  | { kind: "tile"; file: string; zoom: number; x: number; y: number };

function usage(): never {
  console.log(`Usage:
  mapsforge-dump info <file.map>
  mapsforge-dump tile <file.map> <z> <x> <y>

Description:
  info   Print the file header: version, bounds, start position, zoom intervals
         and tag table sizes.
  tile   Decode tile z/x/y (x = column, y = row) and print its features as JSON.

Exit status:
  1  bad arguments
  2  the file could not be read or the tile could not be decoded
`);
  process.exit(1);
}

function parseTileNumber(raw: string | undefined): number | null {
  return raw !== undefined && /^\d+$/.test(raw) ? Number(raw) : null;
}

/** Null when the arguments do not form a command. */
export function parseArgs(argv: string[]): Command | null {
  const args = argv.slice(2);
  const [cmd, file] = args;
  if (!file) return null;

  if (cmd === "info" && args.length === 2) return { kind: "info", file };
  if (cmd === "tile" && args.length === 5) {
    const zoom = parseTileNumber(args[2]);
    const x = parseTileNumber(args[3]);
    const y = parseTileNumber(args[4]);
    if (zoom === null || x === null || y === null) return null;
    return { kind: "tile", file, zoom, x, y };
  }
  return null;
}

export function describeHeader(h: FileHeader): string[] {
  const b = h.boundingBox;
  const lines = [
    `[mapsforge] version=${h.version}, tile_size=${h.tileSize}, projection=${h.projection}, debug=${h.debug}`,
    `[mapsforge] bounds=${dequantize(b.minLatQ)},${dequantize(b.minLonQ)},${dequantize(b.maxLatQ)},${dequantize(b.maxLonQ)}`,
    `[mapsforge] created=${new Date(h.creationDate).toISOString()}, file_size=${h.fileSize}`,
  ];
  if (h.startPosition) {
    lines.push(
      `[mapsforge] start=${dequantize(h.startPosition.latQ)},${dequantize(h.startPosition.lonQ)}` +
        (h.startZoom !== undefined ? ` @ z${h.startZoom}` : ""),
    );
  }
  if (h.comment !== undefined) lines.push(`[mapsforge] comment=${h.comment}`);
  if (h.createdBy !== undefined) lines.push(`[mapsforge] created_by=${h.createdBy}`);
  lines.push(`[mapsforge] poi_tags=${h.poiTags.length}, way_tags=${h.wayTags.length}`);
  for (const z of h.zoomIntervals) {
    const r = z.tileRange;
    lines.push(
      `[mapsforge] zoom ${z.minZoom}-${z.maxZoom} base=${z.baseZoom}: ` +
        `subfile ${z.subfileStart}+${z.subfileLength}, tiles rows ${r.minRow}-${r.maxRow} cols ${r.minCol}-${r.maxCol}`,
    );
  }
  return lines;
}

async function main() {
  const command = parseArgs(process.argv);
  if (!command) usage();

  const t0 = Date.now();
  const map = await MapReader.open(command.file);
  try {
    if (command.kind === "info") {
      for (const line of describeHeader(map.header)) console.log(line);
    } else {
      const features = await map.featuresForTile(command.zoom, command.x, command.y);
      console.log(JSON.stringify(features, null, 2));
      const pois = features.filter((f) => f.kind === "poi").length;
      console.error(
        `[mapsforge] tile ${command.zoom}/${command.x}/${command.y}: ${pois} POIs, ` +
          `${features.length - pois} ways, water=${map.isWaterTile(command.zoom, command.x, command.y)} ` +
          `in ${Date.now() - t0} ms`,
      );
    }
  } finally {
    await map.close();
  }
}

if (require.main === module) {
  main().catch((err: unknown) => {
    if (isMapsforgeError(err)) {
      console.error(`${err.kind}: ${err.message}`);
    } else {
      console.error("Failed:", err);
    }
    process.exit(2);
  });
}
