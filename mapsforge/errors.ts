// errors.ts
//
// Every failure raised by the reader is a MapsforgeError; `kind` tells them apart.
// Open-time kinds (UnsupportedFormat, CorruptHeader) mean no reader exists.
// Tile-time kinds only fail the request that raised them.

export type MapsforgeErrorKind =
  | "UnsupportedFormat"
  | "CorruptHeader"
  | "TruncatedData"
  | "MalformedData"
  | "TruncatedTileBlock"
  | "CorruptTileBlock"
  | "TileOutOfRange"
  | "NoCoverage"
  | "InvalidZoom";

export class MapsforgeError extends Error {
  readonly kind: MapsforgeErrorKind;

  constructor(kind: MapsforgeErrorKind, message: string, options?: { cause?: unknown }) {
    super(`mapsforge: ${message}`, options);
    this.name = "MapsforgeError";
    this.kind = kind;
  }
}

export function isMapsforgeError(err: unknown, ...kinds: MapsforgeErrorKind[]): err is MapsforgeError {
  if (!(err instanceof MapsforgeError)) return false;
  return kinds.length === 0 || kinds.includes(err.kind);
}

/**
 * Rethrow low-level read failures (TruncatedData, MalformedData) as the kind that
 * names the structure being read. Anything else passes through untouched.
 */
export function rethrowAs(
  err: unknown,
  mapping: Partial<Record<MapsforgeErrorKind, MapsforgeErrorKind>>,
  context: string,
): never {
  if (err instanceof MapsforgeError) {
    const kind = mapping[err.kind];
    if (kind) throw new MapsforgeError(kind, `${context}: ${err.message.replace(/^mapsforge: /, "")}`, { cause: err });
  }
  throw err;
}
