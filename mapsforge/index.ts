export { MapReader, type TileRequestOptions } from "./map-reader";
export { MapsforgeError, isMapsforgeError, type MapsforgeErrorKind } from "./errors";
export {
  parseFileHeader,
  readFileHeader,
  MAGIC,
  SUPPORTED_VERSIONS,
  type FileHeader,
  type TagDescriptor,
  type TagValueType,
  type ZoomInterval,
} from "./header";
export { TileIndex, type TileIndexEntry } from "./tile-index";
export {
  decodeTileBlock,
  type BlockTile,
  type Feature,
  type FeatureProperties,
  type PointOfInterest,
  type Way,
} from "./tile-decoder";
export {
  latLonToTile,
  tileToLatLon,
  tileOrigin,
  tileRangeForBoundingBox,
  quantize,
  dequantize,
  MIN_ZOOM,
  MAX_ZOOM,
  type BoundingBox,
  type LatLon,
  type QuantizedLatLon,
  type TilePosition,
  type TileRange,
} from "./coordinates";
export { readUnsignedVarint, readSignedVarint, type VarintResult } from "./varint";
export { FileByteSource, MemoryByteSource, type ByteSource } from "./byte-source";
