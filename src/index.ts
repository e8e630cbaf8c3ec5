/**
 * @module mbtiles-raster
 *
 * Public API surface for the mbtiles-raster library.
 *
 * mbtiles-raster presents a raster MBTiles database as a slippy map: a
 * geographic extent, a clamped range of discrete zoom levels, conversions
 * between geographic, Web-Mercator and pixel coordinates, and a synchronous
 * draw loop that resolves visible tiles through a cache and hands them to a
 * painter.
 *
 * ---
 *
 * ### Collaborators
 *
 * The map core talks to four interfaces, each with a bundled implementation:
 *
 * | Interface | Bundled | Role |
 * |-----------|---------|------|
 * | {@link TileStore} | {@link MBTilesStore} | Schema check, zoom range, extents, tile bytes |
 * | {@link TileCache} | {@link LruTileCache} | Decoded tiles by key, shareable between maps |
 * | {@link ImageDecoder} | {@link RasterDecoder} | PNG/JPEG bytes to RGBA bitmaps |
 * | {@link Painter} | {@link RecordingPainter} | Receives draw commands |
 *
 * ---
 *
 * ### Lower-level modules
 *
 * Projection math ({@link geoToProjected}, {@link scaleForZoom}, ...) and
 * tile addressing ({@link tileIndexFromProjected}, {@link flipRow}, ...) are
 * re-exported for consumers that need them without a map.
 */

// ─── Map ────────────────────────────────────────────────────────────────────

export { TileMap } from './map.js';
export { openMBTiles } from './open.js';
export { InvalidMapError } from './errors.js';
export { resolveSettings, DEFAULT_MAP_SETTINGS } from './options.js';
export { createLogger, LOG_LEVEL_ENV } from './logger.js';

// ─── Collaborators ──────────────────────────────────────────────────────────

export { MBTilesStore } from './stores/mbtiles.js';
export { LruTileCache } from './cache.js';
export { RasterDecoder, sniffFormat } from './decoder.js';
export { RecordingPainter } from './painter.js';

// ─── Math ───────────────────────────────────────────────────────────────────

export {
  EARTH_RADIUS,
  MAX_LATITUDE,
  TILE_SIZE,
  WORLD_SIZE,
  clampLatitude,
  geoToProjected,
  groundFactor,
  projectedToGeo,
  scaleForZoom,
  zoomForScale,
} from './geometry/project.js';
export {
  flipRow,
  projectedFromTileOrigin,
  safeTileIndex,
  tileCount,
  tileIndexFromProjected,
  tileKey,
} from './tiles.js';
export { clampGeoRect, deriveGeoRect, isValidGeoRect } from './bounds.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export type { TileStore } from './stores/store.js';
export type { MBTilesStoreOptions } from './stores/mbtiles.js';
export type { TileCache, LruTileCacheOptions } from './cache.js';
export type { ImageDecoder, RasterDecoderOptions, RasterFormat } from './decoder.js';
export type { Painter } from './painter.js';
export type { MapSettings, TileMapOptions } from './options.js';
export type { OpenMBTilesOptions } from './open.js';
export type { LevelWithSilent, Logger } from './logger.js';
export type {
  DrawCommand,
  GeoPoint,
  GeoRect,
  PixelPoint,
  PixelRect,
  ProjectedPoint,
  RasterImage,
  Size,
  TileExtents,
  TileIndex,
  TilePlacement,
  ZoomRange,
} from './types.js';
