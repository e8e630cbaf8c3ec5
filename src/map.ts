/**
 * @module map
 *
 * Slippy-map view over a raster tile store.
 *
 * A {@link TileMap} binds one {@link TileStore} at construction, reads its
 * zoom range and geographic extent once, and from then on owns the view
 * state: the current zoom level and the device/tile pixel ratios. All
 * coordinate conversions are relative to that state.
 *
 * Pixel space is centered on (0°, 0°) with Y growing downward, so the
 * pixel bounds of a world map at zoom `z` run from `-2^z · tileSize / 2` to
 * `+2^z · tileSize / 2` on both axes, and tile edges fall on multiples of
 * {@link TileMap.tileSizeInPixels} offset from the world's west/north edge.
 *
 * Drawing is synchronous: every visible tile is resolved through the cache,
 * falling back to a store read and a decode on a miss, before `draw`
 * returns.
 */

import { basename } from 'node:path';
import type { Logger } from 'pino';
import type { TileStore } from './stores/store.js';
import type { TileCache } from './cache.js';
import type { ImageDecoder } from './decoder.js';
import type { Painter } from './painter.js';
import type {
  GeoPoint,
  GeoRect,
  PixelPoint,
  PixelRect,
  Size,
  TileIndex,
  TilePlacement,
  ZoomRange,
} from './types.js';
import { LruTileCache } from './cache.js';
import { InvalidMapError } from './errors.js';
import { createLogger } from './logger.js';
import { resolveSettings, type TileMapOptions } from './options.js';
import { deriveGeoRect, isValidGeoRect } from './bounds.js';
import {
  TILE_SIZE,
  geoToProjected,
  groundFactor,
  projectedToGeo,
  scaleForZoom,
  zoomForScale,
} from './geometry/project.js';
import { flipRow, safeTileIndex, tileCount, tileKey } from './tiles.js';

interface LoadedTileSet {
  zooms: ZoomRange;
  bounds: GeoRect;
}

// Grid slivers thinner than this fraction of a tile are not drawn
const GRID_EPSILON = 1e-9;

type LoadResult =
  | { valid: true; tileSet: LoadedTileSet }
  | { valid: false; error: string };

/**
 * Read zoom range and extent from a store.
 *
 * The store is closed again before returning; drawing reopens it on demand.
 */
function loadTileSet(store: TileStore): LoadResult {
  try {
    store.open();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { valid: false, error: `${store.id}: Error opening database file (${reason})` };
  }

  try {
    if (!store.validateSchema()) {
      return { valid: false, error: 'Invalid table format' };
    }

    const zooms = store.zoomRange();
    if (!zooms) {
      return { valid: false, error: 'Empty tile set' };
    }
    if (zooms.min < 0 || zooms.min > zooms.max) {
      return { valid: false, error: 'Invalid zoom levels' };
    }

    const extents = store.tileIndexExtentsAtZoom(zooms.min);
    if (!extents) {
      return { valid: false, error: 'Empty tile set' };
    }

    // Store rows count from the south edge: its max row is the northernmost
    const bounds = deriveGeoRect(zooms.min, {
      minColumn: extents.minColumn,
      minRow: flipRow(zooms.min, extents.maxRow),
      maxColumn: extents.maxColumn,
      maxRow: flipRow(zooms.min, extents.minRow),
    });

    return { valid: true, tileSet: { zooms, bounds } };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { valid: false, error: `${store.id}: ${reason}` };
  } finally {
    store.close();
  }
}

/**
 * Raster map view over a {@link TileStore}.
 *
 * Construction never throws for a broken database. Check
 * {@link TileMap.isValid} first: every operation other than `isValid`,
 * `errorString` and `name` throws {@link InvalidMapError} on an invalid map.
 *
 * @typeParam TImage - Decoded image type produced by the configured decoder.
 *
 * @example
 * ```typescript
 * const map = new TileMap(new MBTilesStore('./world.mbtiles'), {
 *   decoder: new RasterDecoder(),
 * });
 * if (!map.isValid) throw new Error(map.errorString);
 *
 * map.zoomFit({ width: 1024, height: 768 }, map.geoBounds);
 * const painter = new RecordingPainter<RasterImage>();
 * map.draw(painter, map.bounds());
 * ```
 */
export class TileMap<TImage> {
  readonly store: TileStore;
  private readonly decoder: ImageDecoder<TImage>;
  private readonly cache: TileCache<TImage>;
  private readonly log: Logger;
  private readonly tileSet: LoadedTileSet | undefined;
  private readonly error: string | undefined;
  private currentZoom = 0;
  private deviceRatio: number;
  private tileRatio: number;

  /**
   * Load a map from a tile store.
   *
   * @param store - Tile database. Owned by the map from here on.
   * @param options - Decoder (required), optional cache, logger and pixel
   *   ratios. See {@link TileMapOptions}.
   * @throws {RangeError} If a pixel ratio is not a positive number.
   */
  constructor(store: TileStore, options: TileMapOptions<TImage>) {
    const settings = resolveSettings(options);
    this.store = store;
    this.decoder = options.decoder;
    this.cache = options.cache ?? new LruTileCache<TImage>();
    this.log = (options.logger ?? createLogger(settings.logLevel)).child({ store: store.id });
    this.deviceRatio = positiveRatio(settings.deviceRatio);
    this.tileRatio = positiveRatio(settings.tileRatio);

    const result = loadTileSet(store);
    if (result.valid) {
      this.tileSet = result.tileSet;
      this.currentZoom = result.tileSet.zooms.max;
      this.log.debug({ zooms: result.tileSet.zooms, bounds: result.tileSet.bounds }, 'Tile set loaded');
    } else {
      this.error = result.error;
      this.log.warn({ error: result.error }, 'Tile set rejected');
    }
  }

  // ─── Validity ───────────────────────────────────────────────────────

  /** Whether the store passed every load check. */
  get isValid(): boolean {
    return this.tileSet !== undefined;
  }

  /** Reason the map is invalid, or an empty string. */
  get errorString(): string {
    return this.error ?? '';
  }

  /** Base file name of the store. */
  get name(): string {
    return basename(this.store.id);
  }

  // ─── Store lifecycle ────────────────────────────────────────────────

  /** Open the store handle ahead of drawing. */
  load(): void {
    this.loaded();
    this.store.open();
  }

  /** Release the store handle. Cached tiles stay in the cache. */
  unload(): void {
    this.loaded();
    this.store.close();
  }

  // ─── State ──────────────────────────────────────────────────────────

  /** Current zoom level. */
  get zoom(): number {
    this.loaded();
    return this.currentZoom;
  }

  /** Zoom levels present in the store. */
  get zoomRange(): ZoomRange {
    const { zooms } = this.loaded();
    return { min: zooms.min, max: zooms.max };
  }

  /** Geographic extent of the stored tiles. */
  get geoBounds(): GeoRect {
    const { bounds } = this.loaded();
    return {
      topLeft: { ...bounds.topLeft },
      bottomRight: { ...bounds.bottomRight },
    };
  }

  /**
   * Ratio between pixel-space units and tile pixels.
   *
   * On high-density displays (`deviceRatio > 1`) tiles are drawn at
   * `deviceRatio / tileRatio` density instead of fetching a finer zoom.
   */
  get coordinatesRatio(): number {
    this.loaded();
    return this.deviceRatio > 1 ? this.deviceRatio / this.tileRatio : 1;
  }

  /** Image-to-device pixel ratio attached to every draw command. */
  get imageRatio(): number {
    this.loaded();
    return this.deviceRatio > 1 ? this.deviceRatio : this.tileRatio;
  }

  /**
   * Set the device pixel ratio of the target display.
   *
   * @throws {RangeError} If `ratio` is not a positive number.
   */
  setDevicePixelRatio(ratio: number): void {
    this.loaded();
    this.deviceRatio = positiveRatio(ratio);
  }

  /**
   * Set the pixel ratio of the stored tiles (2 for "@2x" tile sets).
   *
   * @throws {RangeError} If `ratio` is not a positive number.
   */
  setTileRatio(ratio: number): void {
    this.loaded();
    this.tileRatio = positiveRatio(ratio);
  }

  // ─── Zoom ───────────────────────────────────────────────────────────

  /**
   * Clamp a zoom level to the store's zoom range.
   *
   * Fractional levels are rounded; `NaN` maps to the finest level.
   */
  limitZoom(zoom: number): number {
    const { zooms } = this.loaded();
    if (Number.isNaN(zoom)) return zooms.max;
    const z = Math.round(zoom);
    return z < zooms.min ? zooms.min : z > zooms.max ? zooms.max : z;
  }

  /** Set the current zoom, clamped. @returns The new zoom. */
  setZoom(zoom: number): number {
    this.currentZoom = this.limitZoom(zoom);
    return this.currentZoom;
  }

  /** Step one level finer, stopping at the maximum. @returns The new zoom. */
  zoomIn(): number {
    const { zooms } = this.loaded();
    this.currentZoom = Math.min(this.currentZoom + 1, zooms.max);
    return this.currentZoom;
  }

  /** Step one level coarser, stopping at the minimum. @returns The new zoom. */
  zoomOut(): number {
    const { zooms } = this.loaded();
    this.currentZoom = Math.max(this.currentZoom - 1, zooms.min);
    return this.currentZoom;
  }

  /**
   * Pick the finest zoom at which `rect` fits into a viewport.
   *
   * The fit scale is the tighter of the horizontal and vertical ratios;
   * projected Y grows northward, so the vertical ratio is negated.
   * Without a valid `rect` the map goes to its finest level.
   *
   * @returns The new zoom.
   */
  zoomFit(size: Size, rect?: GeoRect): number {
    const { zooms } = this.loaded();
    if (!isValidGeoRect(rect)) {
      this.currentZoom = zooms.max;
      return this.currentZoom;
    }

    const topLeft = geoToProjected(rect.topLeft);
    const bottomRight = geoToProjected(rect.bottomRight);
    const sx = (bottomRight.x - topLeft.x) / size.width;
    const sy = (bottomRight.y - topLeft.y) / size.height;

    this.currentZoom = this.limitZoom(zoomForScale(Math.max(sx, -sy) / this.coordinatesRatio));
    return this.currentZoom;
  }

  // ─── Coordinates ────────────────────────────────────────────────────

  /** Geographic position → pixel position at the current zoom. */
  geoToPixel(p: GeoPoint): PixelPoint {
    const scale = scaleForZoom(this.zoom) * this.coordinatesRatio;
    const m = geoToProjected(p);
    return { x: m.x / scale, y: -m.y / scale };
  }

  /** Pixel position at the current zoom → geographic position. */
  pixelToGeo(p: PixelPoint): GeoPoint {
    const scale = scaleForZoom(this.zoom) * this.coordinatesRatio;
    return projectedToGeo({ x: p.x * scale, y: -p.y * scale });
  }

  /** Pixel rectangle covered by the stored tiles at the current zoom. */
  bounds(): PixelRect {
    const { bounds } = this.loaded();
    const topLeft = this.geoToPixel(bounds.topLeft);
    const bottomRight = this.geoToPixel(bounds.bottomRight);
    return { minX: topLeft.x, minY: topLeft.y, maxX: bottomRight.x, maxY: bottomRight.y };
  }

  /**
   * Ground meters per pixel at the vertical center of `rect`.
   *
   * Projected meters shrink by `cos(latitude)` on the ground.
   */
  resolution(rect: PixelRect): number {
    const scale = scaleForZoom(this.zoom) * this.coordinatesRatio;
    const center = this.pixelToGeo({ x: 0, y: (rect.minY + rect.maxY) / 2 });
    return scale * groundFactor(center.lat);
  }

  /** On-screen size of one tile, in pixels. */
  tileSizeInPixels(): number {
    return TILE_SIZE / this.coordinatesRatio;
  }

  // ─── Drawing ────────────────────────────────────────────────────────

  /**
   * Tile slots covering `viewport`, row-major, without resolving images.
   *
   * The viewport is first clipped to {@link TileMap.bounds}; the anchor tile
   * is the one under the clipped top-left corner and the grid extends to
   * the clipped bottom-right corner, never past the last tile of the zoom
   * level.
   */
  visibleTiles(viewport: PixelRect): TilePlacement[] {
    const b = this.bounds();
    const left = Math.max(viewport.minX, b.minX);
    const top = Math.max(viewport.minY, b.minY);
    const right = Math.min(viewport.maxX, b.maxX);
    const bottom = Math.min(viewport.maxY, b.maxY);
    if (right <= left || bottom <= top) return [];

    const zoom = this.currentZoom;
    const n = tileCount(zoom);
    const size = this.tileSizeInPixels();
    // Pixel position of the world's west (and north) edge
    const edge = -n * size / 2;

    const anchorColumn = safeTileIndex(Math.floor((left - edge) / size + GRID_EPSILON), zoom);
    const anchorRow = safeTileIndex(Math.floor((top - edge) / size + GRID_EPSILON), zoom);
    const originX = edge + anchorColumn * size;
    const originY = edge + anchorRow * size;
    const columns = Math.min(Math.ceil((right - originX) / size - GRID_EPSILON), n - anchorColumn);
    const rows = Math.min(Math.ceil((bottom - originY) / size - GRID_EPSILON), n - anchorRow);

    const placements: TilePlacement[] = [];
    for (let j = 0; j < rows; j++) {
      for (let i = 0; i < columns; i++) {
        placements.push({
          tile: { zoom, column: anchorColumn + i, row: anchorRow + j },
          point: { x: originX + i * size, y: originY + j * size },
        });
      }
    }
    return placements;
  }

  /**
   * Draw every available tile covering `viewport`.
   *
   * Tiles missing from the store or failing to decode are skipped; nothing
   * is drawn in their slot and no error is raised.
   */
  draw(painter: Painter<TImage>, viewport: PixelRect): void {
    const ratio = this.imageRatio;
    let drawn = 0;
    const placements = this.visibleTiles(viewport);

    for (const { tile, point } of placements) {
      const image = this.resolveTile(tile);
      if (image === undefined) continue;
      painter.draw({ image, point, ratio, tile });
      drawn++;
    }

    this.log.trace({ zoom: this.currentZoom, planned: placements.length, drawn }, 'Tiles drawn');
  }

  /**
   * Decoded image for a tile: from the cache, else from the store.
   *
   * @returns `undefined` if the tile is missing, unreadable or undecodable.
   */
  private resolveTile(tile: TileIndex): TImage | undefined {
    const key = tileKey(this.store.id, tile);
    const cached = this.cache.get(key);
    if (cached !== undefined) return cached;

    let bytes: Uint8Array | undefined;
    try {
      bytes = this.store.fetchTileBytes(tile.zoom, tile.column, flipRow(tile.zoom, tile.row));
    } catch (err) {
      this.log.warn({ err, tile }, 'Tile read failed');
      return undefined;
    }
    if (!bytes) {
      this.log.debug({ tile }, 'Tile not stored');
      return undefined;
    }

    const image = this.decoder.decode(bytes);
    if (image === undefined) {
      this.log.debug({ tile, bytes: bytes.length }, 'Tile decode failed');
      return undefined;
    }

    this.cache.put(key, image);
    return image;
  }

  // ─── Guards ─────────────────────────────────────────────────────────

  private loaded(): LoadedTileSet {
    if (!this.tileSet) {
      throw new InvalidMapError(this.errorString);
    }
    return this.tileSet;
  }
}

function positiveRatio(ratio: number): number {
  if (!(ratio > 0) || !Number.isFinite(ratio)) {
    throw new RangeError(`Pixel ratio must be a positive number, got ${ratio}`);
  }
  return ratio;
}
