/**
 * @module tiles
 *
 * Tile addressing for the mbtiles-raster core.
 *
 * Provides pure-math conversions between projected Web-Mercator meters and
 * slippy map tile indices, the row-convention flip between the XYZ grid used
 * by the core and the TMS grid used inside MBTiles databases, and the cache
 * key scheme for decoded tiles.
 *
 * - **XYZ** (top-origin) -- row 0 is the northern edge. Every
 *   {@link TileIndex} handled by the core uses this convention.
 * - **TMS** (bottom-origin) -- row 0 is the southern edge. Only
 *   {@link TileStore} implementations see these rows, through
 *   {@link flipRow} at the access site.
 *
 * All functions in this module are deterministic and side-effect-free.
 */

import type { ProjectedPoint, TileIndex } from './types.js';
import { WORLD_SIZE } from './geometry/project.js';

const HALF_WORLD = WORLD_SIZE / 2;

/**
 * Number of tiles along one axis at a zoom level.
 *
 * @example
 * ```typescript
 * tileCount(0);  // => 1
 * tileCount(10); // => 1024
 * ```
 */
export function tileCount(zoom: number): number {
  return 2 ** zoom;
}

// ─── Row convention ─────────────────────────────────────────────────────────

/**
 * Convert a row index between the top-origin and bottom-origin conventions.
 *
 * The conversion is its own inverse: `flipRow(z, flipRow(z, r)) === r`.
 *
 * @example
 * ```typescript
 * flipRow(10, 7); // => 1016
 * flipRow(0, 0);  // => 0
 * ```
 */
export function flipRow(zoom: number, row: number): number {
  return tileCount(zoom) - row - 1;
}

// ─── Index normalization ────────────────────────────────────────────────────

/**
 * Clamp a raw column or row index to `[0, 2^zoom - 1]`.
 *
 * Index values read from a tile database are not trusted to be in range;
 * every value is passed through here before it is interpreted.
 */
export function safeTileIndex(index: number, zoom: number): number {
  const last = tileCount(zoom) - 1;
  return index < 0 ? 0 : index > last ? last : index;
}

// ─── Projected ↔ tile ───────────────────────────────────────────────────────

/**
 * Tile containing a projected point at a zoom level.
 *
 * Returns the column and top-origin row. Points outside the world map
 * produce indices outside `[0, 2^zoom - 1]`; callers clamp where needed.
 *
 * @example
 * ```typescript
 * tileIndexFromProjected({ x: 1, y: 1 }, 1); // => { column: 1, row: 0 }
 * ```
 */
export function tileIndexFromProjected(
  p: ProjectedPoint,
  zoom: number,
): { column: number; row: number } {
  const n = tileCount(zoom);
  return {
    column: Math.floor((p.x + HALF_WORLD) / WORLD_SIZE * n),
    row: Math.floor((HALF_WORLD - p.y) / WORLD_SIZE * n),
  };
}

/**
 * Projected position of a tile's top-left (north-west) corner.
 *
 * Fractional or out-of-grid indices are accepted: `column + 1` gives the
 * tile's eastern edge and `row + 1` its southern edge.
 */
export function projectedFromTileOrigin(
  column: number,
  row: number,
  zoom: number,
): ProjectedPoint {
  const n = tileCount(zoom);
  return {
    x: column / n * WORLD_SIZE - HALF_WORLD,
    y: HALF_WORLD - row / n * WORLD_SIZE,
  };
}

// ─── Cache keys ─────────────────────────────────────────────────────────────

/**
 * Cache key identifying one decoded tile image.
 *
 * Combines the store identity (typically the database path) with the zoom,
 * column and top-origin row, so a cache can be shared between maps reading
 * different databases.
 *
 * @example
 * ```typescript
 * tileKey('world.mbtiles', { zoom: 3, column: 4, row: 2 });
 * // => 'world.mbtiles-3_4_2'
 * ```
 */
export function tileKey(storeId: string, tile: TileIndex): string {
  return `${storeId}-${tile.zoom}_${tile.column}_${tile.row}`;
}
