/**
 * @module stores/store
 *
 * Read access interface for single-file tile databases.
 *
 * A {@link TileStore} encapsulates the storage details of a tile pyramid
 * (file format, connection handling, schema) while exposing the four
 * queries the map core needs: a schema check, the stored zoom range, the
 * stored index extents at a zoom level, and the encoded bytes of one tile.
 *
 * Stores speak the **bottom-origin** (TMS) row convention of the MBTiles
 * format. The core converts its top-origin rows with `flipRow` at every
 * call into the store and nowhere else.
 *
 * All methods are synchronous. A store is one logical handle scoped to a
 * single map; callers serialize access to it.
 *
 * Built-in implementations:
 *
 * - {@link MBTilesStore} -- SQLite MBTiles files via `better-sqlite3`
 */

import type { TileExtents, ZoomRange } from '../types.js';

export interface TileStore {
  /**
   * Stable identity of the underlying database, used in cache keys.
   *
   * Two stores with the same `id` must return the same bytes for the same
   * tile.
   */
  readonly id: string;

  /**
   * Open the underlying handle. Calling `open()` on an open store is a
   * no-op.
   *
   * @throws {Error} If the database cannot be opened (missing file, not a
   *   database, permission denied, etc.).
   */
  open(): void;

  /**
   * Release the underlying handle. Calling `close()` on a closed store is a
   * no-op. Queries issued after `close()` reopen the handle.
   */
  close(): void;

  /**
   * Check that the database holds a `tiles` relation with the expected
   * columns and types.
   *
   * @returns `false` if the schema is missing or does not match.
   */
  validateSchema(): boolean;

  /**
   * Minimal and maximal zoom level present in the database.
   *
   * @returns `undefined` if the database holds no tiles.
   */
  zoomRange(): ZoomRange | undefined;

  /**
   * Minimal and maximal stored column and row at a zoom level.
   *
   * Values are returned as stored, without range checks.
   *
   * @returns `undefined` if no tile is stored at `zoom`.
   */
  tileIndexExtentsAtZoom(zoom: number): TileExtents | undefined;

  /**
   * Encoded image bytes of one tile.
   *
   * @param row - Bottom-origin row.
   * @returns `undefined` if no such tile is stored. A missing tile is a
   *   visual gap, not an error.
   */
  fetchTileBytes(zoom: number, column: number, row: number): Uint8Array | undefined;
}
