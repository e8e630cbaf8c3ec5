/**
 * @module stores/mbtiles
 *
 * MBTiles {@link TileStore} implementation.
 *
 * Reads raster tiles from an MBTiles database (SQLite) through
 * `better-sqlite3`. The connection is opened read-only on first use and
 * prepared statements are cached per connection. Both the plain table
 * layout and the deduplicated `map`/`images` layout (where `tiles` is a
 * view) are supported, since the schema check reads column metadata through
 * `PRAGMA table_info`, which describes views as well as tables.
 */

import { basename } from 'node:path';
import Database from 'better-sqlite3';
import type { TileStore } from './store.js';
import type { TileExtents, ZoomRange } from '../types.js';

/** Expected `tiles` columns, in order, with their SQLite type affinity. */
const TILES_SCHEMA: ReadonlyArray<{ name: string; affinity: 'INT' | 'BLOB' }> = [
  { name: 'zoom_level', affinity: 'INT' },
  { name: 'tile_column', affinity: 'INT' },
  { name: 'tile_row', affinity: 'INT' },
  { name: 'tile_data', affinity: 'BLOB' },
];

interface ColumnInfo {
  name: string;
  type: string;
}

interface ZoomRow {
  min: number | null;
  max: number | null;
}

interface ExtentsRow {
  minColumn: number | null;
  minRow: number | null;
  maxColumn: number | null;
  maxRow: number | null;
}

interface TileRow {
  tile_data: Buffer | null;
}

interface MetadataRow {
  name: string;
  value: string | null;
}

/**
 * Configuration options for {@link MBTilesStore}.
 */
export interface MBTilesStoreOptions {
  /**
   * Store identity used in cache keys.
   *
   * @defaultValue The database path.
   */
  id?: string;
  /**
   * Milliseconds to wait on a locked database before failing.
   *
   * @defaultValue 5000
   */
  timeout?: number;
}

/**
 * Read-only MBTiles store backed by `better-sqlite3`.
 *
 * @example
 * ```typescript
 * import { MBTilesStore } from 'mbtiles-raster/stores';
 *
 * const store = new MBTilesStore('./data/world.mbtiles');
 *
 * store.validateSchema();        // => true
 * store.zoomRange();             // => { min: 0, max: 6 }
 * store.fetchTileBytes(0, 0, 0); // => Uint8Array [0x89, 0x50, ...]
 *
 * store.close();
 * ```
 */
export class MBTilesStore implements TileStore {
  readonly id: string;
  readonly path: string;
  private readonly timeout: number;
  private db: Database.Database | undefined;
  private tileStatement: Database.Statement<[number, number, number], TileRow> | undefined;

  /**
   * Create a store for an MBTiles file. No I/O happens until the first
   * query or an explicit {@link MBTilesStore.open}.
   *
   * @param path - Filesystem path to the `.mbtiles` file.
   * @param options - Optional configuration. See {@link MBTilesStoreOptions}.
   */
  constructor(path: string, options?: MBTilesStoreOptions) {
    this.path = path;
    this.id = options?.id ?? path;
    this.timeout = options?.timeout ?? 5000;
  }

  /** Base file name of the database. */
  get name(): string {
    return basename(this.path);
  }

  /** Whether a connection is currently open. */
  get isOpen(): boolean {
    return this.db !== undefined;
  }

  open(): void {
    this.connection();
  }

  close(): void {
    const db = this.db;
    this.db = undefined;
    this.tileStatement = undefined;
    db?.close();
  }

  validateSchema(): boolean {
    const columns = this.connection()
      .prepare<[], ColumnInfo>('PRAGMA table_info(tiles)')
      .all();
    if (columns.length < TILES_SCHEMA.length) return false;

    return TILES_SCHEMA.every((expected, i) => {
      const column = columns[i];
      return column.name === expected.name
        && column.type.toUpperCase().includes(expected.affinity);
    });
  }

  zoomRange(): ZoomRange | undefined {
    const row = this.connection()
      .prepare<[], ZoomRow>('SELECT min(zoom_level) AS min, max(zoom_level) AS max FROM tiles')
      .get();
    if (!row || row.min === null || row.max === null) return undefined;
    return { min: row.min, max: row.max };
  }

  tileIndexExtentsAtZoom(zoom: number): TileExtents | undefined {
    const row = this.connection()
      .prepare<[number], ExtentsRow>(
        'SELECT min(tile_column) AS minColumn, min(tile_row) AS minRow, '
          + 'max(tile_column) AS maxColumn, max(tile_row) AS maxRow '
          + 'FROM tiles WHERE zoom_level = ?',
      )
      .get(zoom);
    if (
      !row
      || row.minColumn === null
      || row.minRow === null
      || row.maxColumn === null
      || row.maxRow === null
    ) {
      return undefined;
    }
    return {
      minColumn: row.minColumn,
      minRow: row.minRow,
      maxColumn: row.maxColumn,
      maxRow: row.maxRow,
    };
  }

  fetchTileBytes(zoom: number, column: number, row: number): Uint8Array | undefined {
    if (!this.tileStatement) {
      this.tileStatement = this.connection().prepare<[number, number, number], TileRow>(
        'SELECT tile_data FROM tiles WHERE zoom_level = ? AND tile_column = ? AND tile_row = ?',
      );
    }
    const data = this.tileStatement.get(zoom, column, row)?.tile_data;
    if (!data || data.length === 0) return undefined;
    return new Uint8Array(data.buffer, data.byteOffset, data.length);
  }

  /**
   * Name/value pairs of the `metadata` table (`name`, `format`, `bounds`,
   * `attribution`, ...).
   *
   * @returns An empty object if the database has no `metadata` table.
   */
  metadata(): Record<string, string> {
    const db = this.connection();
    const table = db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type IN ('table', 'view') AND name = 'metadata'",
      )
      .get();
    if (!table) return {};

    const result: Record<string, string> = {};
    for (const { name, value } of db.prepare<[], MetadataRow>('SELECT name, value FROM metadata').all()) {
      if (value !== null) result[name] = value;
    }
    return result;
  }

  // ─── Connection ─────────────────────────────────────────────────────

  /**
   * Return the open connection, opening it on first use.
   *
   * @throws {Error} If the file does not exist or is not a SQLite database.
   */
  private connection(): Database.Database {
    if (!this.db) {
      const db = new Database(this.path, {
        readonly: true,
        fileMustExist: true,
        timeout: this.timeout,
      });
      try {
        // Read the header now so a file that is not a database fails on open
        db.pragma('schema_version', { simple: true });
      } catch (err) {
        db.close();
        throw err;
      }
      this.db = db;
    }
    return this.db;
  }
}
