/**
 * @module cache
 *
 * Decoded tile cache.
 *
 * The map core only relies on the {@link TileCache} get/put contract: an
 * entry may disappear between two calls, and putting the same key twice
 * with an equivalent image is harmless. Retention is the cache's own
 * business.
 *
 * A cache is injected into each {@link TileMap}. Keys include the store
 * identity (see `tileKey`), so one instance can back several maps.
 */

/**
 * Key → decoded image store consumed by the draw loop.
 *
 * @typeParam TImage - Decoded image type.
 */
export interface TileCache<TImage> {
  /** @returns `undefined` on a miss. */
  get(key: string): TImage | undefined;
  put(key: string, image: TImage): void;
}

/**
 * Configuration options for {@link LruTileCache}.
 */
export interface LruTileCacheOptions {
  /**
   * Maximum number of decoded tiles kept. When exceeded, the least recently
   * used entry is dropped.
   *
   * @defaultValue 1024
   */
  maxEntries?: number;
}

/**
 * In-memory LRU tile cache.
 *
 * @example
 * ```typescript
 * const cache = new LruTileCache<RasterImage>({ maxEntries: 256 });
 *
 * // One cache shared by two maps
 * const world = openMBTiles('./world.mbtiles', { cache });
 * const city = openMBTiles('./city.mbtiles', { cache });
 * ```
 */
export class LruTileCache<TImage> implements TileCache<TImage> {
  readonly maxEntries: number;
  /** LRU order: Map preserves insertion order; most recently used is moved to end */
  private readonly entries = new Map<string, TImage>();

  constructor(options?: LruTileCacheOptions) {
    this.maxEntries = Math.max(1, options?.maxEntries ?? 1024);
  }

  /** Number of cached tiles. */
  get size(): number {
    return this.entries.size;
  }

  get(key: string): TImage | undefined {
    const image = this.entries.get(key);
    if (image === undefined) return undefined;

    // Move to end (most recently used)
    this.entries.delete(key);
    this.entries.set(key, image);
    return image;
  }

  put(key: string, image: TImage): void {
    this.entries.delete(key);
    this.entries.set(key, image);

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  /** Remove every cached tile. */
  clear(): void {
    this.entries.clear();
  }
}
