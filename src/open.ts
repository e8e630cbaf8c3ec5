/**
 * @module open
 *
 * One-call entry point for MBTiles files.
 *
 * Wires an {@link MBTilesStore}, a {@link RasterDecoder} and (unless one is
 * injected) a private {@link LruTileCache} into a {@link TileMap}.
 */

import { MBTilesStore, type MBTilesStoreOptions } from './stores/mbtiles.js';
import { RasterDecoder } from './decoder.js';
import { TileMap } from './map.js';
import type { ImageDecoder } from './decoder.js';
import type { TileMapOptions } from './options.js';
import type { RasterImage } from './types.js';

/**
 * Options for {@link openMBTiles}: the {@link TileMapOptions} with an
 * optional decoder, plus store options.
 */
export interface OpenMBTilesOptions extends Omit<TileMapOptions<RasterImage>, 'decoder'> {
  /** @defaultValue `new RasterDecoder()` */
  decoder?: ImageDecoder<RasterImage>;
  /** Options forwarded to the {@link MBTilesStore}. */
  store?: MBTilesStoreOptions;
}

/**
 * Open an MBTiles file as a raster map.
 *
 * @param path - Filesystem path to the `.mbtiles` file.
 * @returns The map; check `isValid` before use.
 *
 * @example
 * ```typescript
 * import { openMBTiles, LruTileCache } from 'mbtiles-raster';
 *
 * const cache = new LruTileCache<RasterImage>();
 * const map = openMBTiles('./data/world.mbtiles', { cache, deviceRatio: 2 });
 * if (!map.isValid) console.error(map.errorString);
 * ```
 */
export function openMBTiles(path: string, options?: OpenMBTilesOptions): TileMap<RasterImage> {
  const { store, decoder, ...rest } = options ?? {};
  return new TileMap(new MBTilesStore(path, store), {
    ...rest,
    decoder: decoder ?? new RasterDecoder(),
  });
}
