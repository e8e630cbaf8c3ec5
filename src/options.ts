/**
 * @module options
 *
 * Map option resolution.
 *
 * Setting values cascade through three levels:
 *
 * 1. {@link MapSettings} passed to the constructor (highest priority)
 * 2. Environment variables (`MBTILES_RASTER_LOG_LEVEL`)
 * 3. {@link DEFAULT_MAP_SETTINGS}: built-in fallbacks
 *
 * Collaborators (decoder, cache, logger) are not settings: they are injected
 * through {@link TileMapOptions} and only defaulted by the map itself.
 */

import type { Logger } from 'pino';
import type { TileCache } from './cache.js';
import type { ImageDecoder } from './decoder.js';
import { isLogLevel, LOG_LEVEL_ENV, type LevelWithSilent } from './logger.js';

/**
 * Scalar map settings. Any field left `undefined` falls through to the
 * environment and then to the built-in default via {@link resolveSettings}.
 */
export interface MapSettings {
  /** Device pixels per CSS pixel of the target display. @defaultValue 1 */
  deviceRatio?: number;
  /** Image pixels per tile pixel of the stored tiles (2 for "@2x" sets). @defaultValue 1 */
  tileRatio?: number;
  /** Level of the logger created when none is injected. @defaultValue 'silent' */
  logLevel?: LevelWithSilent;
}

/**
 * Options accepted by the {@link TileMap} constructor.
 *
 * @typeParam TImage - Decoded image type produced by `decoder`.
 */
export interface TileMapOptions<TImage> extends MapSettings {
  /** Converts stored tile bytes into images. */
  decoder: ImageDecoder<TImage>;
  /**
   * Decoded tile cache. Pass the same instance to several maps to share it.
   *
   * @defaultValue A private `LruTileCache` with default capacity.
   */
  cache?: TileCache<TImage>;
  /**
   * Parent logger; the map logs through a child bound to the store id.
   *
   * @defaultValue `createLogger(logLevel)`
   */
  logger?: Logger;
}

/**
 * Built-in default values for all map settings.
 */
export const DEFAULT_MAP_SETTINGS: Required<MapSettings> = {
  deviceRatio: 1,
  tileRatio: 1,
  logLevel: 'silent',
};

/**
 * Resolve effective settings: explicit options → environment → defaults.
 *
 * @param options - Explicit settings (highest priority).
 * @param env - Environment to read; defaults to `process.env`.
 * @returns Fully resolved settings with no `undefined` fields.
 *
 * @example
 * ```typescript
 * resolveSettings({ deviceRatio: 2 }, { MBTILES_RASTER_LOG_LEVEL: 'debug' });
 * // → { deviceRatio: 2, tileRatio: 1, logLevel: 'debug' }
 * ```
 */
export function resolveSettings(
  options?: MapSettings,
  env: Readonly<Record<string, string | undefined>> = process.env,
): Required<MapSettings> {
  const envLevel = env[LOG_LEVEL_ENV];
  return {
    deviceRatio: options?.deviceRatio ?? DEFAULT_MAP_SETTINGS.deviceRatio,
    tileRatio: options?.tileRatio ?? DEFAULT_MAP_SETTINGS.tileRatio,
    logLevel: options?.logLevel
      ?? (isLogLevel(envLevel) ? envLevel : DEFAULT_MAP_SETTINGS.logLevel),
  };
}
