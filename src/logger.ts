/**
 * @module logger
 *
 * Structured logging for mbtiles-raster, built on pino.
 *
 * The library is silent unless a level is configured, either through
 * `TileMapOptions.logLevel` or the `MBTILES_RASTER_LOG_LEVEL` environment
 * variable. Applications that already own a pino instance pass it as
 * `TileMapOptions.logger` instead.
 */

import pino, { type LevelWithSilent, type Logger } from 'pino';

export type { LevelWithSilent, Logger };

/** Environment variable read for the default log level. */
export const LOG_LEVEL_ENV = 'MBTILES_RASTER_LOG_LEVEL';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Narrow an arbitrary string to a pino level name.
 */
export function isLogLevel(value: string | undefined): value is LevelWithSilent {
  return LEVELS.some(level => level === value);
}

/**
 * Create the package logger.
 *
 * @param level - Minimum level to emit.
 */
export function createLogger(level: LevelWithSilent): Logger {
  return pino({
    name: 'mbtiles-raster',
    level,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
  });
}
