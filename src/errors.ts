/**
 * @module errors
 */

/**
 * Raised by every {@link TileMap} operation other than the validity
 * accessors when the map failed to load.
 */
export class InvalidMapError extends Error {
  constructor(reason: string) {
    super(`Invalid map: ${reason}`);
    this.name = 'InvalidMapError';
  }
}
