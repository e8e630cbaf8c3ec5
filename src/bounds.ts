/**
 * @module bounds
 *
 * Geographic extent of a tile set.
 *
 * The extent is derived from the outermost stored tiles at the coarsest
 * zoom level. Stored indices pass through {@link safeTileIndex} and the
 * resulting latitudes through {@link clampLatitude}: the tile edges of zoom
 * levels 0 and 1 sit on the ±85.0511° singularity of the projection, where
 * the inverse projection is numerically unstable.
 */

import type { GeoRect, TileExtents } from './types.js';
import { clampLatitude, projectedToGeo } from './geometry/project.js';
import { projectedFromTileOrigin, safeTileIndex } from './tiles.js';

/**
 * Geographic rectangle covered by a block of tiles.
 *
 * @param zoom - Zoom level the extents refer to.
 * @param extents - Inclusive column/row extents, rows in top-origin
 *   convention. Out-of-range values are clamped to the zoom's grid.
 *
 * @example
 * ```typescript
 * deriveGeoRect(0, { minColumn: 0, minRow: 0, maxColumn: 0, maxRow: 0 });
 * // => { topLeft: { lat: 85.0511, lon: -180 },
 * //      bottomRight: { lat: -85.0511, lon: 180 } }
 * ```
 */
export function deriveGeoRect(zoom: number, extents: TileExtents): GeoRect {
  const minColumn = safeTileIndex(extents.minColumn, zoom);
  const minRow = safeTileIndex(extents.minRow, zoom);
  const maxColumn = safeTileIndex(extents.maxColumn, zoom);
  const maxRow = safeTileIndex(extents.maxRow, zoom);

  // The far corner is the outer edge of the last tile
  const topLeft = projectedToGeo(projectedFromTileOrigin(minColumn, minRow, zoom));
  const bottomRight = projectedToGeo(projectedFromTileOrigin(maxColumn + 1, maxRow + 1, zoom));

  return clampGeoRect({ topLeft, bottomRight });
}

/**
 * Clamp both corners of a rectangle to the representable latitude band.
 */
export function clampGeoRect(rect: GeoRect): GeoRect {
  return {
    topLeft: { lat: clampLatitude(rect.topLeft.lat), lon: rect.topLeft.lon },
    bottomRight: { lat: clampLatitude(rect.bottomRight.lat), lon: rect.bottomRight.lon },
  };
}

/**
 * Whether a rectangle describes a non-empty area with its top-left corner
 * north-west of its bottom-right corner.
 */
export function isValidGeoRect(rect: GeoRect | undefined): rect is GeoRect {
  if (!rect) return false;
  const { topLeft, bottomRight } = rect;
  return Number.isFinite(topLeft.lat)
    && Number.isFinite(topLeft.lon)
    && Number.isFinite(bottomRight.lat)
    && Number.isFinite(bottomRight.lon)
    && topLeft.lat > bottomRight.lat
    && topLeft.lon < bottomRight.lon;
}
