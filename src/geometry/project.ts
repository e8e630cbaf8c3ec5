/**
 * @module geometry/project
 *
 * Spherical Web-Mercator projection between WGS84 geographic coordinates and
 * projected meters, plus the zoom/scale arithmetic of the tile pyramid.
 *
 * **Coordinate conventions:**
 * - **X**: 0 at the prime meridian, `-π·R` at 180 W, `+π·R` at 180 E.
 * - **Y**: 0 at the equator, growing northward; `±π·R` at roughly
 *   ±85.0511 degrees latitude, the edge of the square world map.
 *
 * A zoom level's **scale** is the number of projected meters covered by one
 * tile pixel. Zoom 0 fits the whole world into a single
 * {@link TILE_SIZE}-pixel tile and every increment halves the scale.
 */

import type { GeoPoint, ProjectedPoint } from '../types.js';

const PI = Math.PI;

/** Earth radius used by spherical Web-Mercator (WGS84 semi-major axis), meters. */
export const EARTH_RADIUS = 6378137;

/** Width of the projected world, `2·π·R` meters. */
export const WORLD_SIZE = 2 * PI * EARTH_RADIUS;

/** Native width and height of one stored tile, in pixels. */
export const TILE_SIZE = 256;

/**
 * Largest latitude representable on the square Web-Mercator map.
 *
 * Latitudes beyond this band are clamped before projection and derived
 * map bounds are clamped to it.
 */
export const MAX_LATITUDE = 85.0511;

// Absorbs floating point error when a scale sits exactly on a zoom level.
const ZOOM_EPSILON = 1e-9;

/**
 * Clamp a latitude to the ±{@link MAX_LATITUDE} band.
 *
 * @example
 * ```ts
 * clampLatitude(89);  // => 85.0511
 * clampLatitude(-12); // => -12
 * ```
 */
export function clampLatitude(lat: number): number {
  return lat < -MAX_LATITUDE ? -MAX_LATITUDE : lat > MAX_LATITUDE ? MAX_LATITUDE : lat;
}

/**
 * Project a WGS84 point to Web-Mercator meters.
 *
 * Latitude is clamped to ±{@link MAX_LATITUDE} first, so the poles map to
 * finite values.
 *
 * @example
 * ```ts
 * geoToProjected({ lat: 0, lon: 180 }); // => { x: 20037508.34..., y: 0 }
 * ```
 */
export function geoToProjected(p: GeoPoint): ProjectedPoint {
  const lat = clampLatitude(p.lat) * PI / 180;
  return {
    x: EARTH_RADIUS * p.lon * PI / 180,
    y: EARTH_RADIUS * Math.log(Math.tan(PI / 4 + lat / 2)),
  };
}

/**
 * Inverse of {@link geoToProjected}.
 */
export function projectedToGeo(p: ProjectedPoint): GeoPoint {
  return {
    lat: (2 * Math.atan(Math.exp(p.y / EARTH_RADIUS)) - PI / 2) * 180 / PI,
    lon: p.x / EARTH_RADIUS * 180 / PI,
  };
}

/**
 * Projected meters per tile pixel at a zoom level.
 *
 * @example
 * ```ts
 * scaleForZoom(0); // => 156543.03... (whole world in 256 px)
 * scaleForZoom(1); // => 78271.51...
 * ```
 */
export function scaleForZoom(zoom: number): number {
  return WORLD_SIZE / (TILE_SIZE * Math.pow(2, zoom));
}

/**
 * Integer zoom level for a requested scale.
 *
 * Returns the finest zoom whose scale is still at least `scale`, so that a
 * region measured at `scale` meters per pixel fits at the returned zoom.
 * The result is not clamped to any zoom range; may be negative for scales
 * coarser than zoom 0.
 *
 * @example
 * ```ts
 * zoomForScale(scaleForZoom(7));       // => 7
 * zoomForScale(scaleForZoom(7) * 1.5); // => 6
 * ```
 */
export function zoomForScale(scale: number): number {
  return Math.floor(Math.log2(WORLD_SIZE / (scale * TILE_SIZE)) + ZOOM_EPSILON);
}

/**
 * Mercator scale distortion at a latitude: ground meters per projected meter.
 */
export function groundFactor(lat: number): number {
  return Math.cos(clampLatitude(lat) * PI / 180);
}
