/**
 * @module types
 *
 * Shared type definitions for the mbtiles-raster core.
 *
 * Three coordinate spaces flow through the library:
 *
 * - **Geographic** ({@link GeoPoint}) -- WGS84 latitude/longitude in degrees.
 * - **Projected** ({@link ProjectedPoint}) -- spherical Web-Mercator meters,
 *   origin at (0°, 0°), Y growing northward.
 * - **Pixel** ({@link PixelPoint}) -- device-independent pixels at the
 *   current zoom, origin at (0°, 0°), Y growing downward.
 *
 * Tile addresses ({@link TileIndex}) always use the top-origin (XYZ) row
 * convention. The bottom-origin (TMS) rows of the MBTiles format only exist
 * behind the {@link TileStore} interface.
 */

// ─── Points ─────────────────────────────────────────────────────────────────

/** WGS84 position in decimal degrees. */
export interface GeoPoint {
  /** Latitude, -90 (south) to 90 (north). */
  lat: number;
  /** Longitude, -180 (west) to 180 (east). */
  lon: number;
}

/** Spherical Web-Mercator position in meters. */
export interface ProjectedPoint {
  x: number;
  y: number;
}

/** Position in device-independent pixels at the current zoom level. */
export interface PixelPoint {
  x: number;
  y: number;
}

// ─── Rectangles ─────────────────────────────────────────────────────────────

/** Viewport dimensions in pixels. */
export interface Size {
  width: number;
  height: number;
}

/**
 * Axis-aligned rectangle in pixel space.
 *
 * Pixel Y grows downward, so `minY` is the top edge.
 */
export interface PixelRect {
  /** Left edge. */
  minX: number;
  /** Top edge. */
  minY: number;
  /** Right edge. */
  maxX: number;
  /** Bottom edge. */
  maxY: number;
}

/** Geographic rectangle described by its north-west and south-east corners. */
export interface GeoRect {
  topLeft: GeoPoint;
  bottomRight: GeoPoint;
}

// ─── Tiles ──────────────────────────────────────────────────────────────────

/** Inclusive range of zoom levels available in a tile store. */
export interface ZoomRange {
  min: number;
  max: number;
}

/**
 * Address of one tile in the pyramid.
 *
 * `row` counts from the top (north) edge of the world.
 */
export interface TileIndex {
  zoom: number;
  column: number;
  row: number;
}

/**
 * Minimal and maximal column/row indices stored at one zoom level.
 *
 * Rows are in the store's own (bottom-origin) convention.
 */
export interface TileExtents {
  minColumn: number;
  minRow: number;
  maxColumn: number;
  maxRow: number;
}

// ─── Rendering ──────────────────────────────────────────────────────────────

/**
 * A single tile placement emitted by the draw loop.
 *
 * @typeParam TImage - Decoded image type produced by the configured
 *   {@link ImageDecoder}.
 */
export interface DrawCommand<TImage> {
  /** Decoded tile image. */
  image: TImage;
  /** Pixel position of the image's top-left corner. */
  point: PixelPoint;
  /** Image pixels per device pixel the painter should apply. */
  ratio: number;
  /** Tile the image was resolved from. */
  tile: TileIndex;
}

/** A tile slot planned by the draw loop, before its image is resolved. */
export interface TilePlacement {
  tile: TileIndex;
  point: PixelPoint;
}

/**
 * RGBA bitmap produced by the bundled {@link RasterDecoder}.
 *
 * `data` holds `width * height * 4` bytes, row-major, top row first.
 */
export interface RasterImage {
  width: number;
  height: number;
  data: Uint8Array;
}
