/**
 * @module decoder
 *
 * Tile image decoding.
 *
 * The draw loop turns the raw bytes of a stored tile into an image through
 * an {@link ImageDecoder}. Decoding must be synchronous and must report
 * failure by returning `undefined`; a tile that cannot be decoded is left
 * blank.
 *
 * {@link RasterDecoder} handles the two raster formats found in MBTiles
 * databases, PNG and JPEG, identified by their signature bytes, and produces
 * an RGBA {@link RasterImage}.
 */

import pngjs from 'pngjs';
import jpeg from 'jpeg-js';
import type { RasterImage } from './types.js';

/**
 * Raw bytes → decoded image conversion consumed by the draw loop.
 *
 * @typeParam TImage - Decoded image type.
 */
export interface ImageDecoder<TImage> {
  /** @returns `undefined` if the bytes cannot be decoded. */
  decode(bytes: Uint8Array): TImage | undefined;
}

/** Raster formats recognized by {@link sniffFormat}. */
export type RasterFormat = 'png' | 'jpeg';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const JPEG_SIGNATURE = [0xff, 0xd8, 0xff];

function startsWith(bytes: Uint8Array, signature: readonly number[]): boolean {
  if (bytes.length < signature.length) return false;
  for (let i = 0; i < signature.length; i++) {
    if (bytes[i] !== signature[i]) return false;
  }
  return true;
}

/**
 * Identify the image format from its leading signature bytes.
 *
 * @returns `undefined` for anything but PNG or JPEG.
 */
export function sniffFormat(bytes: Uint8Array): RasterFormat | undefined {
  if (startsWith(bytes, PNG_SIGNATURE)) return 'png';
  if (startsWith(bytes, JPEG_SIGNATURE)) return 'jpeg';
  return undefined;
}

/**
 * Configuration options for {@link RasterDecoder}.
 */
export interface RasterDecoderOptions {
  /**
   * Upper bound on the memory jpeg-js may allocate for one tile, in MB.
   *
   * @defaultValue 64
   */
  maxMemoryUsageInMB?: number;
}

/**
 * PNG/JPEG decoder producing RGBA bitmaps, built on pngjs and jpeg-js.
 *
 * @example
 * ```typescript
 * const decoder = new RasterDecoder();
 * const image = decoder.decode(store.fetchTileBytes(0, 0, 0) ?? new Uint8Array());
 * // => { width: 256, height: 256, data: Uint8Array(262144) } or undefined
 * ```
 */
export class RasterDecoder implements ImageDecoder<RasterImage> {
  private readonly maxMemoryUsageInMB: number;

  constructor(options?: RasterDecoderOptions) {
    this.maxMemoryUsageInMB = options?.maxMemoryUsageInMB ?? 64;
  }

  decode(bytes: Uint8Array): RasterImage | undefined {
    const format = sniffFormat(bytes);
    if (!format) return undefined;

    try {
      return format === 'png' ? this.decodePng(bytes) : this.decodeJpeg(bytes);
    } catch {
      // Truncated or corrupt image data
      return undefined;
    }
  }

  private decodePng(bytes: Uint8Array): RasterImage {
    const png = pngjs.PNG.sync.read(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
    return {
      width: png.width,
      height: png.height,
      data: new Uint8Array(png.data.buffer, png.data.byteOffset, png.data.byteLength),
    };
  }

  private decodeJpeg(bytes: Uint8Array): RasterImage {
    const { width, height, data } = jpeg.decode(bytes, {
      useTArray: true,
      formatAsRGBA: true,
      maxMemoryUsageInMB: this.maxMemoryUsageInMB,
    });
    return { width, height, data };
  }
}
