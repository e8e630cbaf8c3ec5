/**
 * @module painter
 *
 * Draw command sink.
 *
 * The draw loop emits one {@link DrawCommand} per resolved tile, in
 * row-major order, and expects nothing back. Compositing onto a real
 * surface (canvas, framebuffer, image file) is the painter's job.
 */

import type { DrawCommand } from './types.js';

/**
 * Receiver of the draw commands produced by `TileMap.draw`.
 *
 * @typeParam TImage - Decoded image type.
 */
export interface Painter<TImage> {
  draw(command: DrawCommand<TImage>): void;
}

/**
 * Painter that records every command it receives.
 *
 * @example
 * ```typescript
 * const painter = new RecordingPainter<RasterImage>();
 * map.draw(painter, { minX: 0, minY: 0, maxX: 512, maxY: 512 });
 * painter.commands.length; // => number of tiles drawn
 * ```
 */
export class RecordingPainter<TImage> implements Painter<TImage> {
  readonly commands: DrawCommand<TImage>[] = [];

  draw(command: DrawCommand<TImage>): void {
    this.commands.push(command);
  }

  /** Drop all recorded commands. */
  clear(): void {
    this.commands.length = 0;
  }
}
