/**
 * Performance benchmarks for mbtiles-raster.
 *
 * These benchmarks exercise the coordinate math, the tile grid walk, the
 * cache and the decoder independently, and the draw loop end-to-end against
 * an in-memory store, measuring throughput in ops/sec.
 *
 * Run: npm run bench
 */

import pngjs from 'pngjs';
import { geoToProjected, projectedToGeo } from '../src/geometry/project.js';
import { flipRow, tileIndexFromProjected, tileKey } from '../src/tiles.js';
import { LruTileCache } from '../src/cache.js';
import { RasterDecoder } from '../src/decoder.js';
import { TileMap } from '../src/map.js';
import { RecordingPainter } from '../src/painter.js';
import type { TileStore } from '../src/stores/store.js';
import type { PixelRect, RasterImage, TileExtents, ZoomRange } from '../src/types.js';

// ─── Helpers ────────────────────────────────────────────────────────────────

function bench(name: string, fn: () => void, iterations: number): void {
  // Warmup
  for (let i = 0; i < Math.min(iterations, 100); i++) fn();

  const start = performance.now();
  for (let i = 0; i < iterations; i++) fn();
  const elapsed = performance.now() - start;

  const opsPerSec = (iterations / elapsed) * 1000;
  const usPerOp = (elapsed / iterations) * 1000;

  console.log(
    `  ${name.padEnd(45)} ${fmt(opsPerSec, 0).padStart(12)} ops/s  ${fmt(usPerOp, 1).padStart(10)} µs/op`,
  );
}

function fmt(n: number, decimals: number): string {
  return n.toLocaleString('en-US', { maximumFractionDigits: decimals });
}

// ─── Synthetic data generators ──────────────────────────────────────────────

function generatePng(size: number): Uint8Array {
  const png = new pngjs.PNG({ width: size, height: size });
  for (let i = 0; i < png.data.length; i++) {
    png.data[i] = Math.floor(Math.random() * 256);
  }
  return new Uint8Array(pngjs.PNG.sync.write(png));
}

/** World-covering store answering every tile with the same bytes. */
class SyntheticStore implements TileStore {
  readonly id = 'synthetic';

  constructor(
    private readonly maxZoom: number,
    private readonly bytes: Uint8Array,
  ) {}

  open(): void {}
  close(): void {}

  validateSchema(): boolean {
    return true;
  }

  zoomRange(): ZoomRange {
    return { min: 0, max: this.maxZoom };
  }

  tileIndexExtentsAtZoom(): TileExtents {
    return { minColumn: 0, minRow: 0, maxColumn: 0, maxRow: 0 };
  }

  fetchTileBytes(): Uint8Array {
    return this.bytes;
  }
}

/** 1920×1080 viewport centered on a point of interest. */
function viewportAround(map: TileMap<RasterImage>, lat: number, lon: number): PixelRect {
  const c = map.geoToPixel({ lat, lon });
  return { minX: c.x - 960, minY: c.y - 540, maxX: c.x + 960, maxY: c.y + 540 };
}

// ─── Benchmark suites ───────────────────────────────────────────────────────

function benchProjection() {
  console.log('\n── Projection (WGS84 ↔ Mercator) ──');

  const points = Array.from({ length: 1000 }, () => ({
    lat: -85 + Math.random() * 170,
    lon: -180 + Math.random() * 360,
  }));

  bench('1,000 points → projected', () => {
    for (const p of points) geoToProjected(p);
  }, 10000);

  const projected = points.map(geoToProjected);
  bench('1,000 points → geographic', () => {
    for (const p of projected) projectedToGeo(p);
  }, 10000);
}

function benchTileAddressing() {
  console.log('\n── Tile Addressing ──');

  const projected = Array.from({ length: 1000 }, () => geoToProjected({
    lat: -85 + Math.random() * 170,
    lon: -180 + Math.random() * 360,
  }));

  bench('1,000 projected → tile index (z14)', () => {
    for (const p of projected) tileIndexFromProjected(p, 14);
  }, 10000);

  bench('1,000 row flips + cache keys (z14)', () => {
    for (let i = 0; i < 1000; i++) {
      tileKey('synthetic', { zoom: 14, column: i, row: flipRow(14, i) });
    }
  }, 10000);
}

function benchCache() {
  console.log('\n── LRU Cache ──');

  const image: RasterImage = { width: 1, height: 1, data: new Uint8Array(4) };

  for (const maxEntries of [64, 1024]) {
    const cache = new LruTileCache<RasterImage>({ maxEntries });
    let i = 0;
    bench(`put/get, ${maxEntries} entries, 2× key space`, () => {
      const key = `k${i++ % (maxEntries * 2)}`;
      if (cache.get(key) === undefined) cache.put(key, image);
    }, 200000);
  }
}

function benchDecoding() {
  console.log('\n── PNG Decoding ──');

  const decoder = new RasterDecoder();
  for (const size of [256, 512]) {
    const bytes = generatePng(size);
    bench(`${size}×${size} noise tile`, () => decoder.decode(bytes), 200);
  }
}

function benchVisibleTiles() {
  console.log('\n── Tile Grid Walk (1920×1080) ──');

  const map = new TileMap(new SyntheticStore(18, new Uint8Array()), { decoder: new RasterDecoder() });
  for (const zoom of [2, 10, 18]) {
    map.setZoom(zoom);
    const viewport = viewportAround(map, 48.8584, 2.2945);
    bench(`zoom ${zoom}`, () => map.visibleTiles(viewport), 50000);
  }
}

function benchDraw() {
  console.log('\n── Draw (1920×1080, 256 px tiles) ──');

  const bytes = generatePng(256);
  const painter = new RecordingPainter<RasterImage>();

  const warm = new TileMap(new SyntheticStore(14, bytes), { decoder: new RasterDecoder() });
  const viewport = viewportAround(warm, 48.8584, 2.2945);
  warm.draw(painter, viewport);
  bench('cached tiles', () => {
    painter.clear();
    warm.draw(painter, viewport);
  }, 20000);

  const cold = new TileMap(new SyntheticStore(14, bytes), {
    decoder: new RasterDecoder(),
    cache: { get: () => undefined, put: () => {} },
  });
  bench('uncached tiles (fetch + decode)', () => {
    painter.clear();
    cold.draw(painter, viewport);
  }, 20);
}

// ─── Main ───────────────────────────────────────────────────────────────────

console.log('╔══════════════════════════════════════════════════════════════════════╗');
console.log('║  mbtiles-raster Performance Benchmarks                               ║');
console.log('╚══════════════════════════════════════════════════════════════════════╝');

benchProjection();
benchTileAddressing();
benchCache();
benchDecoding();
benchVisibleTiles();
benchDraw();

console.log('\nDone.');
