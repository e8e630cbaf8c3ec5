import { describe, it, expect } from 'vitest';
import { TileMap } from '../src/map.js';
import { LruTileCache, type TileCache } from '../src/cache.js';
import { InvalidMapError } from '../src/errors.js';
import { RecordingPainter } from '../src/painter.js';
import type { PixelRect } from '../src/types.js';
import { LabelDecoder, MemoryStore, label, type MemoryStoreOptions } from './helpers/memory-store.js';

const WORLD: MemoryStoreOptions = {
  zoomRange: { min: 0, max: 10 },
  extents: { 0: { minColumn: 0, minRow: 0, maxColumn: 0, maxRow: 0 } },
};

/** One tile-sized viewport over tile (12, 7) at zoom 10. */
const TILE_12_7: PixelRect = { minX: -128000, minY: -129280, maxX: -127744, maxY: -129024 };

function fetches(store: MemoryStore): string[] {
  return store.calls.filter(c => c.startsWith('fetch'));
}

class BrokenStore extends MemoryStore {
  override fetchTileBytes(): Uint8Array | undefined {
    throw new Error('disk I/O error');
  }
}

describe('TileMap.draw', () => {
  it('should draw a single stored tile at its grid position', () => {
    const store = new MemoryStore(WORLD).add(10, 12, 1016, label('a'));
    const cache = new LruTileCache<string>();
    const map = new TileMap(store, { decoder: new LabelDecoder(), cache });
    const painter = new RecordingPainter<string>();

    map.draw(painter, TILE_12_7);

    expect(painter.commands).toEqual([{
      image: 'a',
      point: { x: -128000, y: -129280 },
      ratio: 1,
      tile: { zoom: 10, column: 12, row: 7 },
    }]);
    expect(fetches(store)).toEqual(['fetch 10/12/1016']);
    expect(cache.get('memory.mbtiles-10_12_7')).toBe('a');
  });

  it('should skip tiles missing from the store', () => {
    const store = new MemoryStore(WORLD);
    const cache = new LruTileCache<string>();
    const map = new TileMap(store, { decoder: new LabelDecoder(), cache });
    const painter = new RecordingPainter<string>();

    map.draw(painter, TILE_12_7);

    expect(painter.commands).toEqual([]);
    expect(fetches(store)).toEqual(['fetch 10/12/1016']);
    expect(cache.size).toBe(0);
  });

  it('should skip undecodable tiles without caching them', () => {
    const store = new MemoryStore(WORLD).add(10, 12, 1016, label('bad tile'));
    const cache = new LruTileCache<string>();
    const decoder = new LabelDecoder();
    const map = new TileMap(store, { decoder, cache });
    const painter = new RecordingPainter<string>();

    map.draw(painter, TILE_12_7);
    map.draw(painter, TILE_12_7);

    expect(painter.commands).toEqual([]);
    expect(cache.size).toBe(0);
    expect(fetches(store)).toHaveLength(2);
    expect(decoder.decoded).toBe(0);
  });

  it('should skip tiles whose read fails', () => {
    const store = new BrokenStore(WORLD);
    const map = new TileMap(store, { decoder: new LabelDecoder() });
    const painter = new RecordingPainter<string>();

    expect(() => map.draw(painter, TILE_12_7)).not.toThrow();
    expect(painter.commands).toEqual([]);
  });

  it('should serve repeated draws from the cache', () => {
    const store = new MemoryStore(WORLD).add(10, 12, 1016, label('a'));
    const decoder = new LabelDecoder();
    const map = new TileMap(store, { decoder });
    const painter = new RecordingPainter<string>();

    map.draw(painter, TILE_12_7);
    map.draw(painter, TILE_12_7);

    expect(painter.commands.map(c => c.image)).toEqual(['a', 'a']);
    expect(fetches(store)).toHaveLength(1);
    expect(decoder.decoded).toBe(1);
  });

  it('should refetch when the cache retains nothing', () => {
    const store = new MemoryStore(WORLD).add(10, 12, 1016, label('a'));
    const cache: TileCache<string> = {
      get: () => undefined,
      put: () => {},
    };
    const map = new TileMap(store, { decoder: new LabelDecoder(), cache });
    const painter = new RecordingPainter<string>();

    map.draw(painter, TILE_12_7);
    map.draw(painter, TILE_12_7);

    expect(painter.commands.map(c => c.image)).toEqual(['a', 'a']);
    expect(fetches(store)).toHaveLength(2);
  });

  it('should keep tiles of different stores apart in a shared cache', () => {
    const cache = new LruTileCache<string>();
    const first = new TileMap(
      new MemoryStore({ ...WORLD, id: 'first.mbtiles' }).add(10, 12, 1016, label('first')),
      { decoder: new LabelDecoder(), cache },
    );
    const second = new TileMap(
      new MemoryStore({ ...WORLD, id: 'second.mbtiles' }).add(10, 12, 1016, label('second')),
      { decoder: new LabelDecoder(), cache },
    );
    const painter = new RecordingPainter<string>();

    first.draw(painter, TILE_12_7);
    second.draw(painter, TILE_12_7);

    expect(painter.commands.map(c => c.image)).toEqual(['first', 'second']);
    expect(cache.size).toBe(2);
    expect(cache.get('first.mbtiles-10_12_7')).toBe('first');
    expect(cache.get('second.mbtiles-10_12_7')).toBe('second');
  });

  it('should emit commands in row-major order', () => {
    const store = new MemoryStore(WORLD)
      .add(10, 12, 1016, label('nw'))
      .add(10, 13, 1016, label('ne'))
      .add(10, 12, 1015, label('sw'))
      .add(10, 13, 1015, label('se'));
    const map = new TileMap(store, { decoder: new LabelDecoder() });
    const painter = new RecordingPainter<string>();

    map.draw(painter, { minX: -127990, minY: -129260, maxX: -127700, maxY: -128980 });

    expect(painter.commands.map(c => [c.image, c.tile.column, c.tile.row, c.point.x, c.point.y])).toEqual([
      ['nw', 12, 7, -128000, -129280],
      ['ne', 13, 7, -127744, -129280],
      ['sw', 12, 8, -128000, -129024],
      ['se', 13, 8, -127744, -129024],
    ]);
  });

  it('should attach the image ratio to every command', () => {
    const store = new MemoryStore(WORLD).add(0, 0, 0, label('world'));
    const map = new TileMap(store, { decoder: new LabelDecoder(), deviceRatio: 2 });
    map.setZoom(0);
    const painter = new RecordingPainter<string>();

    map.draw(painter, { minX: -1000, minY: -1000, maxX: 1000, maxY: 1000 });

    expect(painter.commands).toEqual([{
      image: 'world',
      point: { x: -64, y: -64 },
      ratio: 2,
      tile: { zoom: 0, column: 0, row: 0 },
    }]);
  });

  it('should throw on an invalid map', () => {
    const map = new TileMap(new MemoryStore({ schemaValid: false }), { decoder: new LabelDecoder() });
    expect(() => map.draw(new RecordingPainter<string>(), TILE_12_7)).toThrow(InvalidMapError);
  });
});

describe('TileMap.visibleTiles', () => {
  it('should cover the whole world with one tile at zoom 0', () => {
    const map = new TileMap(new MemoryStore(WORLD), { decoder: new LabelDecoder() });
    map.setZoom(0);

    expect(map.visibleTiles({ minX: -1000, minY: -1000, maxX: 1000, maxY: 1000 })).toEqual([
      { tile: { zoom: 0, column: 0, row: 0 }, point: { x: -128, y: -128 } },
    ]);
  });

  it('should stop at the last tile of the zoom level', () => {
    const map = new TileMap(new MemoryStore(WORLD), { decoder: new LabelDecoder() });
    map.setZoom(2);

    const placements = map.visibleTiles({ minX: -1000, minY: -1000, maxX: 1000, maxY: 1000 });
    expect(placements).toHaveLength(16);
    expect(placements[0]).toEqual({ tile: { zoom: 2, column: 0, row: 0 }, point: { x: -512, y: -512 } });
    expect(placements[15]).toEqual({ tile: { zoom: 2, column: 3, row: 3 }, point: { x: 256, y: 256 } });
  });

  it('should walk the grid at zoom levels beyond 30', () => {
    const store = new MemoryStore({ ...WORLD, zoomRange: { min: 0, max: 31 } });
    const map = new TileMap(store, { decoder: new LabelDecoder() });
    expect(map.zoom).toBe(31);

    const placements = map.visibleTiles({ minX: -1000, minY: -1000, maxX: 1000, maxY: 1000 });
    expect(placements).toHaveLength(64);
    expect(placements[0]).toEqual({
      tile: { zoom: 31, column: 2 ** 30 - 4, row: 2 ** 30 - 4 },
      point: { x: -1024, y: -1024 },
    });
    expect(placements[63].tile).toEqual({ zoom: 31, column: 2 ** 30 + 3, row: 2 ** 30 + 3 });
  });

  it('should return nothing for a viewport outside the map', () => {
    const map = new TileMap(new MemoryStore(WORLD), { decoder: new LabelDecoder() });
    map.setZoom(0);

    expect(map.visibleTiles({ minX: 200, minY: 200, maxX: 400, maxY: 400 })).toEqual([]);
    expect(map.visibleTiles({ minX: -1000, minY: -1000, maxX: -500, maxY: 1000 })).toEqual([]);
  });

  it('should return nothing for an empty viewport', () => {
    const map = new TileMap(new MemoryStore(WORLD), { decoder: new LabelDecoder() });
    map.setZoom(0);

    expect(map.visibleTiles({ minX: 10, minY: 10, maxX: 10, maxY: 50 })).toEqual([]);
  });

  it('should restrict the grid to the extent of a partial map', () => {
    // North-east quadrant only: column 1, store row 1 at zoom 1
    const store = new MemoryStore()
      .add(1, 1, 1, label('ne'))
      .add(2, 2, 3, label('ne-nw'));
    const map = new TileMap(store, { decoder: new LabelDecoder() });

    map.setZoom(1);
    expect(map.visibleTiles({ minX: -1000, minY: -1000, maxX: 1000, maxY: 1000 })).toEqual([
      { tile: { zoom: 1, column: 1, row: 0 }, point: { x: 0, y: -256 } },
    ]);

    map.setZoom(2);
    expect(map.visibleTiles({ minX: -1000, minY: -1000, maxX: 1000, maxY: 1000 }).map(p => p.tile)).toEqual([
      { zoom: 2, column: 2, row: 0 },
      { zoom: 2, column: 3, row: 0 },
      { zoom: 2, column: 2, row: 1 },
      { zoom: 2, column: 3, row: 1 },
    ]);
  });

  it('should not resolve any tile', () => {
    const store = new MemoryStore(WORLD).add(0, 0, 0, label('world'));
    const map = new TileMap(store, { decoder: new LabelDecoder() });
    map.setZoom(0);

    map.visibleTiles({ minX: -1000, minY: -1000, maxX: 1000, maxY: 1000 });
    expect(fetches(store)).toEqual([]);
  });
});
