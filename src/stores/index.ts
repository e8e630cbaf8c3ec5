export type { TileStore } from './store.js';
export { MBTilesStore } from './mbtiles.js';
export type { MBTilesStoreOptions } from './mbtiles.js';
