/**
 * @signalworks/grid
 *
 * Tile-grid geometry for puzzle levels: grid positions as identity keys,
 * world positions derived through a tile layout, and the small amount of
 * vector math the signal predicates need (distances).
 */

// Core types
export type {
  Vector2,
  GridPosition,
  PositionKey,
  TileSize,
  TileLayout,
  Direction,
} from "./types.js";

// Math utilities
export { distance } from "./math.js";

// Positions
export {
  gridPosition,
  positionsEqual,
  positionKey,
  formatPosition,
  parsePositionKey,
  parseCoordinate,
  stepPosition,
} from "./position.js";

// Layout
export {
  DEFAULT_TILE_SIZE,
  createTileLayout,
  gridToWorld,
} from "./layout.js";
