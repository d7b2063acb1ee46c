/**
 * Core types for @signalworks/grid
 *
 * Uses Y-up coordinate system (row 0 is the bottom row, positive Y is up).
 * Grid positions are the identity of level objects; world positions are
 * derived from them through a TileLayout and may change (e.g. the player
 * walking between tiles).
 */

/**
 * 2D vector for world (pixel) positions.
 * Immutable by convention - all operations return new vectors.
 */
export interface Vector2 {
  readonly x: number;
  readonly y: number;
}

/**
 * Integer grid coordinate of a tile.
 */
export interface GridPosition {
  readonly col: number;
  readonly row: number;
}

/**
 * String form of a grid position: `"<col>_<row>"`.
 * Used as a Map key wherever positions need value equality.
 */
export type PositionKey = `${number}_${number}`;

/**
 * Size of a single tile in world units.
 */
export interface TileSize {
  readonly width: number;
  readonly height: number;
}

/**
 * Describes how a tile grid maps onto world space.
 * The grid is centered on `origin`.
 */
export interface TileLayout {
  /** Number of tile columns */
  readonly columns: number;
  /** Number of tile rows */
  readonly rows: number;
  /** Size of one tile in world units */
  readonly tileSize: TileSize;
  /** World position of the grid's center */
  readonly origin: Vector2;
}

/**
 * Cardinal movement direction on the grid.
 */
export type Direction = "north" | "south" | "east" | "west";
