/**
 * Conversion between grid positions and world positions.
 *
 * A tile's world position is the center of its sprite. The grid is centered
 * on the layout origin, so for a 4-column grid of 128-unit tiles column 0 sits
 * at x = -192 and column 3 at x = 192.
 */

import type { GridPosition, TileLayout, TileSize, Vector2 } from "./types.js";

/** Default tile edge length in world units */
export const DEFAULT_TILE_SIZE = 128;

/**
 * Create a tile layout.
 *
 * @throws Error if the grid dimensions or tile size are not positive
 */
export function createTileLayout(
  columns: number,
  rows: number,
  tileSize: TileSize = { width: DEFAULT_TILE_SIZE, height: DEFAULT_TILE_SIZE },
  origin: Vector2 = { x: 0, y: 0 },
): TileLayout {
  if (!Number.isInteger(columns) || columns <= 0 || !Number.isInteger(rows) || rows <= 0) {
    throw new Error(`Tile layout needs a positive integer grid size. Got: ${columns}x${rows}`);
  }
  if (!(tileSize.width > 0) || !(tileSize.height > 0)) {
    throw new Error(
      `Tile layout needs a positive tile size. Got: ${tileSize.width}x${tileSize.height}`,
    );
  }
  return { columns, rows, tileSize, origin };
}

/**
 * World position (sprite center) of a grid tile.
 */
export function gridToWorld(position: GridPosition, layout: TileLayout): Vector2 {
  const { tileSize, origin } = layout;
  const halfWidth = (layout.columns * tileSize.width) / 2;
  const halfHeight = (layout.rows * tileSize.height) / 2;
  return {
    x: position.col * tileSize.width - halfWidth + tileSize.width / 2 + origin.x,
    y: position.row * tileSize.height - halfHeight + tileSize.height / 2 + origin.y,
  };
}
