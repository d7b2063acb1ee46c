/**
 * Grid position helpers.
 *
 * Positions are compared by value. Anything that needs to key a Map by
 * position goes through positionKey() so that two equal positions built
 * separately land on the same entry.
 */

import type { Direction, GridPosition, PositionKey } from "./types.js";

/**
 * Create a grid position.
 */
export const gridPosition = (col: number, row: number): GridPosition => ({ col, row });

/**
 * Whether two grid positions name the same tile.
 */
export const positionsEqual = (a: GridPosition, b: GridPosition): boolean =>
  a.col === b.col && a.row === b.row;

/**
 * Key form of a position, e.g. `{ col: 2, row: 3 }` -> `"2_3"`.
 */
export const positionKey = (position: GridPosition): PositionKey =>
  `${position.col}_${position.row}`;

/**
 * Format a position the way humans read it in diagnostics: `(2, 3)`.
 */
export const formatPosition = (position: GridPosition): string =>
  `(${position.col}, ${position.row})`;

const KEY_PATTERN = /^(-?\d+)_(-?\d+)$/;
const COORDINATE_PATTERN = /^\s*\(?\s*(-?\d+)\s*,\s*(-?\d+)\s*\)?\s*$/;

/**
 * Parse a position key (`"2_3"`) back into a position.
 * Returns null if the string is not a key.
 */
export function parsePositionKey(key: string): GridPosition | null {
  const match = KEY_PATTERN.exec(key);
  if (!match) return null;
  return gridPosition(Number(match[1]), Number(match[2]));
}

/**
 * Parse a level-data coordinate such as `"2,3"` or `"(2, 3)"`.
 * Returns null if the string is not a coordinate.
 */
export function parseCoordinate(text: string): GridPosition | null {
  const match = COORDINATE_PATTERN.exec(text);
  if (!match) return null;
  return gridPosition(Number(match[1]), Number(match[2]));
}

/** Unit offset for each direction (Y-up: north increases row). */
const DIRECTION_OFFSETS: Record<Direction, GridPosition> = {
  north: { col: 0, row: 1 },
  south: { col: 0, row: -1 },
  east: { col: 1, row: 0 },
  west: { col: -1, row: 0 },
};

/**
 * The neighbouring position one tile away in the given direction.
 */
export function stepPosition(position: GridPosition, direction: Direction): GridPosition {
  const offset = DIRECTION_OFFSETS[direction];
  return gridPosition(position.col + offset.col, position.row + offset.row);
}
