/**
 * Test utilities for puzzle example tests.
 */

import type { GridPosition } from "@signalworks/grid";
import { positionsEqual } from "@signalworks/grid";
import type { PropertyBag } from "@signalworks/signals";
import { layoutForTiles } from "@signalworks/signals";
import { tilesFromMap } from "./levels.js";
import type { MovementWorld } from "./player.js";
import { createCrates, LevelGrid } from "./player.js";
import type { PuzzleLevel } from "./types.js";

/**
 * Create a level from an ASCII map.
 */
export function createTestLevel(
  id: string,
  map: readonly string[],
  properties: PropertyBag = {},
): PuzzleLevel {
  const { tiles, crates } = tilesFromMap(map);
  return { id, name: `Test ${id}`, tiles, crates, properties };
}

/**
 * Movement world for an ASCII map, with optional closed doors.
 */
export function createTestWorld(
  map: readonly string[],
  closedDoors: readonly GridPosition[] = [],
): MovementWorld {
  const { tiles, crates } = tilesFromMap(map);
  const layout = layoutForTiles(tiles);
  return {
    grid: new LevelGrid(tiles, layout),
    crates: createCrates(crates, layout),
    isDoorClosed: (position) => closedDoors.some((door) => positionsEqual(door, position)),
  };
}
