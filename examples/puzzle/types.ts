/**
 * Puzzle game type definitions
 *
 * Coordinate System: Y-UP
 * - Row 0 is the bottom row of the level
 * - Moving north increases the row
 */

import type { Direction, GridPosition, Vector2 } from "@signalworks/grid";
import type { Costume, LevelData } from "@signalworks/signals";

export type { Direction, GridPosition, Vector2 };

// =============================================================================
// Level Types
// =============================================================================

/**
 * A puzzle level: signal network data plus presentation and crate placement.
 */
export interface PuzzleLevel extends LevelData {
  /** Display name for the level */
  name: string;
  /** Optional description */
  description?: string;
  /** Starting positions of pushable crates */
  crates: GridPosition[];
}

/** Mass of a crate; heavy enough to hold down a pressure plate */
export const CRATE_MASS = 60;

// =============================================================================
// Player
// =============================================================================

/**
 * Player state in a puzzle level
 */
export interface PuzzlePlayer {
  /** Tile the player stands on */
  gridPosition: GridPosition;
  /** World position (center of the tile) */
  worldPosition: Vector2;
  /** Costume currently worn */
  costume: Costume;
  /** Costumes the player may switch between, in cycling order */
  costumes: readonly Costume[];
}

/**
 * A pushable crate
 */
export interface Crate {
  /** Stable identifier, by starting position ("crate-<col>_<row>") */
  id: string;
  gridPosition: GridPosition;
  worldPosition: Vector2;
  mass: number;
}

// =============================================================================
// Commands
// =============================================================================

/**
 * Player command, applied before the next tick
 */
export type PlayerCommand =
  | { type: "move"; direction: Direction }
  | { type: "use" }
  | { type: "nextCostume" }
  | { type: "previousCostume" };

/**
 * Top-level game state machine states
 */
export type PuzzleGameState = "playing" | "menu";
