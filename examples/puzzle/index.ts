/**
 * Puzzle game example built on @signalworks/signals
 */

// Types
export type {
  Direction,
  GridPosition,
  Vector2,
  PuzzleLevel,
  PuzzlePlayer,
  Crate,
  PlayerCommand,
  PuzzleGameState,
} from "./types.js";
export { CRATE_MASS } from "./types.js";

// Costumes
export { getCostumeSet, nextCostume, previousCostume, resolveStartingCostume } from "./costumes.js";

// Levels
export {
  tilesFromMap,
  LEVELS,
  LEVEL_FIRST_STEPS,
  LEVEL_HEAVY_LIFTING,
  LEVEL_TWO_KEYS,
  LEVEL_OVER_THE_WALL,
  DEFAULT_LEVEL,
  WALL_MOUNTED_VARIANT,
  getLevel,
  getLevelIds,
  getAllLevels,
  validateLevel,
  parseLevelFromJson,
} from "./levels.js";
export type { TileMap, LevelValidationResult } from "./levels.js";

// Player
export {
  LevelGrid,
  canEnter,
  movePlayer,
  createPuzzlePlayer,
  createCrate,
  createCrates,
} from "./player.js";
export type { MovementWorld, MoveResult } from "./player.js";

// Stimulus
export { createStimulus } from "./stimulus.js";

// Game
export { PuzzleGame } from "./game.js";
export type { PuzzleGameConfig } from "./game.js";
