/**
 * Level definitions for the puzzle game.
 *
 * Levels are drawn as ASCII tile maps and converted to tile records with
 * tilesFromMap(). The first string is the TOP line of the level.
 *
 * Coordinate System: Y-UP
 * - Row 0 is the bottom line of the map
 * - Tiles are emitted column by column, bottom to top
 *
 * Legend:
 *   #  wall          .  floor         P  player (on floor)
 *   D  door          L  lever         l  wall-mounted lever
 *   1  computer (T1) 2  computer (T2) _  pressure plate
 *   I  iris scanner  T  trigger       C  crate (on floor)
 *      (space) empty
 *
 * @module examples/puzzle/levels
 */

import type { GridPosition } from "@signalworks/grid";
import { formatPosition, positionKey } from "@signalworks/grid";
import type { ActivationMethod, PropertyBag, TileKind, TileRecord } from "@signalworks/signals";
import {
  ACTIVATION_METHODS,
  collectDiagnostics,
  isSenderKind,
  LevelSession,
} from "@signalworks/signals";
import type { PuzzleLevel } from "./types.js";

// =============================================================================
// Tile Maps
// =============================================================================

/** Texture variant of senders mounted on a wall; they block movement */
export const WALL_MOUNTED_VARIANT = "lever_wallup";

interface LegendEntry {
  kinds: readonly TileKind[];
  textureVariant?: string;
  crate?: boolean;
}

const TILE_LEGEND: Readonly<Record<string, LegendEntry>> = {
  "#": { kinds: ["wall"] },
  ".": { kinds: ["floor"] },
  P: { kinds: ["floor", "player"] },
  D: { kinds: ["floor", "door"] },
  L: { kinds: ["floor", "lever"] },
  l: { kinds: ["wall", "lever"], textureVariant: WALL_MOUNTED_VARIANT },
  "1": { kinds: ["floor", "computerT1"] },
  "2": { kinds: ["floor", "computerT2"] },
  _: { kinds: ["floor", "pressurePlate"] },
  I: { kinds: ["floor", "irisScanner"] },
  T: { kinds: ["floor", "trigger"] },
  C: { kinds: ["floor"], crate: true },
  " ": { kinds: [] },
};

/**
 * Tile records and crate positions read from an ASCII map.
 */
export interface TileMap {
  tiles: TileRecord[];
  crates: GridPosition[];
}

/**
 * Convert an ASCII map to tile records.
 *
 * @param map - Map lines, top line first
 * @throws Error on a character with no legend entry
 */
export function tilesFromMap(map: readonly string[]): TileMap {
  const tiles: TileRecord[] = [];
  const crates: GridPosition[] = [];
  const rows = map.length;
  const columns = Math.max(0, ...map.map((line) => line.length));

  for (let col = 0; col < columns; col++) {
    for (let row = 0; row < rows; row++) {
      const char = map[rows - 1 - row]?.[col] ?? " ";
      const entry = TILE_LEGEND[char];
      const position = { col, row };
      if (!entry) {
        throw new Error(`[Levels] Unknown tile character "${char}" at ${formatPosition(position)}`);
      }
      for (const kind of entry.kinds) {
        const record: TileRecord = { position, kind };
        if (entry.textureVariant !== undefined && isSenderKind(kind)) {
          record.textureVariant = entry.textureVariant;
        }
        tiles.push(record);
      }
      if (entry.crate) {
        crates.push(position);
      }
    }
  }

  return { tiles, crates };
}

function defineLevel(
  id: string,
  name: string,
  description: string,
  map: readonly string[],
  properties: PropertyBag,
): PuzzleLevel {
  const { tiles, crates } = tilesFromMap(map);
  return { id, name, description, tiles, crates, properties };
}

// =============================================================================
// Built-in Levels
// =============================================================================

/**
 * One lever opens the exit.
 */
export const LEVEL_FIRST_STEPS: PuzzleLevel = defineLevel(
  "first-steps",
  "First Steps",
  "Pull the lever to open the door",
  [
    "#######",
    "#P.L.D#",
    "#######",
  ],
  {
    exitAt: "5,1",
    requisite_5_1: "any;3,1",
    levelLink: "heavy-lifting",
  },
);

/**
 * Push the crate onto the pressure plate.
 */
export const LEVEL_HEAVY_LIFTING: PuzzleLevel = defineLevel(
  "heavy-lifting",
  "Heavy Lifting",
  "Something heavy has to hold the plate down",
  [
    "########",
    "#P.C_.D#",
    "########",
  ],
  {
    exitAt: "6,1",
    requisite_6_1: "any;4,1",
    levelLink: "two-keys",
  },
);

/**
 * A lever and a USB-only computer, both required.
 */
export const LEVEL_TWO_KEYS: PuzzleLevel = defineLevel(
  "two-keys",
  "Two Keys",
  "The door needs the lever and the computer",
  [
    "#########",
    "#P.L.2.D#",
    "#########",
  ],
  {
    exitAt: "7,1",
    requisite_7_1: ["all", "3,1", "5,1"],
    availableCostumes: 1,
    startingCostume: "Default",
    levelLink: "over-the-wall",
  },
);

/**
 * Fly over a wall as a bird to reach the trigger.
 */
export const LEVEL_OVER_THE_WALL: PuzzleLevel = defineLevel(
  "over-the-wall",
  "Over the Wall",
  "Birds are not stopped by walls",
  [
    "########",
    "#P.#.TD#",
    "########",
  ],
  {
    exitAt: "6,1",
    requisite_6_1: "any;5,1",
    availableCostumes: 2,
    startingCostume: "Bird",
  },
);

// =============================================================================
// Level Registry
// =============================================================================

/**
 * All available levels indexed by ID.
 */
export const LEVELS: Record<string, PuzzleLevel> = {
  "first-steps": LEVEL_FIRST_STEPS,
  "heavy-lifting": LEVEL_HEAVY_LIFTING,
  "two-keys": LEVEL_TWO_KEYS,
  "over-the-wall": LEVEL_OVER_THE_WALL,
};

/**
 * Get a level by ID.
 * @param levelId - The level ID to look up
 * @returns The level, or undefined if not found
 */
export function getLevel(levelId: string): PuzzleLevel | undefined {
  return LEVELS[levelId];
}

/**
 * Get all available level IDs.
 */
export function getLevelIds(): string[] {
  return Object.keys(LEVELS);
}

/**
 * Get all available levels as an array.
 */
export function getAllLevels(): PuzzleLevel[] {
  return Object.values(LEVELS);
}

/**
 * The level a new game starts with.
 */
export const DEFAULT_LEVEL = LEVEL_FIRST_STEPS;

// =============================================================================
// Level Validation
// =============================================================================

/**
 * Validation result for a level.
 */
export interface LevelValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Validate a level.
 * Loads the level's signal network without running it: anything that would
 * abort the level is an error, degraded wiring is a warning.
 *
 * @param level - The level to validate
 * @returns Validation result with errors and warnings
 */
export function validateLevel(level: PuzzleLevel): LevelValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  // Check required fields
  if (!level.id || level.id.trim() === "") {
    errors.push("Level must have an id");
  }
  if (!level.name || level.name.trim() === "") {
    errors.push("Level must have a name");
  }

  // Tile positions must be on the grid
  const floors = new Set<string>();
  let positionsValid = true;
  for (const [i, tile] of level.tiles.entries()) {
    if (!isGridPosition(tile.position)) {
      errors.push(`Tile ${i} has an invalid position`);
      positionsValid = false;
    } else if (tile.kind === "floor") {
      floors.add(positionKey(tile.position));
    }
  }

  // Crates sit on floor, one per tile
  const crateKeys = new Set<string>();
  for (const crate of level.crates) {
    const key = positionKey(crate);
    if (crateKeys.has(key)) {
      errors.push(`Two crates at ${formatPosition(crate)}`);
    }
    crateKeys.add(key);
    if (!floors.has(key)) {
      warnings.push(`Crate at ${formatPosition(crate)} is not on a floor tile`);
    }
  }

  // Dry-load the signal network
  if (positionsValid) {
    const diagnostics = collectDiagnostics();
    LevelSession.load(level, { diagnostics });
    for (const diagnostic of diagnostics.diagnostics) {
      if (diagnostic.severity === "fatal") {
        errors.push(diagnostic.message);
      } else {
        warnings.push(diagnostic.message);
      }
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

// =============================================================================
// JSON Loading
// =============================================================================

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isGridPosition = (value: unknown): value is GridPosition =>
  isRecord(value) &&
  typeof value.col === "number" &&
  typeof value.row === "number" &&
  Number.isInteger(value.col) &&
  Number.isInteger(value.row) &&
  value.col >= 0 &&
  value.row >= 0;

const BASE_TILE_KINDS: readonly string[] = ["wall", "floor", "player", "door"];

const isTileKind = (value: unknown): value is TileKind =>
  typeof value === "string" && (BASE_TILE_KINDS.includes(value) || isSenderKind(value));

const isActivationMethod = (value: unknown): value is ActivationMethod =>
  ACTIVATION_METHODS.some((method) => method === value);

function parseTileRecord(value: unknown, index: number): TileRecord {
  if (!isRecord(value) || !isGridPosition(value.position) || !isTileKind(value.kind)) {
    throw new Error(`Tile ${index} is not a valid tile record`);
  }
  const tile: TileRecord = { position: value.position, kind: value.kind };
  if (typeof value.textureVariant === "string") {
    tile.textureVariant = value.textureVariant;
  }
  if (value.methods !== undefined) {
    if (!Array.isArray(value.methods) || !value.methods.every(isActivationMethod)) {
      throw new Error(`Tile ${index} has invalid activation methods`);
    }
    tile.methods = value.methods;
  }
  if (value.cooldownMs !== undefined) {
    if (typeof value.cooldownMs !== "number") {
      throw new Error(`Tile ${index} has an invalid cooldown`);
    }
    tile.cooldownMs = value.cooldownMs;
  }
  return tile;
}

/**
 * Parse and validate a level from JSON.
 * This is useful for loading user-created levels.
 *
 * The level gives its tiles either as tile records (`tiles`) or as an ASCII
 * map (`map`, top line first).
 *
 * @param json - The JSON string or object to parse
 * @returns The validated level
 * @throws Error if the JSON is invalid or the level fails validation
 */
export function parseLevelFromJson(json: string | object): PuzzleLevel {
  let data: unknown;

  if (typeof json === "string") {
    try {
      data = JSON.parse(json);
    } catch {
      throw new Error("Invalid JSON format");
    }
  } else {
    data = json;
  }

  if (!isRecord(data)) {
    throw new Error("Level must be an object");
  }

  // Required fields
  if (typeof data.id !== "string") {
    throw new Error("Level must have a string 'id' field");
  }
  if (typeof data.name !== "string") {
    throw new Error("Level must have a string 'name' field");
  }

  // Tiles
  let tiles: TileRecord[];
  const crates: GridPosition[] = [];
  const map = data.map;
  if (Array.isArray(data.tiles)) {
    tiles = data.tiles.map(parseTileRecord);
  } else if (Array.isArray(map) && map.every((line): line is string => typeof line === "string")) {
    const parsed = tilesFromMap(map);
    tiles = parsed.tiles;
    crates.push(...parsed.crates);
  } else {
    throw new Error("Level must have a 'tiles' array or a 'map' of strings");
  }

  if (Array.isArray(data.crates)) {
    for (const crate of data.crates) {
      if (!isGridPosition(crate)) {
        throw new Error("Crate positions must be { col, row } grid positions");
      }
      crates.push(crate);
    }
  }

  const level: PuzzleLevel = {
    id: data.id,
    name: data.name,
    tiles,
    crates,
    properties: isRecord(data.properties) ? data.properties : {},
  };
  if (typeof data.description === "string") {
    level.description = data.description;
  }

  const validation = validateLevel(level);
  if (!validation.valid) {
    throw new Error(`Invalid level: ${validation.errors.join("; ")}`);
  }

  return level;
}
