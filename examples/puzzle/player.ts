/**
 * Puzzle player movement.
 *
 * The player moves one tile at a time. A move is blocked by:
 * - tiles with neither floor nor wall (outside the level)
 * - walls, unless the player wears the bird costume
 * - senders mounted on a wall
 * - closed doors
 * A crate in the way is pushed one tile along if the tile behind it is free.
 */

import type { Direction, GridPosition, PositionKey, TileLayout } from "@signalworks/grid";
import { gridToWorld, positionKey, positionsEqual, stepPosition } from "@signalworks/grid";
import type { Costume, TileRecord } from "@signalworks/signals";
import { isSenderKind } from "@signalworks/signals";
import { WALL_MOUNTED_VARIANT } from "./levels.js";
import type { Crate, PuzzlePlayer } from "./types.js";
import { CRATE_MASS } from "./types.js";

// =============================================================================
// Level Grid
// =============================================================================

/**
 * Static collision view of a level's tiles.
 */
export class LevelGrid {
  readonly layout: TileLayout;
  private readonly walls = new Set<PositionKey>();
  private readonly floors = new Set<PositionKey>();
  private readonly wallMounted = new Set<PositionKey>();

  constructor(tiles: readonly TileRecord[], layout: TileLayout) {
    this.layout = layout;
    for (const tile of tiles) {
      const key = positionKey(tile.position);
      if (tile.kind === "wall") {
        this.walls.add(key);
      } else if (tile.kind === "floor") {
        this.floors.add(key);
      } else if (isSenderKind(tile.kind) && tile.textureVariant === WALL_MOUNTED_VARIANT) {
        this.wallMounted.add(key);
      }
    }
  }

  isWall(position: GridPosition): boolean {
    return this.walls.has(positionKey(position));
  }

  hasFloor(position: GridPosition): boolean {
    return this.floors.has(positionKey(position));
  }

  isWallMounted(position: GridPosition): boolean {
    return this.wallMounted.has(positionKey(position));
  }
}

/**
 * What movement needs to know about the level at the time of the move.
 */
export interface MovementWorld {
  grid: LevelGrid;
  /** Whether a closed door occupies the position */
  isDoorClosed: (position: GridPosition) => boolean;
  crates: readonly Crate[];
}

/**
 * Result of a move attempt.
 */
export interface MoveResult {
  player: PuzzlePlayer;
  crates: Crate[];
  moved: boolean;
  /** Crate pushed by this move, if any */
  pushed: Crate | null;
}

// =============================================================================
// Movement
// =============================================================================

/**
 * Whether something wearing `costume` may occupy a tile (ignoring crates).
 */
export function canEnter(world: MovementWorld, position: GridPosition, costume: Costume): boolean {
  const { grid } = world;
  if (grid.isWallMounted(position) || world.isDoorClosed(position)) {
    return false;
  }
  if (grid.isWall(position)) {
    return costume === "bird";
  }
  return grid.hasFloor(position);
}

const crateAt = (crates: readonly Crate[], position: GridPosition): Crate | undefined =>
  crates.find((crate) => positionsEqual(crate.gridPosition, position));

/**
 * Try to move the player one tile.
 */
export function movePlayer(
  player: PuzzlePlayer,
  direction: Direction,
  world: MovementWorld,
): MoveResult {
  const blocked: MoveResult = { player, crates: [...world.crates], moved: false, pushed: null };
  const target = stepPosition(player.gridPosition, direction);

  if (!canEnter(world, target, player.costume)) {
    return blocked;
  }

  let crates = [...world.crates];
  let pushed: Crate | null = null;
  const crate = crateAt(crates, target);
  if (crate) {
    const beyond = stepPosition(target, direction);
    // Crates cannot fly
    if (!canEnter(world, beyond, "default") || crateAt(crates, beyond)) {
      return blocked;
    }
    const moved = createCrate(crate.id, beyond, world.grid.layout);
    crates = crates.map((c) => (c === crate ? moved : c));
    pushed = moved;
  }

  return {
    player: {
      ...player,
      gridPosition: target,
      worldPosition: gridToWorld(target, world.grid.layout),
    },
    crates,
    moved: true,
    pushed,
  };
}

// =============================================================================
// Factories
// =============================================================================

/**
 * Create a player standing on a tile.
 */
export function createPuzzlePlayer(
  position: GridPosition,
  layout: TileLayout,
  costumes: readonly Costume[],
  costume: Costume,
): PuzzlePlayer {
  return {
    gridPosition: position,
    worldPosition: gridToWorld(position, layout),
    costume,
    costumes,
  };
}

/**
 * Create a crate on a tile.
 */
export function createCrate(id: string, position: GridPosition, layout: TileLayout): Crate {
  return {
    id,
    gridPosition: position,
    worldPosition: gridToWorld(position, layout),
    mass: CRATE_MASS,
  };
}

/**
 * Crates for a level's starting positions.
 */
export function createCrates(positions: readonly GridPosition[], layout: TileLayout): Crate[] {
  return positions.map((position) =>
    createCrate(`crate-${positionKey(position)}`, position, layout),
  );
}
