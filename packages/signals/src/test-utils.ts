/**
 * Test utilities for signal network tests.
 */

import type { GridPosition, Vector2 } from "@signalworks/grid";
import type {
  ActivationMethod,
  Costume,
  DynamicObjectSample,
  PlayerSample,
  SenderKind,
  Stimulus,
  StimulusPredicate,
  TileKind,
  TileRecord,
} from "./core/types.js";
import { SignalSender } from "./sender/signal-sender.js";
import { SignalReceiver } from "./receiver/signal-receiver.js";

/**
 * Stimulus with no player, no use intent and no objects.
 */
export function createEmptyStimulus(): Stimulus {
  return { player: null, use: false, objects: [] };
}

/**
 * Create a player sample. World position defaults to the origin.
 */
export function createTestPlayer(overrides: Partial<PlayerSample> = {}): PlayerSample {
  return {
    gridPosition: overrides.gridPosition ?? { col: 0, row: 0 },
    worldPosition: overrides.worldPosition ?? { x: 0, y: 0 },
    costume: overrides.costume ?? "default",
  };
}

/**
 * Stimulus with the player standing at a world position.
 */
export function stimulusAt(
  worldPosition: Vector2,
  options: { use?: boolean; costume?: Costume; objects?: DynamicObjectSample[] } = {},
): Stimulus {
  return {
    player: createTestPlayer({ worldPosition, costume: options.costume ?? "default" }),
    use: options.use ?? false,
    objects: options.objects ?? [],
  };
}

/**
 * A predicate that returns whatever the returned `set` last stored.
 */
export function createSwitchPredicate(initial = false): {
  predicate: StimulusPredicate;
  set: (value: boolean) => void;
} {
  let value = initial;
  return {
    predicate: () => value,
    set: (next) => {
      value = next;
    },
  };
}

/**
 * Create a sender at a grid position with a controllable predicate.
 */
export function createTestSender(
  position: GridPosition,
  predicate: StimulusPredicate,
  options: { kind?: SenderKind; methods?: ActivationMethod[]; cooldownMs?: number } = {},
): SignalSender {
  return new SignalSender({
    position,
    worldPosition: { x: position.col * 128, y: position.row * 128 },
    kind: options.kind ?? "lever",
    methods: options.methods ?? ["byIntervention"],
    cooldownMs: options.cooldownMs,
    predicate,
  });
}

export function createTestReceiver(position: GridPosition): SignalReceiver {
  return new SignalReceiver({
    position,
    worldPosition: { x: position.col * 128, y: position.row * 128 },
  });
}

/**
 * Tile record shorthand.
 */
export const tile = (col: number, row: number, kind: TileKind): TileRecord => ({
  position: { col, row },
  kind,
});

/**
 * A floor strip along row 0 from column 0 to `columns - 1`, with the player
 * on the first tile.
 */
export function createFloorStrip(columns: number): TileRecord[] {
  const tiles: TileRecord[] = [tile(0, 0, "player")];
  for (let col = 0; col < columns; col++) {
    tiles.push(tile(col, 0, "floor"));
  }
  return tiles;
}

