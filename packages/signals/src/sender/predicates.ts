/**
 * Kind-specific activation predicates.
 *
 * Each sender gets its predicate from a registry keyed by kind, so new sender
 * kinds (or level-specific variations) only need a registry entry. The
 * defaults depend on the tile size because "in range" is measured in tiles.
 */

import type { TileSize } from "@signalworks/grid";
import { distance } from "@signalworks/grid";
import {
  IRIS_SCANNER_COOLDOWN_MS,
  PRESSURE_PLATE_MIN_MASS,
  PRESSURE_PLATE_RADIUS,
} from "../constants.js";
import type {
  ActivationMethod,
  Costume,
  SenderKind,
  StimulusPredicate,
} from "../core/types.js";

/**
 * Predicate for every sender kind.
 */
export type PredicateRegistry = Record<SenderKind, StimulusPredicate>;

/**
 * Tuning for the default predicates.
 */
export interface PredicateConfig {
  /** Tile size of the level; use range is one tile, trigger range half a tile */
  tileSize: TileSize;
  /** Pressure plate radius (default: PRESSURE_PLATE_RADIUS) */
  plateRadius?: number;
  /** Minimum object mass for pressure plates (default: PRESSURE_PLATE_MIN_MASS) */
  plateMinMass?: number;
}

/**
 * Pressure plate: a heavy enough object strictly inside the radius, or the
 * player within the radius.
 */
export function pressurePlatePredicate(
  radius: number = PRESSURE_PLATE_RADIUS,
  minMass: number = PRESSURE_PLATE_MIN_MASS,
): StimulusPredicate {
  return (stimulus, sender) => {
    for (const object of stimulus.objects) {
      if (object.mass >= minMass && distance(object.worldPosition, sender.worldPosition) < radius) {
        return true;
      }
    }
    const player = stimulus.player;
    return player !== null && distance(player.worldPosition, sender.worldPosition) <= radius;
  };
}

/**
 * Use-activated sender: the player pressed "use" this tick within range,
 * optionally wearing a required costume.
 */
export function usePredicate(range: number, requiredCostume?: Costume): StimulusPredicate {
  return (stimulus, sender) => {
    const player = stimulus.player;
    if (!stimulus.use || player === null) return false;
    if (requiredCostume !== undefined && player.costume !== requiredCostume) return false;
    return distance(player.worldPosition, sender.worldPosition) <= range;
  };
}

/**
 * Proximity trigger: the player is standing on (within range of) the sender.
 */
export function proximityPredicate(range: number): StimulusPredicate {
  return (stimulus, sender) => {
    const player = stimulus.player;
    return player !== null && distance(player.worldPosition, sender.worldPosition) <= range;
  };
}

/**
 * Build the default predicate registry for a level.
 *
 * Use-activated senders reach one full tile (inclusive) rather than the strict
 * half tile of an on-the-spot check, so the player can use a lever or computer
 * from a neighbouring tile. Triggers keep the half-tile reach.
 */
export function createDefaultPredicates(config: PredicateConfig): PredicateRegistry {
  const useRange = Math.max(config.tileSize.width, config.tileSize.height);
  const standRange = Math.min(config.tileSize.width, config.tileSize.height) / 2;
  return {
    lever: usePredicate(useRange),
    computerT1: usePredicate(useRange, "bird"),
    computerT2: usePredicate(useRange, "flashDrive"),
    irisScanner: usePredicate(useRange),
    trigger: proximityPredicate(standRange),
    pressurePlate: pressurePlatePredicate(config.plateRadius, config.plateMinMass),
  };
}

/**
 * Default activation behaviour of each sender kind.
 */
export interface SenderDefaults {
  methods: readonly ActivationMethod[];
  cooldownMs: number;
}

export const SENDER_DEFAULTS: Readonly<Record<SenderKind, SenderDefaults>> = {
  lever: { methods: ["oncePermanently"], cooldownMs: 0 },
  computerT1: { methods: ["oncePermanently"], cooldownMs: 0 },
  computerT2: { methods: ["oncePermanently"], cooldownMs: 0 },
  trigger: { methods: ["byIntervention"], cooldownMs: 0 },
  pressurePlate: { methods: ["byIntervention"], cooldownMs: 0 },
  irisScanner: { methods: ["byIntervention", "onTimer"], cooldownMs: IRIS_SCANNER_COOLDOWN_MS },
};
