/**
 * Costume sets and costume cycling.
 */

import type { Costume } from "@signalworks/signals";
import { MAX_COSTUME_SET } from "@signalworks/signals";

/**
 * Costumes available for each costume set id. Each set extends the previous one.
 */
const COSTUME_SETS: readonly (readonly Costume[])[] = [
  ["default"],
  ["default", "flashDrive"],
  ["default", "flashDrive", "bird"],
  ["default", "flashDrive", "bird", "sorceress"],
];

/**
 * Costumes for a costume set id. Ids outside 0..MAX_COSTUME_SET give the
 * default costume only.
 */
export function getCostumeSet(id: number): readonly Costume[] {
  if (!Number.isInteger(id) || id < 0 || id > MAX_COSTUME_SET) {
    return COSTUME_SETS[0] ?? ["default"];
  }
  return COSTUME_SETS[id] ?? ["default"];
}

/**
 * The costume after `current`, wrapping around. A costume that is not in the
 * set moves to the first one.
 */
export function nextCostume(costumes: readonly Costume[], current: Costume): Costume {
  return cycle(costumes, current, 1);
}

/**
 * The costume before `current`, wrapping around.
 */
export function previousCostume(costumes: readonly Costume[], current: Costume): Costume {
  return cycle(costumes, current, -1);
}

function cycle(costumes: readonly Costume[], current: Costume, step: 1 | -1): Costume {
  const index = costumes.indexOf(current);
  if (index === -1) {
    return costumes[0] ?? current;
  }
  const next = (index + step + costumes.length) % costumes.length;
  return costumes[next] ?? current;
}

/**
 * Starting costume for a level: the configured costume if the set has it,
 * otherwise the set's first costume.
 */
export function resolveStartingCostume(costumes: readonly Costume[], preferred: Costume): Costume {
  return costumes.includes(preferred) ? preferred : (costumes[0] ?? "default");
}
