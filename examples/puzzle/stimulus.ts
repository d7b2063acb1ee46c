import type { Stimulus } from "@signalworks/signals";
import type { Crate, PuzzlePlayer } from "./types.js";

/**
 * Sample the player and crates into a stimulus for one tick.
 */
export function createStimulus(
  player: PuzzlePlayer | null,
  use: boolean,
  crates: readonly Crate[],
): Stimulus {
  return {
    player: player && {
      gridPosition: player.gridPosition,
      worldPosition: player.worldPosition,
      costume: player.costume,
    },
    use,
    objects: crates.map((crate) => ({ worldPosition: crate.worldPosition, mass: crate.mass })),
  };
}
