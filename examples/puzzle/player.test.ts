import type { Costume } from "@signalworks/signals";
import { describe, expect, it } from "vitest";
import type { MovementWorld } from "./player.js";
import { createPuzzlePlayer, movePlayer } from "./player.js";
import { createTestWorld } from "./test-utils.js";

function playerIn(world: MovementWorld, col: number, row: number, costume: Costume = "default") {
  return createPuzzlePlayer({ col, row }, world.grid.layout, ["default", "bird"], costume);
}

describe("movePlayer", () => {
  it("should step onto floor", () => {
    const world = createTestWorld(["#.#", "#P#", "###"]);
    const result = movePlayer(playerIn(world, 1, 1), "north", world);

    expect(result.moved).toBe(true);
    expect(result.player.gridPosition).toEqual({ col: 1, row: 2 });
    // 3x3 layout of 128-unit tiles: (1, 2) is centered at (0, 128)
    expect(result.player.worldPosition).toEqual({ x: 0, y: 128 });
  });

  it("should be blocked by walls", () => {
    const world = createTestWorld(["###", "#P#", "###"]);
    const player = playerIn(world, 1, 1);
    for (const direction of ["north", "south", "east", "west"] as const) {
      expect(movePlayer(player, direction, world).moved).toBe(false);
    }
  });

  it("should let a bird cross walls but not leave the level", () => {
    const world = createTestWorld(["#P#"]);
    const bird = playerIn(world, 1, 0, "bird");

    const onWall = movePlayer(bird, "east", world);
    expect(onWall.moved).toBe(true);
    expect(onWall.player.gridPosition).toEqual({ col: 2, row: 0 });

    expect(movePlayer(onWall.player, "east", world).moved).toBe(false);
  });

  it("should be blocked by a wall-mounted lever, even as a bird", () => {
    const world = createTestWorld(["#Pl#"]);
    expect(movePlayer(playerIn(world, 1, 0, "bird"), "east", world).moved).toBe(false);
  });

  it("should be blocked by a closed door", () => {
    const world = createTestWorld(["#PD#"], [{ col: 2, row: 0 }]);
    expect(movePlayer(playerIn(world, 1, 0), "east", world).moved).toBe(false);

    const open = createTestWorld(["#PD#"]);
    expect(movePlayer(playerIn(open, 1, 0), "east", open).moved).toBe(true);
  });

  describe("crates", () => {
    it("should push a crate onto a free tile", () => {
      const world = createTestWorld(["#PC.#"]);
      const result = movePlayer(playerIn(world, 1, 0), "east", world);

      expect(result.moved).toBe(true);
      expect(result.player.gridPosition).toEqual({ col: 2, row: 0 });
      expect(result.pushed?.id).toBe("crate-2_0");
      expect(result.crates.map((c) => c.gridPosition)).toEqual([{ col: 3, row: 0 }]);
    });

    it("should not push a crate into a wall", () => {
      const world = createTestWorld(["#PC#"]);
      const result = movePlayer(playerIn(world, 1, 0, "bird"), "east", world);

      expect(result.moved).toBe(false);
      expect(result.crates.map((c) => c.gridPosition)).toEqual([{ col: 2, row: 0 }]);
    });

    it("should not push two crates at once", () => {
      const world = createTestWorld(["#PCC.#"]);
      expect(movePlayer(playerIn(world, 1, 0), "east", world).moved).toBe(false);
    });
  });
});
