import { collectDiagnostics } from "@signalworks/signals";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { PuzzleGame } from "./game.js";
import { createTestLevel } from "./test-utils.js";

describe("PuzzleGame", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function createGame(onReturnToMenu?: (target: string) => void) {
    return new PuzzleGame({ diagnostics: collectDiagnostics(), onReturnToMenu });
  }

  describe("loading", () => {
    it("should start in the menu", () => {
      const game = createGame();
      expect(game.state).toBe("menu");
      expect(game.tick()).toBeNull();
      expect(game.apply({ type: "use" })).toBe(false);
    });

    it("should place the player at the level's start", () => {
      const game = createGame();
      game.loadLevel("first-steps");

      expect(game.state).toBe("playing");
      expect(game.player?.gridPosition).toEqual({ col: 1, row: 1 });
      expect(game.player?.costume).toBe("default");
      expect(game.lastLoadedLevel).toBe("first-steps");
    });

    it("should reject unknown levels", () => {
      expect(() => createGame().loadLevel("nope")).toThrow('[PuzzleGame] Unknown level "nope"');
    });

    it("should stay in the menu when a level aborts", () => {
      const game = new PuzzleGame({
        diagnostics: collectDiagnostics(),
        levels: { broken: createTestLevel("broken", ["#.D#"], { exitAt: "2,0" }) },
      });

      const session = game.loadLevel("broken");

      expect(session.state).toBe("aborted");
      expect(game.state).toBe("menu");
      expect(game.player).toBeNull();
    });

    it("should restart the last loaded level", () => {
      const game = createGame();
      game.loadLevel("first-steps");
      game.apply({ type: "move", direction: "east" });

      game.restartLevel();

      expect(game.player?.gridPosition).toEqual({ col: 1, row: 1 });
    });

    it("should refuse to restart before any level loaded", () => {
      expect(() => createGame().restartLevel()).toThrow("[PuzzleGame] No level to restart");
    });
  });

  describe("playing", () => {
    it("should only use a lever within reach", () => {
      const game = createGame();
      game.loadLevel("first-steps");

      game.apply({ type: "use" });
      expect(game.tick(16)?.exitSatisfied).toBe(false);

      game.apply({ type: "move", direction: "east" });
      game.apply({ type: "use" });
      expect(game.tick(16)?.exitSatisfied).toBe(true);
    });

    it("should advance to the linked level on completion", () => {
      const game = createGame();
      game.loadLevel("first-steps");
      game.apply({ type: "move", direction: "east" });
      game.apply({ type: "use" });
      game.tick(16);

      const result = game.tick(16);

      expect(result?.state).toBe("completed");
      expect(game.lastLoadedLevel).toBe("heavy-lifting");
      expect(game.session?.id).toBe("heavy-lifting");
      expect(game.session?.state).toBe("ready");
    });

    it("should hold a pressure plate down with a pushed crate", () => {
      const game = createGame();
      game.loadLevel("heavy-lifting");

      game.apply({ type: "move", direction: "east" });
      expect(game.apply({ type: "move", direction: "east" })).toBe(true);
      expect(game.crates.map((c) => c.gridPosition)).toEqual([{ col: 4, row: 1 }]);

      expect(game.tick(16)?.exitSatisfied).toBe(true);
    });

    it("should need the right costume for a computer", () => {
      const game = createGame();
      game.loadLevel("two-keys");
      game.apply({ type: "move", direction: "east" });
      game.apply({ type: "move", direction: "east" });
      game.apply({ type: "move", direction: "east" });
      expect(game.player?.gridPosition).toEqual({ col: 4, row: 1 });

      game.apply({ type: "use" });
      expect(game.tick(16)?.exitSatisfied).toBe(false);
      expect(game.session?.network.getSender("3_1")?.active).toBe(true);

      expect(game.apply({ type: "nextCostume" })).toBe(true);
      expect(game.player?.costume).toBe("flashDrive");
      game.apply({ type: "use" });
      expect(game.tick(16)?.exitSatisfied).toBe(true);
    });

    it("should keep the player out of a closed door", () => {
      const game = createGame();
      game.loadLevel("first-steps");
      game.apply({ type: "move", direction: "east" });
      game.apply({ type: "move", direction: "east" });
      game.apply({ type: "move", direction: "east" });

      expect(game.apply({ type: "move", direction: "east" })).toBe(false);
      expect(game.player?.gridPosition).toEqual({ col: 4, row: 1 });
    });

    it("should return to the menu after the last level", () => {
      const onReturnToMenu = vi.fn();
      const game = createGame(onReturnToMenu);
      game.loadLevel("over-the-wall");
      expect(game.player?.costume).toBe("bird");

      for (let i = 0; i < 4; i++) {
        expect(game.apply({ type: "move", direction: "east" })).toBe(true);
      }
      game.tick(16);
      game.tick(16);

      expect(game.state).toBe("menu");
      expect(game.session).toBeNull();
      expect(game.lastLoadedLevel).toBe("over-the-wall");
      expect(onReturnToMenu).toHaveBeenCalledWith("MainMenu");
    });

    it("should not switch costumes when only one is available", () => {
      const game = createGame();
      game.loadLevel("first-steps");
      expect(game.apply({ type: "nextCostume" })).toBe(false);
    });
  });
});
