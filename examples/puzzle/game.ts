/**
 * Puzzle game context.
 *
 * Owns the current level session and the player/crate state around it:
 * - applies player commands (move, use, costume switching)
 * - samples a stimulus and ticks the session
 * - advances to the configured next level when a level completes, or
 *   returns to the menu when the next level is not a known level
 */

import type { DiagnosticSink, LevelSessionConfig, TickResult } from "@signalworks/signals";
import { consoleDiagnostics, LevelSession } from "@signalworks/signals";
import { getCostumeSet, nextCostume, previousCostume, resolveStartingCostume } from "./costumes.js";
import { LEVELS } from "./levels.js";
import type { MovementWorld } from "./player.js";
import { createCrates, createPuzzlePlayer, LevelGrid, movePlayer } from "./player.js";
import { createStimulus } from "./stimulus.js";
import type { Crate, PlayerCommand, PuzzleGameState, PuzzleLevel, PuzzlePlayer } from "./types.js";

/**
 * Configuration for a puzzle game
 */
export interface PuzzleGameConfig {
  /** Levels by id (default: the built-in levels) */
  levels?: Readonly<Record<string, PuzzleLevel>>;
  /** Diagnostic sink for every session (default: console) */
  diagnostics?: DiagnosticSink;
  /** Extra session settings (hooks, predicate overrides) */
  session?: Omit<LevelSessionConfig, "diagnostics" | "onComplete">;
  /** Called after a level session has loaded */
  onLevelLoaded?: (session: LevelSession) => void;
  /** Called when a completed level links to something that is not a level */
  onReturnToMenu?: (target: string) => void;
}

export class PuzzleGame {
  private readonly levels: Readonly<Record<string, PuzzleLevel>>;
  private readonly sink: DiagnosticSink;
  private readonly config: PuzzleGameConfig;

  private currentState: PuzzleGameState = "menu";
  private currentSession: LevelSession | null = null;
  private grid: LevelGrid | null = null;
  private currentPlayer: PuzzlePlayer | null = null;
  private currentCrates: Crate[] = [];
  private lastLoaded: string | null = null;
  private pendingUse = false;
  private pendingNext: string | null = null;

  constructor(config: PuzzleGameConfig = {}) {
    this.config = config;
    this.levels = config.levels ?? LEVELS;
    this.sink = config.diagnostics ?? consoleDiagnostics;
  }

  get state(): PuzzleGameState {
    return this.currentState;
  }

  get session(): LevelSession | null {
    return this.currentSession;
  }

  get player(): PuzzlePlayer | null {
    return this.currentPlayer;
  }

  get crates(): readonly Crate[] {
    return this.currentCrates;
  }

  /** Id of the most recently loaded level, kept after returning to the menu */
  get lastLoadedLevel(): string | null {
    return this.lastLoaded;
  }

  /**
   * Load a level and start playing it.
   *
   * @throws Error if the level id is unknown
   */
  loadLevel(levelId: string): LevelSession {
    const level = this.levels[levelId];
    if (!level) {
      throw new Error(`[PuzzleGame] Unknown level "${levelId}"`);
    }

    const session = LevelSession.load(level, {
      ...this.config.session,
      diagnostics: this.sink,
      onComplete: (nextLevelName) => {
        this.pendingNext = nextLevelName;
      },
    });

    this.currentSession = session;
    this.lastLoaded = levelId;
    this.pendingUse = false;
    this.pendingNext = null;
    this.grid = new LevelGrid(level.tiles, session.layout);
    this.currentCrates = createCrates(level.crates, session.layout);

    const start = session.playerStart;
    if (session.state === "aborted" || start === null) {
      console.error(`[PuzzleGame] Level "${levelId}" could not be loaded`);
      this.currentPlayer = null;
      this.currentState = "menu";
    } else {
      const costumes = getCostumeSet(session.configuration.costumeSet);
      const costume = resolveStartingCostume(costumes, session.configuration.startingCostume);
      this.currentPlayer = createPuzzlePlayer(start, session.layout, costumes, costume);
      this.currentState = "playing";
      console.log(`[PuzzleGame] Loaded level "${levelId}"`);
    }

    this.config.onLevelLoaded?.(session);
    return session;
  }

  /**
   * Reload the most recently loaded level.
   *
   * @throws Error if no level has been loaded yet
   */
  restartLevel(): LevelSession {
    if (this.lastLoaded === null) {
      throw new Error("[PuzzleGame] No level to restart");
    }
    return this.loadLevel(this.lastLoaded);
  }

  /**
   * Apply a player command. Moves and costume changes take effect
   * immediately; "use" is sampled by the next tick.
   *
   * @returns Whether the command changed anything
   */
  apply(command: PlayerCommand): boolean {
    const player = this.currentPlayer;
    const session = this.currentSession;
    const grid = this.grid;
    if (this.currentState !== "playing" || player === null || session === null || grid === null) {
      return false;
    }

    switch (command.type) {
      case "move": {
        const world: MovementWorld = {
          grid,
          crates: this.currentCrates,
          isDoorClosed: (position) => session.network.getReceiverAt(position)?.active === false,
        };
        const result = movePlayer(player, command.direction, world);
        this.currentPlayer = result.player;
        this.currentCrates = result.crates;
        return result.moved;
      }
      case "use":
        this.pendingUse = true;
        return true;
      case "nextCostume":
      case "previousCostume": {
        const switchCostume = command.type === "nextCostume" ? nextCostume : previousCostume;
        const costume = switchCostume(player.costumes, player.costume);
        if (costume === player.costume) return false;
        this.currentPlayer = { ...player, costume };
        return true;
      }
    }
  }

  /**
   * Sample the current state and tick the level.
   *
   * @returns The session's tick result, or null when not playing
   */
  tick(deltaMs?: number): TickResult | null {
    const session = this.currentSession;
    if (this.currentState !== "playing" || session === null) {
      return null;
    }

    const stimulus = createStimulus(this.currentPlayer, this.pendingUse, this.currentCrates);
    this.pendingUse = false;
    const result = session.tick(stimulus, deltaMs);

    const next = this.pendingNext;
    if (next !== null) {
      this.pendingNext = null;
      this.advance(next);
    }
    return result;
  }

  private advance(target: string): void {
    if (this.levels[target]) {
      this.loadLevel(target);
      return;
    }
    console.log(`[PuzzleGame] Returning to "${target}"`);
    this.currentState = "menu";
    this.currentSession = null;
    this.currentPlayer = null;
    this.grid = null;
    this.currentCrates = [];
    this.config.onReturnToMenu?.(target);
  }
}
