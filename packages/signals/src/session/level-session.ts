/**
 * Level session: owns one level's signal graph and drives it tick by tick.
 *
 * State machine:
 *
 *   loading -> ready -> running -> completed
 *      \
 *       -> aborted
 *
 * - loading: decode configuration, build the graph from tiles, link requisites
 * - ready: the level has a player, static geometry, an exit location and an
 *   exit receiver; otherwise the session is aborted with fatal diagnostics
 * - running: entered by the first tick
 * - completed: entered on the tick after the exit receiver became active; the
 *   completion callback fires exactly once
 *
 * Ticking an aborted or completed session evaluates nothing.
 */

import type { GridPosition, TileLayout } from "@signalworks/grid";
import { formatPosition } from "@signalworks/grid";
import { decodeLevelConfiguration } from "../config/level-configuration.js";
import { DEFAULT_TICK_INTERVAL_MS } from "../constants.js";
import type { DiagnosticSink, LevelDiagnostic } from "../core/diagnostics.js";
import { consoleDiagnostics, describeError, LevelLoadError } from "../core/diagnostics.js";
import type {
  LevelConfiguration,
  LevelState,
  PropertyBag,
  Stimulus,
  TileRecord,
} from "../core/types.js";
import type { SignalEffect } from "../evaluator/effect-queue.js";
import type { ReceiverChangeHook } from "../evaluator/tick-evaluator.js";
import { dispatchEffects, TickEvaluator } from "../evaluator/tick-evaluator.js";
import type { LinkReport } from "../linker/requisite-linker.js";
import { linkRequisites } from "../linker/requisite-linker.js";
import type { SignalNetwork } from "../network/signal-network.js";
import type { SignalReceiver } from "../receiver/signal-receiver.js";
import type { PredicateRegistry } from "../sender/predicates.js";
import { createDefaultPredicates } from "../sender/predicates.js";
import type { NetworkSnapshot } from "../snapshot.js";
import { createNetworkSnapshot } from "../snapshot.js";
import type { SenderHookFactory } from "./graph-builder.js";
import { buildLevelGraph, layoutForTiles } from "./graph-builder.js";

/**
 * Static description of a level.
 */
export interface LevelData {
  /** Level name, used in diagnostics and snapshots */
  id: string;
  /** Tile records in tile map order */
  tiles: readonly TileRecord[];
  /** Key/value configuration attached to the level */
  properties: PropertyBag;
}

/**
 * Configuration for a level session.
 */
export interface LevelSessionConfig {
  /** Tile layout (default: just large enough for the tiles, default tile size) */
  layout?: TileLayout;
  /** Replace the default predicate for some sender kinds */
  predicates?: Partial<PredicateRegistry>;
  /** Diagnostic sink (default: console) */
  diagnostics?: DiagnosticSink;
  /** Attach onActivate/onDeactivate hooks to senders as they are created */
  senderHooks?: SenderHookFactory;
  /** Called after a tick for every receiver that changed state */
  onReceiverChange?: ReceiverChangeHook;
  /** Called once when the level completes, with the next level's name */
  onComplete?: (nextLevelName: string) => void;
}

/**
 * Result of LevelSession.tick().
 */
export interface TickResult {
  /** Number of evaluation passes run so far */
  tick: number;
  /** Session state after this call */
  state: LevelState;
  /** Whether an evaluation pass ran */
  evaluated: boolean;
  /** Edges produced by this pass (already dispatched to hooks) */
  effects: SignalEffect[];
  /** Whether the exit receiver was active at the end of this pass */
  exitSatisfied: boolean;
}

export class LevelSession {
  readonly id: string;
  readonly configuration: LevelConfiguration;
  readonly layout: TileLayout;
  readonly network: SignalNetwork;
  /** Where the player starts; null only for aborted sessions */
  readonly playerStart: GridPosition | null;
  /** Linking outcome; null if the session aborted before linking */
  readonly linkReport: LinkReport | null;

  private currentState: LevelState = "loading";
  private readonly sink: DiagnosticSink;
  private readonly config: LevelSessionConfig;
  private readonly exit: SignalReceiver | null;
  private readonly evaluator: TickEvaluator | null;
  private error: LevelLoadError | null = null;
  private passes = 0;
  private exitActive = false;

  private constructor(level: LevelData, config: LevelSessionConfig) {
    this.id = level.id;
    this.config = config;
    this.sink = config.diagnostics ?? consoleDiagnostics;

    const decoded = decodeLevelConfiguration(level.properties);
    decoded.diagnostics.forEach((d) => this.sink.report(d));
    this.configuration = decoded.configuration;

    this.layout = config.layout ?? layoutForTiles(level.tiles);
    const predicates: PredicateRegistry = {
      ...createDefaultPredicates({ tileSize: this.layout.tileSize }),
      ...config.predicates,
    };
    const graph = buildLevelGraph(level.tiles, this.layout, predicates, config.senderHooks);
    graph.diagnostics.forEach((d) => this.sink.report(d));
    this.network = graph.network;
    this.playerStart = graph.playerStart;

    const fatal = graph.diagnostics.filter((d) => d.severity === "fatal");
    const fail = (diagnostic: LevelDiagnostic) => {
      fatal.push(diagnostic);
      this.sink.report(diagnostic);
    };

    if (graph.playerStart === null) {
      fail({
        severity: "fatal",
        code: "missing-player",
        message: "The level has no player tile.",
      });
    }
    if (graph.geometryCount === 0) {
      fail({
        severity: "fatal",
        code: "missing-geometry",
        message: "The level has no wall or floor tiles.",
      });
    }

    const exitLocation = this.configuration.exitLocation;
    let exit: SignalReceiver | null = null;
    if (exitLocation === null) {
      fail({
        severity: "fatal",
        code: "missing-exit",
        message: "The level configuration does not name an exit (exitAt).",
      });
    } else {
      exit = this.network.getReceiverAt(exitLocation) ?? null;
      if (exit === null) {
        fail({
          severity: "fatal",
          code: "missing-exit-receiver",
          message: `There is no door at the exit location ${formatPosition(exitLocation)}.`,
          position: exitLocation,
        });
      }
    }
    this.exit = exit;

    if (fatal.length > 0) {
      this.error = new LevelLoadError(level.id, fatal);
      this.linkReport = null;
      this.evaluator = null;
      this.currentState = "aborted";
      return;
    }

    this.linkReport = linkRequisites(this.configuration.requisites, this.network, this.sink);
    this.evaluator = new TickEvaluator(this.network, exit, this.sink);
    this.currentState = "ready";
  }

  /**
   * Load a level. Never throws for bad level data: a level that cannot run
   * comes back aborted, with the reason in `loadError`.
   */
  static load(level: LevelData, config: LevelSessionConfig = {}): LevelSession {
    return new LevelSession(level, config);
  }

  get state(): LevelState {
    return this.currentState;
  }

  /** Why the level aborted, or null */
  get loadError(): LevelLoadError | null {
    return this.error;
  }

  /** Number of evaluation passes run so far */
  get tickCount(): number {
    return this.passes;
  }

  /** Level clock in milliseconds */
  get nowMs(): number {
    return this.evaluator?.nowMs ?? 0;
  }

  /** Whether the exit receiver was active at the end of the last pass */
  get exitSatisfied(): boolean {
    return this.exitActive;
  }

  /** The receiver whose activation completes the level */
  get exitReceiver(): SignalReceiver | null {
    return this.exit;
  }

  /**
   * Advance the level by one tick.
   *
   * @param stimulus Player/object state sampled for this tick
   * @param deltaMs Time since the previous tick (clamped)
   */
  tick(stimulus: Stimulus, deltaMs: number = DEFAULT_TICK_INTERVAL_MS): TickResult {
    const evaluator = this.evaluator;
    if (evaluator === null || this.currentState === "completed") {
      return this.idleResult();
    }

    if (this.exitActive) {
      this.complete();
      return this.idleResult();
    }

    this.currentState = "running";
    const pass = evaluator.evaluate(stimulus, deltaMs);
    this.passes++;
    this.exitActive = pass.exitActive;
    dispatchEffects(pass.effects, this.sink, this.config.onReceiverChange);

    return {
      tick: this.passes,
      state: this.currentState,
      evaluated: true,
      effects: pass.effects,
      exitSatisfied: this.exitActive,
    };
  }

  /**
   * Capture the current activation states.
   */
  snapshot(): NetworkSnapshot {
    return createNetworkSnapshot(this);
  }

  private complete(): void {
    this.currentState = "completed";
    const nextLevelName = this.configuration.nextLevelName;
    try {
      this.config.onComplete?.(nextLevelName);
    } catch (error) {
      this.sink.report({
        severity: "warning",
        code: "hook-failed",
        message: `Completion callback for level "${this.id}" failed: ${describeError(error)}`,
      });
    }
  }

  private idleResult(): TickResult {
    return {
      tick: this.passes,
      state: this.currentState,
      evaluated: false,
      effects: [],
      exitSatisfied: this.exitActive,
    };
  }
}
