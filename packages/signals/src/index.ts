/**
 * @signalworks/signals - Level signal network
 *
 * Senders (levers, computers, triggers, pressure plates, iris scanners) turn
 * player and object state into boolean signals. Receivers (doors) combine the
 * senders wired into them by the level's requisites. A level session loads a
 * level, links the graph and evaluates it once per tick.
 */

// =============================================================================
// High-Level API (Recommended)
// =============================================================================
export { LevelSession } from "./session/level-session.js";
export type { LevelData, LevelSessionConfig, TickResult } from "./session/level-session.js";

export { LevelLoop, createLevelLoop } from "./loop/level-loop.js";
export type { LevelLoopConfig } from "./loop/level-loop.js";

export {
  createNetworkSnapshot,
  serializeSnapshot,
  deserializeSnapshot,
  isNetworkSnapshot,
} from "./snapshot.js";
export type { NetworkSnapshot, SnapshotSource } from "./snapshot.js";

// =============================================================================
// Core Types
// =============================================================================
export type {
  SenderKind,
  TileKind,
  TileRecord,
  ActivationMethod,
  Transition,
  SenderView,
  StimulusPredicate,
  SenderHooks,
  PolicyKeyword,
  ActivationPolicy,
  ReceiverView,
  SenderLookup,
  Costume,
  PlayerSample,
  DynamicObjectSample,
  Stimulus,
  Requisite,
  LevelConfiguration,
  PropertyBag,
  LevelState,
} from "./core/types.js";
export {
  SENDER_KINDS,
  ACTIVATION_METHODS,
  POLICY_KEYWORDS,
  LEVEL_STATES,
  isSenderKind,
} from "./core/types.js";

export {
  consoleDiagnostics,
  collectDiagnostics,
  describeError,
  LevelLoadError,
} from "./core/diagnostics.js";
export type {
  DiagnosticSeverity,
  DiagnosticCode,
  LevelDiagnostic,
  DiagnosticSink,
  CollectingDiagnosticSink,
} from "./core/diagnostics.js";

// =============================================================================
// Graph Primitives
// =============================================================================
export { SignalSender } from "./sender/signal-sender.js";
export type { SignalSenderOptions, SenderEvaluation } from "./sender/signal-sender.js";
export {
  createDefaultPredicates,
  pressurePlatePredicate,
  usePredicate,
  proximityPredicate,
  SENDER_DEFAULTS,
} from "./sender/predicates.js";
export type { PredicateRegistry, PredicateConfig, SenderDefaults } from "./sender/predicates.js";

export { SignalReceiver, NO_INPUT_POLICY } from "./receiver/signal-receiver.js";
export type { SignalReceiverOptions } from "./receiver/signal-receiver.js";

export { SignalNetwork } from "./network/signal-network.js";

export { linkRequisites, policyFromRequisite } from "./linker/requisite-linker.js";
export type { LinkReport } from "./linker/requisite-linker.js";

export { buildLevelGraph, layoutForTiles } from "./session/graph-builder.js";
export type { LevelGraph, SenderHookFactory } from "./session/graph-builder.js";

export { TickEvaluator, dispatchEffects, clampDelta } from "./evaluator/tick-evaluator.js";
export type { EvaluationPass, ReceiverChangeHook } from "./evaluator/tick-evaluator.js";
export { EffectQueue } from "./evaluator/effect-queue.js";
export type { EdgeTransition, SignalEffect } from "./evaluator/effect-queue.js";

// =============================================================================
// Level Configuration
// =============================================================================
export {
  decodeLevelConfiguration,
  parseRequisite,
  costumeFromWireName,
  COSTUME_WIRE_NAMES,
  DEFAULT_STARTING_COSTUME,
  DEFAULT_LEVEL_CONFIGURATION,
  MAX_COSTUME_SET,
} from "./config/level-configuration.js";
export type { DecodedLevelConfiguration } from "./config/level-configuration.js";

// =============================================================================
// Constants
// =============================================================================
export {
  DEFAULT_TICK_RATE,
  DEFAULT_TICK_INTERVAL_MS,
  MIN_DELTA_MS,
  MAX_DELTA_MS,
  MIN_TICK_RATE,
  MAX_TICK_RATE,
  PRESSURE_PLATE_RADIUS,
  PRESSURE_PLATE_MIN_MASS,
  IRIS_SCANNER_COOLDOWN_MS,
  DEFAULT_NEXT_LEVEL,
  DEFAULT_COSTUME_SET,
} from "./constants.js";
