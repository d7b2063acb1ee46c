/**
 * Core types for the level signal network.
 *
 * Senders produce boolean signals; receivers combine them. Both are identified
 * by their grid position. Nothing here refers to rendering or audio - those
 * collaborators observe `active` states and react to transition effects.
 */

import type { GridPosition, PositionKey, Vector2 } from "@signalworks/grid";

// =============================================================================
// Tiles
// =============================================================================

/**
 * Kinds of signal senders that can appear in a level.
 */
export type SenderKind =
  | "lever"
  | "computerT1"
  | "computerT2"
  | "trigger"
  | "pressurePlate"
  | "irisScanner";

/** All sender kinds, in a stable order */
export const SENDER_KINDS: readonly SenderKind[] = [
  "lever",
  "computerT1",
  "computerT2",
  "trigger",
  "pressurePlate",
  "irisScanner",
];

/**
 * Kinds of tiles a level is built from.
 */
export type TileKind = "wall" | "floor" | "player" | "door" | SenderKind;

/**
 * A single tile record from the level's tile map.
 */
export interface TileRecord {
  /** Grid position of the tile */
  position: GridPosition;
  /** What the tile represents */
  kind: TileKind;
  /** Texture name picked by the level editor (e.g. "lever_wallup"); passed through to renderers */
  textureVariant?: string;
  /** Overrides the kind's default activation methods (senders only) */
  methods?: readonly ActivationMethod[];
  /** Overrides the kind's default cooldown (senders only) */
  cooldownMs?: number;
}

/**
 * Type guard for sender tile kinds.
 */
export const isSenderKind = (kind: string): kind is SenderKind =>
  (SENDER_KINDS as readonly string[]).includes(kind);

// =============================================================================
// Senders
// =============================================================================

/**
 * How a sender turns on and off. A sender may combine several methods.
 */
export type ActivationMethod = "oncePermanently" | "byIntervention" | "onTimer" | "onToggle";

/** All activation methods, in a stable order */
export const ACTIVATION_METHODS: readonly ActivationMethod[] = [
  "oncePermanently",
  "byIntervention",
  "onTimer",
  "onToggle",
];

/**
 * Edge produced by a single evaluation.
 */
export type Transition = "none" | "activated" | "deactivated";

/**
 * Read-only view of a sender handed to predicates, hooks and renderers.
 */
export interface SenderView {
  readonly position: GridPosition;
  readonly key: PositionKey;
  readonly worldPosition: Vector2;
  readonly kind: SenderKind;
  readonly active: boolean;
  readonly textureVariant: string | undefined;
}

/**
 * Kind-specific activation test. Must be deterministic for a given stimulus.
 * Returns false when it cannot resolve (e.g. no player this tick).
 */
export type StimulusPredicate = (stimulus: Stimulus, sender: SenderView) => boolean;

/**
 * Side-effect callbacks for one sender (audio cues, achievements, ...).
 * They run after the tick that produced the edge.
 */
export interface SenderHooks {
  onActivate?: (sender: SenderView) => void;
  onDeactivate?: (sender: SenderView) => void;
}

// =============================================================================
// Receivers
// =============================================================================

/**
 * Keyword form of an activation policy as written in level data.
 */
export type PolicyKeyword = "none" | "any" | "all";

/** Policy keywords, exactly as level data spells them */
export const POLICY_KEYWORDS: readonly PolicyKeyword[] = ["none", "any", "all"];

/**
 * How a receiver combines its wired senders.
 */
export type ActivationPolicy =
  | { readonly type: "none" }
  | { readonly type: "any" }
  | { readonly type: "all"; readonly required: readonly GridPosition[] };

/**
 * Read-only view of a receiver.
 */
export interface ReceiverView {
  readonly position: GridPosition;
  readonly key: PositionKey;
  readonly worldPosition: Vector2;
  readonly active: boolean;
  readonly inputs: readonly PositionKey[];
  readonly policy: ActivationPolicy;
  readonly textureVariant: string | undefined;
}

/**
 * Lookup of senders by position key. Receivers resolve their inputs through it.
 */
export interface SenderLookup {
  getSender(key: PositionKey): SenderView | undefined;
}

// =============================================================================
// Stimulus
// =============================================================================

/**
 * Player costumes. Some senders only respond to a specific costume.
 */
export type Costume = "default" | "bird" | "flashDrive" | "sorceress";

/**
 * Player state sampled for one tick.
 */
export interface PlayerSample {
  gridPosition: GridPosition;
  worldPosition: Vector2;
  costume: Costume;
}

/**
 * A dynamic object (e.g. a crate) that can hold down pressure plates.
 */
export interface DynamicObjectSample {
  worldPosition: Vector2;
  mass: number;
}

/**
 * Everything senders may react to during one tick.
 */
export interface Stimulus {
  /** The player, or null if it is transiently unavailable */
  player: PlayerSample | null;
  /** Whether the player issued a "use" intent this tick */
  use: boolean;
  /** Nearby dynamic objects */
  objects: readonly DynamicObjectSample[];
}

// =============================================================================
// Level configuration
// =============================================================================

/**
 * Level-authored wiring rule for one receiver.
 */
export interface Requisite {
  /** Receiver this rule targets */
  outputLocation: GridPosition;
  /** Senders that feed the receiver */
  requiredInputs: readonly GridPosition[];
  /** Policy to assign; omitted means "none" */
  requisite?: PolicyKeyword;
}

/**
 * Decoded level configuration.
 */
export interface LevelConfiguration {
  /** Which costumes are available (0 = none, 3 = all) */
  costumeSet: number;
  /** Level loaded after this one completes */
  nextLevelName: string;
  /** Costume the player starts with */
  startingCostume: Costume;
  /** Position of the exit receiver, if configured */
  exitLocation: GridPosition | null;
  /** Wiring rules, sorted by output location */
  requisites: Requisite[];
}

/**
 * Raw key/value data attached to a level asset.
 */
export type PropertyBag = Readonly<Record<string, unknown>>;

// =============================================================================
// Session
// =============================================================================

/** Lifecycle states of a level session */
export const LEVEL_STATES = ["loading", "ready", "running", "completed", "aborted"] as const;

export type LevelState = (typeof LEVEL_STATES)[number];
