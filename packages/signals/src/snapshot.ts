/**
 * Network snapshots: activation states captured at a tick boundary.
 *
 * Snapshots are plain data. They serialize with superjson so the sender and
 * receiver Maps survive the round trip (for save files, debugging overlays
 * and replay comparisons).
 */

import type { PositionKey } from "@signalworks/grid";
import { parsePositionKey } from "@signalworks/grid";
import superjson from "superjson";
import type { LevelState } from "./core/types.js";
import { LEVEL_STATES } from "./core/types.js";
import type { SignalNetwork } from "./network/signal-network.js";

export interface NetworkSnapshot {
  levelId: string;
  tick: number;
  elapsedMs: number;
  state: LevelState;
  /** Sender states by position, in creation order */
  senders: Map<PositionKey, boolean>;
  /** Receiver states by position (first receiver per position), in creation order */
  receivers: Map<PositionKey, boolean>;
  exitSatisfied: boolean;
}

/**
 * What a snapshot is taken from (a LevelSession).
 */
export interface SnapshotSource {
  readonly id: string;
  readonly tickCount: number;
  readonly nowMs: number;
  readonly state: LevelState;
  readonly network: SignalNetwork;
  readonly exitSatisfied: boolean;
}

export function createNetworkSnapshot(source: SnapshotSource): NetworkSnapshot {
  const senders = new Map<PositionKey, boolean>();
  for (const sender of source.network.senders) {
    senders.set(sender.key, sender.active);
  }
  const receivers = new Map<PositionKey, boolean>();
  for (const receiver of source.network.receivers) {
    if (!receivers.has(receiver.key)) {
      receivers.set(receiver.key, receiver.active);
    }
  }
  return {
    levelId: source.id,
    tick: source.tickCount,
    elapsedMs: source.nowMs,
    state: source.state,
    senders,
    receivers,
    exitSatisfied: source.exitSatisfied,
  };
}

export function serializeSnapshot(snapshot: NetworkSnapshot): string {
  return superjson.stringify(snapshot);
}

/**
 * Parse a serialized snapshot.
 * @throws Error if the text is not a valid snapshot
 */
export function deserializeSnapshot(text: string): NetworkSnapshot {
  const data: unknown = superjson.parse(text);
  if (!isNetworkSnapshot(data)) {
    throw new Error("[Snapshot] Invalid snapshot data");
  }
  return data;
}

// =============================================================================
// Type guards
// =============================================================================

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const isLevelState = (value: unknown): value is LevelState =>
  LEVEL_STATES.some((state) => state === value);

function isStateMap(value: unknown): value is Map<PositionKey, boolean> {
  if (!(value instanceof Map)) return false;
  for (const [key, active] of value) {
    if (typeof key !== "string" || parsePositionKey(key) === null) return false;
    if (typeof active !== "boolean") return false;
  }
  return true;
}

export function isNetworkSnapshot(value: unknown): value is NetworkSnapshot {
  if (!isRecord(value)) return false;
  return (
    typeof value.levelId === "string" &&
    typeof value.tick === "number" &&
    typeof value.elapsedMs === "number" &&
    isLevelState(value.state) &&
    isStateMap(value.senders) &&
    isStateMap(value.receivers) &&
    typeof value.exitSatisfied === "boolean"
  );
}
