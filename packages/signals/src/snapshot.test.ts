import type { PositionKey } from "@signalworks/grid";
import superjson from "superjson";
import { describe, expect, it } from "vitest";
import type { NetworkSnapshot } from "./snapshot.js";
import { deserializeSnapshot, isNetworkSnapshot, serializeSnapshot } from "./snapshot.js";

function createSnapshot(): NetworkSnapshot {
  return {
    levelId: "test-level",
    tick: 12,
    elapsedMs: 200,
    state: "running",
    senders: new Map<PositionKey, boolean>([
      ["2_0", true],
      ["3_1", false],
    ]),
    receivers: new Map<PositionKey, boolean>([["5_0", true]]),
    exitSatisfied: true,
  };
}

describe("snapshot serialization", () => {
  it("should keep the state maps through a round trip", () => {
    const restored = deserializeSnapshot(serializeSnapshot(createSnapshot()));

    expect(restored.senders).toBeInstanceOf(Map);
    expect([...restored.senders]).toEqual([
      ["2_0", true],
      ["3_1", false],
    ]);
    expect(restored.receivers.get("5_0")).toBe(true);
    expect(restored.state).toBe("running");
  });

  it("should reject data that is not a snapshot", () => {
    expect(() => deserializeSnapshot(superjson.stringify({ levelId: "x" }))).toThrow(
      "[Snapshot] Invalid snapshot data",
    );
  });

  it("should reject malformed position keys", () => {
    const snapshot = { ...createSnapshot(), senders: new Map([["lever", true]]) };
    expect(isNetworkSnapshot(snapshot)).toBe(false);
  });

  it("should reject unknown states", () => {
    expect(isNetworkSnapshot({ ...createSnapshot(), state: "paused" })).toBe(false);
  });
});
