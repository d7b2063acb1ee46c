import { describe, expect, it } from "vitest";
import {
  createEmptyStimulus,
  createSwitchPredicate,
  createTestSender,
  stimulusAt,
} from "../test-utils.js";
import { pressurePlatePredicate } from "./predicates.js";

const origin = { col: 0, row: 0 };

describe("SignalSender", () => {
  describe("construction", () => {
    it("should require at least one activation method", () => {
      expect(() => createTestSender(origin, () => true, { methods: [] })).toThrow(
        "Sender at 0_0 needs at least one activation method",
      );
    });

    it("should reject a negative cooldown", () => {
      expect(() =>
        createTestSender(origin, () => true, { methods: ["onTimer"], cooldownMs: -1 }),
      ).toThrow("invalid cooldown");
    });

    it("should start inactive", () => {
      const sender = createTestSender(origin, () => true);
      expect(sender.active).toBe(false);
      expect(sender.key).toBe("0_0");
      expect(sender.timerDeadlineMs).toBeNull();
    });
  });

  describe("oncePermanently", () => {
    it("should latch on the first satisfied tick", () => {
      const { predicate, set } = createSwitchPredicate();
      const sender = createTestSender(origin, predicate, { methods: ["oncePermanently"] });
      const stimulus = createEmptyStimulus();

      expect(sender.evaluate(stimulus, 16).transition).toBe("none");

      set(true);
      expect(sender.evaluate(stimulus, 32)).toEqual({ active: true, transition: "activated" });

      set(false);
      expect(sender.evaluate(stimulus, 48)).toEqual({ active: true, transition: "none" });
      expect(sender.evaluate(stimulus, 100_000)).toEqual({ active: true, transition: "none" });
    });

    it("should stop consulting the predicate once latched", () => {
      let calls = 0;
      const sender = createTestSender(
        origin,
        () => {
          calls++;
          return true;
        },
        { methods: ["oncePermanently"] },
      );
      sender.evaluate(createEmptyStimulus(), 16);
      sender.evaluate(createEmptyStimulus(), 32);
      sender.evaluate(createEmptyStimulus(), 48);
      expect(calls).toBe(1);
    });

    it("should never arm a timer when combined with onTimer", () => {
      const sender = createTestSender(origin, () => true, {
        methods: ["oncePermanently", "onTimer"],
        cooldownMs: 100,
      });
      expect(sender.evaluate(createEmptyStimulus(), 16).transition).toBe("activated");
      expect(sender.timerDeadlineMs).toBeNull();
      expect(sender.evaluate(createEmptyStimulus(), 1000).active).toBe(true);
    });
  });

  describe("byIntervention", () => {
    it("should follow the predicate and report each edge once", () => {
      const { predicate, set } = createSwitchPredicate();
      const sender = createTestSender(origin, predicate, { methods: ["byIntervention"] });
      const stimulus = createEmptyStimulus();

      set(true);
      expect(sender.evaluate(stimulus, 16).transition).toBe("activated");
      expect(sender.evaluate(stimulus, 32).transition).toBe("none");

      set(false);
      expect(sender.evaluate(stimulus, 48).transition).toBe("deactivated");
      expect(sender.evaluate(stimulus, 64).transition).toBe("none");
      expect(sender.active).toBe(false);
    });

    it("should take precedence over onToggle", () => {
      const sender = createTestSender(origin, () => true, {
        methods: ["onToggle", "byIntervention"],
      });
      sender.evaluate(createEmptyStimulus(), 16);
      sender.evaluate(createEmptyStimulus(), 32);
      expect(sender.active).toBe(true);
    });
  });

  describe("onToggle", () => {
    it("should count a stimulus held across ticks as one event", () => {
      const sender = createTestSender(origin, () => true, { methods: ["onToggle"] });
      const stimulus = createEmptyStimulus();

      const states = [16, 32, 48, 64, 80].map((nowMs) => {
        sender.evaluate(stimulus, nowMs);
        return sender.active;
      });

      expect(states).toEqual([true, true, true, true, true]);
    });

    it("should flip once per press", () => {
      const { predicate, set } = createSwitchPredicate();
      const sender = createTestSender(origin, predicate, { methods: ["onToggle"] });
      const transitions = [true, false, true, false].map((value, i) => {
        set(value);
        return sender.evaluate(createEmptyStimulus(), (i + 1) * 16).transition;
      });

      expect(transitions).toEqual(["activated", "none", "deactivated", "none"]);
    });

    it("should end active after an odd number of qualifying events", () => {
      const { predicate, set } = createSwitchPredicate();
      const sender = createTestSender(origin, predicate, { methods: ["onToggle"] });
      const pattern = [true, false, true, true, false, false, true];

      pattern.forEach((value, i) => {
        set(value);
        sender.evaluate(createEmptyStimulus(), (i + 1) * 16);
      });

      // 3 rising edges
      expect(sender.active).toBe(true);

      set(false);
      sender.evaluate(createEmptyStimulus(), 200);
      set(true);
      sender.evaluate(createEmptyStimulus(), 216);
      expect(sender.active).toBe(false);
    });

    it("should hold its state while unsatisfied", () => {
      const { predicate, set } = createSwitchPredicate(true);
      const sender = createTestSender(origin, predicate, { methods: ["onToggle"] });
      sender.evaluate(createEmptyStimulus(), 16);
      set(false);
      expect(sender.evaluate(createEmptyStimulus(), 32)).toEqual({
        active: true,
        transition: "none",
      });
    });
  });

  describe("onTimer", () => {
    it("should arm a deadline on the rising edge and deactivate when it passes", () => {
      const sender = createTestSender(origin, () => true, {
        methods: ["byIntervention", "onTimer"],
        cooldownMs: 5000,
      });
      const stimulus = createEmptyStimulus();

      expect(sender.evaluate(stimulus, 16).transition).toBe("activated");
      expect(sender.timerDeadlineMs).toBe(5016);

      expect(sender.evaluate(stimulus, 2000).transition).toBe("none");
      expect(sender.timerDeadlineMs).toBe(5016);

      expect(sender.evaluate(stimulus, 5016)).toEqual({ active: false, transition: "deactivated" });
      expect(sender.timerDeadlineMs).toBeNull();
    });

    it("should re-arm on the next rising edge after expiry", () => {
      const sender = createTestSender(origin, () => true, {
        methods: ["byIntervention", "onTimer"],
        cooldownMs: 100,
      });
      const stimulus = createEmptyStimulus();

      sender.evaluate(stimulus, 10);
      sender.evaluate(stimulus, 110);
      expect(sender.active).toBe(false);

      expect(sender.evaluate(stimulus, 120).transition).toBe("activated");
      expect(sender.timerDeadlineMs).toBe(220);
    });

    it("should hold the sender on while armed even if the predicate drops", () => {
      const { predicate, set } = createSwitchPredicate(true);
      const sender = createTestSender(origin, predicate, {
        methods: ["byIntervention", "onTimer"],
        cooldownMs: 1000,
      });

      sender.evaluate(createEmptyStimulus(), 0);
      set(false);
      expect(sender.evaluate(createEmptyStimulus(), 500).active).toBe(true);
      expect(sender.evaluate(createEmptyStimulus(), 1000).transition).toBe("deactivated");
    });

    it("should latch until the deadline when used alone", () => {
      const { predicate, set } = createSwitchPredicate(true);
      const sender = createTestSender(origin, predicate, { methods: ["onTimer"], cooldownMs: 50 });

      expect(sender.evaluate(createEmptyStimulus(), 0).transition).toBe("activated");
      set(false);
      expect(sender.evaluate(createEmptyStimulus(), 25).active).toBe(true);
      expect(sender.evaluate(createEmptyStimulus(), 50).transition).toBe("deactivated");
      expect(sender.evaluate(createEmptyStimulus(), 75).active).toBe(false);
    });
  });

  describe("predicate failures", () => {
    it("should treat a throwing predicate as unsatisfied and report the error", () => {
      const { predicate, set } = createSwitchPredicate(true);
      let fail = false;
      const sender = createTestSender(origin, (stimulus, view) => {
        if (fail) throw new Error("boom");
        return predicate(stimulus, view);
      });

      sender.evaluate(createEmptyStimulus(), 16);
      expect(sender.active).toBe(true);

      fail = true;
      set(true);
      const evaluation = sender.evaluate(createEmptyStimulus(), 32);
      expect(evaluation.active).toBe(false);
      expect(evaluation.transition).toBe("deactivated");
      expect(evaluation.predicateError).toBeInstanceOf(Error);
    });

    it("should not set predicateError when the predicate succeeds", () => {
      const sender = createTestSender(origin, () => false);
      expect("predicateError" in sender.evaluate(createEmptyStimulus(), 16)).toBe(false);
    });
  });

  describe("real-world scenarios", () => {
    it("crate sliding off a pressure plate deactivates it exactly once", () => {
      const plate = createTestSender(origin, pressurePlatePredicate(), {
        kind: "pressurePlate",
        methods: ["byIntervention"],
      });
      const crateAt = (x: number) => ({
        player: null,
        use: false,
        objects: [{ worldPosition: { x, y: 0 }, mass: 60 }],
      });

      const transitions = [50, 70, 70, 70].map(
        (x, i) => plate.evaluate(crateAt(x), (i + 1) * 16).transition,
      );

      expect(transitions).toEqual(["activated", "deactivated", "none", "none"]);
      expect(transitions.filter((t) => t === "deactivated")).toHaveLength(1);
    });

    it("player stepping on and off a plate", () => {
      const plate = createTestSender(origin, pressurePlatePredicate(), {
        kind: "pressurePlate",
        methods: ["byIntervention"],
      });
      expect(plate.evaluate(stimulusAt({ x: 0, y: 64 }), 16).transition).toBe("activated");
      expect(plate.evaluate(stimulusAt({ x: 0, y: 65 }), 32).transition).toBe("deactivated");
    });
  });
});
