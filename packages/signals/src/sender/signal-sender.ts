/**
 * Signal sender: a level object that produces a boolean signal.
 *
 * A sender decides its own state once per tick from the current stimulus and
 * its activation methods. It never reads receiver state. Side effects are not
 * run here - evaluate() reports the edge and the evaluator queues it.
 *
 * Method precedence when several are combined:
 *   oncePermanently > byIntervention > onToggle, with onTimer layered on top.
 */

import type { GridPosition, PositionKey, Vector2 } from "@signalworks/grid";
import { positionKey } from "@signalworks/grid";
import type {
  ActivationMethod,
  SenderHooks,
  SenderKind,
  SenderView,
  Stimulus,
  StimulusPredicate,
  Transition,
} from "../core/types.js";

/**
 * Options for creating a sender.
 */
export interface SignalSenderOptions {
  position: GridPosition;
  worldPosition: Vector2;
  kind: SenderKind;
  /** Activation methods; must not be empty */
  methods: readonly ActivationMethod[];
  /** Time the sender stays on before deactivating (onTimer only) */
  cooldownMs?: number;
  /** Kind-specific activation test */
  predicate: StimulusPredicate;
  textureVariant?: string;
  hooks?: SenderHooks;
}

/**
 * Result of a single evaluation.
 */
export interface SenderEvaluation {
  /** State after this tick */
  active: boolean;
  /** Edge crossed this tick */
  transition: Transition;
  /** Set when the predicate threw; the predicate counted as false */
  predicateError?: unknown;
}

export class SignalSender implements SenderView {
  readonly position: GridPosition;
  readonly key: PositionKey;
  readonly worldPosition: Vector2;
  readonly kind: SenderKind;
  readonly methods: ReadonlySet<ActivationMethod>;
  readonly cooldownMs: number;
  readonly textureVariant: string | undefined;

  private readonly predicate: StimulusPredicate;
  private hooks: SenderHooks;
  private isActive = false;
  /** Time at which an armed timer switches the sender off; null when unarmed */
  private deadlineMs: number | null = null;
  /** Predicate result at the last tick it was consulted (onToggle edge detection) */
  private wasSatisfied = false;

  constructor(options: SignalSenderOptions) {
    if (options.methods.length === 0) {
      throw new Error(
        `Sender at ${positionKey(options.position)} needs at least one activation method`,
      );
    }
    const cooldownMs = options.cooldownMs ?? 0;
    if (!Number.isFinite(cooldownMs) || cooldownMs < 0) {
      throw new Error(
        `Sender at ${positionKey(options.position)} has an invalid cooldown. Got: ${cooldownMs}`,
      );
    }
    this.position = options.position;
    this.key = positionKey(options.position);
    this.worldPosition = options.worldPosition;
    this.kind = options.kind;
    this.methods = new Set(options.methods);
    this.cooldownMs = cooldownMs;
    this.textureVariant = options.textureVariant;
    this.predicate = options.predicate;
    this.hooks = options.hooks ?? {};
  }

  get active(): boolean {
    return this.isActive;
  }

  /** Deadline of the armed timer, or null */
  get timerDeadlineMs(): number | null {
    return this.deadlineMs;
  }

  /** Hooks dispatched for this sender's edges */
  getHooks(): SenderHooks {
    return this.hooks;
  }

  setHooks(hooks: SenderHooks): void {
    this.hooks = hooks;
  }

  /**
   * Compute this tick's state from the stimulus.
   *
   * @param stimulus The sampled player/object state for this tick
   * @param nowMs Level clock at this tick (drives onTimer deadlines)
   */
  evaluate(stimulus: Stimulus, nowMs: number): SenderEvaluation {
    const wasActive = this.isActive;

    if (this.methods.has("oncePermanently")) {
      if (wasActive) {
        return { active: true, transition: "none" };
      }
      const test = this.test(stimulus);
      this.isActive = test.value;
      return this.result(wasActive, test.error);
    }

    // An armed timer holds the sender on until it fires
    if (this.deadlineMs !== null) {
      if (nowMs >= this.deadlineMs) {
        this.deadlineMs = null;
        this.isActive = false;
        return { active: false, transition: "deactivated" };
      }
      return { active: true, transition: "none" };
    }

    const test = this.test(stimulus);
    const risingEdge = test.value && !this.wasSatisfied;
    this.wasSatisfied = test.value;
    let next: boolean;
    if (this.methods.has("byIntervention")) {
      next = test.value;
    } else if (this.methods.has("onToggle")) {
      // One flip per qualifying event; a stimulus held across ticks is one event
      next = risingEdge ? !wasActive : wasActive;
    } else {
      // onTimer alone: switch on when triggered, the timer switches it off
      next = wasActive || test.value;
    }

    if (!wasActive && next && this.methods.has("onTimer")) {
      this.deadlineMs = nowMs + this.cooldownMs;
    }
    this.isActive = next;
    return this.result(wasActive, test.error);
  }

  /**
   * Run the predicate. A throwing predicate counts as false for this tick.
   */
  private test(stimulus: Stimulus): { value: boolean; error?: unknown } {
    try {
      return { value: this.predicate(stimulus, this) };
    } catch (error) {
      return { value: false, error };
    }
  }

  private result(wasActive: boolean, predicateError: unknown): SenderEvaluation {
    const transition: Transition =
      wasActive === this.isActive ? "none" : this.isActive ? "activated" : "deactivated";
    const evaluation: SenderEvaluation = { active: this.isActive, transition };
    if (predicateError !== undefined) {
      evaluation.predicateError = predicateError;
    }
    return evaluation;
  }
}
