/**
 * Tick evaluator: one deterministic evaluation pass per simulation step.
 *
 * Order within a tick is fixed:
 *   1. advance the level clock by the (clamped) tick delta
 *   2. evaluate every sender, in creation order
 *   3. recompute every receiver, in creation order
 *   4. terminal check: is the exit receiver active?
 * Edges from steps 2 and 3 are queued; dispatchEffects() runs the hooks
 * afterwards.
 */

import { formatPosition } from "@signalworks/grid";
import { DEFAULT_TICK_INTERVAL_MS, MAX_DELTA_MS, MIN_DELTA_MS } from "../constants.js";
import type { DiagnosticSink } from "../core/diagnostics.js";
import { describeError } from "../core/diagnostics.js";
import type { ReceiverView, Stimulus } from "../core/types.js";
import type { SignalNetwork } from "../network/signal-network.js";
import type { SignalReceiver } from "../receiver/signal-receiver.js";
import { EffectQueue, type EdgeTransition, type SignalEffect } from "./effect-queue.js";

/**
 * Result of one evaluation pass.
 */
export interface EvaluationPass {
  /** Level clock after this pass */
  nowMs: number;
  /** Edges produced this pass, senders first */
  effects: SignalEffect[];
  /** Whether the exit receiver is active after this pass */
  exitActive: boolean;
}

/**
 * Callback invoked when a receiver changes state.
 */
export type ReceiverChangeHook = (receiver: ReceiverView, transition: EdgeTransition) => void;

/**
 * Clamp a tick delta to [MIN_DELTA_MS, MAX_DELTA_MS].
 */
export const clampDelta = (deltaMs: number): number =>
  Number.isFinite(deltaMs)
    ? Math.max(MIN_DELTA_MS, Math.min(MAX_DELTA_MS, deltaMs))
    : DEFAULT_TICK_INTERVAL_MS;

export class TickEvaluator {
  private readonly network: SignalNetwork;
  private readonly exit: SignalReceiver | null;
  private readonly sink: DiagnosticSink;
  private readonly queue = new EffectQueue();
  private clockMs = 0;

  /**
   * @param network The linked signal graph
   * @param exit The exit receiver checked at the end of every pass
   * @param sink Where runtime warnings go
   */
  constructor(network: SignalNetwork, exit: SignalReceiver | null, sink: DiagnosticSink) {
    this.network = network;
    this.exit = exit;
    this.sink = sink;
  }

  /** Level clock in milliseconds */
  get nowMs(): number {
    return this.clockMs;
  }

  /**
   * Run one evaluation pass.
   */
  evaluate(stimulus: Stimulus, deltaMs: number = DEFAULT_TICK_INTERVAL_MS): EvaluationPass {
    this.clockMs += clampDelta(deltaMs);
    const nowMs = this.clockMs;

    for (const sender of this.network.senders) {
      const evaluation = sender.evaluate(stimulus, nowMs);
      if (evaluation.predicateError !== undefined) {
        this.sink.report({
          severity: "warning",
          code: "predicate-failed",
          message:
            `Predicate for ${sender.kind} at ${formatPosition(sender.position)} failed: ` +
            describeError(evaluation.predicateError),
          position: sender.position,
        });
      }
      if (evaluation.transition !== "none") {
        this.queue.enqueue({ type: "sender", transition: evaluation.transition, sender });
      }
    }

    for (const receiver of this.network.receivers) {
      const wasActive = receiver.active;
      const isActive = receiver.recompute(this.network);
      if (wasActive !== isActive) {
        this.queue.enqueue({
          type: "receiver",
          transition: isActive ? "activated" : "deactivated",
          receiver,
        });
      }
    }

    return {
      nowMs,
      effects: this.queue.drain(),
      exitActive: this.exit?.active === true,
    };
  }
}

/**
 * Run hooks for a pass's effects. A hook that throws is reported and the
 * remaining effects still dispatch; sender/receiver state is never touched.
 */
export function dispatchEffects(
  effects: readonly SignalEffect[],
  sink: DiagnosticSink,
  onReceiverChange?: ReceiverChangeHook,
): void {
  for (const effect of effects) {
    try {
      if (effect.type === "sender") {
        const hooks = effect.sender.getHooks();
        const hook = effect.transition === "activated" ? hooks.onActivate : hooks.onDeactivate;
        hook?.(effect.sender);
      } else {
        onReceiverChange?.(effect.receiver, effect.transition);
      }
    } catch (error) {
      const subject = effect.type === "sender" ? effect.sender : effect.receiver;
      sink.report({
        severity: "warning",
        code: "hook-failed",
        message:
          `Hook for ${effect.type} at ${formatPosition(subject.position)} ` +
          `(${effect.transition}) failed: ${describeError(error)}`,
        position: subject.position,
      });
    }
  }
}
