/**
 * Transition effects produced by a tick.
 *
 * The evaluator first computes every new state, then records the edges here.
 * Hooks (audio, achievements, the renderer swapping textures) run from the
 * drained queue after the tick, never during evaluation.
 */

import type { SignalReceiver } from "../receiver/signal-receiver.js";
import type { SignalSender } from "../sender/signal-sender.js";

export type EdgeTransition = "activated" | "deactivated";

export type SignalEffect =
  | { type: "sender"; transition: EdgeTransition; sender: SignalSender }
  | { type: "receiver"; transition: EdgeTransition; receiver: SignalReceiver };

/**
 * FIFO of effects for the current tick.
 */
export class EffectQueue {
  private effects: SignalEffect[] = [];

  enqueue(effect: SignalEffect): void {
    this.effects.push(effect);
  }

  /**
   * Take every queued effect, in the order they were produced.
   */
  drain(): SignalEffect[] {
    const drained = this.effects;
    this.effects = [];
    return drained;
  }

  get size(): number {
    return this.effects.length;
  }
}
