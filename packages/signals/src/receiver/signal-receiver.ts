/**
 * Signal receiver: a level object (door) whose state is derived from the
 * senders wired into it.
 *
 * Receivers never own senders. They hold position keys and resolve them
 * through a SenderLookup every time they recompute, so a receiver cannot keep
 * a sender alive or reach one that is not part of the level graph.
 */

import type { GridPosition, PositionKey, Vector2 } from "@signalworks/grid";
import { positionKey } from "@signalworks/grid";
import type { ActivationPolicy, ReceiverView, SenderLookup } from "../core/types.js";

/** Policy of a receiver no requisite has wired */
export const NO_INPUT_POLICY: ActivationPolicy = { type: "none" };

export interface SignalReceiverOptions {
  position: GridPosition;
  worldPosition: Vector2;
  textureVariant?: string;
}

export class SignalReceiver implements ReceiverView {
  readonly position: GridPosition;
  readonly key: PositionKey;
  readonly worldPosition: Vector2;
  readonly textureVariant: string | undefined;

  private readonly inputKeys: PositionKey[] = [];
  private currentPolicy: ActivationPolicy = NO_INPUT_POLICY;
  private isActive = false;

  constructor(options: SignalReceiverOptions) {
    this.position = options.position;
    this.key = positionKey(options.position);
    this.worldPosition = options.worldPosition;
    this.textureVariant = options.textureVariant;
  }

  get active(): boolean {
    return this.isActive;
  }

  /** Wired senders, in wiring order */
  get inputs(): readonly PositionKey[] {
    return this.inputKeys;
  }

  get policy(): ActivationPolicy {
    return this.currentPolicy;
  }

  /**
   * Wire a sender into this receiver.
   * @returns false if the sender was already wired
   */
  wire(senderKey: PositionKey): boolean {
    if (this.inputKeys.includes(senderKey)) {
      return false;
    }
    this.inputKeys.push(senderKey);
    return true;
  }

  setPolicy(policy: ActivationPolicy): void {
    this.currentPolicy = policy;
  }

  /**
   * Evaluate the policy against the current sender states without storing it.
   */
  evaluatePolicy(senders: SenderLookup): boolean {
    const policy = this.currentPolicy;
    switch (policy.type) {
      case "none":
        return false;
      case "any":
        return this.inputKeys.some((key) => senders.getSender(key)?.active === true);
      case "all":
        return policy.required.every((position) => {
          const key = positionKey(position);
          return this.inputKeys.includes(key) && senders.getSender(key)?.active === true;
        });
    }
  }

  /**
   * Recompute and store `active`. Idempotent: with unchanged senders a second
   * call returns the same value and changes nothing.
   */
  recompute(senders: SenderLookup): boolean {
    this.isActive = this.evaluatePolicy(senders);
    return this.isActive;
  }
}
