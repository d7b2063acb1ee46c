/**
 * The level's signal graph: a sender arena keyed by position plus the list of
 * receivers.
 *
 * Iteration always follows creation order (the arrays). The Map is only used
 * for lookups, never iterated for evaluation.
 */

import type { GridPosition, PositionKey } from "@signalworks/grid";
import { formatPosition, positionKey, positionsEqual } from "@signalworks/grid";
import type { SenderLookup } from "../core/types.js";
import type { SignalReceiver } from "../receiver/signal-receiver.js";
import type { SignalSender } from "../sender/signal-sender.js";

export class SignalNetwork implements SenderLookup {
  private readonly senderList: SignalSender[] = [];
  private readonly senderIndex = new Map<PositionKey, SignalSender>();
  private readonly receiverList: SignalReceiver[] = [];

  /** Senders in creation order */
  get senders(): readonly SignalSender[] {
    return this.senderList;
  }

  /** Receivers in creation order */
  get receivers(): readonly SignalReceiver[] {
    return this.receiverList;
  }

  /**
   * Add a sender to the arena.
   * @throws Error if a sender already occupies the position
   */
  addSender(sender: SignalSender): void {
    if (this.senderIndex.has(sender.key)) {
      throw new Error(`Duplicate sender at ${formatPosition(sender.position)}`);
    }
    this.senderList.push(sender);
    this.senderIndex.set(sender.key, sender);
  }

  /**
   * Add a receiver. Several receivers may share a position; the linker
   * reports that as a duplicate mapping.
   */
  addReceiver(receiver: SignalReceiver): void {
    this.receiverList.push(receiver);
  }

  getSender(key: PositionKey): SignalSender | undefined {
    return this.senderIndex.get(key);
  }

  getSenderAt(position: GridPosition): SignalSender | undefined {
    return this.senderIndex.get(positionKey(position));
  }

  /** Receivers at a position, in creation order */
  receiversAt(position: GridPosition): SignalReceiver[] {
    return this.receiverList.filter((receiver) => positionsEqual(receiver.position, position));
  }

  /** First receiver at a position */
  getReceiverAt(position: GridPosition): SignalReceiver | undefined {
    return this.receiverList.find((receiver) => positionsEqual(receiver.position, position));
  }

  /** Recompute every receiver once, in creation order */
  recomputeReceivers(): void {
    for (const receiver of this.receiverList) {
      receiver.recompute(this);
    }
  }
}
