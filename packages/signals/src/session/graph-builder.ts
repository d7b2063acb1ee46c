/**
 * Builds the signal graph from a level's tile records.
 *
 * Tiles are visited in the order given (the tile map walk, column-major), and
 * that order becomes the creation order the evaluator iterates in.
 */

import type { GridPosition, TileLayout } from "@signalworks/grid";
import { createTileLayout, formatPosition, gridToWorld } from "@signalworks/grid";
import type { LevelDiagnostic } from "../core/diagnostics.js";
import { describeError } from "../core/diagnostics.js";
import type { SenderHooks, SenderView, TileRecord } from "../core/types.js";
import { SignalNetwork } from "../network/signal-network.js";
import { SignalReceiver } from "../receiver/signal-receiver.js";
import type { PredicateRegistry } from "../sender/predicates.js";
import { SENDER_DEFAULTS } from "../sender/predicates.js";
import { SignalSender } from "../sender/signal-sender.js";

/**
 * Supplies hooks for a sender as it is created.
 */
export type SenderHookFactory = (sender: SenderView) => SenderHooks | undefined;

export interface LevelGraph {
  network: SignalNetwork;
  /** Player start position, if the level has a player tile */
  playerStart: GridPosition | null;
  /** Number of wall and floor tiles */
  geometryCount: number;
  diagnostics: LevelDiagnostic[];
}

/**
 * Derive a layout that just covers every tile (tiles start at column/row 0).
 */
export function layoutForTiles(tiles: readonly TileRecord[]): TileLayout {
  let columns = 1;
  let rows = 1;
  for (const tile of tiles) {
    columns = Math.max(columns, tile.position.col + 1);
    rows = Math.max(rows, tile.position.row + 1);
  }
  return createTileLayout(columns, rows);
}

/**
 * Create senders, receivers and the player start from tile records.
 */
export function buildLevelGraph(
  tiles: readonly TileRecord[],
  layout: TileLayout,
  predicates: PredicateRegistry,
  senderHooks?: SenderHookFactory,
): LevelGraph {
  const network = new SignalNetwork();
  const diagnostics: LevelDiagnostic[] = [];
  let playerStart: GridPosition | null = null;
  let geometryCount = 0;

  for (const tile of tiles) {
    const kind = tile.kind;
    switch (kind) {
      case "wall":
      case "floor":
        geometryCount++;
        break;
      case "player":
        if (playerStart === null) {
          playerStart = tile.position;
        } else {
          diagnostics.push({
            severity: "warning",
            code: "duplicate-player",
            message:
              `Extra player tile at ${formatPosition(tile.position)}; ` +
              `the player starts at ${formatPosition(playerStart)}.`,
            position: tile.position,
          });
        }
        break;
      case "door":
        network.addReceiver(
          new SignalReceiver({
            position: tile.position,
            worldPosition: gridToWorld(tile.position, layout),
            textureVariant: tile.textureVariant,
          }),
        );
        break;
      default: {
        if (network.getSenderAt(tile.position) !== undefined) {
          diagnostics.push({
            severity: "fatal",
            code: "duplicate-sender",
            message: `Two senders occupy ${formatPosition(tile.position)}.`,
            position: tile.position,
          });
          break;
        }
        const defaults = SENDER_DEFAULTS[kind];
        let sender: SignalSender;
        try {
          sender = new SignalSender({
            position: tile.position,
            worldPosition: gridToWorld(tile.position, layout),
            kind,
            methods: tile.methods ?? defaults.methods,
            cooldownMs: tile.cooldownMs ?? defaults.cooldownMs,
            predicate: predicates[kind],
            textureVariant: tile.textureVariant,
          });
        } catch (error) {
          diagnostics.push({
            severity: "fatal",
            code: "invalid-sender",
            message: `Invalid ${kind} tile: ${describeError(error)}`,
            position: tile.position,
          });
          break;
        }
        const hooks = senderHooks?.(sender);
        if (hooks) sender.setHooks(hooks);
        network.addSender(sender);
      }
    }
  }

  return { network, playerStart, geometryCount, diagnostics };
}
