import { createTileLayout } from "@signalworks/grid";
import { describe, expect, it } from "vitest";
import type { TileRecord } from "../core/types.js";
import { createDefaultPredicates } from "../sender/predicates.js";
import { tile } from "../test-utils.js";
import { buildLevelGraph, layoutForTiles } from "./graph-builder.js";

const layout = createTileLayout(4, 2);
const predicates = createDefaultPredicates({ tileSize: layout.tileSize });

describe("layoutForTiles", () => {
  it("should cover the furthest tile", () => {
    const result = layoutForTiles([tile(0, 0, "floor"), tile(5, 2, "wall")]);
    expect(result.columns).toBe(6);
    expect(result.rows).toBe(3);
  });

  it("should produce a 1x1 layout for no tiles", () => {
    expect(layoutForTiles([])).toMatchObject({ columns: 1, rows: 1 });
  });
});

describe("buildLevelGraph", () => {
  it("should create senders and receivers in tile order", () => {
    const graph = buildLevelGraph(
      [
        tile(0, 0, "player"),
        tile(0, 0, "floor"),
        tile(1, 0, "lever"),
        tile(2, 1, "door"),
        tile(3, 0, "pressurePlate"),
      ],
      layout,
      predicates,
    );

    expect(graph.playerStart).toEqual({ col: 0, row: 0 });
    expect(graph.geometryCount).toBe(1);
    expect(graph.network.senders.map((s) => `${s.kind}@${s.key}`)).toEqual([
      "lever@1_0",
      "pressurePlate@3_0",
    ]);
    expect(graph.network.receivers.map((r) => r.key)).toEqual(["2_1"]);
    expect(graph.diagnostics).toEqual([]);
  });

  it("should place objects at their tile centers", () => {
    const graph = buildLevelGraph([tile(3, 1, "lever"), tile(0, 0, "door")], layout, predicates);
    expect(graph.network.getSenderAt({ col: 3, row: 1 })?.worldPosition).toEqual({ x: 192, y: 64 });
    expect(graph.network.getReceiverAt({ col: 0, row: 0 })?.worldPosition).toEqual({
      x: -192,
      y: -64,
    });
  });

  it("should apply kind defaults unless the tile overrides them", () => {
    const tiles: TileRecord[] = [
      tile(0, 0, "irisScanner"),
      { position: { col: 1, row: 0 }, kind: "lever", methods: ["onToggle"] },
      { position: { col: 2, row: 0 }, kind: "irisScanner", cooldownMs: 250 },
    ];
    const { network } = buildLevelGraph(tiles, layout, predicates);

    const [iris, lever, quickIris] = network.senders;
    expect(iris?.cooldownMs).toBe(5000);
    expect(iris ? [...iris.methods] : []).toEqual(["byIntervention", "onTimer"]);
    expect(lever ? [...lever.methods] : []).toEqual(["onToggle"]);
    expect(quickIris?.cooldownMs).toBe(250);
  });

  it("should report a second sender at one position as fatal", () => {
    const graph = buildLevelGraph(
      [tile(1, 1, "lever"), tile(1, 1, "trigger")],
      layout,
      predicates,
    );
    expect(graph.network.senders).toHaveLength(1);
    expect(graph.network.senders[0]?.kind).toBe("lever");
    expect(graph.diagnostics).toEqual([
      {
        severity: "fatal",
        code: "duplicate-sender",
        message: "Two senders occupy (1, 1).",
        position: { col: 1, row: 1 },
      },
    ]);
  });

  it("should report sender tiles with invalid settings as fatal", () => {
    const graph = buildLevelGraph(
      [
        { position: { col: 1, row: 0 }, kind: "lever", cooldownMs: -5 },
        { position: { col: 2, row: 0 }, kind: "trigger", methods: [] },
        tile(3, 0, "pressurePlate"),
      ],
      layout,
      predicates,
    );

    expect(graph.network.senders.map((s) => s.key)).toEqual(["3_0"]);
    expect(graph.diagnostics).toEqual([
      {
        severity: "fatal",
        code: "invalid-sender",
        message: "Invalid lever tile: Sender at 1_0 has an invalid cooldown. Got: -5",
        position: { col: 1, row: 0 },
      },
      {
        severity: "fatal",
        code: "invalid-sender",
        message: "Invalid trigger tile: Sender at 2_0 needs at least one activation method",
        position: { col: 2, row: 0 },
      },
    ]);
  });

  it("should keep the first player tile", () => {
    const graph = buildLevelGraph(
      [tile(0, 0, "player"), tile(2, 0, "player")],
      layout,
      predicates,
    );
    expect(graph.playerStart).toEqual({ col: 0, row: 0 });
    expect(graph.diagnostics.map((d) => d.code)).toEqual(["duplicate-player"]);
  });

  it("should attach hooks from the factory", () => {
    const seen: string[] = [];
    const graph = buildLevelGraph([tile(1, 0, "lever")], layout, predicates, (sender) => ({
      onActivate: () => seen.push(sender.key),
    }));
    const lever = graph.network.getSender("1_0");
    expect(lever).toBeDefined();
    if (lever) lever.getHooks().onActivate?.(lever);
    expect(seen).toEqual(["1_0"]);
  });
});
