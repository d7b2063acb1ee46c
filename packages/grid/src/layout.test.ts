import { describe, expect, it } from "vitest";
import {
  createTileLayout,
  DEFAULT_TILE_SIZE,
  gridToWorld,
} from "./layout.js";
import { gridPosition } from "./position.js";

describe("createTileLayout", () => {
  it("defaults to square tiles centered on the origin", () => {
    const layout = createTileLayout(4, 3);
    expect(layout.tileSize).toEqual({ width: DEFAULT_TILE_SIZE, height: DEFAULT_TILE_SIZE });
    expect(layout.origin).toEqual({ x: 0, y: 0 });
  });

  it("rejects non-positive grid sizes", () => {
    expect(() => createTileLayout(0, 3)).toThrow("positive integer grid size");
    expect(() => createTileLayout(2.5, 3)).toThrow("positive integer grid size");
  });

  it("rejects non-positive tile sizes", () => {
    expect(() => createTileLayout(4, 3, { width: 0, height: 128 })).toThrow("positive tile size");
  });
});

describe("gridToWorld", () => {
  const layout = createTileLayout(4, 3);

  it("places column 0 / row 0 at the bottom-left sprite center", () => {
    expect(gridToWorld(gridPosition(0, 0), layout)).toEqual({ x: -192, y: -128 });
  });

  it("places the last tile at the top-right sprite center", () => {
    expect(gridToWorld(gridPosition(3, 2), layout)).toEqual({ x: 192, y: 128 });
  });

  it("applies the layout origin", () => {
    const shifted = createTileLayout(4, 3, { width: 128, height: 128 }, { x: 1000, y: -50 });
    expect(gridToWorld(gridPosition(0, 0), shifted)).toEqual({ x: 808, y: -178 });
  });
});
