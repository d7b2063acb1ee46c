import { describe, expect, it } from "vitest";
import { distance } from "./math.js";

describe("distance", () => {
  it("computes the distance between two points", () => {
    expect(distance({ x: 1, y: 1 }, { x: 4, y: 5 })).toBe(5);
  });

  it("is zero for identical points", () => {
    expect(distance({ x: 10, y: -2 }, { x: 10, y: -2 })).toBe(0);
  });

  it("is symmetric", () => {
    expect(distance({ x: -64, y: 0 }, { x: 0, y: 0 })).toBe(64);
    expect(distance({ x: 0, y: 0 }, { x: -64, y: 0 })).toBe(64);
  });
});
