/**
 * Vector math for world-space positions (Y-up).
 */

import type { Vector2 } from "./types.js";

/**
 * Euclidean distance between two points.
 */
export const distance = (a: Vector2, b: Vector2): number => Math.hypot(a.x - b.x, a.y - b.y);
