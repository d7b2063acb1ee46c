/**
 * Default configuration constants for the signal network
 */

/**
 * Default simulation tick rate: 60 Hz (~16.67ms per tick)
 * One evaluation pass runs per rendered frame.
 */
export const DEFAULT_TICK_RATE = 60;

/**
 * Default tick interval in milliseconds (1000 / tickRate)
 */
export const DEFAULT_TICK_INTERVAL_MS = 1000 / DEFAULT_TICK_RATE; // ~16.67ms

/**
 * Minimum tick delta clamp (1ms)
 */
export const MIN_DELTA_MS = 1;

/**
 * Maximum tick delta clamp (100ms)
 * A stalled frame advances timers by at most this much.
 */
export const MAX_DELTA_MS = 100;

/**
 * Tick rate bounds for a fixed-step loop (10-1000 Hz).
 * Outside them the delta clamp would change how fast the level clock runs.
 */
export const MIN_TICK_RATE = 1000 / MAX_DELTA_MS;
export const MAX_TICK_RATE = 1000 / MIN_DELTA_MS;

/**
 * Pressure plate activation radius in world units.
 * Objects must be strictly closer than this; the player may stand exactly on it.
 */
export const PRESSURE_PLATE_RADIUS = 64;

/**
 * Minimum mass a dynamic object needs to hold a pressure plate down.
 */
export const PRESSURE_PLATE_MIN_MASS = 50;

/**
 * Time an iris scanner stays active after a scan.
 */
export const IRIS_SCANNER_COOLDOWN_MS = 5000;

/**
 * Level loaded when a level configuration names no next level.
 */
export const DEFAULT_NEXT_LEVEL = "MainMenu";

/**
 * Costume set id used when a level configuration names none (no costumes).
 */
export const DEFAULT_COSTUME_SET = 0;
