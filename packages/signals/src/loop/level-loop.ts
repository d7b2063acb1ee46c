import {
  DEFAULT_TICK_INTERVAL_MS,
  DEFAULT_TICK_RATE,
  MAX_DELTA_MS,
  MAX_TICK_RATE,
  MIN_DELTA_MS,
  MIN_TICK_RATE,
} from "../constants.js";
import type { Stimulus } from "../core/types.js";
import type { LevelSession, TickResult } from "../session/level-session.js";

/**
 * Fixed timestep loop that ticks a level session.
 *
 * Every tick samples a fresh stimulus and advances the session by the tick
 * interval, so evaluation never depends on timer jitter. The loop stops by
 * itself once the session is completed or aborted.
 */
export class LevelLoop {
  private session: LevelSession;
  private sampleStimulus: () => Stimulus;
  private tickInterval: number;
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private onTickCallback?: (result: TickResult) => void;

  constructor(
    session: LevelSession,
    sampleStimulus: () => Stimulus,
    tickIntervalMs: number = DEFAULT_TICK_INTERVAL_MS,
  ) {
    if (!(tickIntervalMs >= MIN_DELTA_MS && tickIntervalMs <= MAX_DELTA_MS)) {
      throw new Error(
        `[LevelLoop] tickIntervalMs must be between ${MIN_DELTA_MS} and ${MAX_DELTA_MS}. Got: ${tickIntervalMs}`,
      );
    }
    this.session = session;
    this.sampleStimulus = sampleStimulus;
    this.tickInterval = tickIntervalMs;
  }

  /**
   * Set callback to be called after each tick with its result
   */
  onTick(callback: (result: TickResult) => void): void {
    this.onTickCallback = callback;
  }

  /**
   * Process a single tick
   */
  private tick(): void {
    const result = this.session.tick(this.sampleStimulus(), this.tickInterval);

    if (this.onTickCallback) {
      this.onTickCallback(result);
    }

    if (result.state === "completed" || result.state === "aborted") {
      console.log(`[LevelLoop] Level "${this.session.id}" ${result.state} after ${result.tick} ticks`);
      this.stop();
    }
  }

  /**
   * Start the loop
   */
  start(): void {
    if (this.intervalId !== null) {
      return; // Already running
    }
    if (this.session.state === "aborted" || this.session.state === "completed") {
      console.warn(`[LevelLoop] Level "${this.session.id}" is ${this.session.state}; not starting`);
      return;
    }

    this.intervalId = setInterval(() => {
      this.tick();
    }, this.tickInterval);
  }

  /**
   * Stop the loop
   */
  stop(): void {
    if (this.intervalId !== null) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }

  /**
   * Check if the loop is running
   */
  isRunning(): boolean {
    return this.intervalId !== null;
  }
}

/**
 * Configuration for createLevelLoop
 */
export interface LevelLoopConfig {
  /** Ticks per second, 10-1000 (default: 60) */
  tickRate?: number;
  /** Called after each tick */
  onTick?: (result: TickResult) => void;
}

/**
 * Create a loop for a session at the given tick rate.
 */
export function createLevelLoop(
  session: LevelSession,
  sampleStimulus: () => Stimulus,
  config: LevelLoopConfig = {},
): LevelLoop {
  const tickRate = config.tickRate ?? DEFAULT_TICK_RATE;
  if (!(tickRate >= MIN_TICK_RATE && tickRate <= MAX_TICK_RATE)) {
    throw new Error(
      `[LevelLoop] tickRate must be between ${MIN_TICK_RATE} and ${MAX_TICK_RATE}. Got: ${tickRate}`,
    );
  }

  const loop = new LevelLoop(session, sampleStimulus, 1000 / tickRate);
  if (config.onTick) {
    loop.onTick(config.onTick);
  }
  return loop;
}
