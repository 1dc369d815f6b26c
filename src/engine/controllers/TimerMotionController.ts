import type { Clock } from "../types.js";
import type { TickListener, TickSource } from "../interfaces/TickSource.js";
import { clamp } from "../../utils/geo.js";

/**
 * Tick source driven by a fixed-interval timer, interval = round(1000 / frameRate).
 *
 * Linear only. Legs no longer than one interval land on their target at the first
 * tick after they start instead of taking a fractional step.
 */
export class TimerMotionController implements TickSource {
  readonly implementation = "timer" as const;

  private listener: TickListener | null = null;
  private cancelTimer: (() => void) | null = null;
  // Bumped on every teardown so a firing from a cleared interval does nothing
  private generation = 0;
  private intervalMs: number;

  constructor(
    frameRate: number,
    private clock: Clock = Date.now,
  ) {
    this.intervalMs = Math.round(1000 / frameRate);
  }

  get running(): boolean {
    return this.cancelTimer !== null;
  }

  get interval(): number {
    return this.intervalMs;
  }

  readonly fraction = (elapsed: number, duration: number): number => {
    if (duration <= this.intervalMs) return 1;
    return clamp(elapsed / duration, 0, 1);
  };

  start(listener: TickListener): void {
    this.listener = listener;
    if (this.cancelTimer !== null) return;

    const generation = ++this.generation;
    const timer = setInterval(() => {
      if (generation !== this.generation || !this.listener) return;
      this.listener(this.clock());
    }, this.intervalMs);
    this.cancelTimer = () => clearInterval(timer);
  }

  stop(): void {
    this.generation++;
    this.listener = null;
    if (this.cancelTimer !== null) {
      this.cancelTimer();
      this.cancelTimer = null;
    }
  }

  /**
   * Re-creates the interval with the new cadence when running.
   */
  setFrameRate(frameRate: number): void {
    const intervalMs = Math.round(1000 / frameRate);
    if (intervalMs === this.intervalMs) return;

    this.intervalMs = intervalMs;
    const listener = this.listener;
    if (this.cancelTimer === null || !listener) return;

    this.stop();
    this.start(listener);
  }
}
