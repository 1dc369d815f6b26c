import type { Curve, LegTiming } from "../types.js";
import { copyPosition, lerpPosition, type LatLng } from "../../utils/geo.js";
import { Curves } from "./curves.js";

/**
 * Maps the elapsed time of a leg to a fraction in [0, 1].
 * Supplied by the active tick source so the timing rules stay backend specific.
 */
export type FractionFn = (elapsed: number, duration: number) => number;

/**
 * Animation state of a single marker: one leg from `start` to `target`.
 */
export class AnimatedMarker {
  private start: LatLng;
  private currentTarget: LatLng;
  private current: LatLng;
  private startedAt = 0;
  private duration = 0;
  private curve: Curve = Curves.linear;
  private isActive = false;

  // New markers appear at their supplied position, no animate-in
  constructor(
    readonly id: string,
    position: LatLng,
  ) {
    this.start = copyPosition(position);
    this.currentTarget = copyPosition(position);
    this.current = copyPosition(position);
  }

  get target(): LatLng {
    return this.currentTarget;
  }

  get position(): LatLng {
    return this.current;
  }

  get active(): boolean {
    return this.isActive;
  }

  get startTime(): number {
    return this.startedAt;
  }

  /**
   * Abandons the current leg and starts a new one from the current position.
   * A zero duration lands on the target right away.
   */
  retarget(target: LatLng, now: number, timing: LegTiming): void {
    this.start = copyPosition(this.current);
    this.currentTarget = copyPosition(target);
    this.startedAt = now;
    this.duration = timing.duration;
    this.curve = timing.curve;

    if (this.duration <= 0) {
      this.finish();
      return;
    }
    this.isActive = true;
  }

  /**
   * Changes duration and curve of the in-flight leg. Start, target and start time are kept.
   */
  retime(timing: LegTiming): void {
    if (!this.isActive) return;
    this.duration = timing.duration;
    this.curve = timing.curve;
  }

  /**
   * Recomputes the current position at `now`.
   * Returns true when the position changed.
   */
  advance(now: number, fraction: FractionFn): boolean {
    if (!this.isActive) return false;

    const previous = this.current;
    const progress = fraction(now - this.startedAt, this.duration);

    if (progress >= 1) {
      this.finish();
    } else {
      this.current = lerpPosition(this.start, this.currentTarget, this.curve(progress));
    }

    return previous.lat !== this.current.lat || previous.lng !== this.current.lng;
  }

  private finish(): void {
    this.current = copyPosition(this.currentTarget);
    this.isActive = false;
  }
}
