import type { Clock } from "../types.js";
import type { FrameHost, TickListener, TickSource } from "../interfaces/TickSource.js";
import { clamp } from "../../utils/geo.js";

// Cadence used when the host has no display frame callback (e.g. Node)
const FALLBACK_FRAME_MS = 16;

/**
 * Uses requestAnimationFrame when the host provides it, a 16ms timeout otherwise.
 */
export const defaultFrameHost: FrameHost = {
  request(callback) {
    if (typeof requestAnimationFrame === "function") {
      const frameId = requestAnimationFrame(() => callback());
      return () => cancelAnimationFrame(frameId);
    }
    const timeout = setTimeout(callback, FALLBACK_FRAME_MS);
    return () => clearTimeout(timeout);
  },
};

/**
 * Tick source synchronized to the host's display frames.
 * Supports any curve; a zero duration completes on the first evaluation.
 */
export class FrameMotionController implements TickSource {
  readonly implementation = "frame" as const;

  private listener: TickListener | null = null;
  private cancelFrame: (() => void) | null = null;
  private isRunning = false;

  constructor(
    private host: FrameHost = defaultFrameHost,
    private clock: Clock = Date.now,
  ) {}

  get running(): boolean {
    return this.isRunning;
  }

  readonly fraction = (elapsed: number, duration: number): number => {
    if (duration <= 0) return 1;
    return clamp(elapsed / duration, 0, 1);
  };

  start(listener: TickListener): void {
    this.listener = listener;
    if (this.isRunning) return;

    this.isRunning = true;
    this.requestFrame();
  }

  stop(): void {
    this.isRunning = false;
    this.listener = null;
    if (this.cancelFrame !== null) {
      this.cancelFrame();
      this.cancelFrame = null;
    }
  }

  private requestFrame(): void {
    this.cancelFrame = this.host.request(this.onFrame);
  }

  private onFrame = (): void => {
    this.cancelFrame = null;
    if (!this.isRunning || !this.listener) return;

    // Frame timestamps are ignored: legs are timed against the same clock that started them
    this.listener(this.clock());

    // The listener may have stopped us, or restarted us with a fresh frame
    if (this.isRunning && this.cancelFrame === null) {
      this.requestFrame();
    }
  };
}
