import type { FractionFn } from "../motion/AnimatedMarker.js";
import type { MotionImplementation } from "../types.js";

/**
 * Called by a tick source with the current clock reading.
 */
export type TickListener = (now: number) => void;

/**
 * Shared clock that drives every active marker of one engine.
 * Implementations own exactly one subscription (frame callback or timer) at a time;
 * the engine starts it when the first leg activates and stops it when the last one completes.
 */
export interface TickSource {
    readonly implementation: MotionImplementation;

    /**
     * Whether the underlying subscription is live.
     */
    readonly running: boolean;

    /**
     * Subscribes lazily. Calling it while running only swaps the listener.
     */
    start(listener: TickListener): void;

    /**
     * Cancels the subscription synchronously. A callback already in flight becomes a no-op.
     */
    stop(): void;

    /**
     * Elapsed time to leg fraction under this backend's timing rules.
     */
    readonly fraction: FractionFn;
}

/**
 * Host display-frame scheduler.
 * Returns a function that cancels the requested frame.
 */
export interface FrameHost {
    request(callback: () => void): () => void;
}
