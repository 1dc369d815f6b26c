import type { Clock, MarkerSnapshot, RenderCallback } from "./types.js";
import { MarkerMotionConfig, type MarkerMotionConfigInput } from "./config/MarkerMotionConfig.js";
import type { FrameHost, TickSource } from "./interfaces/TickSource.js";
import { defaultFrameHost, FrameMotionController } from "./controllers/FrameMotionController.js";
import { TimerMotionController } from "./controllers/TimerMotionController.js";
import { MarkerStateStore } from "./store/MarkerStateStore.js";

/**
 * Options for creating a {@link MarkerMotion} engine.
 */
export interface MarkerMotionOptions<M extends MarkerSnapshot = MarkerSnapshot> {
  /**
   * Receives the materialized marker set after every update and every tick that moved a marker.
   */
  onRender: RenderCallback<M>;
  /**
   * Validated once here; construction throws on an invalid combination.
   */
  config?: MarkerMotionConfig | MarkerMotionConfigInput;
  /**
   * Initial collection. Rendered immediately at the supplied positions.
   */
  markers?: Iterable<M>;
  /**
   * Display-frame scheduler for the frame backend.
   * @default requestAnimationFrame, or a 16ms timeout where the host has none
   */
  frameHost?: FrameHost;
  /**
   * Millisecond clock used to time legs.
   * @default Date.now
   */
  clock?: Clock;
}

/**
 * Turns successive marker snapshots into smooth position changes.
 *
 * Each call to {@link setMarkers} is diffed against the live markers by id:
 * new ids appear instantly, missing ids vanish instantly, and ids whose position
 * changed glide from wherever they currently are to the new position.
 */
export class MarkerMotion<M extends MarkerSnapshot = MarkerSnapshot> {
  private store = new MarkerStateStore<M>();
  private source: TickSource;
  private currentConfig: MarkerMotionConfig;
  private onRender: RenderCallback<M> | null;
  private frameHost: FrameHost;
  private clock: Clock;
  private disposed = false;

  constructor(options: MarkerMotionOptions<M>) {
    this.currentConfig = MarkerMotionConfig.from(options.config);
    this.onRender = options.onRender;
    this.frameHost = options.frameHost ?? defaultFrameHost;
    this.clock = options.clock ?? Date.now;
    this.source = this.createSource(this.currentConfig);

    if (options.markers) {
      this.setMarkers(options.markers);
    }
  }

  get config(): MarkerMotionConfig {
    return this.currentConfig;
  }

  /**
   * Current rendered snapshot.
   */
  get markers(): Set<M> {
    return this.store.renderedSnapshot();
  }

  get isAnimating(): boolean {
    return this.store.activeCount > 0;
  }

  /**
   * Replaces the logical marker set. Synchronous; emits exactly once.
   */
  setMarkers(markers: Iterable<M>): void {
    if (this.disposed) {
      console.warn("[MarkerMotion] setMarkers called after dispose, ignoring update");
      return;
    }

    const diff = this.store.applyDiff(markers, this.clock(), this.currentConfig.timing);
    if (diff.duplicates.length > 0) {
      console.warn(
        `[MarkerMotion] Duplicate marker ids in update, keeping the last occurrence: ${diff.duplicates.join(", ")}`,
      );
    }
    if (diff.invalid.length > 0) {
      console.warn(`[MarkerMotion] Invalid coords for marker ids, position ignored: ${diff.invalid.join(", ")}`);
    }

    this.syncSource();
    this.emit();
  }

  /**
   * Swaps the animation parameters at runtime.
   *
   * In-flight legs keep their start, target and start time; only the remaining
   * portion follows the new duration and curve. Switching implementation hands
   * the active legs over to the new backend.
   */
  setConfig(config: MarkerMotionConfig | MarkerMotionConfigInput): void {
    if (this.disposed) {
      console.warn("[MarkerMotion] setConfig called after dispose, ignoring update");
      return;
    }

    const next = MarkerMotionConfig.from(config);
    const previous = this.currentConfig;
    this.currentConfig = next;

    if (next.implementation !== previous.implementation) {
      this.source.stop();
      this.source = this.createSource(next);
    } else if (this.source instanceof TimerMotionController && next.frameRate !== previous.frameRate) {
      this.source.setFrameRate(next.frameRate);
    }

    if (next.duration !== previous.duration || next.curve !== previous.curve) {
      this.store.retime(next.timing);
    }

    this.syncSource();
  }

  /**
   * Cancels the active frame subscription or timer, then releases all state.
   * Nothing is emitted afterwards.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.source.stop();
    this.onRender = null;
    this.store.clear();
  }

  private createSource(config: MarkerMotionConfig): TickSource {
    return config.implementation === "timer"
      ? new TimerMotionController(config.frameRate, this.clock)
      : new FrameMotionController(this.frameHost, this.clock);
  }

  // Keeps the shared clock subscribed exactly while some leg is active
  private syncSource(): void {
    if (this.store.activeCount > 0) {
      this.source.start(this.onTick);
    } else if (this.source.running) {
      this.source.stop();
    }
  }

  private onTick = (now: number): void => {
    if (this.disposed) return;

    const changed = this.store.tick(now, this.source.fraction);
    if (this.store.activeCount === 0) {
      this.source.stop();
    }
    if (changed) this.emit();
  };

  private emit(): void {
    this.onRender?.(this.store.renderedSnapshot());
  }
}
