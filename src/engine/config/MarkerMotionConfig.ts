import { z } from "zod";
import { Curves } from "../motion/curves.js";
import type { Curve, LegTiming, MotionImplementation } from "../types.js";

/**
 * Frame rate of the frame-driven backend. It follows the host's display cadence,
 * so this is the only value that backend accepts.
 */
export const NATIVE_FRAME_RATE = 60;
export const MIN_TIMER_FRAME_RATE = 1;
export const MAX_TIMER_FRAME_RATE = 120;
export const DEFAULT_DURATION_MS = 1000;

export interface MarkerMotionConfigInput {
  /**
   * Scheduling backend.
   * @default "frame"
   */
  implementation?: MotionImplementation;
  /**
   * Length of one leg in milliseconds.
   * @default 1000
   */
  duration?: number;
  /**
   * Easing curve. Frame backend only; the timer backend is linear.
   * @default Curves.linear
   */
  curve?: Curve;
  /**
   * Ticks per second. Timer backend only, integer in [1, 120].
   * @default 60
   */
  frameRate?: number;
}

const configSchema = z
  .object({
    implementation: z.enum(["frame", "timer"]).default("frame"),
    duration: z
      .number()
      .finite()
      .nonnegative("duration must not be negative")
      .default(DEFAULT_DURATION_MS),
    curve: z
      .custom<Curve>((value) => typeof value === "function", "curve must be a function")
      .default(() => Curves.linear),
    frameRate: z.number().int("frameRate must be an integer").default(NATIVE_FRAME_RATE),
  })
  .superRefine((config, ctx) => {
    if (config.implementation === "frame" && config.frameRate !== NATIVE_FRAME_RATE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["frameRate"],
        message: "frameRate can only be customized for the timer implementation",
      });
    }
    if (
      config.implementation === "timer" &&
      (config.frameRate < MIN_TIMER_FRAME_RATE || config.frameRate > MAX_TIMER_FRAME_RATE)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["frameRate"],
        message: `frameRate must be between ${MIN_TIMER_FRAME_RATE} and ${MAX_TIMER_FRAME_RATE} for the timer implementation`,
      });
    }
    if (config.implementation === "timer" && config.curve !== Curves.linear) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["curve"],
        message: "the timer implementation only supports Curves.linear",
      });
    }
  });

export class MarkerMotionConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid marker motion config: ${issues.join("; ")}`);
    this.name = "MarkerMotionConfigError";
    this.issues = issues;
  }
}

/**
 * Validated, immutable animation parameters.
 * Construction throws {@link MarkerMotionConfigError} on any violation, so an
 * instance is always valid.
 */
export class MarkerMotionConfig {
  readonly implementation: MotionImplementation;
  readonly duration: number;
  readonly curve: Curve;
  readonly frameRate: number;

  constructor(input: MarkerMotionConfigInput = {}) {
    const result = configSchema.safeParse(input);
    if (!result.success) {
      throw new MarkerMotionConfigError(
        result.error.issues.map((issue) =>
          issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
        ),
      );
    }

    this.implementation = result.data.implementation;
    this.duration = result.data.duration;
    this.curve = result.data.curve;
    this.frameRate = result.data.frameRate;
    Object.freeze(this);
  }

  static from(config: MarkerMotionConfig | MarkerMotionConfigInput | undefined): MarkerMotionConfig {
    return config instanceof MarkerMotionConfig ? config : new MarkerMotionConfig(config);
  }

  get timing(): LegTiming {
    return { duration: this.duration, curve: this.curve };
  }

  /**
   * Tick interval of the timer backend in milliseconds.
   */
  get timerIntervalMs(): number {
    return Math.round(1000 / this.frameRate);
  }
}
