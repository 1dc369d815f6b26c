import { describe, expect, it } from "vitest";

import { MarkerMotionConfig, MarkerMotionConfigError } from "../config/MarkerMotionConfig.js";
import { Curves } from "../motion/curves.js";

describe("MarkerMotionConfig", () => {
  it("applies defaults", () => {
    const config = new MarkerMotionConfig();

    expect(config.implementation).toBe("frame");
    expect(config.duration).toBe(1000);
    expect(config.curve).toBe(Curves.linear);
    expect(config.frameRate).toBe(60);
  });

  it("is frozen", () => {
    const config = new MarkerMotionConfig({ duration: 250 });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("accepts an explicit native frame rate for the frame implementation", () => {
    expect(new MarkerMotionConfig({ implementation: "frame", frameRate: 60 }).frameRate).toBe(60);
  });

  it("rejects custom frameRate for the frame implementation", () => {
    expect(() => new MarkerMotionConfig({ frameRate: 30 })).toThrow(MarkerMotionConfigError);
  });

  it("rejects timer frameRate below range", () => {
    expect(() => new MarkerMotionConfig({ implementation: "timer", frameRate: 0 })).toThrow(
      MarkerMotionConfigError,
    );
  });

  it("rejects timer frameRate above range", () => {
    expect(() => new MarkerMotionConfig({ implementation: "timer", frameRate: 121 })).toThrow(
      MarkerMotionConfigError,
    );
  });

  it("accepts the timer frameRate bounds", () => {
    expect(new MarkerMotionConfig({ implementation: "timer", frameRate: 1 }).timerIntervalMs).toBe(1000);
    expect(new MarkerMotionConfig({ implementation: "timer", frameRate: 120 }).timerIntervalMs).toBe(8);
  });

  it("rounds the timer interval", () => {
    expect(new MarkerMotionConfig({ implementation: "timer", frameRate: 60 }).timerIntervalMs).toBe(17);
  });

  it("rejects a fractional frameRate", () => {
    expect(() => new MarkerMotionConfig({ implementation: "timer", frameRate: 24.5 })).toThrow(
      MarkerMotionConfigError,
    );
  });

  it("rejects non-linear curve with the timer implementation", () => {
    expect(() => new MarkerMotionConfig({ implementation: "timer", curve: Curves.easeIn })).toThrow(
      MarkerMotionConfigError,
    );
  });

  it("accepts non-linear curves with the frame implementation", () => {
    expect(new MarkerMotionConfig({ curve: Curves.easeIn }).curve).toBe(Curves.easeIn);
  });

  it("rejects a negative duration", () => {
    expect(() => new MarkerMotionConfig({ duration: -1 })).toThrow(MarkerMotionConfigError);
  });

  it("accepts a zero duration", () => {
    expect(new MarkerMotionConfig({ duration: 0 }).duration).toBe(0);
  });

  it("reports the offending field", () => {
    try {
      new MarkerMotionConfig({ implementation: "timer", frameRate: 121 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MarkerMotionConfigError);
      if (error instanceof MarkerMotionConfigError) {
        expect(error.issues).toEqual([
          "frameRate: frameRate must be between 1 and 120 for the timer implementation",
        ]);
      }
    }
  });

  it("from() passes an existing config through", () => {
    const config = new MarkerMotionConfig({ duration: 10 });
    expect(MarkerMotionConfig.from(config)).toBe(config);
    expect(MarkerMotionConfig.from({ duration: 20 }).duration).toBe(20);
    expect(MarkerMotionConfig.from(undefined).duration).toBe(1000);
  });
});
