import { describe, expect, it } from "vitest";

import { Curves, cubicBezier } from "../motion/curves.js";

describe("Curves", () => {
  it("linear is the identity", () => {
    expect(Curves.linear(0.25)).toBe(0.25);
  });

  it("pins every named curve to 0 and 1 at the ends", () => {
    for (const curve of Object.values(Curves)) {
      expect(curve(0)).toBe(0);
      expect(curve(1)).toBe(1);
    }
  });

  it("easeIn lags behind linear at the midpoint", () => {
    expect(Curves.easeIn(0.5)).toBeCloseTo(0.315, 2);
  });

  it("easeOut leads linear at the midpoint", () => {
    expect(Curves.easeOut(0.5)).toBeCloseTo(0.685, 2);
  });

  it("is monotonic", () => {
    for (const curve of [Curves.easeIn, Curves.easeInOut, Curves.fastOutSlowIn]) {
      let previous = 0;
      for (let step = 1; step <= 20; step++) {
        const value = curve(step / 20);
        expect(value).toBeGreaterThanOrEqual(previous);
        previous = value;
      }
    }
  });

  it("cubicBezier with straight control points is linear", () => {
    const curve = cubicBezier(1 / 3, 1 / 3, 2 / 3, 2 / 3);
    expect(curve(0.3)).toBeCloseTo(0.3, 5);
  });

  it("clamps out-of-range input", () => {
    expect(Curves.easeInOut(-1)).toBe(0);
    expect(Curves.easeInOut(2)).toBe(1);
  });
});
