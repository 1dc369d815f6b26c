import { describe, expect, it } from "vitest";

import { clamp, copyPosition, lerpPosition, planarDistance, samePosition } from "../geo.js";

describe("geo utils", () => {
  it("lerpPosition interpolates both coordinates", () => {
    expect(lerpPosition({ lat: 0, lng: 10 }, { lat: 10, lng: 20 }, 0.5)).toEqual({ lat: 5, lng: 15 });
  });

  it("lerpPosition lands on the endpoints", () => {
    const from = { lat: 1.5, lng: -3 };
    const to = { lat: 2, lng: 7 };
    expect(lerpPosition(from, to, 0)).toEqual(from);
    expect(lerpPosition(from, to, 1)).toEqual(to);
  });

  it("clamp bounds a value", () => {
    expect(clamp(-1, 0, 1)).toBe(0);
    expect(clamp(0.4, 0, 1)).toBe(0.4);
    expect(clamp(3, 0, 1)).toBe(1);
  });

  it("samePosition compares exactly", () => {
    expect(samePosition({ lat: 1, lng: 2 }, { lat: 1, lng: 2 })).toBe(true);
    expect(samePosition({ lat: 1, lng: 2 }, { lat: 1, lng: 2.0000001 })).toBe(false);
  });

  it("planarDistance is euclidean in coordinate space", () => {
    expect(planarDistance({ lat: 0, lng: 0 }, { lat: 3, lng: 4 })).toBe(5);
  });

  it("copyPosition returns a detached copy", () => {
    const original = { lat: 1, lng: 2 };
    const copy = copyPosition(original);
    copy.lat = 9;
    expect(original.lat).toBe(1);
  });
});
