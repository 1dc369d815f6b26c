import { describe, expect, it } from "vitest";

import { diffMarkers, type TrackedTarget } from "../diff/diffMarkers.js";
import type { MarkerSnapshot } from "../types.js";

function marker(id: string, lat: number, lng: number, rotation = 0): MarkerSnapshot {
  return { id, position: { lat, lng }, rotation };
}

function live(...entries: [string, number, number][]): Map<string, TrackedTarget> {
  return new Map(entries.map(([id, lat, lng]) => [id, { target: { lat, lng } }]));
}

describe("diffMarkers", () => {
  it("classifies added, removed and retained ids", () => {
    const diff = diffMarkers(live(["1", 1, 1], ["2", 2, 2]), [marker("2", 2, 2), marker("3", 3, 3)]);

    expect(diff.added.map((m) => m.id)).toEqual(["3"]);
    expect(diff.removed).toEqual(["1"]);
    expect(diff.retained).toEqual([{ snapshot: marker("2", 2, 2), moved: false }]);
    expect(diff.duplicates).toEqual([]);
  });

  it("flags retained markers whose position differs from the stored target", () => {
    const diff = diffMarkers(live(["1", 1, 1], ["2", 2, 2]), [marker("1", 1, 1), marker("2", 20, 2)]);

    expect(diff.retained.map(({ snapshot, moved }) => [snapshot.id, moved])).toEqual([
      ["1", false],
      ["2", true],
    ]);
  });

  it("ignores non-positional changes when detecting movement", () => {
    const diff = diffMarkers(live(["1", 5, 5]), [marker("1", 5, 5, 90)]);
    expect(diff.retained[0]?.moved).toBe(false);
    expect(diff.retained[0]?.snapshot.rotation).toBe(90);
  });

  it("treats an empty collection as removing everything", () => {
    const diff = diffMarkers(live(["1", 1, 1], ["2", 2, 2]), []);
    expect(diff.removed).toEqual(["1", "2"]);
    expect(diff.added).toEqual([]);
    expect(diff.retained).toEqual([]);
  });

  it("keeps the last occurrence of a duplicate id", () => {
    const diff = diffMarkers(live(["1", 0, 0]), [marker("1", 10, 0), marker("1", 20, 0)]);

    expect(diff.duplicates).toEqual(["1"]);
    expect(diff.retained).toHaveLength(1);
    expect(diff.retained[0]?.snapshot.position).toEqual({ lat: 20, lng: 0 });
  });

  it("accepts any iterable", () => {
    const diff = diffMarkers(new Map(), new Set([marker("a", 1, 2)]));
    expect(diff.added.map((m) => m.id)).toEqual(["a"]);
  });

  it("skips new markers with non-finite coordinates", () => {
    const diff = diffMarkers(new Map(), [marker("a", Number.NaN, 0), marker("b", 1, Number.POSITIVE_INFINITY), marker("c", 1, 1)]);

    expect(diff.added.map((m) => m.id)).toEqual(["c"]);
    expect(diff.invalid).toEqual(["a", "b"]);
  });

  it("keeps live markers with non-finite coordinates without moving them", () => {
    const diff = diffMarkers(live(["1", 1, 1]), [marker("1", Number.NaN, 1, 45)]);

    expect(diff.invalid).toEqual(["1"]);
    expect(diff.removed).toEqual([]);
    expect(diff.retained).toHaveLength(1);
    expect(diff.retained[0]?.moved).toBe(false);
    expect(diff.retained[0]?.snapshot.rotation).toBe(45);
  });
});
