import type { MarkerSnapshot } from "../types.js";
import { isFinitePosition, samePosition, type LatLng } from "../../utils/geo.js";

/**
 * What the diff needs to know about a marker that is already live.
 */
export interface TrackedTarget {
  readonly target: LatLng;
}

export interface RetainedMarker<M extends MarkerSnapshot> {
  snapshot: M;
  /**
   * True when the supplied position differs from the stored target.
   */
  moved: boolean;
}

export interface MarkerDiff<M extends MarkerSnapshot> {
  added: M[];
  removed: string[];
  retained: RetainedMarker<M>[];
  /**
   * Ids that appeared more than once in the incoming collection.
   * The last occurrence of each is the one that was kept.
   */
  duplicates: string[];
  /**
   * Ids whose supplied position is not finite. A new one is not added, a live one
   * keeps its target and only takes the rest of the payload.
   */
  invalid: string[];
}

/**
 * Classifies every id of `next` against the live markers in `previous`.
 * Runs in O(n + m): the incoming collection is indexed by id before comparison.
 */
export function diffMarkers<M extends MarkerSnapshot>(
  previous: ReadonlyMap<string, TrackedTarget>,
  next: Iterable<M>,
): MarkerDiff<M> {
  const incoming = new Map<string, M>();
  const duplicates = new Set<string>();

  for (const snapshot of next) {
    if (incoming.has(snapshot.id)) duplicates.add(snapshot.id);
    // Last occurrence wins, in the slot of the first one
    incoming.set(snapshot.id, snapshot);
  }

  const diff: MarkerDiff<M> = {
    added: [],
    removed: [],
    retained: [],
    duplicates: [...duplicates],
    invalid: [],
  };

  for (const id of previous.keys()) {
    if (!incoming.has(id)) diff.removed.push(id);
  }

  for (const [id, snapshot] of incoming) {
    const existing = previous.get(id);
    const valid = isFinitePosition(snapshot.position);
    if (!valid) diff.invalid.push(id);

    if (!existing) {
      if (!valid) continue;
      diff.added.push(snapshot);
    } else {
      diff.retained.push({
        snapshot,
        moved: valid && !samePosition(existing.target, snapshot.position),
      });
    }
  }

  return diff;
}
