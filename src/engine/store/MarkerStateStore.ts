import type { LegTiming, MarkerSnapshot, SvgIconConfig } from "../types.js";
import { diffMarkers, type MarkerDiff } from "../diff/diffMarkers.js";
import { AnimatedMarker, type FractionFn } from "../motion/AnimatedMarker.js";
import { copyPosition, type LatLng } from "../../utils/geo.js";

function copyIcon(icon: SvgIconConfig): SvgIconConfig {
  return { ...icon, ...(icon.anchor ? { anchor: { ...icon.anchor } } : {}) };
}

/**
 * Payload for one emission. Nested objects are copied so no two emissions,
 * and no emission and the caller, share a mutable object.
 */
function renderPayload<M extends MarkerSnapshot>(payload: M, position: LatLng): M {
  return {
    ...payload,
    position: copyPosition(position),
    ...(payload.infoWindow ? { infoWindow: { ...payload.infoWindow } } : {}),
    ...(payload.icon ? { icon: copyIcon(payload.icon) } : {}),
  };
}

/**
 * Owns the id → animation state mapping and the latest payload per id.
 *
 * The set of active ids doubles as the reference count for the shared clock:
 * the engine keeps its tick source running exactly while `activeCount > 0`.
 */
export class MarkerStateStore<M extends MarkerSnapshot = MarkerSnapshot> {
  private states = new Map<string, AnimatedMarker>();
  private payloads = new Map<string, M>();
  private activeIds = new Set<string>();

  get size(): number {
    return this.states.size;
  }

  get activeCount(): number {
    return this.activeIds.size;
  }

  /**
   * Applies a new collection: adds, retargets, updates payloads and removes.
   */
  applyDiff(next: Iterable<M>, now: number, timing: LegTiming): MarkerDiff<M> {
    const diff = diffMarkers(this.states, next);

    for (const id of diff.removed) {
      this.states.delete(id);
      this.payloads.delete(id);
      this.activeIds.delete(id);
    }

    for (const snapshot of diff.added) {
      this.states.set(snapshot.id, new AnimatedMarker(snapshot.id, snapshot.position));
      this.payloads.set(snapshot.id, snapshot);
    }

    for (const { snapshot, moved } of diff.retained) {
      this.payloads.set(snapshot.id, snapshot);
      if (!moved) continue;

      const state = this.states.get(snapshot.id);
      if (!state) continue;

      state.retarget(snapshot.position, now, timing);
      this.track(state);
    }

    return diff;
  }

  /**
   * Advances every active leg to `now`. Returns true when any position changed.
   */
  tick(now: number, fraction: FractionFn): boolean {
    let changed = false;

    for (const id of [...this.activeIds]) {
      const state = this.states.get(id);
      if (!state) {
        this.activeIds.delete(id);
        continue;
      }
      if (state.advance(now, fraction)) changed = true;
      this.track(state);
    }

    return changed;
  }

  /**
   * Applies a new duration and curve to the remaining part of every in-flight leg.
   */
  retime(timing: LegTiming): void {
    for (const id of this.activeIds) {
      this.states.get(id)?.retime(timing);
    }
  }

  get(id: string): AnimatedMarker | undefined {
    return this.states.get(id);
  }

  /**
   * Fresh set with one entry per live id: current position over the latest payload.
   */
  renderedSnapshot(): Set<M> {
    const rendered = new Set<M>();
    for (const [id, payload] of this.payloads) {
      const state = this.states.get(id);
      if (!state) continue;
      rendered.add(renderPayload(payload, state.position));
    }
    return rendered;
  }

  clear(): void {
    this.states.clear();
    this.payloads.clear();
    this.activeIds.clear();
  }

  private track(state: AnimatedMarker): void {
    if (state.active) this.activeIds.add(state.id);
    else this.activeIds.delete(state.id);
  }
}
