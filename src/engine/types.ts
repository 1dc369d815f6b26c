/**
 * Defines the core types for the marker motion engine.
 */

import type { LatLng } from "../utils/geo.js";

/**
 * Info window content attached to a marker.
 */
export interface InfoWindowContent {
  title?: string;
  snippet?: string;
}

/**
 * contract SvgIconConfig
 *
 * Defines the visual style for a dynamic SVG-based marker.
 * If provided, the Google layer renders a vector symbol and applies `rotation` to it.
 */
export interface SvgIconConfig {
  /**
   * The SVG path data (d attribute).
   * Example: "M10 10 L20 20 Z"
   */
  path: string;

  /**
   * Fill color of the SVG path.
   * @default "#FFFFFF"
   */
  fillColor?: string;

  /**
   * Opacity of the fill color (0.0 to 1.0).
   * @default 1.0
   */
  fillOpacity?: number;

  /**
   * Stroke color (border) of the SVG path.
   * @default "transparent"
   */
  strokeColor?: string;

  /**
   * Thickness of the stroke in pixels.
   * @default 0
   */
  strokeWeight?: number;

  /**
   * Scale factor for the icon.
   * @default 1.0
   */
  scale?: number;

  /**
   * The position within the icon that anchors to the map coordinate,
   * relative to the SVG coordinate system.
   */
  anchor?: {
    x: number;
    y: number;
  };
}

/**
 * One marker as supplied by the caller and as rendered by the engine.
 *
 * Only `position` is interpolated. Every other field is copied verbatim from the
 * most recent snapshot supplied for the same `id`. Consumers may extend this
 * interface with their own fields; they pass through untouched.
 */
export interface MarkerSnapshot {
  /**
   * Identity, unique within one collection.
   */
  id: string;
  position: LatLng;
  /**
   * Degrees clockwise. Applied immediately, never tweened.
   */
  rotation?: number;
  /**
   * 0.0 (transparent) to 1.0 (opaque).
   */
  alpha?: number;
  draggable?: boolean;
  consumeTapEvents?: boolean;
  flat?: boolean;
  visible?: boolean;
  zIndex?: number;
  infoWindow?: InfoWindowContent;
  icon?: SvgIconConfig;
}

/**
 * Easing strategy: maps a time fraction in [0, 1] to a progress fraction in [0, 1].
 * Expected to be monotonic with curve(0) = 0 and curve(1) = 1.
 */
export type Curve = (t: number) => number;

/**
 * Scheduling backend.
 * - frame: synchronized to the host's display frame callback.
 * - timer: synchronized to a fixed-interval timer derived from `frameRate`.
 */
export type MotionImplementation = "frame" | "timer";

/**
 * Milliseconds source. Must be monotonic for the lifetime of an engine.
 */
export type Clock = () => number;

/**
 * Receives the fully materialized marker set whenever it changes.
 */
export type RenderCallback<M extends MarkerSnapshot = MarkerSnapshot> = (
  markers: Set<M>,
) => void;

/**
 * Duration and curve applied to a leg.
 */
export interface LegTiming {
  duration: number;
  curve: Curve;
}
