export type {
  MarkerSnapshot,
  InfoWindowContent,
  SvgIconConfig,
  Curve,
  Clock,
  LegTiming,
  MotionImplementation,
  RenderCallback,
} from "./engine/types.js";

export { MarkerMotion } from "./engine/MarkerMotion.js";
export type { MarkerMotionOptions } from "./engine/MarkerMotion.js";

export {
  MarkerMotionConfig,
  MarkerMotionConfigError,
  NATIVE_FRAME_RATE,
  MIN_TIMER_FRAME_RATE,
  MAX_TIMER_FRAME_RATE,
  DEFAULT_DURATION_MS,
} from "./engine/config/MarkerMotionConfig.js";
export type { MarkerMotionConfigInput } from "./engine/config/MarkerMotionConfig.js";

export { Curves, cubicBezier } from "./engine/motion/curves.js";
export type { CurveName } from "./engine/motion/curves.js";

export { diffMarkers } from "./engine/diff/diffMarkers.js";
export type { MarkerDiff, RetainedMarker, TrackedTarget } from "./engine/diff/diffMarkers.js";

export { MarkerStateStore } from "./engine/store/MarkerStateStore.js";
export { AnimatedMarker } from "./engine/motion/AnimatedMarker.js";
export type { FractionFn } from "./engine/motion/AnimatedMarker.js";

export { FrameMotionController, defaultFrameHost } from "./engine/controllers/FrameMotionController.js";
export { TimerMotionController } from "./engine/controllers/TimerMotionController.js";
export type { TickSource, TickListener, FrameHost } from "./engine/interfaces/TickSource.js";

export { GoogleMarkerLayer, infoWindowHtml, toMarkerOptions } from "./providers/google/GoogleMarkerLayer.js";
export type {
  GoogleMarkerLayerFactories,
  InfoWindowFactory,
  InfoWindowHandle,
  MarkerFactory,
  MarkerHandle,
} from "./providers/google/GoogleMarkerLayer.js";

export type { LatLng } from "./utils/geo.js";

export {
  lerpPosition,
  clamp,
  samePosition,
  planarDistance,
} from "./utils/geo.js";
