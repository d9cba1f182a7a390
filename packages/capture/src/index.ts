/**
 * # Capture Kit
 *
 * Lifecycle and concurrency core for exclusive, modally-presented web
 * widgets: a de-duplicated request queue, a one-outcome-per-request
 * presentation state machine with load/present/interaction timeouts, and
 * reachability/foreground-driven retries.
 *
 * Rendering and presentation are supplied by the host through
 * `WidgetRenderer` and `PresentationHost`.
 *
 * @module @capture-kit/capture
 */

export { Capture, getCapture, type CaptureDependencies } from "./capture.js";
export {
  PresentationController,
  type PresentationControllerOptions,
  type PresentationState,
} from "./presentation-controller.js";
export { WidgetQueue } from "./request-queue.js";
export { CompletionChannel } from "./completion-channel.js";
export { ExclusiveFlag } from "./exclusive-flag.js";
export { OneShotTimer } from "./one-shot-timer.js";
export {
  ReachabilityMonitor,
  type DrainTarget,
  type ReachabilityMonitorOptions,
} from "./reachability-monitor.js";
export { createWidgetsApi, filterWidgets, type WidgetsApi, type WidgetsApiOptions } from "./widgets-api.js";
export {
  WidgetSource,
  type WebViewConfig,
  type WebViewConfigResult,
  type WidgetSourceOptions,
} from "./widget-source.js";
export {
  CaptureConfigSchema,
  PresentationTimingSchema,
  InteractionPolicySchema,
  DEFAULT_TIMING,
  DEFAULT_INTERACTION_POLICY,
  parseCaptureConfig,
  type CaptureConfig,
  type CaptureConfigInput,
  type PresentationTiming,
  type InteractionPolicy,
} from "./config.js";
export type {
  AppLifecycleSource,
  CaptureUser,
  HostResolver,
  LoadCallback,
  LoadResult,
  PresentationHost,
  ReachabilitySource,
  RendererEvents,
  UserStorage,
  WidgetRenderer,
} from "./types.js";
export {
  WidgetError,
  ConfigError,
  describeWidgetResult,
  type WidgetErrorCode,
  type WidgetResult,
} from "@capture-kit/shared";
