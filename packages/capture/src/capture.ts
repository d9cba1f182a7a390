/**
 * Capture - the public surface.
 *
 * One instance per process. `Capture.initialize()` validates the config,
 * wires the presentation controller, the reachability monitor and the
 * widget source, and registers the instance; `destroy()` tears all of it
 * down and frees the slot. Pass the returned instance to the code that
 * needs it; `getCapture()` exists for hosts that cannot.
 *
 * @example
 * ```typescript
 * const capture = Capture.initialize(
 *   {
 *     dataSourceKey: "data-source-key",
 *     captureJsUrl: "https://cdn.example.com/capture.js",
 *     apiHost: "https://api.example.com",
 *   },
 *   { renderer, resolveHost, userStorage, reachability, lifecycle },
 * );
 *
 * capture.queueWidget("spring-sale");
 * const result = await capture.showWidget("welcome");
 * if (!result.ok) logger.warn(result.error.message);
 * ```
 */

import { Logger, createExecutionContext, type ExecutionContext } from "@capture-kit/kernel";
import { ConfigError, type WidgetResult, type WidgetsResponse } from "@capture-kit/shared";
import { parseCaptureConfig, type CaptureConfig, type CaptureConfigInput } from "./config.js";
import { PresentationController } from "./presentation-controller.js";
import { ReachabilityMonitor } from "./reachability-monitor.js";
import type {
  AppLifecycleSource,
  HostResolver,
  ReachabilitySource,
  UserStorage,
  WidgetRenderer,
} from "./types.js";
import { WidgetSource, type WebViewConfigResult } from "./widget-source.js";

const log = Logger.for("Capture");

export interface CaptureDependencies {
  renderer: WidgetRenderer;
  resolveHost: HostResolver;
  userStorage: UserStorage;
  reachability?: ReachabilitySource;
  lifecycle?: AppLifecycleSource;
  /** UI-owning context; a fresh one is created when omitted */
  context?: ExecutionContext;
  fetch?: typeof fetch;
  getPageContext?: () => Record<string, unknown>;
}

let _instance: Capture | null = null;

/** The live instance, if one is initialized. */
export function getCapture(): Capture | null {
  return _instance;
}

export class Capture {
  readonly config: CaptureConfig;
  readonly context: ExecutionContext;
  readonly controller: PresentationController;
  readonly widgets: WidgetSource;
  private readonly _monitor: ReachabilityMonitor;
  private _destroyed = false;

  /**
   * Validate `config` and bring up the process-wide instance.
   * Throws `ConfigError` on invalid config or when an instance is live.
   */
  static initialize(config: CaptureConfigInput, dependencies: CaptureDependencies): Capture {
    if (_instance) throw ConfigError.alreadyInitialized();

    const parsed = parseCaptureConfig(config);
    if (parsed.logLevel) Logger.configure({ level: parsed.logLevel });

    const capture = new Capture(parsed, dependencies);
    _instance = capture;
    capture._monitor.start();
    log.info({ apiHost: parsed.apiHost }, "initialized");
    return capture;
  }

  private constructor(config: CaptureConfig, dependencies: CaptureDependencies) {
    this.config = config;
    this.context = dependencies.context ?? createExecutionContext("ui");

    this.controller = new PresentationController({
      context: this.context,
      renderer: dependencies.renderer,
      resolveHost: dependencies.resolveHost,
      timing: config.timing,
      interaction: config.interaction,
    });

    this._monitor = new ReachabilityMonitor(this.controller, {
      reachability: dependencies.reachability,
      lifecycle: dependencies.lifecycle,
    });

    this.widgets = new WidgetSource({
      dataSourceKey: config.dataSourceKey,
      captureJsUrl: config.captureJsUrl,
      apiHost: config.apiHost,
      userStorage: dependencies.userStorage,
      fetch: dependencies.fetch,
      getPageContext: dependencies.getPageContext,
    });
  }

  get isWidgetActive(): boolean {
    return this.controller.isActive;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }

  /** Remember `widgetId` for the next queue drain. */
  queueWidget(widgetId: string): void {
    this.controller.queueWidget(widgetId);
  }

  showWidget(widgetId: string): Promise<WidgetResult> {
    return this.controller.requestShow(widgetId);
  }

  hideWidget(): void {
    this.controller.close();
  }

  close(): void {
    this.controller.close();
  }

  /** Debounced attempt to show the most recently queued widget. */
  processNextWidgetFromQueue(): void {
    this.controller.scheduleQueueDrain();
  }

  loadWidgets(widgetId?: string): Promise<WidgetsResponse> {
    return this.widgets.loadWidgets(widgetId);
  }

  getWebViewConfig(widgetId?: string): Promise<WebViewConfigResult> {
    return this.widgets.getWebViewConfig(widgetId);
  }

  destroy(): void {
    if (this._destroyed) return;
    this._destroyed = true;
    this._monitor.stop();
    this.controller.destroy();
    if (_instance === this) _instance = null;
    log.info("destroyed");
  }
}
