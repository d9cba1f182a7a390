/**
 * Testing utilities for @capture-kit/capture.
 *
 * In-process stand-ins for every boundary the core consumes. Each fake
 * records what the core did to it and exposes methods to emit the signals
 * the real collaborator would.
 *
 * @example
 * ```ts
 * const renderer = new FakeRenderer();
 * const host = new FakeHost();
 * const controller = new PresentationController({
 *   context: createSyncContext(),
 *   renderer,
 *   resolveHost: () => host,
 * });
 *
 * const result = controller.requestShow("w1");
 * renderer.completeLoad();
 * host.completePresentation();
 * renderer.emitCloseRequested();
 * expect(await result).toEqual({ ok: true });
 * ```
 */

import { createExecutionContext, type ExecutionContext } from "@capture-kit/kernel";
import type {
  AppLifecycleSource,
  CaptureUser,
  LoadCallback,
  LoadResult,
  PresentationHost,
  ReachabilitySource,
  RendererEvents,
  UserStorage,
  WidgetRenderer,
} from "./types.js";

/**
 * An execution context whose dispatches flush synchronously, so entry
 * points called from a test run to completion before returning.
 */
export function createSyncContext(name = "test-ui"): ExecutionContext {
  return createExecutionContext(name, { scheduler: (flush) => flush() });
}

// ============================================================================
// Renderer
// ============================================================================

export interface FakeView {
  readonly id: number;
  readonly widgetId: string | null;
}

export class FakeRenderer implements WidgetRenderer<FakeView> {
  widgetId: string | null = null;
  readonly loads: Array<{ widgetId: string; callback: LoadCallback }> = [];
  /** When set, `load()` completes synchronously with this result */
  autoLoad: LoadResult | null = null;
  /** When set, `attach()` throws it */
  attachError: unknown = undefined;
  private _events: RendererEvents | null = null;
  private _nextViewId = 1;

  get bound(): boolean {
    return this._events !== null;
  }

  setWidgetId(widgetId: string | null): void {
    this.widgetId = widgetId;
  }

  load(widgetId: string, callback: LoadCallback): void {
    this.loads.push({ widgetId, callback });
    if (this.autoLoad) callback(this.autoLoad);
  }

  attach(): FakeView {
    if (this.attachError !== undefined) throw this.attachError;
    return { id: this._nextViewId++, widgetId: this.widgetId };
  }

  bind(events: RendererEvents): () => void {
    this._events = events;
    return () => {
      if (this._events === events) this._events = null;
    };
  }

  /** Finish the most recent load. */
  completeLoad(result: LoadResult = { ok: true }): void {
    const last = this.loads[this.loads.length - 1];
    if (!last) throw new Error("FakeRenderer: no load in flight");
    last.callback(result);
  }

  emitScriptMessage(body: unknown): void {
    this._events?.onScriptMessage(body);
  }

  emitCloseRequested(): void {
    this._events?.onCloseRequested();
  }
}

// ============================================================================
// Presentation host
// ============================================================================

export class FakeHost implements PresentationHost<FakeView> {
  presented: FakeView | null = null;
  readonly dismissed: FakeView[] = [];
  /** Every `present()` call, in order; `onPresented` may be replayed */
  readonly presentations: Array<{ view: FakeView; onPresented: () => void }> = [];
  endEditingCalls = 0;
  /** When true, presentation completes as soon as it starts */
  autoPresent = false;
  private _inFlight: { view: FakeView; onPresented: () => void } | null = null;

  present(view: FakeView, onPresented: () => void): void {
    this.presented = view;
    this.presentations.push({ view, onPresented });
    this._inFlight = { view, onPresented };
    if (this.autoPresent) this.completePresentation();
  }

  /** Finish the in-flight presentation transition. */
  completePresentation(): void {
    const inFlight = this._inFlight;
    if (!inFlight) throw new Error("FakeHost: no presentation in flight");
    this._inFlight = null;
    inFlight.onPresented();
  }

  isPresenting(view: FakeView): boolean {
    return this.presented === view;
  }

  dismiss(view: FakeView): void {
    this.dismissed.push(view);
    if (this.presented === view) this.presented = null;
  }

  endEditing(): void {
    this.endEditingCalls++;
  }
}

// ============================================================================
// Environment
// ============================================================================

export class FakeReachability implements ReachabilitySource {
  private readonly _listeners = new Set<(reachable: boolean) => void>();

  get listenerCount(): number {
    return this._listeners.size;
  }

  subscribe(listener: (reachable: boolean) => void): () => void {
    this._listeners.add(listener);
    return () => {
      this._listeners.delete(listener);
    };
  }

  set(reachable: boolean): void {
    for (const listener of this._listeners) listener(reachable);
  }
}

export class FakeAppLifecycle implements AppLifecycleSource {
  private readonly _listeners = new Set<() => void>();

  get listenerCount(): number {
    return this._listeners.size;
  }

  onForeground(listener: () => void): () => void {
    this._listeners.add(listener);
    return () => {
      this._listeners.delete(listener);
    };
  }

  foreground(): void {
    for (const listener of this._listeners) listener();
  }
}

export class MemoryUserStorage implements UserStorage {
  constructor(
    public session: string | undefined = undefined,
    public user: CaptureUser | undefined = undefined,
  ) {}

  getSession(): string | undefined {
    return this.session;
  }

  setSession(sessionId: string): void {
    this.session = sessionId;
  }

  getUser(): CaptureUser | undefined {
    return this.user;
  }
}
