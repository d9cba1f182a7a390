/**
 * Presentation Controller
 *
 * Drives one exclusive widget session at a time through
 *
 *   idle → acquiring → loading → presenting → awaiting-interaction → closing → idle
 *
 * Each `requestShow()` gets its own completion channel and resolves exactly
 * once. Every callback path (load, presented, timers, script bridge, close)
 * checks that its session is still the pending one before resolving, so
 * racing signals cannot deliver two outcomes.
 *
 * All state lives on the controller's execution context. Public methods may
 * be called from anywhere; they redispatch onto the context first.
 */

import { Logger, type ExecutionContext } from "@capture-kit/kernel";
import {
  WidgetError,
  widgetFailure,
  widgetShown,
  type WidgetResult,
} from "@capture-kit/shared";
import { CompletionChannel } from "./completion-channel.js";
import {
  DEFAULT_INTERACTION_POLICY,
  DEFAULT_TIMING,
  type InteractionPolicy,
  type PresentationTiming,
} from "./config.js";
import { ExclusiveFlag } from "./exclusive-flag.js";
import { OneShotTimer } from "./one-shot-timer.js";
import { WidgetQueue } from "./request-queue.js";
import type {
  HostResolver,
  LoadResult,
  PresentationHost,
  WidgetRenderer,
} from "./types.js";

const log = Logger.for("PresentationController");

// ============================================================================
// Types
// ============================================================================

export type PresentationState =
  | "idle"
  | "acquiring"
  | "loading"
  | "presenting"
  | "awaiting-interaction"
  | "closing";

export interface PresentationControllerOptions<TView> {
  context: ExecutionContext;
  renderer: WidgetRenderer<TView>;
  resolveHost: HostResolver<TView>;
  queue?: WidgetQueue;
  /** Pass a flag over a shared buffer to read exclusivity from elsewhere. */
  flag?: ExclusiveFlag;
  timing?: Partial<PresentationTiming>;
  interaction?: Partial<InteractionPolicy>;
}

interface ActiveSession<TView> {
  readonly widgetId: string;
  state: PresentationState;
  host: PresentationHost<TView> | null;
  /** Boxed so a `TView` that is itself nullish stays distinguishable */
  view: { current: TView } | null;
  confirmed: boolean;
  closing: boolean;
  tornDown: boolean;
  readonly presentationTimer: OneShotTimer;
  readonly interactionTimer: OneShotTimer;
  readonly dismissTimer: OneShotTimer;
}

interface PendingCompletion<TView> {
  session: ActiveSession<TView>;
  channel: CompletionChannel<WidgetResult>;
}

function errorFields(error: unknown): Record<string, unknown> {
  return error instanceof Error
    ? { errorMessage: error.message, errorStack: error.stack }
    : { errorMessage: String(error) };
}

// ============================================================================
// Controller
// ============================================================================

export class PresentationController<TView = unknown> {
  private readonly _context: ExecutionContext;
  private readonly _renderer: WidgetRenderer<TView>;
  private readonly _resolveHost: HostResolver<TView>;
  private readonly _queue: WidgetQueue;
  private readonly _flag: ExclusiveFlag;
  private readonly _timing: PresentationTiming;
  private readonly _interaction: InteractionPolicy;
  private readonly _drainTimer: OneShotTimer;

  /** Set iff `_flag` is held */
  private _session: ActiveSession<TView> | null = null;
  private _pending: PendingCompletion<TView> | null = null;
  /** Released sessions whose deferred teardown has not run yet */
  private readonly _closing = new Set<ActiveSession<TView>>();
  private _unbindRenderer: (() => void) | null;
  private _destroyed = false;

  constructor(options: PresentationControllerOptions<TView>) {
    this._context = options.context;
    this._renderer = options.renderer;
    this._resolveHost = options.resolveHost;
    this._queue = options.queue ?? new WidgetQueue();
    this._flag = options.flag ?? new ExclusiveFlag();
    this._timing = { ...DEFAULT_TIMING, ...options.timing };
    this._interaction = { ...DEFAULT_INTERACTION_POLICY, ...options.interaction };
    this._drainTimer = new OneShotTimer(this._context, "queue-drain");

    this._unbindRenderer = this._renderer.bind({
      onScriptMessage: (body) => this._context.ensure(() => this._handleScriptMessage(body)),
      onCloseRequested: () => this._context.ensure(() => this._handleCloseRequested()),
    });
  }

  // ==========================================================================
  // Introspection
  // ==========================================================================

  get state(): PresentationState {
    if (this._session) return this._session.state;
    return this._closing.size > 0 ? "closing" : "idle";
  }

  /** Safe to read from any context. */
  get isActive(): boolean {
    return this._flag.isHeld;
  }

  get activeWidgetId(): string | undefined {
    return this._session?.widgetId;
  }

  get queuedWidgets(): string[] {
    return this._queue.toArray();
  }

  // ==========================================================================
  // Public operations
  // ==========================================================================

  queueWidget(widgetId: string): void {
    this._context.ensure(() => {
      if (this._destroyed) return;
      this._queue.queue(widgetId);
    });
  }

  /**
   * Show `widgetId` if no other widget is active. Never rejects; failures
   * arrive as `{ ok: false, error }`.
   */
  requestShow(widgetId: string): Promise<WidgetResult> {
    const channel = new CompletionChannel<WidgetResult>();
    const outcome = channel.wait();
    this._context.ensure(() => this._acquire(widgetId, channel));
    return outcome;
  }

  /**
   * Dismiss the active widget. A still-pending request resolves as
   * dismissed prematurely. Safe to call repeatedly.
   */
  close(): void {
    this._context.ensure(() => {
      if (this._destroyed) return;
      this._close(this._session);
    });
  }

  /** (Re)arm the debounced drain of the most recently queued widget. */
  scheduleQueueDrain(): void {
    this._context.ensure(() => {
      if (this._destroyed) return;
      this._drainTimer.start(this._timing.drainDebounceMs, () => this._drain());
    });
  }

  cancelQueueDrain(): void {
    this._context.ensure(() => this._drainTimer.cancel());
  }

  /** Resolve anything pending, release the view and stop all timers. */
  destroy(): void {
    this._context.ensure(() => {
      if (this._destroyed) return;
      this._destroyed = true;
      this._unbindRenderer?.();
      this._unbindRenderer = null;
      this._drainTimer.cancel();

      const session = this._session;
      if (session) {
        this._settle(session, widgetFailure(WidgetError.dismissedPrematurely()));
        this._teardown(session, { drain: false });
      }
      for (const closing of [...this._closing]) {
        this._teardown(closing, { drain: false });
      }
      log.debug("destroyed");
    });
  }

  // ==========================================================================
  // Transitions
  // ==========================================================================

  private _acquire(widgetId: string, channel: CompletionChannel<WidgetResult>): void {
    if (this._destroyed) {
      log.debug({ widgetId }, "requestShow: controller destroyed");
      channel.resolve(widgetFailure(WidgetError.destroyed()));
      return;
    }

    if (!this._flag.tryAcquire()) {
      log.debug({ widgetId, active: this._session?.widgetId }, "requestShow: already active");
      channel.resolve(widgetFailure(WidgetError.alreadyActive()));
      return;
    }

    this._queue.remove(widgetId);

    if (this._pending) {
      log.warn(
        { widgetId, superseded: this._pending.session.widgetId },
        "requestShow: superseding a pending request",
      );
      const stale = this._pending;
      this._pending = null;
      stale.channel.resolve(widgetFailure(WidgetError.superseded()));
    }

    const session: ActiveSession<TView> = {
      widgetId,
      state: "acquiring",
      host: null,
      view: null,
      confirmed: false,
      closing: false,
      tornDown: false,
      presentationTimer: new OneShotTimer(this._context, "presentation"),
      interactionTimer: new OneShotTimer(this._context, "interaction"),
      dismissTimer: new OneShotTimer(this._context, "dismiss"),
    };
    this._session = session;
    this._pending = { session, channel };

    const host = this._resolveHost();
    if (!host) {
      this._fail(session, WidgetError.noPresentationSurface(), { cleanup: false });
      return;
    }
    session.host = host;
    session.state = "loading";
    log.debug({ widgetId }, "requestShow: loading");

    this._renderer.setWidgetId(widgetId);
    try {
      this._renderer.load(widgetId, (result) =>
        this._context.ensure(() => this._onLoaded(session, host, result)),
      );
    } catch (error) {
      this._onLoaded(session, host, { ok: false, error });
    }
  }

  private _onLoaded(
    session: ActiveSession<TView>,
    host: PresentationHost<TView>,
    result: LoadResult,
  ): void {
    if (session.state !== "loading" || !this._isPending(session)) {
      log.warn(
        { widgetId: session.widgetId, state: session.state, ok: result.ok },
        "load finished after the request was resolved; widget may have been closed prematurely",
      );
      return;
    }

    if (!result.ok) {
      log.error({ widgetId: session.widgetId, ...errorFields(result.error) }, "load failed");
      this._fail(session, WidgetError.loadFailed(result.error));
      return;
    }

    this._present(session, host);
  }

  private _present(session: ActiveSession<TView>, host: PresentationHost<TView>): void {
    session.state = "presenting";

    let view: TView;
    try {
      view = this._renderer.attach();
    } catch (error) {
      log.error({ widgetId: session.widgetId, ...errorFields(error) }, "presentation setup failed");
      this._fail(session, WidgetError.presentationSetupFailed(error));
      return;
    }

    host.endEditing?.();
    session.view = { current: view };

    session.presentationTimer.start(this._timing.presentationTimeoutMs, () => {
      log.error({ widgetId: session.widgetId }, "presentation timed out");
      if (this._isPending(session)) {
        this._fail(session, WidgetError.presentationTimeout());
      }
    });

    try {
      host.present(view, () => this._context.ensure(() => this._onPresented(session)));
    } catch (error) {
      log.error({ widgetId: session.widgetId, ...errorFields(error) }, "present threw");
      this._fail(session, WidgetError.presentationSetupFailed(error));
    }
  }

  private _onPresented(session: ActiveSession<TView>): void {
    if (session.state !== "presenting" || !this._isPending(session)) {
      log.debug(
        { widgetId: session.widgetId, state: session.state },
        "ignoring late presented signal",
      );
      // Presented after the session already ended; make sure it does not linger
      if (session.tornDown) this._dismissView(session);
      return;
    }

    session.presentationTimer.cancel();

    session.state = "awaiting-interaction";
    session.interactionTimer.start(this._timing.interactionTimeoutMs, () =>
      this._onInteractionTimeout(session),
    );
  }

  private _onInteractionTimeout(session: ActiveSession<TView>): void {
    if (session.confirmed) return;

    log.warn(
      { widgetId: session.widgetId, timeoutMs: this._timing.interactionTimeoutMs },
      "no script interaction within timeout; closing widget",
    );
    if (this._settle(session, widgetFailure(WidgetError.interactionTimeout()))) {
      this._close(session);
    }
  }

  private _handleScriptMessage(body: unknown): void {
    const session = this._session;
    if (!session) {
      log.debug("script message with no active widget");
      return;
    }

    const confirmed = this._containsMarker(body);
    if (confirmed || this._interaction.cancelTimeoutOn === "any-message") {
      session.interactionTimer.cancel();
    }
    if (confirmed) {
      session.confirmed = true;
    }
  }

  private _handleCloseRequested(): void {
    const session = this._session;
    if (session) {
      session.interactionTimer.cancel();
      if (this._settle(session, widgetShown())) {
        log.info({ widgetId: session.widgetId }, "widget closed by content");
      }
    }
    this._close(session);
  }

  private _close(session: ActiveSession<TView> | null): void {
    if (!session) {
      log.debug("close: no active widget");
      return;
    }

    if (this._isPending(session)) {
      log.warn(
        { widgetId: session.widgetId },
        "closing widget while its request is pending; resolving as dismissed",
      );
      this._settle(session, widgetFailure(WidgetError.dismissedPrematurely()));
    }

    if (session.closing) return;
    session.closing = true;
    session.state = "closing";
    if (this._session !== session) this._closing.add(session);

    session.dismissTimer.start(this._timing.dismissDelayMs, () =>
      this._teardown(session, { drain: true }),
    );
  }

  private _teardown(session: ActiveSession<TView>, options: { drain: boolean }): void {
    session.presentationTimer.cancel();
    session.interactionTimer.cancel();
    session.dismissTimer.cancel();

    // A newer session may already own the renderer
    if (this._session === null || this._session === session) {
      this._renderer.setWidgetId(null);
    }
    this._dismissView(session);
    this._release(session);
    this._closing.delete(session);
    session.state = "idle";
    session.tornDown = true;
    log.debug({ widgetId: session.widgetId }, "torn down");

    if (options.drain) this.scheduleQueueDrain();
  }

  private _fail(
    session: ActiveSession<TView>,
    error: WidgetError,
    options: { cleanup: boolean } = { cleanup: true },
  ): void {
    session.presentationTimer.cancel();
    session.interactionTimer.cancel();
    this._release(session);
    this._settle(session, widgetFailure(error));

    if (options.cleanup) {
      this._close(session);
    } else {
      session.state = "idle";
    }
  }

  private _drain(): void {
    if (this._destroyed) return;
    const widgetId = this._queue.peekLast();
    if (widgetId === undefined) return;

    log.debug({ widgetId }, "draining queue");
    void this.requestShow(widgetId).then((result) => {
      if (!result.ok) {
        log.warn({ widgetId, code: result.error.code }, "queued widget not shown");
      }
    });
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private _isPending(session: ActiveSession<TView>): boolean {
    return this._pending?.session === session;
  }

  /** Resolve `session`'s request if it is still pending. */
  private _settle(session: ActiveSession<TView>, result: WidgetResult): boolean {
    const pending = this._pending;
    if (!pending || pending.session !== session) return false;
    this._pending = null;
    return pending.channel.resolve(result);
  }

  private _release(session: ActiveSession<TView>): void {
    if (this._session !== session) return;
    this._session = null;
    this._flag.release();
  }

  private _dismissView(session: ActiveSession<TView>): void {
    const { host, view } = session;
    if (host && view && host.isPresenting(view.current)) {
      host.dismiss(view.current);
    }
  }

  private _containsMarker(body: unknown): boolean {
    const marker = this._interaction.confirmationMarker;
    if (typeof body === "string") return body.includes(marker);
    let text: string | undefined;
    try {
      text = JSON.stringify(body);
    } catch {
      text = undefined;
    }
    return (text ?? String(body)).includes(marker);
  }
}
