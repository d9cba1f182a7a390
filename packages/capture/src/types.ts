/**
 * Boundary contracts the capture core consumes.
 *
 * The core never renders anything itself. It drives a `WidgetRenderer` (the
 * embedded web content) and a `PresentationHost` (the top-level container
 * that shows it modally), and reacts to the signals they emit.
 */

// ============================================================================
// Rendering
// ============================================================================

export type LoadResult = { ok: true } | { ok: false; error?: unknown };

export type LoadCallback = (result: LoadResult) => void;

/** Signals the rendered content sends back through the script bridge. */
export interface RendererEvents {
  /** Any script message. The body is opaque; only the confirmation marker is looked for. */
  onScriptMessage(body: unknown): void;
  /** The content asked to close (its own close button, a completed form, ...). */
  onCloseRequested(): void;
}

/**
 * The embedded web content host. One instance is reused for every widget.
 *
 * `TView` is whatever the host needs to present, e.g. a view controller or
 * a DOM element.
 */
export interface WidgetRenderer<TView = unknown> {
  setWidgetId(widgetId: string | null): void;
  /** Load content for `widgetId`. The callback may arrive on any context. */
  load(widgetId: string, callback: LoadCallback): void;
  /** Build the presentable view around the loaded content. Throws if layout cannot be set up. */
  attach(): TView;
  /** Subscribe to content signals. Returns an unsubscribe function. */
  bind(events: RendererEvents): () => void;
}

export interface PresentationHost<TView = unknown> {
  /** Present `view` modally; `onPresented` fires once the transition completes. */
  present(view: TView, onPresented: () => void): void;
  isPresenting(view: TView): boolean;
  dismiss(view: TView): void;
  /** Drop keyboard focus before a modal takes over. */
  endEditing?(): void;
}

/** Current top-level container, or null when there is nothing to present on. */
export type HostResolver<TView = unknown> = () => PresentationHost<TView> | null;

// ============================================================================
// Environment
// ============================================================================

export interface ReachabilitySource {
  /** Report reachability changes. May report the current state immediately. */
  subscribe(listener: (reachable: boolean) => void): () => void;
}

export interface AppLifecycleSource {
  /** Fires each time the host app returns to the foreground. */
  onForeground(listener: () => void): () => void;
}

export interface CaptureUser {
  contactId?: string;
  email?: string;
}

/** Host-owned persistence; the core only caches the server session id here. */
export interface UserStorage {
  getSession(): string | undefined;
  setSession(sessionId: string): void;
  getUser(): CaptureUser | undefined;
}
