/**
 * Failure values.
 *
 * Session failures are never thrown across the public surface. They travel
 * as `WidgetResult` values whose `error.message` is a log-ready description.
 */

// ============================================================================
// Widget Errors
// ============================================================================

export type WidgetErrorCode =
  | "already_active"
  | "no_presentation_surface"
  | "load_failed"
  | "presentation_setup_failed"
  | "presentation_timeout"
  | "interaction_timeout"
  | "dismissed_prematurely"
  | "superseded"
  | "destroyed";

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === "string" && cause.length > 0) return cause;
  return "Unknown";
}

/**
 * Terminal failure of one widget session. Does not affect later sessions.
 */
export class WidgetError extends Error {
  readonly name = "WidgetError";

  constructor(
    readonly code: WidgetErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  static alreadyActive(): WidgetError {
    return new WidgetError(
      "already_active",
      "A widget is already active and cannot be shown at this time.",
    );
  }

  static noPresentationSurface(): WidgetError {
    return new WidgetError(
      "no_presentation_surface",
      "Unable to find a presentation surface for the widget.",
    );
  }

  static loadFailed(cause?: unknown): WidgetError {
    return new WidgetError(
      "load_failed",
      `Failed to load the web view for the widget. Underlying error: ${describeCause(cause)}`,
      { cause },
    );
  }

  static presentationSetupFailed(cause: unknown): WidgetError {
    return new WidgetError(
      "presentation_setup_failed",
      `Failed to set up the widget presentation: ${describeCause(cause)}`,
      { cause },
    );
  }

  static presentationTimeout(): WidgetError {
    return new WidgetError("presentation_timeout", "Widget presentation timed out.");
  }

  static interactionTimeout(): WidgetError {
    return new WidgetError(
      "interaction_timeout",
      "Widget closed due to no script interaction within the timeout period.",
    );
  }

  static dismissedPrematurely(): WidgetError {
    return new WidgetError(
      "dismissed_prematurely",
      "Widget was dismissed before completing its lifecycle (e.g. timeout or interaction).",
    );
  }

  static superseded(): WidgetError {
    return new WidgetError(
      "superseded",
      "A new request to show a widget was made before this one completed.",
    );
  }

  static destroyed(): WidgetError {
    return new WidgetError("destroyed", "The widget presenter has been destroyed.");
  }
}

export function isWidgetError(error: unknown): error is WidgetError {
  return error instanceof WidgetError;
}

// ============================================================================
// Config Errors
// ============================================================================

export type ConfigErrorCode =
  | "invalid_config"
  | "capture_js_url_missing"
  | "api_host_missing"
  | "already_initialized";

/**
 * Setup failure. Unlike `WidgetError` this is thrown, from initialization only.
 */
export class ConfigError extends Error {
  readonly name = "ConfigError";

  constructor(
    readonly code: ConfigErrorCode,
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(message);
  }

  static invalid(issues: readonly string[]): ConfigError {
    return new ConfigError("invalid_config", `Invalid capture config: ${issues.join("; ")}`, issues);
  }

  static captureJsUrlMissing(): ConfigError {
    return new ConfigError("capture_js_url_missing", "Capture script URL is not configured.");
  }

  static apiHostMissing(): ConfigError {
    return new ConfigError("api_host_missing", "API host is not configured.");
  }

  static alreadyInitialized(): ConfigError {
    return new ConfigError(
      "already_initialized",
      "Capture is already initialized; destroy the live instance first.",
    );
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

// ============================================================================
// Results
// ============================================================================

export type WidgetResult = { ok: true } | { ok: false; error: WidgetError };

export function widgetShown(): WidgetResult {
  return { ok: true };
}

export function widgetFailure(error: WidgetError): WidgetResult {
  return { ok: false, error };
}

/** One-line description for logs. */
export function describeWidgetResult(result: WidgetResult): string {
  return result.ok
    ? "Widget shown and closed by the user."
    : `${result.error.code}: ${result.error.message}`;
}
