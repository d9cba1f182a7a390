import { Logger } from "@capture-kit/kernel";
import {
  ConfigError,
  emptyWidgetsResponse,
  type WidgetsGetRequest,
  type WidgetsResponse,
} from "@capture-kit/shared";
import type { UserStorage } from "./types.js";
import { createWidgetsApi, filterWidgets, type WidgetsApi } from "./widgets-api.js";

const log = Logger.for("WidgetSource");

export interface WidgetSourceOptions {
  dataSourceKey: string;
  captureJsUrl?: string;
  apiHost?: string;
  userStorage: UserStorage;
  /** Overrides the API built from `apiHost` */
  api?: WidgetsApi;
  fetch?: typeof fetch;
  /** Extra context handed to the rendered content (screen name, locale, ...) */
  getPageContext?: () => Record<string, unknown>;
  now?: () => Date;
}

/** Bootstrap payload for the rendered content. */
export interface WebViewConfig {
  token: string;
  endpoint: string;
  captureJsUrl: string;
  data: WidgetsResponse;
  context: Record<string, unknown>;
}

export type WebViewConfigResult =
  | { ok: true; config: WebViewConfig }
  | { ok: false; error: ConfigError };

/**
 * Widget definitions for the current user, plus the config the rendered
 * content boots from. Persists the server-issued session id.
 */
export class WidgetSource {
  private readonly _options: WidgetSourceOptions;
  private readonly _api: WidgetsApi | undefined;

  constructor(options: WidgetSourceOptions) {
    this._options = options;
    this._api =
      options.api ??
      (options.apiHost ? createWidgetsApi({ apiHost: options.apiHost, fetch: options.fetch }) : undefined);
  }

  async loadWidgets(widgetId?: string): Promise<WidgetsResponse> {
    if (!this._api) {
      log.warn("loadWidgets: no API host configured");
      return emptyWidgetsResponse();
    }

    const { userStorage } = this._options;
    const user = userStorage.getUser();
    const request: WidgetsGetRequest = {
      sessionId: userStorage.getSession(),
      applicationKey: this._options.dataSourceKey,
      contactId: user?.contactId,
      emailAddress: user?.email,
    };

    const response = await this._api.fetchWidgets(request);
    const now = this._options.now?.() ?? new Date();
    const data = filterWidgets(response, widgetId, now);

    if (data.sessionId) {
      userStorage.setSession(data.sessionId);
    }
    log.debug({ widgetId, count: data.widgets.length }, "loadWidgets");
    return data;
  }

  async getWebViewConfig(widgetId?: string): Promise<WebViewConfigResult> {
    const { captureJsUrl, apiHost } = this._options;
    if (!captureJsUrl) return { ok: false, error: ConfigError.captureJsUrlMissing() };
    if (!apiHost) return { ok: false, error: ConfigError.apiHostMissing() };

    const data = await this.loadWidgets(widgetId);
    return {
      ok: true,
      config: {
        token: this._options.dataSourceKey,
        endpoint: apiHost,
        captureJsUrl,
        data,
        context: this._options.getPageContext?.() ?? {},
      },
    };
  }
}
