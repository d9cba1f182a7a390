/**
 * Widgets API
 *
 * Fetches widget definitions from `POST {apiHost}/widgets/get`. Any failure
 * (network, status, body shape) is logged and yields the empty response, so
 * callers always get something renderable.
 */

import { Logger } from "@capture-kit/kernel";
import {
  WIDGET_TYPE_POPUP,
  WidgetsResponseSchema,
  emptyWidgetsResponse,
  type WidgetsGetRequest,
  type WidgetsResponse,
} from "@capture-kit/shared";

const log = Logger.for("WidgetsApi");

export interface WidgetsApiOptions {
  apiHost: string;
  /** Defaults to the global fetch */
  fetch?: typeof fetch;
}

export interface WidgetsApi {
  readonly url: string;
  fetchWidgets(request: WidgetsGetRequest): Promise<WidgetsResponse>;
}

export function createWidgetsApi(options: WidgetsApiOptions): WidgetsApi {
  const fetchImpl = options.fetch ?? globalThis.fetch;
  const url = `${options.apiHost.replace(/\/+$/, "")}/widgets/get`;

  return {
    url,

    async fetchWidgets(request) {
      log.debug({ url }, "fetchWidgets");

      let response: Response;
      try {
        response = await fetchImpl(url, {
          method: "POST",
          headers: {
            Accept: "application/json",
            "Content-Type": "application/json",
          },
          body: JSON.stringify(request),
        });
      } catch (error) {
        log.error(
          { url, errorMessage: error instanceof Error ? error.message : String(error) },
          "fetchWidgets: request failed",
        );
        return emptyWidgetsResponse();
      }

      if (!response.ok) {
        log.warn({ url, status: response.status }, "fetchWidgets: unexpected status");
        return emptyWidgetsResponse();
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        log.warn(
          { url, errorMessage: error instanceof Error ? error.message : String(error) },
          "fetchWidgets: body is not JSON",
        );
        return emptyWidgetsResponse();
      }

      const parsed = WidgetsResponseSchema.safeParse(body);
      if (!parsed.success) {
        log.warn(
          { url, issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) },
          "fetchWidgets: unexpected response shape",
        );
        return emptyWidgetsResponse();
      }
      return parsed.data;
    },
  };
}

/**
 * Narrow a response to the popup definition for `widgetId` that has not
 * expired at `now`. Without an id the response is returned unchanged.
 */
export function filterWidgets(
  response: WidgetsResponse,
  widgetId: string | undefined,
  now: Date = new Date(),
): WidgetsResponse {
  if (widgetId === undefined) return response;

  return {
    ...response,
    widgets: response.widgets
      .filter((widget) => widget.id === widgetId && widget.type === WIDGET_TYPE_POPUP)
      .filter((widget) => !widget.expiry || widget.expiry.getTime() >= now.getTime()),
  };
}
