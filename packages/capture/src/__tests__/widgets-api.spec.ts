import { describe, it, expect, vi } from "vitest";
import { emptyWidgetsResponse, type WidgetsResponse } from "@capture-kit/shared";
import { createWidgetsApi, filterWidgets } from "../widgets-api.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

const request = { applicationKey: "test-key" };

describe("createWidgetsApi", () => {
  it("posts the request to widgets/get", async () => {
    const fetch = vi.fn(async () => jsonResponse({ widgets: [] }));
    const api = createWidgetsApi({ apiHost: "https://api.example.com/", fetch });

    await api.fetchWidgets({ applicationKey: "test-key", sessionId: "s1" });

    expect(api.url).toBe("https://api.example.com/widgets/get");
    expect(fetch).toHaveBeenCalledWith("https://api.example.com/widgets/get", {
      method: "POST",
      headers: {
        Accept: "application/json",
        "Content-Type": "application/json",
      },
      body: '{"applicationKey":"test-key","sessionId":"s1"}',
    });
  });

  it("parses the response and fills defaults", async () => {
    const fetch = vi.fn(async () =>
      jsonResponse({
        widgets: [{ id: "w1", type: "popup", expiry: null, title: "Hello" }],
        sessionId: "s2",
      }),
    );
    const api = createWidgetsApi({ apiHost: "https://api.example.com", fetch });

    const response = await api.fetchWidgets(request);

    expect(response.widgets).toEqual([{ id: "w1", type: "popup", expiry: null, title: "Hello" }]);
    expect(response.hasLogo).toBe(false);
    expect(response.enabledGdpr).toBe(false);
    expect(response.sessionId).toBe("s2");
  });

  it("returns the empty response when the request throws", async () => {
    const fetch = vi.fn(async (): Promise<Response> => {
      throw new TypeError("fetch failed");
    });
    const api = createWidgetsApi({ apiHost: "https://api.example.com", fetch });

    await expect(api.fetchWidgets(request)).resolves.toEqual(emptyWidgetsResponse());
  });

  it("returns the empty response on a non-2xx status", async () => {
    const fetch = vi.fn(async () => jsonResponse({ error: "nope" }, 500));
    const api = createWidgetsApi({ apiHost: "https://api.example.com", fetch });

    await expect(api.fetchWidgets(request)).resolves.toEqual(emptyWidgetsResponse());
  });

  it("returns the empty response when the body is not JSON", async () => {
    const fetch = vi.fn(async () => new Response("<html></html>", { status: 200 }));
    const api = createWidgetsApi({ apiHost: "https://api.example.com", fetch });

    await expect(api.fetchWidgets(request)).resolves.toEqual(emptyWidgetsResponse());
  });

  it("returns the empty response when the shape is wrong", async () => {
    const fetch = vi.fn(async () => jsonResponse({ widgets: "not-a-list" }));
    const api = createWidgetsApi({ apiHost: "https://api.example.com", fetch });

    await expect(api.fetchWidgets(request)).resolves.toEqual(emptyWidgetsResponse());
  });
});

describe("filterWidgets", () => {
  const now = new Date("2024-06-01T12:00:00.000Z");

  function response(widgets: WidgetsResponse["widgets"]): WidgetsResponse {
    return { ...emptyWidgetsResponse(), widgets, sessionId: "s1" };
  }

  it("returns the response unchanged without a widget id", () => {
    const input = response([
      { id: "w1", type: "popup" },
      { id: "w2", type: "inline" },
    ]);

    expect(filterWidgets(input, undefined, now)).toBe(input);
  });

  it("keeps only the matching popup", () => {
    const input = response([
      { id: "w1", type: "popup" },
      { id: "w1", type: "inline" },
      { id: "w2", type: "popup" },
    ]);

    expect(filterWidgets(input, "w1", now).widgets).toEqual([{ id: "w1", type: "popup" }]);
  });

  it("drops expired definitions", () => {
    const input = response([
      { id: "w1", type: "popup", expiry: new Date("2024-06-01T11:59:59.999Z") },
    ]);

    expect(filterWidgets(input, "w1", now).widgets).toEqual([]);
  });

  it("keeps definitions expiring exactly now or later", () => {
    const atNow = { id: "w1", type: "popup", expiry: new Date("2024-06-01T12:00:00.000Z") };
    const later = { id: "w1", type: "popup", expiry: new Date("2024-07-01T00:00:00.000Z") };

    expect(filterWidgets(response([atNow, later]), "w1", now).widgets).toEqual([atNow, later]);
  });

  it("preserves the rest of the response", () => {
    const filtered = filterWidgets(response([]), "w1", now);

    expect(filtered.sessionId).toBe("s1");
    expect(filtered.hasLogo).toBe(false);
  });
});
