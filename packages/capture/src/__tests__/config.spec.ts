import { describe, it, expect } from "vitest";
import { ConfigError } from "@capture-kit/shared";
import { DEFAULT_INTERACTION_POLICY, DEFAULT_TIMING, parseCaptureConfig } from "../config.js";

const valid = {
  dataSourceKey: "test-key",
  captureJsUrl: "https://cdn.example.com/capture.js",
  apiHost: "https://api.example.com",
};

describe("parseCaptureConfig", () => {
  it("fills timing and interaction defaults", () => {
    const config = parseCaptureConfig(valid);

    expect(config.timing).toEqual({
      presentationTimeoutMs: 5000,
      interactionTimeoutMs: 1000,
      dismissDelayMs: 500,
      drainDebounceMs: 3000,
    });
    expect(config.interaction).toEqual({
      cancelTimeoutOn: "any-message",
      confirmationMarker: "shown_on_screen",
    });
    expect(config.logLevel).toBeUndefined();
  });

  it("keeps partial overrides", () => {
    const config = parseCaptureConfig({
      ...valid,
      timing: { interactionTimeoutMs: 2500 },
      interaction: { cancelTimeoutOn: "confirmation" },
      logLevel: "debug",
    });

    expect(config.timing).toEqual({ ...DEFAULT_TIMING, interactionTimeoutMs: 2500 });
    expect(config.interaction).toEqual({
      ...DEFAULT_INTERACTION_POLICY,
      cancelTimeoutOn: "confirmation",
    });
    expect(config.logLevel).toBe("debug");
  });

  it("throws a ConfigError listing every issue", () => {
    let caught: unknown;
    try {
      parseCaptureConfig({ ...valid, dataSourceKey: "", captureJsUrl: "not a url" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.code).toBe("invalid_config");
    expect(caught.issues).toEqual([
      "dataSourceKey: String must contain at least 1 character(s)",
      "captureJsUrl: Invalid url",
    ]);
  });

  it("rejects negative and fractional timings", () => {
    expect(() => parseCaptureConfig({ ...valid, timing: { dismissDelayMs: -1 } })).toThrow(
      ConfigError,
    );
    expect(() => parseCaptureConfig({ ...valid, timing: { presentationTimeoutMs: 1.5 } })).toThrow(
      ConfigError,
    );
  });

  it("rejects an unknown timeout policy", () => {
    expect(() =>
      parseCaptureConfig({ ...valid, interaction: { cancelTimeoutOn: "never" } }),
    ).toThrow(ConfigError);
  });
});
