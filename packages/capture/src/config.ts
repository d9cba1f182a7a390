import { z } from "zod";
import { ConfigError } from "@capture-kit/shared";

export const PresentationTimingSchema = z.object({
  /** Bounds load → presented */
  presentationTimeoutMs: z.number().int().positive().default(5000),
  /** Bounds presented → first script interaction */
  interactionTimeoutMs: z.number().int().positive().default(1000),
  /** Exit animation allowance before the view is released */
  dismissDelayMs: z.number().int().nonnegative().default(500),
  /** Debounce for queue drains */
  drainDebounceMs: z.number().int().nonnegative().default(3000),
});

export const InteractionPolicySchema = z.object({
  /**
   * `"any-message"`: every script message cancels the interaction timeout.
   * `"confirmation"`: only a message carrying the confirmation marker does.
   */
  cancelTimeoutOn: z.enum(["any-message", "confirmation"]).default("any-message"),
  confirmationMarker: z.string().min(1).default("shown_on_screen"),
});

export const CaptureConfigSchema = z.object({
  dataSourceKey: z.string().min(1),
  captureJsUrl: z.string().url(),
  apiHost: z.string().url(),
  timing: PresentationTimingSchema.default({}),
  interaction: InteractionPolicySchema.default({}),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
});

export type PresentationTiming = z.output<typeof PresentationTimingSchema>;
export type InteractionPolicy = z.output<typeof InteractionPolicySchema>;
export type CaptureConfigInput = z.input<typeof CaptureConfigSchema>;
export type CaptureConfig = z.output<typeof CaptureConfigSchema>;

export const DEFAULT_TIMING: PresentationTiming = PresentationTimingSchema.parse({});
export const DEFAULT_INTERACTION_POLICY: InteractionPolicy = InteractionPolicySchema.parse({});

/** Validate and fill defaults. Throws `ConfigError` listing every issue. */
export function parseCaptureConfig(input: unknown): CaptureConfig {
  const parsed = CaptureConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw ConfigError.invalid(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      ),
    );
  }
  return parsed.data;
}
