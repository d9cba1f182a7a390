/**
 * Widget definition schemas.
 *
 * Shapes returned by the `widgets/get` endpoint. Definitions are passed to
 * the rendered content as-is, so unknown fields are preserved.
 */

import { z } from "zod";

export const WIDGET_TYPE_POPUP = "popup";

/** Timestamps arrive as ISO strings, e.g. `2023-07-17T15:30:00.652Z`. */
const timestamp = z.string().transform((value, ctx) => {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid timestamp: ${value}` });
    return z.NEVER;
  }
  return date;
});

export const WidgetDefinitionSchema = z
  .object({
    id: z.string(),
    type: z.string(),
    /** Absent or null means the widget never expires */
    expiry: timestamp.nullish(),
  })
  .passthrough();

export type WidgetDefinition = z.infer<typeof WidgetDefinitionSchema>;

export const WidgetsResponseSchema = z.object({
  widgets: z.array(WidgetDefinitionSchema).default([]),
  hasLogo: z.boolean().default(false),
  enabledGdpr: z.boolean().default(false),
  recaptchaSiteKey: z.string().nullish(),
  countryCode: z.string().nullish(),
  serviceWorkerUrl: z.string().nullish(),
  cdnUrl: z.string().nullish(),
  sessionId: z.string().nullish(),
});

export type WidgetsResponse = z.infer<typeof WidgetsResponseSchema>;

/** Body of `POST {apiHost}/widgets/get` */
export interface WidgetsGetRequest {
  sessionId?: string;
  applicationKey: string;
  contactId?: string;
  emailAddress?: string;
}

/** Stand-in for a fetch that failed or returned something unusable. */
export function emptyWidgetsResponse(): WidgetsResponse {
  return {
    widgets: [],
    hasLogo: false,
    enabledGdpr: false,
  };
}
