/**
 * # Capture Kit Shared
 *
 * Platform-independent types shared by the capture-kit packages:
 *
 * - **WidgetError / ConfigError** - failure values with stable `code`s
 * - **WidgetResult** - the one outcome each show request resolves with
 * - **Widget definitions** - zod schemas for the `widgets/get` endpoint
 *
 * ```typescript
 * import { describeWidgetResult, type WidgetResult } from "@capture-kit/shared";
 *
 * const result: WidgetResult = await capture.showWidget("welcome");
 * if (!result.ok) console.warn(describeWidgetResult(result));
 * ```
 *
 * @module @capture-kit/shared
 */

export * from "./errors.js";
export * from "./widgets.js";
