/**
 * # Capture Kit Kernel
 *
 * Low-level primitives the other capture-kit packages build on:
 *
 * - **Logger** - pino-backed component loggers (`Logger.for("Name")`)
 * - **ExecutionContext** - the single UI-owning context, with FIFO redispatch
 *   and context-bound one-shot timers
 *
 * @module @capture-kit/kernel
 */

export * from "./logger.js";
export * from "./execution-context.js";
