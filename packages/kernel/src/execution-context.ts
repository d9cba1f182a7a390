/**
 * Execution Context
 *
 * A named, single logical execution context that owns UI state. Work is
 * either entered synchronously with `run()` or queued with `dispatch()`;
 * queued tasks run FIFO, each inside the context.
 *
 * Membership is tracked with AsyncLocalStorage, so continuations created
 * while inside the context (timers, promise callbacks) stay inside it.
 * Timers created through `setTimer()` always fire inside the context, even
 * when the underlying clock is driven from outside (e.g. fake timers).
 *
 * @example
 * ```typescript
 * const ui = createExecutionContext("ui");
 *
 * function onEvent() {
 *   ui.ensure(() => mutateUiState());
 * }
 * ```
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { Logger } from "./logger.js";

const log = Logger.for("ExecutionContext");

// ============================================================================
// Types
// ============================================================================

export interface TimerHandle {
  /** Cancel the timer. A no-op once it has fired. */
  cancel(): void;
}

export interface ExecutionContext {
  readonly name: string;

  /** True when the caller is running inside this context. */
  isCurrent(): boolean;

  /** Enter the context synchronously. Re-entrant. */
  run<T>(fn: () => T): T;

  /** Queue a task to run inside the context, after already-queued tasks. */
  dispatch(task: () => void): void;

  /** Run inline when already inside the context, otherwise dispatch. */
  ensure(task: () => void): void;

  /** One-shot timer whose callback runs inside the context. */
  setTimer(delayMs: number, task: () => void): TimerHandle;
}

/** Hands the queue flush to the host loop. Defaults to `setImmediate`. */
export type FlushScheduler = (flush: () => void) => void;

export interface ExecutionContextOptions {
  scheduler?: FlushScheduler;
}

// ============================================================================
// Implementation
// ============================================================================

const contextStorage = new AsyncLocalStorage<ExecutionContext>();

/** The context the caller is running in, if any. */
export function currentExecutionContext(): ExecutionContext | undefined {
  return contextStorage.getStore();
}

class ExecutionContextImpl implements ExecutionContext {
  private readonly _queue: Array<() => void> = [];
  private readonly _scheduler: FlushScheduler;
  private _flushScheduled = false;

  constructor(
    readonly name: string,
    options: ExecutionContextOptions,
  ) {
    this._scheduler = options.scheduler ?? ((flush) => setImmediate(flush));
  }

  isCurrent(): boolean {
    return contextStorage.getStore() === this;
  }

  run<T>(fn: () => T): T {
    if (this.isCurrent()) return fn();
    return contextStorage.run(this, fn);
  }

  dispatch(task: () => void): void {
    this._queue.push(task);
    if (this._flushScheduled) return;
    this._flushScheduled = true;
    this._scheduler(() => this._flush());
  }

  ensure(task: () => void): void {
    if (this.isCurrent()) {
      task();
      return;
    }
    this.dispatch(task);
  }

  setTimer(delayMs: number, task: () => void): TimerHandle {
    let fired = false;
    const timer = setTimeout(() => {
      fired = true;
      this._runTask(task);
    }, delayMs);
    return {
      cancel: () => {
        if (!fired) clearTimeout(timer);
      },
    };
  }

  private _flush(): void {
    // Tasks queued while flushing run in this same pass
    let task = this._queue.shift();
    while (task) {
      this._runTask(task);
      task = this._queue.shift();
    }
    this._flushScheduled = false;
  }

  private _runTask(task: () => void): void {
    try {
      this.run(task);
    } catch (error) {
      log.error(
        {
          context: this.name,
          errorMessage: error instanceof Error ? error.message : String(error),
          errorStack: error instanceof Error ? error.stack : undefined,
        },
        "task threw inside execution context",
      );
    }
  }
}

export function createExecutionContext(
  name: string,
  options: ExecutionContextOptions = {},
): ExecutionContext {
  return new ExecutionContextImpl(name, options);
}
