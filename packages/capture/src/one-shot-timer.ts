import type { ExecutionContext, TimerHandle } from "@capture-kit/kernel";

/**
 * Restartable, cancelable one-shot timer bound to an execution context.
 * Starting it again replaces the pending run.
 */
export class OneShotTimer {
  private _handle: TimerHandle | null = null;

  constructor(
    private readonly context: ExecutionContext,
    readonly label: string,
  ) {}

  get pending(): boolean {
    return this._handle !== null;
  }

  start(delayMs: number, onFire: () => void): void {
    this.cancel();
    const handle = this.context.setTimer(delayMs, () => {
      if (this._handle !== handle) return;
      this._handle = null;
      onFire();
    });
    this._handle = handle;
  }

  cancel(): void {
    if (!this._handle) return;
    this._handle.cancel();
    this._handle = null;
  }
}
