/**
 * Single-slot, one-shot outcome delivery for one pending request.
 *
 * The first `resolve()` wins. If nobody is waiting yet the outcome is held
 * for the first `wait()`. Only one observer may ever wait.
 */
export class CompletionChannel<T> {
  private _outcome: { value: T } | null = null;
  private _deliver: ((value: T) => void) | null = null;
  private _observed = false;

  get settled(): boolean {
    return this._outcome !== null;
  }

  /**
   * Deliver `value`. Returns false, and changes nothing, when an outcome
   * was already recorded.
   */
  resolve(value: T): boolean {
    if (this._outcome) return false;
    this._outcome = { value };
    if (this._deliver) {
      const deliver = this._deliver;
      this._deliver = null;
      deliver(value);
    }
    return true;
  }

  wait(): Promise<T> {
    if (this._observed) {
      throw new Error("CompletionChannel already has an observer");
    }
    this._observed = true;

    if (this._outcome) {
      return Promise.resolve(this._outcome.value);
    }
    return new Promise<T>((resolve) => {
      this._deliver = resolve;
    });
  }
}
