/**
 * Exclusivity flag with atomic compare-and-set.
 *
 * Backed by a shared Int32Array so a reader outside the owning
 * execution context (including another worker holding the same buffer)
 * sees a consistent value.
 */
export class ExclusiveFlag {
  private static readonly FREE = 0;
  private static readonly HELD = 1;

  private readonly _cell: Int32Array;

  constructor(
    readonly buffer: SharedArrayBuffer = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT),
  ) {
    this._cell = new Int32Array(buffer, 0, 1);
  }

  get isHeld(): boolean {
    return Atomics.load(this._cell, 0) === ExclusiveFlag.HELD;
  }

  /** Set the flag if it is free. True when this call took it. */
  tryAcquire(): boolean {
    return (
      Atomics.compareExchange(this._cell, 0, ExclusiveFlag.FREE, ExclusiveFlag.HELD) ===
      ExclusiveFlag.FREE
    );
  }

  release(): void {
    Atomics.store(this._cell, 0, ExclusiveFlag.FREE);
  }
}
