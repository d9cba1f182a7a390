import { Logger } from "@capture-kit/kernel";

const log = Logger.for("WidgetQueue");

/**
 * Ordered, de-duplicated backlog of widget ids waiting to be shown.
 *
 * Not synchronized: owned by the presentation controller and only touched
 * on its execution context.
 */
export class WidgetQueue {
  private _ids: string[] = [];

  get size(): number {
    return this._ids.length;
  }

  /** Append `id` unless it is already queued. */
  queue(id: string): void {
    if (this._ids.includes(id)) return;
    this._ids.push(id);
    log.debug({ widgetId: id, size: this._ids.length }, "queued");
  }

  /** Drop every occurrence of `id`. */
  remove(id: string): void {
    const before = this._ids.length;
    this._ids = this._ids.filter((queued) => queued !== id);
    if (this._ids.length !== before) {
      log.debug({ widgetId: id, size: this._ids.length }, "removed");
    }
  }

  /** Most recently queued id still present. Does not dequeue. */
  peekLast(): string | undefined {
    return this._ids[this._ids.length - 1];
  }

  has(id: string): boolean {
    return this._ids.includes(id);
  }

  clear(): void {
    this._ids = [];
  }

  toArray(): string[] {
    return [...this._ids];
  }
}
