import { Logger } from "@capture-kit/kernel";
import type { AppLifecycleSource, ReachabilitySource } from "./types.js";

const log = Logger.for("ReachabilityMonitor");

/** What the monitor pokes. Implemented by `PresentationController`. */
export interface DrainTarget {
  scheduleQueueDrain(): void;
  cancelQueueDrain(): void;
}

export interface ReachabilityMonitorOptions {
  reachability?: ReachabilitySource;
  lifecycle?: AppLifecycleSource;
}

/**
 * Turns connectivity and foreground transitions into queue drains.
 *
 * - became reachable / became foreground → schedule a drain
 * - became unreachable → cancel a scheduled drain (an active widget is left alone)
 *
 * Purely event-driven; subscriptions live between `start()` and `stop()`.
 */
export class ReachabilityMonitor {
  private readonly _target: DrainTarget;
  private readonly _reachability: ReachabilitySource | undefined;
  private readonly _lifecycle: AppLifecycleSource | undefined;
  private _reachable: boolean | undefined;
  private _unsubscribers: Array<() => void> = [];

  constructor(target: DrainTarget, options: ReachabilityMonitorOptions = {}) {
    this._target = target;
    this._reachability = options.reachability;
    this._lifecycle = options.lifecycle;
  }

  get running(): boolean {
    return this._unsubscribers.length > 0;
  }

  /** Last reported reachability, if any was reported yet. */
  get reachable(): boolean | undefined {
    return this._reachable;
  }

  start(): void {
    if (this.running) return;
    if (this._reachability) {
      this._unsubscribers.push(this._reachability.subscribe(this._onReachability));
    }
    if (this._lifecycle) {
      this._unsubscribers.push(this._lifecycle.onForeground(this._onForeground));
    }
  }

  stop(): void {
    for (const unsubscribe of this._unsubscribers) {
      unsubscribe();
    }
    this._unsubscribers = [];
    this._reachable = undefined;
  }

  private _onReachability = (reachable: boolean): void => {
    if (reachable === this._reachable) return;
    this._reachable = reachable;

    if (reachable) {
      log.debug("became reachable; scheduling queue drain");
      this._target.scheduleQueueDrain();
    } else {
      log.debug("became unreachable; cancelling queue drain");
      this._target.cancelQueueDrain();
    }
  };

  private _onForeground = (): void => {
    log.debug("became foreground; scheduling queue drain");
    this._target.scheduleQueueDrain();
  };
}
