import { describe, it, expect, vi } from "vitest";
import { ReachabilityMonitor, type DrainTarget } from "../reachability-monitor.js";
import { FakeAppLifecycle, FakeReachability } from "../testing.js";

function createTarget() {
  return {
    scheduleQueueDrain: vi.fn(),
    cancelQueueDrain: vi.fn(),
  } satisfies DrainTarget;
}

describe("ReachabilityMonitor", () => {
  it("subscribes on start and unsubscribes on stop", () => {
    const reachability = new FakeReachability();
    const lifecycle = new FakeAppLifecycle();
    const monitor = new ReachabilityMonitor(createTarget(), { reachability, lifecycle });

    monitor.start();
    expect(monitor.running).toBe(true);
    expect(reachability.listenerCount).toBe(1);
    expect(lifecycle.listenerCount).toBe(1);

    monitor.stop();
    expect(monitor.running).toBe(false);
    expect(reachability.listenerCount).toBe(0);
    expect(lifecycle.listenerCount).toBe(0);
  });

  it("does not subscribe twice", () => {
    const reachability = new FakeReachability();
    const monitor = new ReachabilityMonitor(createTarget(), { reachability });

    monitor.start();
    monitor.start();

    expect(reachability.listenerCount).toBe(1);
  });

  it("schedules a drain when the network becomes reachable", () => {
    const target = createTarget();
    const reachability = new FakeReachability();
    const monitor = new ReachabilityMonitor(target, { reachability });
    monitor.start();

    reachability.set(true);

    expect(target.scheduleQueueDrain).toHaveBeenCalledOnce();
    expect(monitor.reachable).toBe(true);
  });

  it("cancels a scheduled drain when the network drops", () => {
    const target = createTarget();
    const reachability = new FakeReachability();
    const monitor = new ReachabilityMonitor(target, { reachability });
    monitor.start();

    reachability.set(true);
    reachability.set(false);

    expect(target.cancelQueueDrain).toHaveBeenCalledOnce();
    expect(monitor.reachable).toBe(false);
  });

  it("ignores repeated reports of the same state", () => {
    const target = createTarget();
    const reachability = new FakeReachability();
    const monitor = new ReachabilityMonitor(target, { reachability });
    monitor.start();

    reachability.set(true);
    reachability.set(true);
    reachability.set(true);

    expect(target.scheduleQueueDrain).toHaveBeenCalledOnce();
  });

  it("schedules a drain on every return to the foreground", () => {
    const target = createTarget();
    const lifecycle = new FakeAppLifecycle();
    const monitor = new ReachabilityMonitor(target, { lifecycle });
    monitor.start();

    lifecycle.foreground();
    lifecycle.foreground();

    expect(target.scheduleQueueDrain).toHaveBeenCalledTimes(2);
  });

  it("forgets the last reachability on stop", () => {
    const target = createTarget();
    const reachability = new FakeReachability();
    const monitor = new ReachabilityMonitor(target, { reachability });
    monitor.start();
    reachability.set(true);

    monitor.stop();
    expect(monitor.reachable).toBeUndefined();

    monitor.start();
    reachability.set(true);
    expect(target.scheduleQueueDrain).toHaveBeenCalledTimes(2);
  });

  it("ignores signals while stopped", () => {
    const target = createTarget();
    const reachability = new FakeReachability();
    const lifecycle = new FakeAppLifecycle();
    new ReachabilityMonitor(target, { reachability, lifecycle });

    reachability.set(true);
    lifecycle.foreground();

    expect(target.scheduleQueueDrain).not.toHaveBeenCalled();
  });
});
