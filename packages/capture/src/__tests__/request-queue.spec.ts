import { describe, it, expect } from "vitest";
import { WidgetQueue } from "../request-queue.js";

describe("WidgetQueue", () => {
  it("keeps insertion order", () => {
    const queue = new WidgetQueue();
    queue.queue("a");
    queue.queue("b");
    queue.queue("c");

    expect(queue.toArray()).toEqual(["a", "b", "c"]);
    expect(queue.size).toBe(3);
  });

  it("ignores ids that are already queued", () => {
    const queue = new WidgetQueue();
    queue.queue("a");
    queue.queue("b");
    queue.queue("a");

    expect(queue.toArray()).toEqual(["a", "b"]);
  });

  it("peeks the most recently queued id without removing it", () => {
    const queue = new WidgetQueue();
    expect(queue.peekLast()).toBeUndefined();

    queue.queue("a");
    queue.queue("b");

    expect(queue.peekLast()).toBe("b");
    expect(queue.peekLast()).toBe("b");
    expect(queue.size).toBe(2);
  });

  it("re-queuing an existing id does not make it most recent", () => {
    const queue = new WidgetQueue();
    queue.queue("a");
    queue.queue("b");
    queue.queue("a");

    expect(queue.peekLast()).toBe("b");
  });

  it("removes an id and falls back to the previous one", () => {
    const queue = new WidgetQueue();
    queue.queue("a");
    queue.queue("b");
    queue.remove("b");

    expect(queue.peekLast()).toBe("a");
    expect(queue.has("b")).toBe(false);
  });

  it("treats removing an absent id as a no-op", () => {
    const queue = new WidgetQueue();
    queue.queue("a");
    queue.remove("zzz");

    expect(queue.toArray()).toEqual(["a"]);
  });

  it("never holds duplicates across mixed operations", () => {
    const queue = new WidgetQueue();
    const ops: Array<["queue" | "remove", string]> = [
      ["queue", "a"],
      ["queue", "b"],
      ["queue", "a"],
      ["remove", "a"],
      ["queue", "c"],
      ["queue", "a"],
      ["queue", "c"],
      ["remove", "b"],
    ];
    for (const [op, id] of ops) {
      if (op === "queue") queue.queue(id);
      else queue.remove(id);
    }

    expect(queue.toArray()).toEqual(["c", "a"]);
    expect(queue.peekLast()).toBe("a");
  });

  it("returns a snapshot from toArray", () => {
    const queue = new WidgetQueue();
    queue.queue("a");
    const snapshot = queue.toArray();
    snapshot.push("mutated");

    expect(queue.toArray()).toEqual(["a"]);
  });

  it("clears everything", () => {
    const queue = new WidgetQueue();
    queue.queue("a");
    queue.clear();
    expect(queue.size).toBe(0);
    expect(queue.peekLast()).toBeUndefined();
  });
});
