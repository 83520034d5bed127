import { describe, expect, it, vi } from "vitest";
import { StoreCorruptionError } from "../errors";
import { Logger } from "../observability";
import { TaskQueue, type TaskLifecycle } from "./taskQueue";

const logger = new Logger({ component: "test", runId: "test", minLevel: "error" });
const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));
const wait = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

class FakeLifecycle implements TaskLifecycle<number> {
  readonly kind = "download" as const;
  readonly claimed: number[] = [];
  readonly executed: number[] = [];
  readonly canceled: number[] = [];
  running = 0;
  maxRunning = 0;
  unclaimable = new Set<number>();
  failures = new Map<number, Error>();
  gate?: Promise<void>;

  async claim(id: number): Promise<number | undefined> {
    this.claimed.push(id);
    return this.unclaimable.has(id) ? undefined : id;
  }

  async execute(id: number): Promise<void> {
    this.executed.push(id);
    this.running += 1;
    this.maxRunning = Math.max(this.maxRunning, this.running);
    try {
      await (this.gate ?? wait(5));
      const failure = this.failures.get(id);
      if (failure) {
        throw failure;
      }
    } finally {
      this.running -= 1;
    }
  }

  async cancelQueued(id: number): Promise<boolean> {
    this.canceled.push(id);
    return true;
  }
}

describe("TaskQueue", () => {
  it("runs ids in FIFO order with bounded concurrency", async () => {
    const lifecycle = new FakeLifecycle();
    const queue = new TaskQueue(lifecycle, { concurrency: 2, logger });
    queue.start();
    for (const id of [1, 2, 3, 4, 5]) {
      queue.enqueue(id);
    }
    await queue.onIdle();
    expect(lifecycle.executed).toEqual([1, 2, 3, 4, 5]);
    expect(lifecycle.maxRunning).toBe(2);
    expect(queue.size).toBe(0);
    expect(queue.inFlight).toBe(0);
  });

  it("ignores ids that are already waiting", () => {
    const queue = new TaskQueue(new FakeLifecycle(), { concurrency: 1, logger });
    expect(queue.enqueue(7)).toBe(true);
    expect(queue.enqueue(7)).toBe(false);
    expect(queue.size).toBe(1);
  });

  it("holds work until started", async () => {
    const lifecycle = new FakeLifecycle();
    const queue = new TaskQueue(lifecycle, { concurrency: 1, logger });
    queue.enqueue(1);
    await flush();
    expect(lifecycle.claimed).toEqual([]);

    queue.start();
    await queue.onIdle();
    expect(lifecycle.executed).toEqual([1]);
  });

  it("skips ids that can no longer be claimed", async () => {
    const lifecycle = new FakeLifecycle();
    lifecycle.unclaimable.add(2);
    const queue = new TaskQueue(lifecycle, { concurrency: 1, logger });
    queue.start();
    [1, 2, 3].forEach((id) => queue.enqueue(id));
    await queue.onIdle();
    expect(lifecycle.claimed).toEqual([1, 2, 3]);
    expect(lifecycle.executed).toEqual([1, 3]);
  });

  it("keeps going after an ordinary task error", async () => {
    const lifecycle = new FakeLifecycle();
    lifecycle.failures.set(1, new Error("boom"));
    const queue = new TaskQueue(lifecycle, { concurrency: 1, logger });
    queue.start();
    queue.enqueue(1);
    queue.enqueue(2);
    await queue.onIdle();
    expect(lifecycle.executed).toEqual([1, 2]);
    expect(queue.isRunning).toBe(true);
  });

  it("halts on the integrity alarm and surfaces it", async () => {
    const lifecycle = new FakeLifecycle();
    const alarm = new StoreCorruptionError("abc", "/tmp/abc.pdf");
    lifecycle.failures.set(1, alarm);
    const onFatal = vi.fn();
    const queue = new TaskQueue(lifecycle, { concurrency: 1, logger, onFatal });
    queue.enqueue(1);
    queue.enqueue(2);
    queue.start();

    await expect(queue.onIdle()).rejects.toBe(alarm);
    expect(onFatal).toHaveBeenCalledWith(alarm);
    expect(queue.isRunning).toBe(false);
    expect(lifecycle.executed).toEqual([1]);
    expect(() => queue.start()).toThrow(StoreCorruptionError);

    await queue.stop({ drain: false });
    expect(lifecycle.canceled).toEqual([2]);
  });

  it("cancels a waiting id through the lifecycle", async () => {
    const lifecycle = new FakeLifecycle();
    const queue = new TaskQueue(lifecycle, { concurrency: 1, logger });
    queue.enqueue(1);
    queue.enqueue(2);
    expect(await queue.cancel(2)).toBe(true);
    expect(await queue.cancel(9)).toBe(false);
    expect(lifecycle.canceled).toEqual([2]);
    expect(queue.size).toBe(1);
    expect(queue.enqueue(2)).toBe(true);
  });

  it("stops without draining by canceling waiting ids and awaiting in-flight work", async () => {
    const lifecycle = new FakeLifecycle();
    let release: () => void = () => undefined;
    lifecycle.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const queue = new TaskQueue(lifecycle, { concurrency: 1, logger });
    queue.start();
    [1, 2, 3].forEach((id) => queue.enqueue(id));
    await flush();
    expect(lifecycle.executed).toEqual([1]);

    const stopped = queue.stop({ drain: false });
    await flush();
    expect(lifecycle.canceled).toEqual([2, 3]);
    expect(queue.inFlight).toBe(1);

    release();
    await stopped;
    expect(queue.inFlight).toBe(0);
    expect(lifecycle.executed).toEqual([1]);
  });

  it("drains before stopping", async () => {
    const lifecycle = new FakeLifecycle();
    const queue = new TaskQueue(lifecycle, { concurrency: 2, logger });
    queue.start();
    [1, 2, 3].forEach((id) => queue.enqueue(id));
    await queue.stop({ drain: true });
    expect(lifecycle.executed).toEqual([1, 2, 3]);
    expect(lifecycle.canceled).toEqual([]);
    expect(queue.isRunning).toBe(false);
  });
});
