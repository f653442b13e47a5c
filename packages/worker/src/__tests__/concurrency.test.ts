import { describe, it, expect } from "vitest";
import { AbortedError, ResultChannel, Semaphore } from "../concurrency.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("Semaphore", () => {
  it("should reject a non-positive capacity", () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
    expect(() => new Semaphore(1.5)).toThrow(RangeError);
  });

  it("should never run more tasks than its capacity", async () => {
    const semaphore = new Semaphore(2);
    let active = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 6 }, () =>
        semaphore.run(async () => {
          active++;
          peak = Math.max(peak, active);
          await new Promise((r) => setTimeout(r, 5));
          active--;
        }),
      ),
    );

    expect(peak).toBe(2);
    expect(semaphore.inUse).toBe(0);
  });

  it("should hand permits to waiters in arrival order", async () => {
    const semaphore = new Semaphore(1);
    const gate = deferred();
    const order: number[] = [];

    const first = semaphore.run(() => gate.promise);
    const rest = [1, 2, 3].map((n) => semaphore.run(async () => void order.push(n)));
    expect(semaphore.pending).toBe(3);

    gate.resolve();
    await Promise.all([first, ...rest]);

    expect(order).toEqual([1, 2, 3]);
  });

  it("should release the permit when a task throws", async () => {
    const semaphore = new Semaphore(1);

    await expect(
      semaphore.run(async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(semaphore.inUse).toBe(0);
  });

  it("should drop an aborted waiter without taking a permit", async () => {
    const semaphore = new Semaphore(1);
    const gate = deferred();
    const controller = new AbortController();

    const holder = semaphore.run(() => gate.promise);
    const waiter = semaphore.acquire(controller.signal);
    controller.abort();

    await expect(waiter).rejects.toBeInstanceOf(AbortedError);
    expect(semaphore.pending).toBe(0);

    gate.resolve();
    await holder;
    expect(semaphore.inUse).toBe(0);
  });

  it("should reject immediately when the signal is already aborted", async () => {
    const semaphore = new Semaphore(3);

    await expect(semaphore.acquire(AbortSignal.abort())).rejects.toBeInstanceOf(AbortedError);
    expect(semaphore.inUse).toBe(0);
  });

  it("should refuse a release without an acquire", () => {
    expect(() => new Semaphore(1).release()).toThrow(
      "semaphore released more times than acquired",
    );
  });
});

describe("ResultChannel", () => {
  it("should deliver buffered values then end after close", async () => {
    const channel = new ResultChannel<number>();
    channel.send(1);
    channel.send(2);
    channel.close();

    const received: number[] = [];
    for await (const value of channel) received.push(value);

    expect(received).toEqual([1, 2]);
  });

  it("should wake a waiting reader on send", async () => {
    const channel = new ResultChannel<string>();
    const received: string[] = [];
    const consumer = (async () => {
      for await (const value of channel) received.push(value);
    })();

    await Promise.resolve();
    channel.send("a");
    setTimeout(() => {
      channel.send("b");
      channel.close();
    }, 5);
    await consumer;

    expect(received).toEqual(["a", "b"]);
  });

  it("should carry undefined values", async () => {
    const channel = new ResultChannel<undefined>();
    channel.send(undefined);
    channel.close();

    let count = 0;
    for await (const _ of channel) count++;

    expect(count).toBe(1);
  });

  it("should refuse sends after close", () => {
    const channel = new ResultChannel<number>();
    channel.close();

    expect(channel.isClosed).toBe(true);
    expect(() => channel.send(1)).toThrow("send on closed channel");
  });
});
