import { describe, expect, it } from "vitest";
import { Semaphore } from "../src/semaphore.ts";

const deferred = () => {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = () => r();
  });
  return { promise, resolve };
};

describe("Semaphore.withPermit", () => {
  it("runs tasks one at a time with a single permit", async () => {
    const sem = new Semaphore({ maxConcurrent: 1 });
    const events: string[] = [];
    const task = (name: string) => async () => {
      events.push(`${name}:start`);
      await Promise.resolve();
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      sem.withPermit(task("a")),
      sem.withPermit(task("b")),
    ]);

    expect(results).toEqual(["a", "b"]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end"]);
  });

  it("starts waiting tasks in FIFO order", async () => {
    const sem = new Semaphore({ maxConcurrent: 1 });
    const gate = deferred();
    const order: number[] = [];

    const held = sem.withPermit(() => gate.promise);
    const first = sem.withPermit(() => order.push(1));
    const second = sem.withPermit(() => order.push(2));
    gate.resolve();
    await Promise.all([held, first, second]);

    expect(order).toEqual([1, 2]);
  });

  it("runs up to maxConcurrent tasks together", async () => {
    const sem = new Semaphore({ maxConcurrent: 2 });
    const gate = deferred();
    let running = 0;
    let peak = 0;
    const task = async () => {
      running++;
      peak = Math.max(peak, running);
      await gate.promise;
      running--;
    };

    const all = Promise.all([
      sem.withPermit(task),
      sem.withPermit(task),
      sem.withPermit(task),
    ]);
    await Promise.resolve();
    gate.resolve();
    await all;

    expect(peak).toBe(2);
  });

  it("returns the value of a synchronous task", async () => {
    const sem = new Semaphore({ maxConcurrent: 1 });
    expect(await sem.withPermit(() => 42)).toBe(42);
  });

  it("releases the permit when the task throws", async () => {
    const sem = new Semaphore({ maxConcurrent: 1 });
    await expect(sem.withPermit(() => {
      throw new Error("task failed");
    })).rejects.toThrow("task failed");

    expect(await sem.withPermit(() => "next")).toBe("next");
  });
});
