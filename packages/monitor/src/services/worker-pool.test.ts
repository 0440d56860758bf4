import { describe, it, expect } from "vitest";
import { WorkerPool } from "./worker-pool.js";

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("WorkerPool", () => {
  it("runs at most `concurrency` tasks at once and queues the rest", async () => {
    const pool = new WorkerPool(2);
    const gates = [deferred<void>(), deferred<void>(), deferred<void>()];
    const started: number[] = [];

    const runs = gates.map((gate, i) =>
      pool.run(async () => {
        started.push(i);
        await gate.promise;
        return i;
      }),
    );
    await flush();

    expect(pool.active).toBe(2);
    expect(pool.pending).toBe(1);
    expect(started).toEqual([0, 1]);

    gates[0]?.resolve();
    await runs[0];
    await flush();
    expect(started).toEqual([0, 1, 2]);
    expect(pool.active).toBe(2);
    expect(pool.pending).toBe(0);

    gates[1]?.resolve();
    gates[2]?.resolve();
    expect(await Promise.all(runs)).toEqual([0, 1, 2]);
    expect(pool.active).toBe(0);
  });

  it("starts queued tasks in FIFO order", async () => {
    const pool = new WorkerPool(1);
    const order: string[] = [];
    await Promise.all(
      ["a", "b", "c", "d"].map((name) =>
        pool.run(async () => {
          order.push(name);
        }),
      ),
    );
    expect(order).toEqual(["a", "b", "c", "d"]);
  });

  it("releases the worker when a task rejects", async () => {
    const pool = new WorkerPool(1);
    await expect(pool.run(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(pool.active).toBe(0);
    await expect(pool.run(async () => "next")).resolves.toBe("next");
  });

  it("drain() resolves once everything has finished", async () => {
    const pool = new WorkerPool(1);
    const gate = deferred<void>();
    let done = 0;

    void pool.run(async () => {
      await gate.promise;
      done++;
    });
    void pool.run(async () => {
      done++;
    });

    const drained = pool.drain();
    gate.resolve();
    await drained;

    expect(done).toBe(2);
    expect(pool.active).toBe(0);
    expect(pool.pending).toBe(0);
  });

  it("drain() resolves immediately when idle", async () => {
    await expect(new WorkerPool(3).drain()).resolves.toBeUndefined();
  });

  it("rejects a non-positive concurrency", () => {
    expect(() => new WorkerPool(0)).toThrow(RangeError);
  });
});
