import { describe, expect, it } from "vitest";
import { RequestPool } from "../../transport/request-pool.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("RequestPool", () => {
  it("runs at most size tasks and starts waiters in arrival order", async () => {
    const pool = new RequestPool(2);
    const gates = [deferred(), deferred(), deferred(), deferred()];
    const started: number[] = [];

    const runs = gates.map((gate, index) =>
      pool.run(async () => {
        started.push(index);
        await gate.promise;
        return index;
      })
    );

    await Promise.resolve();
    expect(started).toEqual([0, 1]);
    expect(pool.running).toBe(2);
    expect(pool.queued).toBe(2);

    gates[1]?.resolve();
    await runs[1];
    await Promise.resolve();
    expect(started).toEqual([0, 1, 2]);

    gates.forEach((gate) => gate.resolve());
    await expect(Promise.all(runs)).resolves.toEqual([0, 1, 2, 3]);
    expect(pool.running).toBe(0);
    expect(pool.queued).toBe(0);
  });

  it("frees the slot when a task fails", async () => {
    const pool = new RequestPool(1);

    await expect(pool.run(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(pool.run(async () => "next")).resolves.toBe("next");
    expect(pool.running).toBe(0);
  });

  it("rejects a size below one", () => {
    expect(() => new RequestPool(0)).toThrow("Pool size must be a positive integer, got 0");
  });
});
