import { describe, it, expect } from "vitest";
import { DispatchPool } from "./pool.js";

// ============================================
// HELPERS
// ============================================

interface Gate {
  promise: Promise<void>;
  open: () => void;
}

function gate(): Gate {
  let open: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open };
}

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

function gatedPool(maxConcurrent: number, maxQueued: number) {
  const gates = new Map<string, Gate>();
  const started: string[] = [];
  const pool = new DispatchPool<string>(
    async (id) => {
      started.push(id);
      const g = gate();
      gates.set(id, g);
      await g.promise;
    },
    { maxConcurrent, maxQueued },
  );
  const finish = (id: string): void => gates.get(id)?.open();
  return { pool, started, finish };
}

// ============================================
// TESTS
// ============================================

describe("DispatchPool", () => {
  it("runs up to maxConcurrent, queues up to maxQueued, rejects the rest", () => {
    const { pool, started } = gatedPool(2, 1);

    expect(pool.submit("a", "a")).toBe("started");
    expect(pool.submit("b", "b")).toBe("started");
    expect(pool.submit("c", "c")).toBe("queued");
    expect(pool.submit("d", "d")).toBe("rejected");

    expect(started).toEqual(["a", "b"]);
    expect(pool.activeCount).toBe(2);
    expect(pool.queuedCount).toBe(1);
  });

  it("refuses ids that are already running or queued", () => {
    const { pool } = gatedPool(1, 1);

    pool.submit("a", "a");
    pool.submit("b", "b");

    expect(pool.submit("a", "a")).toBe("duplicate");
    expect(pool.submit("b", "b")).toBe("duplicate");
    expect(pool.has("a")).toBe(true);
    expect(pool.has("z")).toBe(false);
  });

  it("starts queued jobs in FIFO order as slots free up", async () => {
    const { pool, started, finish } = gatedPool(1, 5);

    pool.submit("a", "a");
    pool.submit("b", "b");
    pool.submit("c", "c");

    finish("a");
    await flush();
    expect(started).toEqual(["a", "b"]);

    finish("b");
    await flush();
    expect(started).toEqual(["a", "b", "c"]);
    expect(pool.queuedCount).toBe(0);
  });

  it("resolves onIdle when everything has finished", async () => {
    const { pool, finish } = gatedPool(2, 2);

    pool.submit("a", "a");
    pool.submit("b", "b");
    pool.submit("c", "c");

    const idle = pool.onIdle();
    finish("a");
    finish("b");
    await flush();
    finish("c");
    await idle;

    expect(pool.activeCount).toBe(0);
  });

  it("keeps going after a worker throws", async () => {
    const seen: string[] = [];
    const pool = new DispatchPool<string>(
      async (id) => {
        seen.push(id);
        if (id === "bad") throw new Error("boom");
      },
      { maxConcurrent: 1, maxQueued: 5 },
    );

    pool.submit("bad", "bad");
    pool.submit("good", "good");
    await pool.onIdle();

    expect(seen).toEqual(["bad", "good"]);
    expect(pool.activeCount).toBe(0);
  });

  it("drain waits for running jobs, drops the queue and closes the pool", async () => {
    const { pool, started, finish } = gatedPool(1, 5);

    pool.submit("a", "a");
    pool.submit("b", "b");

    const draining = pool.drain(1000);
    expect(pool.queuedCount).toBe(0);
    finish("a");

    expect(await draining).toBe(0);
    expect(started).toEqual(["a"]);
    expect(pool.submit("c", "c")).toBe("rejected");
  });

  it("drain gives up after the timeout and reports what is still running", async () => {
    const { pool } = gatedPool(2, 0);

    pool.submit("a", "a");
    pool.submit("b", "b");

    expect(await pool.drain(20)).toBe(2);
  });
});
