import { describe, expect, it } from "vitest";
import { BoundedPool, PoolSaturatedError, TaskAbortedError } from "./bounded-pool";

interface Deferred {
  promise: Promise<string>;
  resolve: (value: string) => void;
}

const deferred = (): Deferred => {
  let resolve: (value: string) => void = () => undefined;
  const promise = new Promise<string>((done) => {
    resolve = done;
  });
  return { promise, resolve };
};

const flush = (): Promise<void> => new Promise((done) => setImmediate(done));

describe("BoundedPool", () => {
  it("keeps at most two tasks in flight", async () => {
    const pool = new BoundedPool(2);
    const gates = [deferred(), deferred(), deferred()];
    const started: number[] = [];
    const signal = new AbortController().signal;

    const results = gates.map((gate, index) =>
      pool.run(async () => {
        started.push(index);
        return gate.promise;
      }, signal)
    );

    expect(started).toEqual([0, 1]);

    gates[0].resolve("a");
    await results[0];
    await flush();
    expect(started).toEqual([0, 1, 2]);

    gates[1].resolve("b");
    gates[2].resolve("c");
    await expect(Promise.all(results)).resolves.toEqual(["a", "b", "c"]);
  });

  it("drops queued tasks whose signal aborts", async () => {
    const pool = new BoundedPool(1);
    const gate = deferred();
    const first = pool.run(async () => gate.promise, new AbortController().signal);

    const controller = new AbortController();
    let secondStarted = false;
    const second = pool.run(async () => {
      secondStarted = true;
      return "late";
    }, controller.signal);

    controller.abort();
    await expect(second).rejects.toBeInstanceOf(TaskAbortedError);

    gate.resolve("done");
    await expect(first).resolves.toBe("done");
    expect(secondStarted).toBe(false);
  });

  it("rejects work once the queue is full", async () => {
    const pool = new BoundedPool(1, 1);
    const gate = deferred();
    const signal = new AbortController().signal;

    const running = pool.run(async () => gate.promise, signal);
    const queued = pool.run(async () => "queued", signal);

    await expect(pool.run(async () => "overflow", signal)).rejects.toBeInstanceOf(PoolSaturatedError);

    gate.resolve("ok");
    await expect(running).resolves.toBe("ok");
    await expect(queued).resolves.toBe("queued");
  });
});
