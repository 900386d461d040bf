import { describe, expect, it } from "vitest";
import { PipelineAbortedError } from "../_core/errors";
import { deferred } from "../testing/fakes";
import { ConcurrencyPool, runWithDependencies } from "./subtaskScheduler";

describe("ConcurrencyPool", () => {
  it("rejects a limit below one", () => {
    expect(() => new ConcurrencyPool(0)).toThrow(RangeError);
  });

  it("never runs more than the limit at once", async () => {
    const pool = new ConcurrencyPool(2);
    let running = 0;
    let peak = 0;
    const gates = [deferred<void>(), deferred<void>(), deferred<void>()];

    const all = Promise.all(
      gates.map((gate, i) =>
        pool.run(async () => {
          running++;
          peak = Math.max(peak, running);
          await gate.promise;
          running--;
          return i;
        })
      )
    );

    await Promise.resolve();
    expect(pool.active).toBe(2);
    expect(pool.depth).toBe(1);

    gates.forEach(gate => gate.resolve());
    await expect(all).resolves.toEqual([0, 1, 2]);
    expect(peak).toBe(2);
    expect(pool.active).toBe(0);
  });

  it("frees the slot when a task throws", async () => {
    const pool = new ConcurrencyPool(1);
    await expect(pool.run(() => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(pool.run(async () => "next")).resolves.toBe("next");
    expect(pool.active).toBe(0);
  });
});

describe("runWithDependencies", () => {
  const tasks = [
    { id: 1, dependsOn: [] },
    { id: 2, dependsOn: [1] },
    { id: 3, dependsOn: [] },
  ];

  it("returns results in input order", async () => {
    const results = await runWithDependencies(tasks, async task => `t${task.id}`, { maxConcurrent: 3 });
    expect(results).toEqual(["t1", "t2", "t3"]);
  });

  it("starts a task only after its dependencies resolve and hands it their results", async () => {
    const started: number[] = [];
    const first = deferred<string>();

    const pending = runWithDependencies<{ id: number; dependsOn: number[] }, string>(
      tasks,
      async (task, deps) => {
        started.push(task.id);
        if (task.id === 1) return first.promise;
        return `t${task.id}<${deps.join(",")}>`;
      },
      { maxConcurrent: 3 }
    );

    await new Promise(resolve => setTimeout(resolve, 0));
    expect(started).toEqual([1, 3]);

    first.resolve("t1");
    await expect(pending).resolves.toEqual(["t1", "t2<t1>", "t3<>"]);
    expect(started).toEqual([1, 3, 2]);
  });

  it("ignores dependencies on unknown tasks", async () => {
    const results = await runWithDependencies([{ id: 1, dependsOn: [9] }], async () => "ok", { maxConcurrent: 1 });
    expect(results).toEqual(["ok"]);
  });

  it("does not start work once the signal has fired", async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;

    await expect(
      runWithDependencies(
        tasks,
        async () => {
          calls++;
          return 1;
        },
        { maxConcurrent: 1, signal: controller.signal }
      )
    ).rejects.toBeInstanceOf(PipelineAbortedError);
    expect(calls).toBe(0);
  });
});
