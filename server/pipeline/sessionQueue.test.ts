import { describe, expect, it } from "vitest";
import { PipelineAbortedError, SessionBusyError } from "../_core/errors";
import { deferred } from "../testing/fakes";
import { SessionQueue } from "./sessionQueue";

const tick = () => new Promise(resolve => setTimeout(resolve, 0));

describe("SessionQueue", () => {
  it("runs work for the same session one at a time, in arrival order", async () => {
    const queue = new SessionQueue("queue");
    const log: string[] = [];
    const gate = deferred<void>();

    const first = queue.run("s1", async () => {
      log.push("first:start");
      await gate.promise;
      log.push("first:end");
      return 1;
    });
    const second = queue.run("s1", async () => {
      log.push("second:start");
      return 2;
    });

    await tick();
    expect(log).toEqual(["first:start"]);
    expect(queue.depth("s1")).toBe(2);

    gate.resolve();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(log).toEqual(["first:start", "first:end", "second:start"]);

    await tick();
    expect(queue.isBusy("s1")).toBe(false);
  });

  it("keeps serving the session after a failed run", async () => {
    const queue = new SessionQueue("queue");
    const failed = queue.run("s1", () => Promise.reject(new Error("boom")));
    const next = queue.run("s1", async () => "ok");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });

  it("lets different sessions run concurrently", async () => {
    const queue = new SessionQueue("queue");
    const gate = deferred<void>();
    let otherRan = false;

    const blocked = queue.run("s1", () => gate.promise);
    await queue.run("s2", async () => {
      otherRan = true;
    });

    expect(otherRan).toBe(true);
    gate.resolve();
    await blocked;
  });

  it("rejects a second run under the reject policy", async () => {
    const queue = new SessionQueue("reject");
    const gate = deferred<void>();
    const first = queue.run("s1", () => gate.promise);

    await expect(queue.run("s1", async () => undefined)).rejects.toBeInstanceOf(SessionBusyError);

    gate.resolve();
    await first;
    await tick();
    await expect(queue.run("s1", async () => "free")).resolves.toBe("free");
  });

  it("never starts a waiter cancelled while in line", async () => {
    const queue = new SessionQueue("queue");
    const gate = deferred<void>();
    const controller = new AbortController();
    let started = false;

    const first = queue.run("s1", () => gate.promise);
    const waiter = queue.run(
      "s1",
      async () => {
        started = true;
      },
      controller.signal
    );

    controller.abort();
    await expect(waiter).rejects.toBeInstanceOf(PipelineAbortedError);

    gate.resolve();
    await first;
    await tick();
    expect(started).toBe(false);
    expect(queue.isBusy("s1")).toBe(false);
  });

  it("refuses work whose signal already fired", async () => {
    const queue = new SessionQueue();
    const controller = new AbortController();
    controller.abort();

    await expect(queue.run("s1", async () => 1, controller.signal)).rejects.toBeInstanceOf(PipelineAbortedError);
    expect(queue.isBusy("s1")).toBe(false);
  });
});
