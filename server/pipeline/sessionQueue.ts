/**
 * Per-session serialization: at most one pipeline run in flight per session id.
 *
 * "queue"  — later runs wait for earlier ones, in arrival order.
 * "reject" — a run arriving while another is in flight fails with SessionBusyError.
 *
 * Different sessions never wait on each other.
 */

import type { SessionBusyPolicy } from "../_core/config";
import { PipelineAbortedError, SessionBusyError } from "../_core/errors";

export class SessionQueue {
  /** Settles when the most recently queued run for the session settles; never rejects */
  private readonly tails = new Map<string, Promise<void>>();
  /** Runs in flight or waiting, per session */
  private readonly counts = new Map<string, number>();

  constructor(readonly policy: SessionBusyPolicy = "queue") {}

  isBusy(sessionId: string): boolean {
    return (this.counts.get(sessionId) ?? 0) > 0;
  }

  /** Runs in flight or waiting for the session */
  depth(sessionId: string): number {
    return this.counts.get(sessionId) ?? 0;
  }

  async run<T>(sessionId: string, task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const count = this.counts.get(sessionId) ?? 0;
    if (count > 0 && this.policy === "reject") {
      throw new SessionBusyError(sessionId);
    }
    if (signal?.aborted) {
      throw new PipelineAbortedError(signal.reason);
    }
    this.counts.set(sessionId, count + 1);

    const previous = this.tails.get(sessionId) ?? Promise.resolve();
    const execution = previous.then(() => {
      if (signal?.aborted) {
        throw new PipelineAbortedError(signal.reason);
      }
      return task();
    });
    const tail = execution.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(sessionId, tail);

    try {
      return await this.untilAborted(execution, signal);
    } finally {
      // Bookkeeping follows the execution, not the caller: a cancelled waiter still occupies its place in line
      void tail.then(() => this.release(sessionId, tail));
    }
  }

  private release(sessionId: string, tail: Promise<void>): void {
    const remaining = (this.counts.get(sessionId) ?? 1) - 1;
    if (remaining > 0) {
      this.counts.set(sessionId, remaining);
      return;
    }
    this.counts.delete(sessionId);
    if (this.tails.get(sessionId) === tail) {
      this.tails.delete(sessionId);
    }
  }

  /** Reject as soon as the signal fires, without waiting for the queued work. */
  private untilAborted<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
    if (!signal) return work;
    return new Promise<T>((resolve, reject) => {
      const onAbort = () => reject(new PipelineAbortedError(signal.reason));
      signal.addEventListener("abort", onAbort, { once: true });
      work.then(
        value => {
          signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        (err: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(err);
        }
      );
    });
  }
}
