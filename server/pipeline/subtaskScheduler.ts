/**
 * Dependency-aware fan-out for per-sub-task work.
 *
 * Each task waits for the tasks it depends on, then takes a slot in a bounded
 * pool. Independent tasks run concurrently; results come back in input order.
 */

import { throwIfAborted } from "../_core/errors";

export interface SchedulableTask {
  id: number;
  dependsOn: readonly number[];
}

/**
 * Fixed-size concurrency pool. A finishing task hands its slot straight to the
 * next waiter, so the active count never exceeds the limit.
 */
export class ConcurrencyPool {
  private activeCount = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(private readonly maxConcurrent: number) {
    if (maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be at least 1, got ${maxConcurrent}`);
    }
  }

  get active(): number {
    return this.activeCount;
  }

  get depth(): number {
    return this.waiting.length;
  }

  async run<T>(execute: () => Promise<T>): Promise<T> {
    if (this.activeCount < this.maxConcurrent) {
      this.activeCount++;
    } else {
      await new Promise<void>(resolve => this.waiting.push(resolve));
    }

    try {
      return await execute();
    } finally {
      const next = this.waiting.shift();
      if (next) {
        next();
      } else {
        this.activeCount--;
      }
    }
  }
}

/**
 * Run `worker` once per task. A task starts only after all of its known
 * dependencies have resolved; it receives their results in `dependsOn` order.
 * Dependencies must reference earlier tasks.
 */
export async function runWithDependencies<T extends SchedulableTask, R>(
  tasks: readonly T[],
  worker: (task: T, dependencyResults: R[]) => Promise<R>,
  options: { maxConcurrent: number; signal?: AbortSignal }
): Promise<R[]> {
  const pool = new ConcurrencyPool(options.maxConcurrent);
  const started = new Map<number, Promise<R>>();
  const all: Array<Promise<R>> = [];

  for (const task of tasks) {
    const prerequisites = task.dependsOn
      .map(id => started.get(id))
      .filter((p): p is Promise<R> => p !== undefined);

    const result = Promise.all(prerequisites).then(dependencyResults =>
      pool.run(() => {
        throwIfAborted(options.signal);
        return worker(task, dependencyResults);
      })
    );
    started.set(task.id, result);
    all.push(result);
  }

  return Promise.all(all);
}
