/**
 * Bounded, fail-fast task group.
 *
 * One group spans a whole build or copy. `limited` gates I/O behind a shared
 * p-limit bound; structural recursion goes through `all` ungated, so nested
 * groups of tasks can never starve each other of slots. The first failure
 * aborts the group's signal and is what every `all` rethrows.
 */

import pLimit, { type LimitFunction } from "p-limit";
import { throwIfCancelled } from "#/errors";

export interface TaskGroupOptions {
  concurrency: number;
  signal?: AbortSignal;
}

export class TaskGroup {
  private readonly controller = new AbortController();
  private readonly limit: LimitFunction;
  private failed = false;
  private firstError: unknown;
  private readonly parent?: AbortSignal;
  private readonly onParentAbort = (): void => this.controller.abort(this.parent?.reason);

  constructor(options: TaskGroupOptions) {
    this.limit = pLimit(Math.max(1, options.concurrency));
    this.parent = options.signal;
    if (this.parent?.aborted) {
      this.controller.abort(this.parent.reason);
    } else if (this.parent) {
      this.parent.addEventListener("abort", this.onParentAbort, { once: true });
    }
  }

  /**
   * Stop following the caller's signal. Call once the group's work is done.
   */
  dispose(): void {
    this.parent?.removeEventListener("abort", this.onParentAbort);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Run `fn` once a concurrency slot is free, unless the group was aborted
   * while it waited. A failure aborts the group before the slot is freed.
   */
  limited<T>(fn: () => Promise<T>): Promise<T> {
    return this.limit(async () => {
      throwIfCancelled(this.signal);
      try {
        return await fn();
      } catch (err) {
        this.fail(err);
        throw err;
      }
    });
  }

  /**
   * Run tasks side by side and wait for every one to settle. Rejects with
   * the group's first error if any task failed.
   */
  async all<T>(tasks: ReadonlyArray<() => Promise<T>>): Promise<T[]> {
    const settled = await Promise.allSettled(tasks.map((task) => this.spawn(task)));
    const values: T[] = [];
    for (const result of settled) {
      if (result.status === "rejected") {
        throw this.failed ? this.firstError : result.reason;
      }
      values.push(result.value);
    }
    return values;
  }

  /**
   * Run one task in the group: a failure aborts the rest.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    try {
      return await this.spawn(task);
    } catch (err) {
      throw this.failed ? this.firstError : err;
    }
  }

  private async spawn<T>(task: () => Promise<T>): Promise<T> {
    try {
      throwIfCancelled(this.signal);
      return await task();
    } catch (err) {
      this.fail(err);
      throw err;
    }
  }

  private fail(err: unknown): void {
    if (this.failed) return;
    this.failed = true;
    this.firstError = err;
    this.controller.abort(err);
  }
}
