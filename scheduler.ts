// @filename: scheduler.ts
/**
 * The default scheduler: a work queue drained on Node's check phase.
 *
 * `execute()` never runs a task on the caller's stack. Tasks go into a FIFO
 * queue and a single `setImmediate` drains it. A drain only runs the tasks
 * that were queued when it started; anything resubmitted while draining waits
 * for the next macrotask, so a producer that keeps yielding still lets I/O and
 * timers through between batches.
 *
 * @example
 * ```ts
 * const scheduler = new GlobalScheduler({ executionModel: batched(256) });
 * Observable.of(1, 2, 3).subscribe(v => console.log(v), { scheduler });
 * ```
 *
 * @module
 */
import type { Scheduler } from "./_types.ts";
import type { ExecutionModel } from "./execution_model.ts";

import { defaultExecutionModel } from "./execution_model.ts";
import { createQueue, dequeue, enqueue, getSize, type Queue } from "./queue.ts";

export interface GlobalSchedulerOptions {
  /** Defaults to {@link defaultExecutionModel}. */
  executionModel?: ExecutionModel;

  /**
   * Receives failures nothing else can handle. Defaults to logging them with
   * `console.error`.
   */
  reporter?: (error: unknown) => void;
}

/** Writes an undeliverable failure to stderr. */
export function logFailure(error: unknown): void {
  console.error("Unhandled stream failure:", String(error));
}

interface SharedQueue {
  tasks: Queue<() => void>;
  scheduled: boolean;
}

export class GlobalScheduler implements Scheduler {
  readonly executionModel: ExecutionModel;
  #reporter: (error: unknown) => void;
  #shared: SharedQueue;

  constructor(options: GlobalSchedulerOptions = {}, shared?: SharedQueue) {
    this.executionModel = options.executionModel ?? defaultExecutionModel;
    this.#reporter = options.reporter ?? logFailure;
    this.#shared = shared ?? { tasks: createQueue<() => void>(), scheduled: false };
  }

  execute(task: () => void): void {
    enqueue(this.#shared.tasks, task);
    if (this.#shared.scheduled) return;

    this.#shared.scheduled = true;
    setImmediate(() => this.#drain());
  }

  reportFailure(error: unknown): void {
    try {
      this.#reporter(error);
    } catch (err) {
      queueMicrotask(() => { throw err; });
    }
  }

  withExecutionModel(model: ExecutionModel): Scheduler {
    return new GlobalScheduler(
      { executionModel: model, reporter: this.#reporter },
      this.#shared
    );
  }

  #drain(): void {
    const shared = this.#shared;
    shared.scheduled = false;

    // Tasks queued from here on belong to the next macrotask
    let remaining = getSize(shared.tasks);
    while (remaining-- > 0) {
      const task = dequeue(shared.tasks);
      if (!task) break;
      try {
        task();
      } catch (err) {
        this.reportFailure(err);
      }
    }

    if (getSize(shared.tasks) > 0 && !shared.scheduled) {
      shared.scheduled = true;
      setImmediate(() => this.#drain());
    }
  }

  get [Symbol.toStringTag](): "GlobalScheduler" { return "GlobalScheduler" as const; }
}

/**
 * Scheduler used when a subscription doesn't name one.
 */
export const globalScheduler: Scheduler = new GlobalScheduler();
