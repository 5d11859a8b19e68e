// @filename: test_scheduler.ts
/**
 * A scheduler that only runs tasks when told to.
 *
 * Nothing submitted through `execute()` runs until the test calls `tickOne()`
 * or `tick()`, which makes every asynchronous boundary of a stream observable:
 * how many elements arrived synchronously, how many after one forced yield,
 * whether anything is still queued after cancellation.
 *
 * @example
 * ```ts
 * const scheduler = new TestScheduler();
 * let received = 0;
 * fromAsyncStateAction(n => [n, n + 1], 0)
 *   .subscribe(() => { received++; }, { scheduler });
 *
 * received;          // 512, the first synchronous batch
 * scheduler.tickOne();
 * received;          // 1024
 * ```
 *
 * @module
 */
import type { Scheduler } from "./_types.ts";
import type { ExecutionModel } from "./execution_model.ts";

import { defaultExecutionModel } from "./execution_model.ts";
import { createQueue, dequeue, enqueue, getSize, type Queue } from "./queue.ts";

interface TestSchedulerState {
  tasks: Queue<() => void>;
  failures: unknown[];
}

export interface TestSchedulerOptions {
  /** Defaults to {@link defaultExecutionModel}. */
  executionModel?: ExecutionModel;
}

export class TestScheduler implements Scheduler {
  readonly executionModel: ExecutionModel;
  #state: TestSchedulerState;

  constructor(options: TestSchedulerOptions = {}, state?: TestSchedulerState) {
    this.executionModel = options.executionModel ?? defaultExecutionModel;
    this.#state = state ?? { tasks: createQueue<() => void>(), failures: [] };
  }

  execute(task: () => void): void {
    enqueue(this.#state.tasks, task);
  }

  reportFailure(error: unknown): void {
    this.#state.failures.push(error);
  }

  /**
   * A view on the same queue and failure log with another execution model.
   */
  withExecutionModel(model: ExecutionModel): TestScheduler {
    return new TestScheduler({ executionModel: model }, this.#state);
  }

  /** Number of queued tasks. */
  get pendingTasks(): number {
    return getSize(this.#state.tasks);
  }

  /** Everything passed to `reportFailure`, oldest first. */
  get failures(): readonly unknown[] {
    return this.#state.failures;
  }

  /**
   * Runs the oldest queued task. Returns `false` when there was none.
   * A task that throws is recorded as a failure.
   */
  tickOne(): boolean {
    const task = dequeue(this.#state.tasks);
    if (!task) return false;

    try {
      task();
    } catch (err) {
      this.reportFailure(err);
    }
    return true;
  }

  /**
   * Runs tasks, including ones submitted along the way, until the queue is
   * empty. Returns how many ran.
   *
   * @param maxTasks - Safety valve for sources that never stop resubmitting
   */
  tick(maxTasks: number = 1_000_000): number {
    let ran = 0;
    while (ran < maxTasks && this.tickOne()) ran++;
    return ran;
  }
}
