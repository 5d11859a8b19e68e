// @filename: _types.ts
import type { Ack, RawCancelable, RawObserver } from "./_protocol.ts";
import type { ExecutionModel } from "./execution_model.ts";
import type { Symbol } from "./symbol.ts";

/**
 * The fair-scheduling service streams run on.
 *
 * Producers use it for three things: to resubmit a loop when the execution
 * model says the current batch is spent, to learn that execution model, and
 * to report failures that have no subscriber left to go to.
 */
export interface Scheduler {
  /** Governs how many synchronous steps a producer may take in a row. */
  readonly executionModel: ExecutionModel;

  /** Runs `task` asynchronously, after the current call stack unwinds. */
  execute(task: () => void): void;

  /** Receives errors that cannot be signalled downstream. */
  reportFailure(error: unknown): void;

  /** The same scheduler with a different execution model. */
  withExecutionModel(model: ExecutionModel): Scheduler;
}

/**
 * A consumer bound to the scheduler it wants its producers to run on.
 *
 * Every operator is a `Subscriber` to its upstream, and passes its own
 * downstream's scheduler up so the whole chain shares one fairness context.
 *
 * @typeParam T - Type of elements received.
 */
export interface Subscriber<T> extends RawObserver<T> {
  readonly scheduler: Scheduler;
}

/**
 * Handle returned by every subscription.
 *
 * `cancel()` is idempotent and best-effort: it prevents future sends but does
 * not take back an element already dispatched, and it never waits for an
 * outstanding acknowledgment.
 *
 * @example
 * ```ts
 * {
 *   using handle = source.subscribe(v => console.log(v));
 *   // ...
 * } // cancelled here
 * ```
 */
export interface Cancelable extends RawCancelable, Disposable {
  /** `true` once `cancel()` has been called. */
  readonly isCanceled: boolean;

  /** Same as `cancel()`, for `using` blocks. */
  [Symbol.dispose](): void;

  readonly [Symbol.toStringTag]: "Cancelable";
}

/**
 * Callbacks accepted by `Observable.subscribe`.
 *
 * `next` may return nothing (meaning `Continue`) or an {@link Ack}, which is
 * how a consumer "thinks" before asking for the next element.
 */
export interface Observer<T> {
  next?(value: T): Ack | void;
  error?(error: unknown): void;
  complete?(): void;
}

export interface SubscribeOptions {
  /** Scheduler to run on. Defaults to the global scheduler. */
  scheduler?: Scheduler;
  /** Aborting the signal cancels the subscription. */
  signal?: AbortSignal;
}

export type { Ack, SyncAck, RawObserver, RawCancelable, RawObservable } from "./_protocol.ts";
