/**
 * Push-based streams with back-pressure.
 *
 * A producer sends one element, then waits. The consumer answers every
 * element with an acknowledgment: `Continue` to ask for the next one, `Stop`
 * to end the stream. The answer can be given right away or later, through a
 * {@link Future}, so a consumer that needs time (a slow write, a network
 * round-trip) paces the producer instead of buffering behind it.
 *
 * ```ts
 * import { Observable, Continue, Future, type SyncAck } from "ack-streams";
 *
 * Observable.of("a", "b", "c").subscribe(value => {
 *   const { future, resolve } = Future.defer<SyncAck>();
 *   writeSlowly(value, () => resolve(Continue));
 *   return future;
 * });
 * ```
 *
 * ## Acknowledgment-aware operators
 *
 * Operators chain acknowledgments without paying for asynchrony that isn't
 * there: when an answer is already known they continue on the same stack.
 *
 * ```ts
 * import { pipe, intersperse, toArray } from "ack-streams";
 *
 * await toArray(pipe(Observable.of("x", "y", "z"), intersperse("S0", "SEP", "E0")));
 * // ["S0", "x", "SEP", "y", "SEP", "z", "E0"]
 * ```
 *
 * ## Generators
 *
 * `fromAsyncStateAction` unfolds a state through a step that may answer now
 * or later. Synchronous steps run in batches; between batches the loop hands
 * control back to the scheduler, so an infinite generator never blocks the
 * event loop or grows the stack.
 *
 * ```ts
 * import { fromAsyncStateAction, take } from "ack-streams";
 *
 * const naturals = fromAsyncStateAction((n: number) => [n, n + 1] as const, 0);
 * await toArray(pipe(naturals, take(5))); // [0, 1, 2, 3, 4]
 * ```
 *
 * ## Scheduling
 *
 * Every subscriber carries a {@link Scheduler}, and every scheduler an
 * {@link ExecutionModel} deciding how much work may run synchronously:
 *
 * - `batched(n)`: up to `n` synchronous steps before a forced yield (the default is 1024);
 * - `alwaysAsync`: every step on its own task;
 * - `synchronous`: never yield.
 *
 * Tests swap in a {@link TestScheduler} to step through asynchronous
 * boundaries one task at a time:
 *
 * ```ts
 * const scheduler = new TestScheduler();
 * naturals.subscribe(() => {}, { scheduler });
 * scheduler.tickOne();
 * ```
 *
 * ## Failures
 *
 * Errors travel to `onError` once, after any outstanding acknowledgment.
 * Errors that have nowhere to go (the consumer already said `Stop`, or its
 * `onNext` threw) are wrapped in an {@link ObservableError} and handed to
 * `scheduler.reportFailure`, which logs them by default.
 *
 * @module
 */
export * from "./observable.ts";
export * from "./ack.ts";
export * from "./future.ts";
export * from "./cancelable.ts";
export * from "./execution_model.ts";
export * from "./scheduler.ts";
export * from "./test_scheduler.ts";
export * from "./state_action.ts";
export * from "./error.ts";
export * from "./helpers/mod.ts";

export type * from "./_types.ts";
