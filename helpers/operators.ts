/**
 * Operators are the building blocks of pipelines.
 *
 * Each operator is a subscriber to its upstream and a source to its
 * downstream. Elements go forward, acknowledgments come back, and the
 * operator sits in the middle making sure it never has more than one
 * acknowledgment outstanding in either direction.
 *
 * ```
 * upstream ── onNext(x) ──▶ operator ── onNext(f(x)) ──▶ downstream
 * upstream ◀──── ack ────── operator ◀───── ack ──────── downstream
 * ```
 *
 * The helpers here take care of the parts every operator shares:
 *
 * - one fresh state per subscription;
 * - the downstream's scheduler is passed upstream;
 * - cancelling the operator's handle cancels the upstream (idempotently);
 * - a hook that throws ends the downstream with that error, answers `Stop`,
 *   and ignores anything the upstream sends afterwards.
 *
 * @example Doubling every number
 * ```ts
 * const double = createOperator<number, number>({
 *   name: "double",
 *   next(value, out) {
 *     return out.onNext(value * 2);
 *   },
 * });
 *
 * pipe(Observable.of(1, 2, 3), double).subscribe(v => console.log(v)); // 2, 4, 6
 * ```
 *
 * @example Running sum
 * ```ts
 * const runningSum = createStatefulOperator<number, number, { sum: number }>({
 *   name: "runningSum",
 *   createState: () => ({ sum: 0 }),
 *   next(value, state, out) {
 *     state.sum += value;
 *     return out.onNext(state.sum);
 *   },
 * });
 * ```
 *
 * @module
 */
import type { Ack } from "../_protocol.ts";
import type { Scheduler, Subscriber } from "../_types.ts";
import type { Operator, OperatorOptions, StatefulOperatorOptions } from "./_types.ts";

import { Stop } from "../ack.ts";
import { createCancelable, emptyCancelable } from "../cancelable.ts";
import { Observable } from "../observable.ts";
import { Symbol } from "../symbol.ts";

/**
 * The upstream-facing subscriber behind every operator built here.
 */
class OperatorSubscriber<In, Out, State> implements Subscriber<In> {
  readonly scheduler: Scheduler;
  #options: StatefulOperatorOptions<In, Out, State>;
  #state: State;
  #out: Subscriber<Out>;
  #done = false;

  constructor(options: StatefulOperatorOptions<In, Out, State>, state: State, out: Subscriber<Out>) {
    this.scheduler = out.scheduler;
    this.#options = options;
    this.#state = state;
    this.#out = out;
  }

  onNext(value: In): Ack {
    if (this.#done) return Stop;

    try {
      return this.#options.next(value, this.#state, this.#out);
    } catch (err) {
      this.#done = true;
      this.#out.onError(err);
      return Stop;
    }
  }

  onError(error: unknown): void {
    if (this.#done) return;
    this.#done = true;

    const errorFn = this.#options.error;
    if (typeof errorFn === "function") errorFn.call(this.#options, error, this.#state, this.#out);
    else this.#out.onError(error);
  }

  onComplete(): void {
    if (this.#done) return;
    this.#done = true;

    const completeFn = this.#options.complete;
    if (typeof completeFn === "function") completeFn.call(this.#options, this.#state, this.#out);
    else this.#out.onComplete();
  }

  get [Symbol.toStringTag](): string { return `OperatorSubscriber(${this.#options.name})`; }
}

/**
 * Builds an operator that keeps state for each subscription.
 */
export function createStatefulOperator<In, Out, State>(
  options: StatefulOperatorOptions<In, Out, State>
): Operator<In, Out> {
  return (source) => new Observable<Out>((out) => {
    let state: State;
    try {
      state = options.createState();
    } catch (err) {
      out.onError(err);
      return emptyCancelable;
    }

    const upstream = source.unsafeSubscribe(new OperatorSubscriber(options, state, out));
    return createCancelable(() => upstream.cancel());
  });
}

/**
 * Builds an operator without per-subscription state.
 */
export function createOperator<In, Out>(options: OperatorOptions<In, Out>): Operator<In, Out> {
  const { name, next, error, complete } = options;

  return createStatefulOperator<In, Out, undefined>({
    name,
    createState: () => undefined,
    next: (value, _state, out) => next.call(options, value, out),
    error: error ? (err, _state, out) => error.call(options, err, out) : undefined,
    complete: complete ? (_state, out) => complete.call(options, out) : undefined,
  });
}
