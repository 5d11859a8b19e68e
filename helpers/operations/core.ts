import type { Operator } from "../_types.ts";

import { Stop, syncOnContinue } from "../../ack.ts";
import { empty } from "../../observable.ts";
import { createOperator, createStatefulOperator } from "../operators.ts";

/**
 * Transforms each element.
 *
 * Like `Array.map()`, with the element's position as the second argument.
 * A `project` that throws ends the stream with that error and tells the
 * upstream to stop.
 *
 * ```ts
 * pipe(Observable.of("a", "b"), map((s, i) => `${s}${i}`)); // "a0", "b1"
 * ```
 *
 * @param project - Function that transforms each element
 */
export function map<T, R>(
  project: (value: T, index: number) => R
): Operator<T, R> {
  return createStatefulOperator<T, R, { index: number }>({
    name: "map",
    createState: () => ({ index: 0 }),
    next(value, state, out) {
      return out.onNext(project(value, state.index++));
    },
  });
}

/**
 * Takes the first `count` elements, then completes.
 *
 * The upstream is told to `Stop` right after the last wanted element, and
 * the downstream completes once it has accepted that element. A count of
 * zero completes without subscribing upstream at all.
 *
 * ```ts
 * // An infinite counter cut down to three elements
 * pipe(fromAsyncStateAction((n: number) => [n, n + 1] as const, 0), take(3)); // 0, 1, 2
 * ```
 *
 * @param count - How many elements to take
 * @throws {RangeError} When `count` is negative or not an integer
 */
export function take<T>(count: number): Operator<T, T> {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`take: count must be a non-negative integer, got ${count}`);
  }

  if (count === 0) return () => empty<T>();

  return createStatefulOperator<T, T, { taken: number }>({
    name: "take",
    createState: () => ({ taken: 0 }),
    next(value, state, out) {
      state.taken++;
      if (state.taken < count) return out.onNext(value);

      syncOnContinue(out.onNext(value), () => out.onComplete());
      return Stop;
    },
  });
}

/**
 * Runs a side effect for each element and passes it through unchanged.
 *
 * ```ts
 * pipe(source, tap(v => console.log("saw", v)));
 * ```
 *
 * @param fn - Side effect to run on each element
 */
export function tap<T>(fn: (value: T) => void): Operator<T, T> {
  return createOperator<T, T>({
    name: "tap",
    next(value, out) {
      fn(value);
      return out.onNext(value);
    },
  });
}
