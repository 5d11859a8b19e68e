// helpers/pipe.ts
// Composition utility for Observable operators

import type { Operator, UnknownOperator } from "./_types.ts";
import type { Observable } from "../observable.ts";

/**
 * Applies operators to a source, left to right.
 *
 * `pipe(source, a, b, c)` is `c(b(a(source)))`, with each stage's input type
 * checked against the previous stage's output. Nothing runs until the result
 * is subscribed.
 *
 * @returns A new Observable with all operators applied
 *
 * @example
 * ```ts
 * const result = pipe(
 *   Observable.of(1, 2, 3),
 *   map(x => String(x * 10)),
 *   intersperse("|"),
 *   take(4)
 * );
 * // "10", "|", "20", "|"
 * ```
 */

// Overload 0: No operator
export function pipe<T>(
  source: Observable<T>,
): Observable<T>;

// Overload 1: Single operator
export function pipe<T, A>(
  source: Observable<T>,
  op1: Operator<T, A>
): Observable<A>;

// Overload 2: Two operators
export function pipe<T, A, B>(
  source: Observable<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>
): Observable<B>;

// Overload 3: Three operators
export function pipe<T, A, B, C>(
  source: Observable<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>
): Observable<C>;

// Overload 4: Four operators
export function pipe<T, A, B, C, D>(
  source: Observable<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>
): Observable<D>;

// Overload 5: Five operators
export function pipe<T, A, B, C, D, E>(
  source: Observable<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>
): Observable<E>;

// Overload 6: Six operators
export function pipe<T, A, B, C, D, E, F>(
  source: Observable<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>,
  op6: Operator<E, F>
): Observable<F>;

/**
 * Implementation of the pipe function
 */
export function pipe(
  source: Observable<unknown>,
  ...operators: UnknownOperator[]
): Observable<unknown> {
  return operators.reduce((acc, op) => op(acc), source);
}

/**
 * Combines operators into one, without a source.
 *
 * @example
 * ```ts
 * const csvLine = compose(map((n: number) => n.toFixed(2)), intersperse(","));
 * pipe(Observable.of(1, 2), csvLine); // "1.00", ",", "2.00"
 * ```
 */
export function compose<T, A>(op1: Operator<T, A>): Operator<T, A>;
export function compose<T, A, B>(op1: Operator<T, A>, op2: Operator<A, B>): Operator<T, B>;
export function compose<T, A, B, C>(
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>
): Operator<T, C>;
export function compose(...operators: UnknownOperator[]): UnknownOperator {
  return (source) => operators.reduce((acc, op) => op(acc), source);
}
