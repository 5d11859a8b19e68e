// @filename: helpers/mod.ts
/**
 * Operators, composition and consumers.
 *
 * @module
 *
 * Every operator here speaks the acknowledgment protocol on both sides: it
 * answers its upstream only once its downstream has answered, so pacing set
 * by the final consumer reaches all the way back to the source.
 *
 * ## Basic Usage
 *
 * @example
 * ```ts
 * import { pipe, map, intersperse, take, toArray } from "ack-streams/helpers";
 * import { Observable } from "ack-streams";
 *
 * const result = pipe(
 *   Observable.of(1, 2, 3, 4),
 *   map(x => x * 10),
 *   intersperse("[", ",", "]")
 * );
 *
 * await toArray(result); // ["[", 10, ",", 20, ",", 30, ",", 40, "]"]
 * ```
 *
 * ## Writing operators
 *
 * `createOperator` and `createStatefulOperator` handle subscription,
 * cancellation and error routing; the hooks only decide what to send and
 * which acknowledgment to give back.
 *
 * @example
 * ```ts
 * const everyOther = createStatefulOperator<number, number, { n: number }>({
 *   name: "everyOther",
 *   createState: () => ({ n: 0 }),
 *   next(value, state, out) {
 *     return state.n++ % 2 === 0 ? out.onNext(value) : Continue;
 *   },
 * });
 * ```
 *
 * ## Limitations
 *
 * - `pipe` is typed for up to 6 operators; use `compose` to group more
 */

export type * from "./_types.ts";

export * from "./operations/mod.ts";
export * from "./operators.ts";
export * from "./pipe.ts";
export * from "./consumers.ts";
