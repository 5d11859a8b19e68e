import type { Ack } from "../_protocol.ts";
import type { Subscriber } from "../_types.ts";
import type { Observable } from "../observable.ts";

/**
 * A stage of a pipeline: takes a source, returns a new one.
 *
 * Operators are lazy. Nothing subscribes upstream until the returned
 * Observable is subscribed.
 */
export type Operator<In, Out> = (source: Observable<In>) => Observable<Out>;

/**
 * Any operator, for `pipe()`'s implementation signature.
 * Written as a method so its parameter is compared bivariantly.
 */
export type UnknownOperator = {
  apply(source: Observable<unknown>): Observable<unknown>;
}["apply"];

/**
 * Gets the data type an Observable emits.
 */
export type InferObservableType<TSource> =
  TSource extends Observable<infer R> ? R : never;

/**
 * Base options shared by every operator built with the helpers.
 */
export interface BaseOperatorOptions {
  /**
   * The operator's name, used when reporting failures it cannot deliver.
   */
  name: string;
}

/**
 * Hooks of an operator that keeps state for each subscription.
 *
 * Every subscription gets its own state from `createState`. The hooks are
 * the upstream-facing half of the protocol, with `out` as the downstream:
 *
 * - `next` must return the acknowledgment owed to the upstream, normally one
 *   derived from `out.onNext`.
 * - `error` / `complete` default to forwarding the signal.
 *
 * A `next` that throws terminates the downstream with that error and answers
 * the upstream with `Stop`.
 */
export interface StatefulOperatorOptions<In, Out, State> extends BaseOperatorOptions {
  createState: () => State;
  next(value: In, state: State, out: Subscriber<Out>): Ack;
  error?(error: unknown, state: State, out: Subscriber<Out>): void;
  complete?(state: State, out: Subscriber<Out>): void;
}

/**
 * Hooks of an operator without per-subscription state.
 */
export interface OperatorOptions<In, Out> extends BaseOperatorOptions {
  next(value: In, out: Subscriber<Out>): Ack;
  error?(error: unknown, out: Subscriber<Out>): void;
  complete?(out: Subscriber<Out>): void;
}
