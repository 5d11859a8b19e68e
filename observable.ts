// @filename: observable.ts
/**
 * A push-based stream whose consumers pace their producers.
 *
 * An `Observable` sends elements one at a time. Every element is answered
 * with an acknowledgment, `Continue` or `Stop`, and the producer waits for
 * that answer before sending the next one. The answer may be immediate, or a
 * {@link Future} the consumer completes when it is ready, so a slow consumer
 * can never be flooded.
 *
 * ```ts
 * Observable.of(1, 2, 3).subscribe({
 *   next(v) { console.log(v); },          // void means Continue
 *   complete() { console.log("done"); },
 * });
 *
 * // A consumer that "thinks" before asking for more
 * Observable.of("a", "b").subscribe(v => {
 *   const { future, resolve } = Future.defer<SyncAck>();
 *   setTimeout(() => resolve(Continue), 100);
 *   return future;
 * });
 * ```
 *
 * Guarantees, for every subscription:
 * 1. Lazy: nothing runs until `subscribe()`.
 * 2. At most one acknowledgment is outstanding at any time.
 * 3. `complete` / `error` arrive at most once, after the last acknowledgment.
 * 4. Cancellation is idempotent and never waits on an acknowledgment.
 *
 * @module
 */
import type { Ack, RawObservable, SyncAck } from "./_protocol.ts";
import type { Cancelable, Observer, Scheduler, SubscribeOptions, Subscriber } from "./_types.ts";
import type { Deferred } from "./future.ts";

import { Continue, Stop, deliver, syncOnContinue, syncTryFlatten } from "./ack.ts";
import { createAssignableCancelable, createCancelable, emptyCancelable } from "./cancelable.ts";
import { ObservableError } from "./error.ts";
import { Future } from "./future.ts";
import { globalScheduler } from "./scheduler.ts";
import { Symbol } from "./symbol.ts";

/**
 * Something that can hand out an Observable through `Symbol.observable`.
 */
export interface InteropObservable<T> {
  [Symbol.observable](): Observable<T>;
}

/** Everything `Observable.from()` accepts. */
export type ObservableInput<T> =
  | Observable<T>
  | InteropObservable<T>
  | Iterable<T>
  | PromiseLike<T>;

/**
 * Wraps user callbacks so they can't break the protocol.
 *
 * - `next` returning nothing means `Continue`.
 * - A throwing `next` becomes one `error` call and `Stop`.
 * - A failed acknowledgment future becomes one `error` call and `Stop`.
 * - Only the first terminal signal gets through, and none after `cancel()`.
 * - Without an `error` callback, errors go to `scheduler.reportFailure`.
 *
 * @typeParam T - The type of values delivered by the parent Observable.
 */
export class SafeSubscriber<T> implements Subscriber<T> {
  readonly scheduler: Scheduler;
  #observer: Observer<T> | null;
  #handle: Cancelable;
  #done = false;

  constructor(observer: Observer<T>, scheduler: Scheduler, handle: Cancelable) {
    this.#observer = observer;
    this.scheduler = scheduler;
    this.#handle = handle;
  }

  onNext(value: T): Ack {
    const observer = this.#observer;
    if (this.#done || !observer || this.#handle.isCanceled) return Stop;

    const nextFn = observer.next;
    if (typeof nextFn !== "function") return Continue;

    let ack: Ack | void;
    try {
      ack = nextFn.call(observer, value);
    } catch (err) {
      this.onError(err);
      return Stop;
    }

    if (ack === Continue) return Continue;
    if (ack === Stop) {
      this.#done = true;
      return Stop;
    }
    if (!(ack instanceof Future)) return Continue;

    // Recover a failing acknowledgment into `Stop`, surfacing its cause once
    const { future, resolve } = Future.defer<SyncAck>();
    ack.onComplete((result) => {
      if (result.status === "rejected") {
        this.onError(result.reason);
        resolve(Stop);
        return;
      }
      if (result.value === Stop) this.#done = true;
      resolve(result.value);
    });
    return future;
  }

  onError(error: unknown): void {
    const observer = this.#observer;
    if (this.#done || !observer) return;
    this.#done = true;
    this.#observer = null;
    if (this.#handle.isCanceled) return;

    const errorFn = observer.error;
    if (typeof errorFn !== "function") {
      this.scheduler.reportFailure(error);
      return;
    }

    try {
      errorFn.call(observer, error);
    } catch (err) {
      this.scheduler.reportFailure(ObservableError.from(err, { operator: "subscribe", tip: "error() callbacks must not throw" }));
    }
  }

  onComplete(): void {
    const observer = this.#observer;
    if (this.#done || !observer) return;
    this.#done = true;
    this.#observer = null;
    if (this.#handle.isCanceled) return;

    try {
      observer.complete?.();
    } catch (err) {
      this.scheduler.reportFailure(ObservableError.from(err, { operator: "subscribe" }));
    }
  }

  get [Symbol.toStringTag](): "SafeSubscriber" { return "SafeSubscriber" as const; }
}

/** Messages handed from the producer side to the async iterator. */
type IteratorSignal<T> =
  | { kind: "next"; value: T; ack: Deferred<SyncAck> }
  | { kind: "error"; error: unknown }
  | { kind: "complete" };

/**
 * A push-based, back-pressured stream.
 *
 * @typeParam T - Type of values emitted by this Observable
 */
export class Observable<T> implements AsyncIterable<T>, RawObservable<T, Subscriber<T>> {
  /** The subscriber function provided when the Observable was created */
  #subscribeFn: (subscriber: Subscriber<T>) => Cancelable;

  /**
   * @param subscribeFn - Starts producing for one subscriber and returns the
   * handle that stops it. It must honour the acknowledgment protocol.
   */
  constructor(subscribeFn: (subscriber: Subscriber<T>) => Cancelable) {
    if (typeof subscribeFn !== "function") {
      throw new TypeError("Observable constructor requires a function");
    }
    this.#subscribeFn = subscribeFn;
  }

  /**
   * Subscribes a raw protocol subscriber, without any safety net.
   *
   * This is what operators use to talk to their upstream. A subscribe
   * function that throws has its error sent to `subscriber.onError`.
   */
  unsafeSubscribe(subscriber: Subscriber<T>): Cancelable {
    try {
      return this.#subscribeFn(subscriber);
    } catch (err) {
      subscriber.onError(err);
      return emptyCancelable;
    }
  }

  /**
   * Subscribes with callbacks.
   *
   * @example
   * ```ts
   * const controller = new AbortController();
   * source.subscribe({
   *   next(v) { console.log(v); },
   *   error(e) { console.error(e); },
   *   complete() { console.log("done"); },
   * }, { scheduler: new TestScheduler(), signal: controller.signal });
   * ```
   */
  subscribe(
    observerOrNext?: Observer<T> | ((value: T) => Ack | void) | null,
    options: SubscribeOptions = {}
  ): Cancelable {
    const observer: Observer<T> =
      typeof observerOrNext === "function" ? { next: observerOrNext } : observerOrNext ?? {};
    const scheduler = options.scheduler ?? globalScheduler;
    const handle = createAssignableCancelable({ signal: options.signal });
    if (handle.isCanceled) return handle;

    const subscriber = new SafeSubscriber<T>(observer, scheduler, handle);
    handle.set(this.unsafeSubscribe(subscriber));
    return handle;
  }

  /**
   * Pulls values with `for await`. Each step of the loop acknowledges the
   * previous element with `Continue`; leaving the loop early cancels the
   * upstream and answers the outstanding element with `Stop`.
   *
   * @example
   * ```ts
   * for await (const n of Observable.of(1, 2, 3)) {
   *   if (n === 2) break;
   * }
   * ```
   */
  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    let pending = Future.defer<IteratorSignal<T>>();
    let outstanding: Deferred<SyncAck> | null = null;

    const handle = this.unsafeSubscribe({
      scheduler: globalScheduler,
      onNext(value) {
        const ack = Future.defer<SyncAck>();
        pending.resolve({ kind: "next", value, ack });
        return ack.future;
      },
      onError(error) { pending.resolve({ kind: "error", error }); },
      onComplete() { pending.resolve({ kind: "complete" }); },
    });

    try {
      while (true) {
        const signal = await pending.future;
        if (signal.kind === "complete") return;
        if (signal.kind === "error") throw signal.error;

        pending = Future.defer<IteratorSignal<T>>();
        outstanding = signal.ack;
        yield signal.value;

        outstanding = null;
        signal.ack.resolve(Continue);
      }
    } finally {
      handle.cancel();
      outstanding?.resolve(Stop);
    }
  }

  /** Interop: an Observable is its own `Symbol.observable` source. */
  [Symbol.observable](): Observable<T> {
    return this;
  }

  static readonly of: typeof of = of;
  static readonly from: typeof from = from;
  static readonly empty: typeof empty = empty;
  static readonly never: typeof never = never;
  static readonly raiseError: typeof raiseError = raiseError;

  get [Symbol.toStringTag](): "Observable" { return "Observable"; }
}

/**
 * Emits the given items in order, then completes.
 */
export function of<T>(...items: T[]): Observable<T> {
  return fromIterable(items);
}

/**
 * Converts iterables, promises and interop objects into an Observable.
 *
 * @example
 * ```ts
 * Observable.from([1, 2, 3]);
 * Observable.from(new Set(["a", "b"]));
 * Observable.from(Promise.resolve(42));
 * Observable.from({ [Symbol.observable]: () => Observable.of(1) });
 * ```
 */
export function from<T>(input: ObservableInput<T>): Observable<T> {
  if (input === null || input === undefined) {
    throw new TypeError("Observable.from: input must not be null or undefined");
  }

  if (input instanceof Observable) return input;

  if (isInterop<T>(input)) {
    const result = input[Symbol.observable]();
    if (!(result instanceof Observable)) {
      throw new TypeError("Observable.from: [Symbol.observable]() must return an Observable");
    }
    return result;
  }

  if (isIterable<T>(input)) return fromIterable(input);

  return fromPromise(input);
}

/** Completes immediately. */
export function empty<T = never>(): Observable<T> {
  return new Observable<T>((subscriber) => {
    subscriber.onComplete();
    return emptyCancelable;
  });
}

/** Never emits and never terminates. */
export function never<T = never>(): Observable<T> {
  return new Observable<T>(() => emptyCancelable);
}

/** Fails immediately with `error`. */
export function raiseError<T = never>(error: unknown): Observable<T> {
  return new Observable<T>((subscriber) => {
    subscriber.onError(error);
    return emptyCancelable;
  });
}

function isInterop<T>(input: ObservableInput<T>): input is InteropObservable<T> {
  return typeof Reflect.get(Object(input), Symbol.observable) === "function";
}

function isIterable<T>(input: ObservableInput<T>): input is Iterable<T> {
  return typeof Reflect.get(Object(input), Symbol.iterator) === "function";
}

/**
 * Walks an iterator under the acknowledgment protocol.
 *
 * Runs synchronously while acknowledgments come back synchronous, counting
 * frames with the execution model's `nextFrameIndex`; when the index wraps
 * to `0` the rest of the walk is resubmitted to the scheduler. Every task
 * takes at least one step, and under `alwaysAsync` even the first one is
 * scheduled.
 */
function fromIterable<T>(iterable: Iterable<T>): Observable<T> {
  return new Observable<T>((subscriber) => {
    const scheduler = subscriber.scheduler;
    const model = scheduler.executionModel;
    const handle = createCancelable();

    let iterator: Iterator<T>;
    try {
      iterator = iterable[Symbol.iterator]();
    } catch (err) {
      subscriber.onError(err);
      return emptyCancelable;
    }

    const resume = (): void => {
      if (!handle.isCanceled) scheduler.execute(loop);
    };

    const loop = (): void => {
      let frameIndex = 0;

      while (!handle.isCanceled) {
        let step: IteratorResult<T>;
        try {
          step = iterator.next();
        } catch (err) {
          subscriber.onError(err);
          return;
        }

        if (step.done) {
          subscriber.onComplete();
          return;
        }

        const ack = syncTryFlatten(deliver(subscriber, step.value, "from"), scheduler);
        if (ack === Stop) return;
        if (ack !== Continue) {
          syncOnContinue(ack, resume, (err) => scheduler.reportFailure(err));
          return;
        }

        frameIndex = model.nextFrameIndex(frameIndex);
        if (frameIndex === 0) {
          resume();
          return;
        }
      }
    };

    if (model.kind === "alwaysAsync") resume();
    else loop();
    return handle;
  });
}

function fromPromise<T>(promise: PromiseLike<T>): Observable<T> {
  return new Observable<T>((subscriber) => {
    const handle = createCancelable();

    Future.fromPromise(promise).onComplete((result) => {
      if (handle.isCanceled) return;
      if (result.status === "rejected") {
        subscriber.onError(result.reason);
        return;
      }

      const ack = deliver(subscriber, result.value, "from");
      syncOnContinue(ack, () => subscriber.onComplete(), (err) => subscriber.scheduler.reportFailure(err));
    });

    return handle;
  });
}
