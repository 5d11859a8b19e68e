// @filename: future.ts
/**
 * A deferred value that can be inspected synchronously.
 *
 * Promises always resolve on a later microtask, which makes them a poor fit
 * for acknowledgments: a consumer that already knows its answer would force
 * every element through the microtask queue. A `Future` is a small state
 * machine (`pending` → `fulfilled` | `rejected`) whose result can be read as
 * soon as it exists, so producers take the synchronous path whenever they can
 * and only register a callback when the answer is genuinely not known yet.
 *
 * @example
 * ```ts
 * const now = Future.resolved(1);
 * now.value; // { status: "fulfilled", value: 1 }
 *
 * const { future, resolve } = Future.defer<number>();
 * future.value; // undefined (still pending)
 * future.map(n => n * 2).onComplete(r => console.log(r));
 * resolve(21); // logs { status: "fulfilled", value: 42 }
 * ```
 *
 * @module
 */

/** A settled outcome. */
export type Settled<T> =
  | { readonly status: "fulfilled"; readonly value: T }
  | { readonly status: "rejected"; readonly reason: unknown };

/** A future together with the capabilities that complete it. */
export interface Deferred<T> {
  readonly future: Future<T>;
  /** Fulfils the future; returns `false` if it was already settled. */
  resolve(value: T): boolean;
  /** Rejects the future; returns `false` if it was already settled. */
  reject(reason: unknown): boolean;
}

/**
 * Checks for a thenable without assuming it is a native Promise.
 */
export function isPromiseLike<T>(value: unknown): value is PromiseLike<T> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    typeof Reflect.get(value, "then") === "function"
  );
}

export class Future<T> implements PromiseLike<T> {
  #result: Settled<T> | undefined;
  #callbacks: Array<(result: Settled<T>) => void> | null = [];

  private constructor(result?: Settled<T>) {
    this.#result = result;
    if (result) this.#callbacks = null;
  }

  /** A future that is already fulfilled with `value`. */
  static resolved<T>(value: T): Future<T> {
    return new Future<T>({ status: "fulfilled", value });
  }

  /** A future that is already rejected with `reason`. */
  static rejected<T = never>(reason: unknown): Future<T> {
    return new Future<T>({ status: "rejected", reason });
  }

  /**
   * Creates a pending future and hands out its completion capabilities.
   * The first completion wins.
   */
  static defer<T>(): Deferred<T> {
    const future = new Future<T>();
    return {
      future,
      resolve: (value) => future.#settle({ status: "fulfilled", value }),
      reject: (reason) => future.#settle({ status: "rejected", reason }),
    };
  }

  /**
   * Adapts a thenable. The result is pending until the thenable settles,
   * which for a native Promise is never sooner than the next microtask.
   */
  static fromPromise<T>(promise: PromiseLike<T>): Future<T> {
    const { future, resolve, reject } = Future.defer<T>();
    void promise.then(resolve, reject);
    return future;
  }

  /**
   * Lifts any deferred shape into a Future: futures pass through, thenables
   * are adapted, anything else is an already-known value.
   */
  static from<T>(value: T | Future<T> | PromiseLike<T>): Future<T> {
    if (value instanceof Future) return value;
    if (isPromiseLike<T>(value)) return Future.fromPromise(value);
    return Future.resolved<T>(value);
  }

  /** The settled outcome, or `undefined` while pending. */
  get value(): Settled<T> | undefined {
    return this.#result;
  }

  get isCompleted(): boolean {
    return this.#result !== undefined;
  }

  /**
   * Runs `callback` with the outcome: immediately when settled, otherwise
   * once settled. Callbacks run in registration order.
   */
  onComplete(callback: (result: Settled<T>) => void): void {
    const result = this.#result;
    if (result) {
      callback(result);
      return;
    }
    this.#callbacks?.push(callback);
  }

  /**
   * Transforms the fulfilled value. Applied synchronously when the future is
   * already settled; an exception thrown by `fn` rejects the result.
   */
  map<R>(fn: (value: T) => R): Future<R> {
    return this.flatMap((value) => Future.resolved(fn(value)));
  }

  /**
   * Chains another deferred computation on the fulfilled value. Applied
   * synchronously when the future is already settled.
   */
  flatMap<R>(fn: (value: T) => Future<R>): Future<R> {
    const result = this.#result;
    if (result) return chain(result, fn);

    const { future, resolve, reject } = Future.defer<R>();
    this.onComplete((settled) => {
      chain(settled, fn).onComplete((next) => {
        if (next.status === "fulfilled") resolve(next.value);
        else reject(next.reason);
      });
    });
    return future;
  }

  /** Bridges to a native Promise. */
  toPromise(): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.onComplete((result) => {
        if (result.status === "fulfilled") resolve(result.value);
        else reject(result.reason);
      });
    });
  }

  then<R1 = T, R2 = never>(
    onfulfilled?: ((value: T) => R1 | PromiseLike<R1>) | null,
    onrejected?: ((reason: unknown) => R2 | PromiseLike<R2>) | null,
  ): Promise<R1 | R2> {
    return this.toPromise().then(onfulfilled, onrejected);
  }

  get [Symbol.toStringTag](): "Future" { return "Future" as const; }

  #settle(result: Settled<T>): boolean {
    const callbacks = this.#callbacks;
    if (this.#result || !callbacks) return false;

    this.#result = result;
    this.#callbacks = null;

    for (const callback of callbacks) {
      try {
        callback(result);
      } catch (err) {
        // A callback must not keep the others from running; surface it to the host
        queueMicrotask(() => { throw err; });
      }
    }
    return true;
  }
}

function chain<T, R>(result: Settled<T>, fn: (value: T) => Future<R>): Future<R> {
  if (result.status === "rejected") return Future.rejected<R>(result.reason);
  try {
    return fn(result.value);
  } catch (err) {
    return Future.rejected<R>(err);
  }
}
