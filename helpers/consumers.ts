/**
 * Turning a stream back into a promise.
 *
 * @module
 */
import type { SubscribeOptions } from "../_types.ts";
import type { Observable } from "../observable.ts";

import { Stop } from "../ack.ts";

/**
 * Collects every element into an array, resolved once the stream completes.
 *
 * Rejects with the stream's error. With `options.signal`, aborting rejects
 * with the signal's reason and cancels the subscription.
 *
 * @example
 * ```ts
 * await toArray(pipe(Observable.of(1, 2), intersperse(0))); // [1, 0, 2]
 * ```
 */
export function toArray<T>(source: Observable<T>, options: SubscribeOptions = {}): Promise<T[]> {
  return new Promise<T[]>((resolve, reject) => {
    const { signal } = options;
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const values: T[] = [];
    const onAbort = () => reject(signal?.reason);
    signal?.addEventListener("abort", onAbort, { once: true });

    source.subscribe({
      next(value) { values.push(value); },
      error(err) {
        signal?.removeEventListener("abort", onAbort);
        reject(err);
      },
      complete() {
        signal?.removeEventListener("abort", onAbort);
        resolve(values);
      },
    }, options);
  });
}

/**
 * Resolves with the first element, or `undefined` if the stream completes
 * empty. The source is told to `Stop` after that first element.
 *
 * @example
 * ```ts
 * await firstValueFrom(fromAsyncStateAction((n: number) => [n, n + 1] as const, 7)); // 7
 * ```
 */
export function firstValueFrom<T>(source: Observable<T>, options: SubscribeOptions = {}): Promise<T | undefined> {
  return new Promise<T | undefined>((resolve, reject) => {
    const { signal } = options;
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => reject(signal?.reason);
    signal?.addEventListener("abort", onAbort, { once: true });
    const settle = () => signal?.removeEventListener("abort", onAbort);

    source.subscribe({
      next(value) {
        settle();
        resolve(value);
        return Stop;
      },
      error(err) {
        settle();
        reject(err);
      },
      complete() {
        settle();
        resolve(undefined);
      },
    }, options);
  });
}
