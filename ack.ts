// @filename: ack.ts
/**
 * Helpers for chaining acknowledgments without paying for asynchrony that
 * isn't there.
 *
 * Each helper has two paths: when the answer is already known (a plain
 * `Continue` / `Stop`, or a settled {@link Future}) it acts right away on the
 * current stack; otherwise it registers a callback on the future.
 *
 * @module
 */
import type { Ack, SyncAck } from "./_protocol.ts";
import type { Scheduler, Subscriber } from "./_types.ts";

import { Continue, Stop } from "./_protocol.ts";
import { ObservableError } from "./error.ts";
import { Future } from "./future.ts";

export { Continue, Stop };

/** Narrows to an acknowledgment that needs no waiting. */
export function isSyncAck(ack: Ack): ack is SyncAck {
  return ack === Continue || ack === Stop;
}

/**
 * Runs `fn` on the acknowledgment's answer and returns its result.
 *
 * Known answers are handled synchronously. A pending future yields a new
 * future for `fn`'s result; a failed one propagates its failure untouched.
 *
 * @example
 * ```ts
 * // Send `b` only once `a` was accepted
 * const ack = syncFlatMap(out.onNext(a), answer =>
 *   answer === Continue ? out.onNext(b) : answer
 * );
 * ```
 */
export function syncFlatMap(ack: Ack, fn: (answer: SyncAck) => Ack): Ack {
  if (isSyncAck(ack)) return fn(ack);

  const settled = ack.value;
  if (settled) {
    return settled.status === "fulfilled" ? fn(settled.value) : ack;
  }

  return ack.flatMap((answer) => Future.from<SyncAck>(fn(answer)));
}

/**
 * Runs `callback` once the acknowledgment is `Continue`. Nothing happens on
 * `Stop`; a failed future is handed to `onFailure`.
 */
export function syncOnContinue(
  ack: Ack,
  callback: () => void,
  onFailure?: (error: unknown) => void
): void {
  if (ack === Continue) {
    callback();
    return;
  }
  if (ack === Stop) return;

  ack.onComplete((result) => {
    if (result.status === "rejected") onFailure?.(result.reason);
    else if (result.value === Continue) callback();
  });
}

/**
 * Runs `callback` once the acknowledgment is `Stop` or has failed.
 */
export function syncOnStopOrFailure(
  ack: Ack,
  callback: (error?: unknown) => void
): void {
  if (ack === Continue) return;
  if (ack === Stop) {
    callback();
    return;
  }

  ack.onComplete((result) => {
    if (result.status === "rejected") callback(result.reason);
    else if (result.value === Stop) callback();
  });
}

/**
 * Collapses a settled future to its plain answer so producers can stay on the
 * synchronous path. A failed future counts as `Stop` and its cause goes to
 * `scheduler.reportFailure`. Pending futures are returned as they are.
 */
export function syncTryFlatten(ack: Ack, scheduler: Scheduler): Ack {
  if (isSyncAck(ack)) return ack;

  const settled = ack.value;
  if (!settled) return ack;
  if (settled.status === "fulfilled") return settled.value;

  scheduler.reportFailure(settled.reason);
  return Stop;
}

/**
 * Sends `value` to `subscriber`, treating a throwing `onNext` as a protocol
 * violation: the error is reported to the scheduler, tagged with `operator`,
 * and the producer is told to `Stop`.
 */
export function deliver<T>(subscriber: Subscriber<T>, value: T, operator: string): Ack {
  try {
    return subscriber.onNext(value);
  } catch (err) {
    subscriber.scheduler.reportFailure(ObservableError.from(err, { operator, value }));
    return Stop;
  }
}
