// @filename: _protocol.ts
/**
 * The minimal back-pressure protocol every stage of a stream speaks.
 *
 * A producer hands one element at a time to `onNext` and receives an
 * acknowledgment back. It may not send the next element until that
 * acknowledgment has resolved to `Continue`. After `Stop` it sends nothing
 * more, terminal signals included.
 *
 * ```
 * producer ── onNext(a) ──▶ consumer
 * producer ◀── Continue ─── consumer   (now, or later through a Future)
 * producer ── onNext(b) ──▶ consumer
 * producer ◀──── Stop ───── consumer   (subscription over)
 * ```
 *
 * Terminal signals (`onComplete` / `onError`) are sent at most once, never
 * both, and only after the last acknowledgment has resolved.
 *
 * @module
 */
import type { Future } from "./future.ts";

/** Keep sending. */
export const Continue = "Continue" as const;
/** Stop sending; terminal for the subscription. */
export const Stop = "Stop" as const;

/** An acknowledgment whose answer is already known. */
export type SyncAck = typeof Continue | typeof Stop;

/** An acknowledgment, possibly not known yet. */
export type Ack = SyncAck | Future<SyncAck>;

/**
 * Consumer side of the protocol.
 *
 * @typeParam T - Type of elements received.
 */
export interface RawObserver<T> {
  /**
   * Receives one element. The returned acknowledgment must resolve before
   * the producer calls any method again.
   */
  onNext(value: T): Ack;

  /** Terminal failure. Called at most once, never together with `onComplete`. */
  onError(error: unknown): void;

  /** Terminal success. Called at most once, never together with `onError`. */
  onComplete(): void;
}

/**
 * Idempotent "stop the upstream" token returned by every subscription.
 */
export interface RawCancelable {
  cancel(): void;
}

/**
 * Source side of the protocol.
 */
export interface RawObservable<T, S extends RawObserver<T> = RawObserver<T>> {
  unsafeSubscribe(subscriber: S): RawCancelable;
}
