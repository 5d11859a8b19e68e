// @filename: state_action.ts
/**
 * Streams built by unfolding a state through an asynchronous step.
 *
 * `fromAsyncStateAction(step, seed)` produces `a0, a1, a2, …` where
 * `step(s0)` yields `[a0, s1]`, `step(s1)` yields `[a1, s2]`, and so on. The
 * step may answer right away (a plain tuple or a settled {@link Future}) or
 * later (a pending future or a promise), and it may fail.
 *
 * The loop runs synchronously for as long as both the step and the
 * consumer's acknowledgment are already known, up to half the execution
 * model's batch size: each generated element also costs one unit of the
 * batch in the operator that receives it, so two steps share one fairness
 * quantum. Past that limit the loop resubmits itself to the scheduler
 * instead of recursing.
 *
 * @example
 * ```ts
 * // Infinite counter; take() ends it
 * const counter = fromAsyncStateAction((n: number) => [n, n + 1] as const, 0);
 * pipe(counter, take(3)).subscribe(v => console.log(v)); // 0, 1, 2
 *
 * // Asynchronous step
 * const pages = fromAsyncStateAction(async (cursor: string) => {
 *   const page = await fetchPage(cursor);
 *   return [page.items, page.next] as const;
 * }, "start");
 * ```
 *
 * @module
 */
import type { Ack } from "./_protocol.ts";
import type { Cancelable, Subscriber } from "./_types.ts";
import type { ExecutionModel } from "./execution_model.ts";

import { Continue, Stop, deliver, syncOnContinue, syncTryFlatten } from "./ack.ts";
import { createCancelable } from "./cancelable.ts";
import { Future } from "./future.ts";
import { Observable } from "./observable.ts";

/** What a step may return: now, later, or through a promise. */
export type DeferredStep<A, S> =
  | readonly [A, S]
  | Future<readonly [A, S]>
  | PromiseLike<readonly [A, S]>;

/**
 * Number of consecutive synchronous steps this generator takes before a
 * forced yield: half the model's batch, at least one; none under
 * `alwaysAsync`.
 */
export function generatorBatchLimit(model: ExecutionModel): number {
  if (model.kind === "alwaysAsync") return 0;
  return Math.max(1, model.recommendedBatchSize / 2);
}

/**
 * Unfolds `seed` through `step` into an infinite stream.
 *
 * Each subscription starts from `seed` on its own. The stream ends only when
 * the consumer answers `Stop`, cancels, or `step` fails; a failure is
 * delivered as exactly one `onError` with the original cause.
 *
 * @param step - Turns the current state into an element and the next state
 * @param seed - The initial state
 */
export function fromAsyncStateAction<S, A>(
  step: (state: S) => DeferredStep<A, S>,
  seed: S
): Observable<A> {
  return new Observable<A>((subscriber) => new StateActionLoop(step, seed, subscriber).start());
}

/**
 * One subscription's worth of generator state. Only the loop touches it, and
 * the acknowledgment protocol guarantees the loop never runs twice at once.
 */
class StateActionLoop<S, A> {
  #step: (state: S) => DeferredStep<A, S>;
  #state: S;
  #subscriber: Subscriber<A>;
  #limit: number;
  #handle: Cancelable;

  constructor(step: (state: S) => DeferredStep<A, S>, seed: S, subscriber: Subscriber<A>) {
    this.#step = step;
    this.#state = seed;
    this.#subscriber = subscriber;
    this.#limit = generatorBatchLimit(subscriber.scheduler.executionModel);
    this.#handle = createCancelable();
  }

  start(): Cancelable {
    const model = this.#subscriber.scheduler.executionModel;
    // Under alwaysAsync not even the first step runs on the caller's stack
    if (model.canContinueSync(0, this.#limit)) this.#run();
    else this.#resubmit();
    return this.#handle;
  }

  /**
   * Runs one batch on the current stack. A batch starts at zero on every
   * fresh task and always takes at least one step.
   */
  #run(): void {
    const scheduler = this.#subscriber.scheduler;
    const model = scheduler.executionModel;
    let batchCount = 0;

    while (!this.#handle.isCanceled) {
      let result: Future<readonly [A, S]>;
      try {
        result = Future.from<readonly [A, S]>(this.#step(this.#state));
      } catch (err) {
        this.#fail(err);
        return;
      }

      const settled = result.value;
      if (!settled) {
        result.onComplete((outcome) => {
          if (this.#handle.isCanceled) return;
          if (outcome.status === "rejected") {
            this.#fail(outcome.reason);
            return;
          }
          this.#continueAfter(this.#emit(outcome.value));
        });
        return;
      }

      if (settled.status === "rejected") {
        this.#fail(settled.reason);
        return;
      }

      const ack = syncTryFlatten(this.#emit(settled.value), scheduler);
      if (ack === Stop) return;
      if (ack !== Continue) {
        this.#continueAfter(ack);
        return;
      }

      batchCount++;
      if (!model.canContinueSync(batchCount, this.#limit)) {
        this.#resubmit();
        return;
      }
    }
  }

  /** Sends the element and advances the state. */
  #emit([value, next]: readonly [A, S]): Ack {
    this.#state = next;
    return deliver(this.#subscriber, value, "fromAsyncStateAction");
  }

  /** Resumes on a fresh task once `ack` turns out to be `Continue`. */
  #continueAfter(ack: Ack): void {
    const scheduler = this.#subscriber.scheduler;
    syncOnContinue(ack, () => this.#resubmit(), (err) => scheduler.reportFailure(err));
  }

  #resubmit(): void {
    if (this.#handle.isCanceled) return;
    this.#subscriber.scheduler.execute(() => this.#run());
  }

  #fail(error: unknown): void {
    if (this.#handle.isCanceled) return;
    this.#subscriber.onError(error);
  }
}
