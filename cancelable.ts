// @filename: cancelable.ts
import type { Cancelable, RawCancelable } from "./_types.ts";
import { Symbol } from "./symbol.ts";

/**
 * Internal state behind a {@link Cancelable}.
 */
interface CancelState {
  /** True once `cancel()` has run */
  canceled: boolean;

  /** Teardown to run on the first cancel; nulled afterwards */
  onCancel: (() => void) | null;

  /** Detaches the AbortSignal listener, when one was attached */
  removeAbortHandler: (() => void) | null;
}

/**
 * Creates an idempotent cancelation handle.
 *
 * The first `cancel()` marks the handle and runs `onCancel`; later calls are
 * no-ops. If `onCancel` throws, the error is rethrown on a microtask so that
 * `cancel()` itself never throws.
 *
 * @param onCancel - Teardown, typically "cancel the upstream"
 * @param opts.signal - Aborting it cancels the handle
 *
 * @example
 * ```ts
 * const upstream = source.unsafeSubscribe(subscriber);
 * const handle = createCancelable(() => upstream.cancel());
 *
 * handle.cancel();
 * handle.cancel(); // no-op
 * handle.isCanceled; // true
 * ```
 */
export function createCancelable(
  onCancel?: (() => void) | null,
  opts?: { signal?: AbortSignal } | null
): Cancelable {
  const state: CancelState = {
    canceled: false,
    onCancel: onCancel ?? null,
    removeAbortHandler: null,
  };

  const cancelable: Cancelable = {
    get [Symbol.toStringTag](): "Cancelable" { return "Cancelable" as const; },
    get isCanceled() { return state.canceled; },
    cancel(): void { cancelOnce(state); },
    [Symbol.dispose]() { cancelOnce(state); },
  };

  const signal = opts?.signal;
  if (signal) {
    if (signal.aborted) {
      cancelOnce(state);
    } else {
      const abortHandler = () => cancelOnce(state);
      signal.addEventListener("abort", abortHandler, { once: true });
      state.removeAbortHandler = () => signal.removeEventListener("abort", abortHandler);
    }
  }

  return cancelable;
}

function cancelOnce(state: CancelState): void {
  if (state.canceled) return;
  state.canceled = true;

  const onCancel = state.onCancel;
  const removeAbortHandler = state.removeAbortHandler;
  state.onCancel = null;
  state.removeAbortHandler = null;

  removeAbortHandler?.();

  try {
    onCancel?.();
  } catch (err) {
    queueMicrotask(() => { throw err; });
  }
}

/**
 * A handle with nothing to cancel, for sources that finish synchronously.
 */
export const emptyCancelable: Cancelable = Object.freeze({
  get [Symbol.toStringTag](): "Cancelable" { return "Cancelable" as const; },
  get isCanceled() { return false; },
  cancel(): void {},
  [Symbol.dispose](): void {},
});

/**
 * A handle whose target is set after it has been handed out.
 *
 * Sources that start producing before `unsafeSubscribe` returns (every
 * synchronous loop does) need to give their subscriber a way to cancel
 * before the real upstream handle exists. Cancelling before `set()` makes
 * the later `set()` cancel its argument immediately.
 */
export interface AssignableCancelable extends Cancelable {
  set(target: RawCancelable): void;
}

export function createAssignableCancelable(
  opts?: { signal?: AbortSignal } | null
): AssignableCancelable {
  let target: RawCancelable | null = null;
  const handle = createCancelable(() => {
    const current = target;
    target = null;
    current?.cancel();
  }, opts);

  return {
    get [Symbol.toStringTag](): "Cancelable" { return "Cancelable" as const; },
    get isCanceled() { return handle.isCanceled; },
    cancel(): void { handle.cancel(); },
    [Symbol.dispose]() { handle.cancel(); },
    set(next) {
      if (handle.isCanceled) {
        next.cancel();
        return;
      }
      target = next;
    },
  };
}
