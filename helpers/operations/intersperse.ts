/**
 * Inserting markers between the elements of a stream.
 *
 * `intersperse` is the stream version of `Array.prototype.join`: a separator
 * goes between every two elements, and optionally a start marker goes before
 * the first one and an end marker after the last.
 *
 * ```
 * source:  ──x──────y──────z──|
 * result:  ──S0─x───SEP─y──SEP─z──E0──|
 * ```
 *
 * Markers are real elements: each one waits for the downstream to accept the
 * previous send, and the upstream only gets its answer once both the marker
 * and its element went through. A stream that never emits gets no markers at
 * all, only its terminal signal.
 *
 * @module
 */
import type { Ack } from "../../_protocol.ts";
import type { Operator } from "../_types.ts";

import { Continue, syncFlatMap, syncOnContinue, syncOnStopOrFailure } from "../../ack.ts";
import { ObservableError } from "../../error.ts";
import { createStatefulOperator } from "../operators.ts";

/**
 * Markers for {@link intersperseWith}. A `start` or `end` that is left out
 * (or `undefined`) is not emitted.
 */
export interface IntersperseOptions<T> {
  /** Emitted before the first element */
  start?: T;
  /** Emitted between every two elements */
  separator: T;
  /** Emitted after the last element, once the source completes */
  end?: T;
}

type Marker<T> = { present: true; value: T } | { present: false };

interface IntersperseState {
  /** Whether an element has been seen; decides between start and separator. */
  atLeastOne: boolean;
  /** The last acknowledgment handed back upstream. */
  downstreamAck: Ack;
}

/**
 * Puts `separator` between every two elements.
 *
 * @example
 * ```ts
 * pipe(Observable.of("a", "b", "c"), intersperse(","));
 * // "a", ",", "b", ",", "c"
 * ```
 */
export function intersperse<T>(separator: T): Operator<T, T>;

/**
 * Puts `separator` between every two elements, `start` before the first one
 * and `end` after the last.
 *
 * @example
 * ```ts
 * pipe(Observable.of(1, 2), intersperse("[", ",", "]"));
 * // "[", 1, ",", 2, "]"
 * ```
 */
export function intersperse<T, M>(start: M, separator: M, end: M): Operator<T, T | M>;

export function intersperse<T, M>(...markers: [M] | [M, M, M]): Operator<T, T | M> {
  if (markers.length === 1) {
    return intersperseMarkers<T, M>(absent(), { present: true, value: markers[0] }, absent());
  }

  const [start, separator, end] = markers;
  return intersperseMarkers<T, M>(
    { present: true, value: start },
    { present: true, value: separator },
    { present: true, value: end }
  );
}

/**
 * Like {@link intersperse}, with each marker named so `start` and `end` can be
 * given independently.
 *
 * @example
 * ```ts
 * // A header line, but no trailer
 * pipe(rows, intersperseWith({ start: "id,name", separator: "\n" }));
 * ```
 */
export function intersperseWith<T, M>(options: IntersperseOptions<M>): Operator<T, T | M> {
  return intersperseMarkers<T, M>(
    options.start !== undefined ? { present: true, value: options.start } : absent(),
    { present: true, value: options.separator },
    options.end !== undefined ? { present: true, value: options.end } : absent()
  );
}

function absent<T>(): Marker<T> {
  return { present: false };
}

function intersperseMarkers<T, M>(
  start: Marker<M>,
  separator: Marker<M>,
  end: Marker<M>
): Operator<T, T | M> {
  return createStatefulOperator<T, T | M, IntersperseState>({
    name: "intersperse",
    createState: () => ({ atLeastOne: false, downstreamAck: Continue }),

    next(value, state, out) {
      let marker: Marker<M> = separator;
      if (!state.atLeastOne) {
        state.atLeastOne = true;
        marker = start;
      }

      const first: Ack = marker.present ? out.onNext(marker.value) : Continue;
      state.downstreamAck = syncFlatMap(first, (answer) =>
        answer === Continue ? out.onNext(value) : answer
      );
      return state.downstreamAck;
    },

    error(err, state, out) {
      const ack = state.downstreamAck;
      syncOnContinue(ack, () => out.onError(err));

      // The downstream said Stop, so the error has nowhere to go
      syncOnStopOrFailure(ack, () => {
        out.scheduler.reportFailure(ObservableError.from(err, { operator: "intersperse" }));
      });
    },

    complete(state, out) {
      syncOnContinue(state.downstreamAck, () => {
        if (state.atLeastOne && end.present) {
          syncOnContinue(out.onNext(end.value), () => out.onComplete());
        } else {
          out.onComplete();
        }
      });
    },
  });
}
