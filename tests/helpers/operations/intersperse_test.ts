import type { Ack, SyncAck } from "../../../_protocol.ts";
import type { Scheduler, Subscriber } from "../../../_types.ts";
import { test, expect } from "vitest";

import { Continue, Stop } from "../../../ack.ts";
import { createCancelable } from "../../../cancelable.ts";
import { ObservableError } from "../../../error.ts";
import { alwaysAsync, batched } from "../../../execution_model.ts";
import { Future } from "../../../future.ts";
import { Observable, empty, raiseError } from "../../../observable.ts";
import { take } from "../../../helpers/operations/core.ts";
import { intersperse, intersperseWith } from "../../../helpers/operations/intersperse.ts";
import { toArray } from "../../../helpers/consumers.ts";
import { pipe } from "../../../helpers/pipe.ts";
import { fromAsyncStateAction } from "../../../state_action.ts";
import { TestScheduler } from "../../../test_scheduler.ts";

/**
 * A raw subscriber that records every signal as a string and answers each
 * element with whatever `respond` returns.
 */
function recorder<T>(scheduler: Scheduler, respond: (value: T) => Ack = () => Continue) {
  const events: string[] = [];
  const subscriber: Subscriber<T> = {
    scheduler,
    onNext(value) {
      events.push(String(value));
      return respond(value);
    },
    onError(error) {
      events.push(`error:${error instanceof Error ? error.message : String(error)}`);
    },
    onComplete() {
      events.push("complete");
    },
  };
  return { events, subscriber };
}

/**
 * A recorder whose acknowledgments stay pending until the test resolves them.
 */
function manualRecorder<T>(scheduler: Scheduler) {
  const acks: Array<(ack: SyncAck) => void> = [];
  const { events, subscriber } = recorder<T>(scheduler, () => {
    const { future, resolve } = Future.defer<SyncAck>();
    acks.push(resolve);
    return future;
  });
  return { events, subscriber, acks };
}

// -----------------------------------------------------------------------------
// Markers
// -----------------------------------------------------------------------------

test("start, separators and end surround the elements", async () => {
  const result = await toArray(
    pipe(Observable.of("x", "y", "z"), intersperse<string, string>("S0", "SEP", "E0"))
  );
  expect(result).toEqual(["S0", "x", "SEP", "y", "SEP", "z", "E0"]);
});

test("a lone separator goes only between elements", async () => {
  const result = await toArray(pipe(Observable.of(1, 2, 3), intersperse(0)));
  expect(result).toEqual([1, 0, 2, 0, 3]);
});

test("a single element gets start and end but no separator", () => {
  const scheduler = new TestScheduler();
  const { events, subscriber } = recorder<string>(scheduler);

  intersperse<string, string>("[", ",", "]")(Observable.of("only")).unsafeSubscribe(subscriber);

  expect(events).toEqual(["[", "only", "]", "complete"]);
});

test("an empty source emits no markers", () => {
  const scheduler = new TestScheduler();
  const { events, subscriber } = recorder<string>(scheduler);

  intersperse<string, string>("[", ",", "]")(empty<string>()).unsafeSubscribe(subscriber);

  expect(events).toEqual(["complete"]);
});

test("an immediate error is forwarded without markers", () => {
  const scheduler = new TestScheduler();
  const { events, subscriber } = recorder<string>(scheduler);

  intersperse<string, string>("[", ",", "]")(raiseError<string>(new Error("boom"))).unsafeSubscribe(subscriber);

  expect(events).toEqual(["error:boom"]);
});

test("separator count is one less than the element count", async () => {
  for (let n = 0; n <= 5; n++) {
    const items = Array.from({ length: n }, (_, i) => `v${i}`);
    const result = await toArray(pipe(Observable.from(items), intersperse<string, string>("S", "|", "E")));

    expect(result.filter((v) => v === "|")).toHaveLength(Math.max(0, n - 1));
    expect(result.filter((v) => v === "S")).toHaveLength(n >= 1 ? 1 : 0);
    expect(result.filter((v) => v === "E")).toHaveLength(n >= 1 ? 1 : 0);
  }
});

test("intersperseWith skips markers that are left out", async () => {
  const withStart = await toArray(pipe(Observable.of(1, 2), intersperseWith<number, string>({ start: "[", separator: "," })));
  const withEnd = await toArray(pipe(Observable.of(1, 2), intersperseWith<number, string>({ separator: ",", end: "]" })));

  expect(withStart).toEqual(["[", 1, ",", 2]);
  expect(withEnd).toEqual([1, ",", 2, "]"]);
});

// -----------------------------------------------------------------------------
// Back-pressure
// -----------------------------------------------------------------------------

test("Stop on the separator keeps the next element from being sent", () => {
  const scheduler = new TestScheduler();
  const { events, subscriber } = recorder<string>(scheduler, (v) => (v === "SEP" ? Stop : Continue));

  intersperse("SEP")(Observable.of("x", "y", "z")).unsafeSubscribe(subscriber);

  expect(events).toEqual(["x", "SEP"]);
  expect(scheduler.pendingTasks).toBe(0);
});

test("Stop on the start marker keeps the first element from being sent", () => {
  const scheduler = new TestScheduler();
  const { events, subscriber } = recorder<string>(scheduler, () => Stop);

  intersperse<string, string>("S", "|", "E")(Observable.of("x")).unsafeSubscribe(subscriber);

  expect(events).toEqual(["S"]);
});

test("each element waits for its marker to be acknowledged", () => {
  const scheduler = new TestScheduler();
  const { events, subscriber, acks } = manualRecorder<string>(scheduler);

  intersperse<string, string>("S", "|", "E")(Observable.of("a", "b")).unsafeSubscribe(subscriber);
  expect(events).toEqual(["S"]);

  acks[0](Continue);
  expect(events).toEqual(["S", "a"]);
  // The upstream hears back only once both sends are accepted
  expect(scheduler.pendingTasks).toBe(0);

  acks[1](Continue);
  expect(scheduler.pendingTasks).toBe(1);

  scheduler.tickOne();
  expect(events).toEqual(["S", "a", "|"]);

  acks[2](Continue);
  expect(events).toEqual(["S", "a", "|", "b"]);

  acks[3](Continue);
  scheduler.tickOne();
  // The end marker is acknowledged before completion goes out
  expect(events).toEqual(["S", "a", "|", "b", "E"]);

  acks[4](Continue);
  expect(events).toEqual(["S", "a", "|", "b", "E", "complete"]);
});

test("a pending marker answered with Stop ends the chain", () => {
  const scheduler = new TestScheduler();
  const { events, subscriber, acks } = manualRecorder<string>(scheduler);

  intersperse<string, string>("S", "|", "E")(Observable.of("a", "b")).unsafeSubscribe(subscriber);
  acks[0](Stop);

  expect(scheduler.tick()).toBe(0);
  expect(events).toEqual(["S"]);
});

// -----------------------------------------------------------------------------
// Terminal signals
// -----------------------------------------------------------------------------

test("an error waits for the outstanding acknowledgment", () => {
  const scheduler = new TestScheduler();
  const { events, subscriber, acks } = manualRecorder<string>(scheduler);

  // This source does not wait for the acknowledgment before failing
  const source = new Observable<string>((sub) => {
    sub.onNext("a");
    sub.onError(new Error("late failure"));
    return createCancelable();
  });

  intersperse<string, string>("S", "|", "E")(source).unsafeSubscribe(subscriber);
  expect(events).toEqual(["S"]);

  acks[0](Continue);
  expect(events).toEqual(["S", "a"]);

  acks[1](Continue);
  expect(events).toEqual(["S", "a", "error:late failure"]);
});

test("completion waits for the outstanding acknowledgment", () => {
  const scheduler = new TestScheduler();
  const { events, subscriber, acks } = manualRecorder<string>(scheduler);

  const source = new Observable<string>((sub) => {
    sub.onNext("a");
    sub.onComplete();
    return createCancelable();
  });

  intersperse("|")(source).unsafeSubscribe(subscriber);
  expect(events).toEqual(["a"]);

  acks[0](Continue);
  expect(events).toEqual(["a", "complete"]);
});

test("an error after Stop is not forwarded but reported", () => {
  const scheduler = new TestScheduler();
  const { events, subscriber } = recorder<string>(scheduler, () => Stop);
  const boom = new Error("after stop");

  const source = new Observable<string>((sub) => {
    sub.onNext("a");
    sub.onError(boom);
    return createCancelable();
  });

  intersperse("|")(source).unsafeSubscribe(subscriber);

  expect(events).toEqual(["a"]);
  expect(scheduler.failures).toHaveLength(1);

  const failure = scheduler.failures[0];
  expect(failure).toBeInstanceOf(ObservableError);
  if (failure instanceof ObservableError) {
    expect(failure.operator).toBe("intersperse");
    expect(failure.cause).toBe(boom);
  }
});

test("completion after Stop sends nothing", () => {
  const scheduler = new TestScheduler();
  const { events, subscriber } = recorder<string>(scheduler, () => Stop);

  const source = new Observable<string>((sub) => {
    sub.onNext("a");
    sub.onComplete();
    return createCancelable();
  });

  intersperse<string, string>("S", "|", "E")(source).unsafeSubscribe(subscriber);

  expect(events).toEqual(["S"]);
});

// -----------------------------------------------------------------------------
// Cancellation
// -----------------------------------------------------------------------------

test("cancel reaches the upstream once", () => {
  const scheduler = new TestScheduler();
  const { subscriber } = recorder<string>(scheduler);
  let cancels = 0;

  const source = new Observable<string>(() => createCancelable(() => { cancels++; }));
  const handle = intersperse("|")(source).unsafeSubscribe(subscriber);

  handle.cancel();
  handle.cancel();

  expect(handle.isCanceled).toBe(true);
  expect(cancels).toBe(1);
});

test("cancel does not wait for an outstanding acknowledgment", () => {
  const scheduler = new TestScheduler();
  const { events, subscriber, acks } = manualRecorder<string>(scheduler);

  const handle = intersperse("|")(Observable.of("a", "b")).unsafeSubscribe(subscriber);
  expect(events).toEqual(["a"]);

  handle.cancel();
  expect(handle.isCanceled).toBe(true);

  // The upstream resumes on a task, finds itself cancelled and stops
  acks[0](Continue);
  scheduler.tick();
  expect(events).toEqual(["a"]);
});

test("cancelling while the end marker is pending suppresses completion", () => {
  const scheduler = new TestScheduler();
  const events: string[] = [];
  const acks: Array<(ack: SyncAck) => void> = [];

  const handle = pipe(Observable.of(1), intersperse<number, string>("[", ",", "]")).subscribe({
    next: (v) => {
      events.push(`next:${v}`);
      if (v !== "]") return Continue;
      const { future, resolve } = Future.defer<SyncAck>();
      acks.push(resolve);
      return future;
    },
    complete: () => { events.push("complete"); },
  }, { scheduler });

  expect(events).toEqual(["next:[", "next:1", "next:]"]);

  handle.cancel();
  acks[0](Continue);
  scheduler.tick();

  expect(events).toEqual(["next:[", "next:1", "next:]"]);
  expect(scheduler.failures).toEqual([]);
});

// -----------------------------------------------------------------------------
// Scheduling
// -----------------------------------------------------------------------------

test("markers keep their order across forced yields of a generator", () => {
  const scheduler = new TestScheduler({ executionModel: batched(8) });
  const { events, subscriber } = recorder<number | string>(scheduler);

  const source = pipe(
    fromAsyncStateAction((n: number) => [n, n + 1] as const, 0),
    take(6),
    intersperse<number, string>("[", ",", "]")
  );
  source.unsafeSubscribe(subscriber);

  // Half of a batch of 8 runs before the first yield
  expect(events).toEqual(["[", "0", ",", "1", ",", "2", ",", "3"]);
  expect(scheduler.pendingTasks).toBe(1);

  scheduler.tickOne();
  expect(events).toEqual(["[", "0", ",", "1", ",", "2", ",", "3", ",", "4", ",", "5", "]", "complete"]);
  expect(scheduler.pendingTasks).toBe(0);
});

test("a generator under alwaysAsync sends each element with its marker on its own task", () => {
  const scheduler = new TestScheduler({ executionModel: alwaysAsync });
  const { events, subscriber } = recorder<number | string>(scheduler);

  const source = pipe(
    fromAsyncStateAction((n: number) => [n, n + 1] as const, 0),
    take(3),
    intersperse<number, string>("[", ",", "]")
  );
  source.unsafeSubscribe(subscriber);
  expect(events).toEqual([]);

  scheduler.tickOne();
  expect(events).toEqual(["[", "0"]);

  scheduler.tickOne();
  expect(events).toEqual(["[", "0", ",", "1"]);

  scheduler.tickOne();
  expect(events).toEqual(["[", "0", ",", "1", ",", "2", "]", "complete"]);
  expect(scheduler.pendingTasks).toBe(0);
});

test("an iterable under alwaysAsync is interspersed one element per task", () => {
  const scheduler = new TestScheduler({ executionModel: alwaysAsync });
  const { events, subscriber } = recorder<number | string>(scheduler);

  pipe(Observable.of(1, 2, 3), intersperse<number, string>("[", ",", "]")).unsafeSubscribe(subscriber);
  expect(events).toEqual([]);

  scheduler.tickOne();
  expect(events).toEqual(["[", "1"]);

  scheduler.tickOne();
  scheduler.tickOne();
  expect(events).toEqual(["[", "1", ",", "2", ",", "3"]);

  // The last task finds the iterator exhausted
  expect(scheduler.tick()).toBe(1);
  expect(events).toEqual(["[", "1", ",", "2", ",", "3", "]", "complete"]);
});
