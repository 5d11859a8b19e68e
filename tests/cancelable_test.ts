import { test, expect, vi } from "vitest";

import { createAssignableCancelable, createCancelable, emptyCancelable } from "../cancelable.ts";
import { Symbol } from "../symbol.ts";

test("cancel runs the teardown once", () => {
  const onCancel = vi.fn();
  const handle = createCancelable(onCancel);

  expect(handle.isCanceled).toBe(false);
  handle.cancel();
  handle.cancel();

  expect(handle.isCanceled).toBe(true);
  expect(onCancel).toHaveBeenCalledTimes(1);
});

test("dispose is the same as cancel", () => {
  const onCancel = vi.fn();
  const handle = createCancelable(onCancel);

  handle[Symbol.dispose]();
  handle.cancel();

  expect(onCancel).toHaveBeenCalledTimes(1);
  expect(String(handle)).toBe("[object Cancelable]");
});

test("aborting the signal cancels the handle", () => {
  const controller = new AbortController();
  const onCancel = vi.fn();
  const handle = createCancelable(onCancel, { signal: controller.signal });

  controller.abort();

  expect(handle.isCanceled).toBe(true);
  expect(onCancel).toHaveBeenCalledTimes(1);
});

test("an already aborted signal cancels at creation", () => {
  const controller = new AbortController();
  controller.abort();
  const onCancel = vi.fn();

  const handle = createCancelable(onCancel, { signal: controller.signal });

  expect(handle.isCanceled).toBe(true);
  expect(onCancel).toHaveBeenCalledTimes(1);
});

test("emptyCancelable is inert", () => {
  emptyCancelable.cancel();
  expect(emptyCancelable.isCanceled).toBe(false);
});

test("an assignable handle forwards to its target", () => {
  const handle = createAssignableCancelable();
  const target = createCancelable();

  handle.set(target);
  handle.cancel();

  expect(target.isCanceled).toBe(true);
});

test("setting a target after cancel cancels it immediately", () => {
  const handle = createAssignableCancelable();
  handle.cancel();

  const target = createCancelable();
  handle.set(target);

  expect(target.isCanceled).toBe(true);
});
