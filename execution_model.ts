// @filename: execution_model.ts
/**
 * Execution models decide how long a producer may keep going synchronously
 * before it has to hand control back to the scheduler.
 *
 * Running synchronously is fast, but an unbounded synchronous loop grows the
 * stack (when steps recurse) and starves everything else sharing the event
 * loop. A model caps the number of consecutive synchronous steps (a "batch");
 * once the cap is reached the producer resubmits itself as a new task.
 *
 * - {@link batched}: up to `recommendedBatchSize` synchronous steps, then a yield.
 * - {@link alwaysAsync}: every step is its own task.
 * - {@link synchronous}: never yields.
 *
 * @example
 * ```ts
 * const model = batched(1000);
 * model.recommendedBatchSize;  // 1024 (next power of two)
 * model.canContinueSync(10);   // true
 * model.canContinueSync(1024); // false
 * ```
 *
 * @module
 */

/** Batch size used by {@link defaultExecutionModel}. */
export const DEFAULT_BATCH_SIZE = 1024;

export type ExecutionModelKind = "batched" | "alwaysAsync" | "synchronous";

export interface ExecutionModel {
  readonly kind: ExecutionModelKind;

  /**
   * Consecutive synchronous steps a simple producer may take before it must
   * yield. `Infinity` for {@link synchronous}, `0` for {@link alwaysAsync}.
   */
  readonly recommendedBatchSize: number;

  /**
   * Advances a frame counter, wrapping to `0` every `recommendedBatchSize`
   * steps. A result of `0` means the next step must run asynchronously.
   */
  nextFrameIndex(current: number): number;

  /**
   * Whether another synchronous step is permitted after `batchCount`
   * consecutive ones.
   *
   * @param limit - Overrides `recommendedBatchSize` for producers that spend
   * more than one unit of the batch per step
   */
  canContinueSync(batchCount: number, limit?: number): boolean;
}

/**
 * Smallest power of two that is `>= n`, for `n >= 1`.
 */
export function nextPowerOf2(n: number): number {
  if (n <= 1) return 1;
  return 2 ** Math.ceil(Math.log2(n));
}

function assertBatchSize(size: number): void {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`batched: size must be a positive integer, got ${size}`);
  }
}

/**
 * Synchronous steps in batches of `size`, rounded up to a power of two.
 */
export function batched(size: number = DEFAULT_BATCH_SIZE): ExecutionModel {
  assertBatchSize(size);
  const recommendedBatchSize = nextPowerOf2(size);
  const modulus = recommendedBatchSize - 1;

  return {
    kind: "batched",
    recommendedBatchSize,
    nextFrameIndex: (current) => (current + 1) & modulus,
    canContinueSync: (batchCount, limit = recommendedBatchSize) => batchCount < limit,
  };
}

/**
 * Every step is scheduled as a new task, the first one included.
 */
export const alwaysAsync: ExecutionModel = Object.freeze({
  kind: "alwaysAsync",
  recommendedBatchSize: 0,
  nextFrameIndex: () => 0,
  canContinueSync: () => false,
} satisfies ExecutionModel);

/**
 * Never forces a yield. Only safe for finite producers that do not recurse.
 */
export const synchronous: ExecutionModel = Object.freeze({
  kind: "synchronous",
  recommendedBatchSize: Infinity,
  nextFrameIndex: () => 1,
  canContinueSync: (batchCount: number, limit: number = Infinity) => batchCount < limit,
} satisfies ExecutionModel);

export const defaultExecutionModel: ExecutionModel = batched(DEFAULT_BATCH_SIZE);
