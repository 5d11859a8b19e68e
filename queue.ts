/**
 * A small FIFO work queue backed by a circular buffer.
 *
 * Schedulers resubmit producer loops through this queue instead of recursing,
 * so it has to take any number of tasks: when the ring is full it doubles its
 * capacity, keeping `enqueue` and `dequeue` O(1) amortised.
 *
 * @example
 * ```ts
 * import { createQueue, enqueue, dequeue, getSize } from "./queue.ts";
 *
 * const tasks = createQueue<() => void>(4);
 * enqueue(tasks, () => console.log("first"));
 * enqueue(tasks, () => console.log("second"));
 *
 * dequeue(tasks)?.(); // "first"
 * getSize(tasks);     // 1
 * ```
 *
 * @module
 */

///////////////////////
// Core Data Types   //
///////////////////////

/**
 * Circular buffer state.
 *
 * @template T - The type of elements stored in the queue
 */
export interface Queue<T> {
  /** Backing storage; empty slots hold `undefined` */
  items: (T | undefined)[];
  /** Index of the front element (next to dequeue) */
  head: number;
  /** Index where the next element will be written */
  tail: number;
  /** Current number of elements */
  size: number;
  /** Current length of the backing storage */
  capacity: number;
}

////////////////////////////
// Factory & Core Setup   //
////////////////////////////

/**
 * Creates an empty queue.
 *
 * @param capacity - Initial slots; the queue grows past this when needed (default: 16)
 */
export function createQueue<T>(capacity: number = 16): Queue<T> {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
  }

  return {
    items: new Array<T | undefined>(capacity).fill(undefined),
    head: 0,
    tail: 0,
    size: 0,
    capacity
  };
}

///////////////////////////
// Core Queue Operations //
///////////////////////////

/**
 * Adds an element to the back of the queue, growing the buffer when full.
 */
export function enqueue<T>(queue: Queue<T>, item: T): void {
  if (queue.size === queue.capacity) grow(queue);

  queue.items[queue.tail] = item;
  queue.tail = (queue.tail + 1) % queue.capacity;
  queue.size++;
}

/**
 * Removes and returns the front element, or `undefined` when empty.
 */
export function dequeue<T>(queue: Queue<T>): T | undefined {
  if (isEmpty(queue)) return undefined;

  const item = queue.items[queue.head];
  queue.items[queue.head] = undefined; // release for GC
  queue.head = (queue.head + 1) % queue.capacity;
  queue.size--;

  return item;
}

////////////////////////////////
// Utility & Status Functions //
////////////////////////////////

export function isEmpty<T>(queue: Queue<T>): boolean {
  return queue.size === 0;
}

export function getSize<T>(queue: Queue<T>): number {
  return queue.size;
}

/**
 * Doubles the backing storage, unrolling the ring so that `head` is 0.
 */
function grow<T>(queue: Queue<T>): void {
  const next = new Array<T | undefined>(queue.capacity * 2).fill(undefined);
  for (let i = 0; i < queue.size; i++) {
    next[i] = queue.items[(queue.head + i) % queue.capacity];
  }

  queue.items = next;
  queue.head = 0;
  queue.tail = queue.size;
  queue.capacity = next.length;
}
