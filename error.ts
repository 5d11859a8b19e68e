// @filename: error.ts
/**
 * Error context for failures that cannot travel down a stream.
 *
 * Most failures are delivered to the subscriber's `onError`. A few cannot be:
 * an error arriving after the consumer answered `Stop`, a consumer whose
 * `onNext` throws, an acknowledgment future that fails. Those end up at
 * `Scheduler.reportFailure`, and this class records where they came from.
 *
 * @module
 */

/** Where in a stream a failure happened. */
export interface FailureContext {
  /** Name of the stage that caught the failure */
  operator?: string;
  /** The element being handled, when there was one */
  value?: unknown;
  /** A hint for whoever reads the report */
  tip?: string;
}

/**
 * A failure raised inside a stream stage, with the stage name and the
 * element being handled when it happened.
 *
 * The original thrown value is kept both as `cause` and as the single entry
 * of `errors`.
 *
 * @example
 * ```ts
 * const err = ObservableError.from(new Error("boom"), { operator: "map", value: 42 });
 * String(err);
 * // ObservableError: boom
 * //   in operator: map
 * //   processing value: 42
 * ```
 */
export class ObservableError extends AggregateError {
  readonly operator?: string;
  readonly value?: unknown;
  readonly tip?: string;

  constructor(cause: unknown, message: string, context: FailureContext = {}) {
    super([cause], message, { cause });
    this.name = "ObservableError";
    this.operator = context.operator;
    this.value = context.value;
    this.tip = context.tip;
  }

  override toString(): string {
    const lines = [`${this.name}: ${this.message}`];
    if (this.operator) lines.push(`  in operator: ${this.operator}`);
    if (this.value !== undefined) lines.push(`  processing value: ${describe(this.value)}`);
    if (this.tip) lines.push(`  tip: ${this.tip}`);
    return lines.join("\n");
  }

  /**
   * Wraps any thrown value. An `ObservableError` that already names its
   * operator is returned as is; one that does not picks up `context`.
   */
  static from(error: unknown, context: FailureContext = {}): ObservableError {
    if (error instanceof ObservableError) {
      if (error.operator || !context.operator) return error;
      return new ObservableError(error.cause, error.message, {
        operator: context.operator,
        value: error.value ?? context.value,
        tip: error.tip ?? context.tip,
      });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new ObservableError(error, message, context);
  }
}

export function isObservableError(value: unknown): value is ObservableError {
  return value instanceof ObservableError;
}

// Objects are shortened so a large element does not flood the log
function describe(value: unknown): string {
  if (typeof value !== "object" || value === null) return String(value);
  try {
    return (JSON.stringify(value) ?? String(value)).slice(0, 100);
  } catch {
    return Object.prototype.toString.call(value);
  }
}
