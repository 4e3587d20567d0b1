/**
 * Error types for heap operations
 *
 * Invariants:
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - All errors support a `cause` property for wrapping underlying errors
 * - Precondition errors are thrown before a heap touches its arrays or index;
 *   an exception escaping a comparer leaves the heap in an unspecified state
 */

/**
 * Base class for all prioset errors
 */
export abstract class PriorityQueueError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when peeking at or extracting from an empty heap
 */
export class EmptyContainerError extends PriorityQueueError {
  readonly code = "E_EMPTY";

  constructor(
    public readonly operation: string,
    options?: ErrorOptions
  ) {
    super(`Cannot ${operation}: the heap is empty`, options);
  }
}

/**
 * Thrown when an indexed heap is asked to track an element it already holds
 */
export class DuplicateElementError extends PriorityQueueError {
  readonly code = "E_DUPLICATE";

  constructor(
    public readonly key: unknown,
    options?: ErrorOptions
  ) {
    super(`Element is already tracked by the heap: ${describeKey(key)}`, options);
  }
}

/**
 * Thrown by an iterator that observes a mutation of its heap
 */
export class ConcurrentModificationError extends PriorityQueueError {
  readonly code = "E_CONCURRENT_MODIFICATION";

  constructor(options?: ErrorOptions) {
    super("Heap was modified during iteration", options);
  }
}

/**
 * Thrown when heap construction options fail validation
 */
export class InvalidOptionError extends PriorityQueueError {
  readonly code = "E_INVALID_OPTION";

  constructor(
    public readonly option: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid heap option "${option}": ${reason}`, options);
  }
}

/**
 * Thrown by validate() when the heap property or the position index is broken
 */
export class HeapInvariantError extends PriorityQueueError {
  readonly code = "E_HEAP_INVARIANT";

  constructor(detail: string, options?: ErrorOptions) {
    super(`Heap invariant violated: ${detail}`, options);
  }
}

/**
 * Thrown by the default comparer for priorities it has no ordering for
 */
export class UncomparablePriorityError extends PriorityQueueError {
  readonly code = "E_UNCOMPARABLE";

  constructor(
    public readonly left: unknown,
    public readonly right: unknown,
    options?: ErrorOptions
  ) {
    super(
      `Cannot compare priorities of type ${typeName(left)} and ${typeName(right)}; pass a comparer option`,
      options
    );
  }
}

function typeName(value: unknown): string {
  if (value === null) return "null";
  if (value instanceof Date) return "Date";
  return typeof value;
}

/**
 * Render a key for an error message, keeping long values short
 */
export function describeKey(key: unknown): string {
  let text: string;
  if (typeof key === "string") {
    text = JSON.stringify(key);
  } else if (typeof key === "bigint") {
    text = `${key}n`;
  } else if (typeof key === "object" && key !== null) {
    let json: string | undefined;
    try {
      json = JSON.stringify(key);
    } catch {
      json = undefined;
    }
    // undefined when toJSON() returns undefined
    text = json ?? Object.prototype.toString.call(key);
  } else {
    text = String(key);
  }
  return text.length > 80 ? `${text.slice(0, 77)}...` : text;
}
