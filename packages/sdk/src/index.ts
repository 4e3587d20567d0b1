/**
 * prioset SDK
 *
 * Array-backed d-ary min-heaps with optional decrease-key and arbitrary removal
 */

// Re-export types
export type {
  Comparer,
  HeapEntry,
  HeapOptions,
  IndexedHeapOptions,
  ResolvedHeapOptions,
  PriorityQueueView,
  SlotListener,
} from "./types.js";

// Heaps
export { HeapStore, DEFAULT_CAPACITY } from "./heap-store.js";
export { IndexedHeap } from "./indexed-heap.js";

// Comparers
export type { CountingComparer } from "./comparers.js";
export { defaultComparer, reverseComparer, countingComparer } from "./comparers.js";

// Options
export {
  resolveHeapOptions,
  HeapOptionsSchema,
  DEFAULT_ARITY,
  MAX_ARITY,
  MAX_CAPACITY,
} from "./validation.js";

// Logging
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { logger } from "./observability/logs.js";

// Re-export errors
export {
  PriorityQueueError,
  EmptyContainerError,
  DuplicateElementError,
  ConcurrentModificationError,
  InvalidOptionError,
  HeapInvariantError,
  UncomparablePriorityError,
} from "./errors.js";
