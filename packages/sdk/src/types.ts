/**
 * Core types for prioset heaps
 */

/**
 * Ordering function for priorities, with Array.prototype.sort semantics:
 * negative when `a` ranks before `b`, positive when after, zero when tied.
 */
export type Comparer<T> = (a: T, b: T) => number;

/**
 * An element together with the priority it is queued under
 */
export interface HeapEntry<TElement, TPriority> {
  element: TElement;
  priority: TPriority;
}

/**
 * Called whenever a heap writes an element into a slot.
 * Sift steps report every relocation, so a listener can maintain an
 * element-to-slot index without the heap knowing about identity.
 */
export type SlotListener<TElement> = (element: TElement, index: number) => void;

/**
 * Construction options shared by all heap variants
 */
export interface HeapOptions<TPriority> {
  /** Number of slots to allocate up front (default: 0, first growth allocates 4) */
  initialCapacity?: number;
  /** Priority ordering (default: defaultComparer) */
  comparer?: Comparer<TPriority>;
  /** Branching factor D of the d-ary heap, 2..64 (default: 4) */
  arity?: number;
  /** Name attached to log events emitted by this instance */
  label?: string;
}

/**
 * Options for IndexedHeap
 */
export interface IndexedHeapOptions<TElement, TPriority> extends HeapOptions<TPriority> {
  /**
   * Identity strategy: maps an element to the key it is tracked under.
   * Keys are compared with Map semantics (SameValueZero). Defaults to the element itself.
   */
  keyOf?: (element: TElement) => unknown;
}

/**
 * Heap options after validation and defaulting
 */
export interface ResolvedHeapOptions<TPriority> {
  initialCapacity: number;
  comparer: Comparer<TPriority>;
  arity: number;
  label: string | undefined;
}

/**
 * Read-only view shared by HeapStore and IndexedHeap
 */
export interface PriorityQueueView<TElement, TPriority>
  extends Iterable<HeapEntry<TElement, TPriority>> {
  readonly count: number;
  readonly capacity: number;
  isEmpty(): boolean;
  peekMin(): HeapEntry<TElement, TPriority>;
  tryPeekMin(): HeapEntry<TElement, TPriority> | undefined;
  /** Snapshot of the valid slots in array order (not sorted) */
  toArray(): HeapEntry<TElement, TPriority>[];
  /** Re-check every structural invariant; throws HeapInvariantError on the first violation */
  validate(): void;
}
