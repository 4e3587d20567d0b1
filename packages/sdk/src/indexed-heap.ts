/**
 * d-ary min-heap with an element-to-slot index
 *
 * Wraps a HeapStore and listens to every slot write, so the position map
 * always holds the current slot of each tracked element. The map is what makes
 * removal of an arbitrary element and decrease/increase-key O(log n).
 *
 * Invariants (checked by validate()):
 * - position.size === count
 * - for every slot i in [0, count): position.get(keyOf(elements[i])) === i
 */

import { DuplicateElementError, HeapInvariantError } from "./errors.js";
import { HeapStore } from "./heap-store.js";
import { logger } from "./observability/logs.js";
import type {
  Comparer,
  HeapEntry,
  IndexedHeapOptions,
  PriorityQueueView,
} from "./types.js";

const identity = (element: unknown): unknown => element;

export class IndexedHeap<TElement, TPriority = number> implements PriorityQueueView<TElement, TPriority> {
  private readonly store: HeapStore<TElement, TPriority>;
  private readonly position = new Map<unknown, number>();
  private readonly keyOf: (element: TElement) => unknown;

  constructor(options: IndexedHeapOptions<TElement, TPriority> = {}) {
    const keyOf = options.keyOf ?? identity;
    this.keyOf = keyOf;
    this.store = new HeapStore<TElement, TPriority>(options, (element, index) => {
      this.position.set(keyOf(element), index);
    });
  }

  /**
   * Build an indexed heap from unordered pairs in linear time
   * @throws DuplicateElementError when two pairs share a key
   */
  static from<TElement, TPriority = number>(
    pairs: Iterable<HeapEntry<TElement, TPriority>>,
    options?: IndexedHeapOptions<TElement, TPriority>
  ): IndexedHeap<TElement, TPriority> {
    const heap = new IndexedHeap<TElement, TPriority>(options);
    heap.bulkLoad(pairs);
    return heap;
  }

  get count(): number {
    return this.store.count;
  }

  get capacity(): number {
    return this.store.capacity;
  }

  get arity(): number {
    return this.store.arity;
  }

  get comparer(): Comparer<TPriority> {
    return this.store.comparer;
  }

  isEmpty(): boolean {
    return this.store.isEmpty();
  }

  /**
   * Track a new element
   * @throws DuplicateElementError when the element's key is already tracked
   */
  insert(element: TElement, priority: TPriority): void {
    const key = this.keyOf(element);
    if (this.position.has(key)) {
      throw new DuplicateElementError(key);
    }

    this.store.insert(element, priority);
  }

  /**
   * Insert the element, or move it to `priority` if it is already tracked
   */
  enqueueOrUpdate(element: TElement, priority: TPriority): void {
    const index = this.position.get(this.keyOf(element));
    if (index === undefined) {
      this.store.insert(element, priority);
    } else {
      this.store.updateAt(index, priority);
    }
  }

  /**
   * Change the priority of a tracked element
   * @returns false when the element is not tracked
   */
  tryUpdate(element: TElement, priority: TPriority): boolean {
    const index = this.position.get(this.keyOf(element));
    if (index === undefined) {
      return false;
    }

    this.store.updateAt(index, priority);
    return true;
  }

  /**
   * Stop tracking an element
   * @returns false when the element is not tracked
   */
  tryRemove(element: TElement): boolean {
    const key = this.keyOf(element);
    const index = this.position.get(key);
    if (index === undefined) {
      return false;
    }

    this.store.removeAt(index);
    this.position.delete(key);
    return true;
  }

  contains(element: TElement): boolean {
    return this.position.has(this.keyOf(element));
  }

  /**
   * Current priority of a tracked element, undefined when not tracked
   */
  getPriority(element: TElement): TPriority | undefined {
    const index = this.position.get(this.keyOf(element));
    return index === undefined ? undefined : this.store.entryAt(index).priority;
  }

  peekMin(): HeapEntry<TElement, TPriority> {
    return this.store.peekMin();
  }

  tryPeekMin(): HeapEntry<TElement, TPriority> | undefined {
    return this.store.tryPeekMin();
  }

  /**
   * Remove and return the minimum
   * @throws EmptyContainerError
   */
  extractMin(): HeapEntry<TElement, TPriority> {
    const min = this.store.extractMin();
    this.position.delete(this.keyOf(min.element));
    return min;
  }

  tryExtractMin(): HeapEntry<TElement, TPriority> | undefined {
    const min = this.store.tryExtractMin();
    if (min !== undefined) {
      this.position.delete(this.keyOf(min.element));
    }
    return min;
  }

  /**
   * Insert a pair and extract the minimum in one pass (see HeapStore.replaceMin)
   * @throws DuplicateElementError when the element's key is already tracked
   */
  replaceMin(element: TElement, priority: TPriority): HeapEntry<TElement, TPriority> {
    const key = this.keyOf(element);
    if (this.position.has(key)) {
      throw new DuplicateElementError(key);
    }

    const min = this.store.tryPeekMin();
    if (min === undefined || this.store.comparer(priority, min.priority) <= 0) {
      return { element, priority };
    }

    this.position.delete(this.keyOf(min.element));
    return this.store.replaceMin(element, priority);
  }

  /**
   * Add many pairs; an empty heap is heapified in O(n)
   * @throws DuplicateElementError before any pair is added when a key repeats
   *   within the batch or is already tracked
   */
  bulkLoad(pairs: Iterable<HeapEntry<TElement, TPriority>>): void {
    const batch = Array.from(pairs);
    const seen = new Set<unknown>();

    for (const { element } of batch) {
      const key = this.keyOf(element);
      if (seen.has(key) || this.position.has(key)) {
        throw new DuplicateElementError(key);
      }
      seen.add(key);
    }

    this.store.bulkLoad(batch);
  }

  clear(): void {
    this.store.clear();
    this.position.clear();
  }

  trimExcess(): void {
    this.store.trimExcess();
  }

  toArray(): HeapEntry<TElement, TPriority>[] {
    return this.store.toArray();
  }

  *drain(): Generator<HeapEntry<TElement, TPriority>, void, undefined> {
    while (!this.store.isEmpty()) {
      yield this.extractMin();
    }
  }

  [Symbol.iterator](): Iterator<HeapEntry<TElement, TPriority>> {
    return this.store[Symbol.iterator]();
  }

  /**
   * Check the heap invariants, then that the position map is an exact
   * inverse of the occupied slots
   * @throws HeapInvariantError
   */
  validate(): void {
    this.store.validate();

    const fail = (detail: string): never => {
      logger.error("heap.invariant_violation", { heap: this.store.label, message: detail });
      throw new HeapInvariantError(detail);
    };

    if (this.position.size !== this.store.count) {
      fail(`index tracks ${this.position.size} elements but the heap holds ${this.store.count}`);
    }

    for (let i = 0; i < this.store.count; i++) {
      const key = this.keyOf(this.store.entryAt(i).element);
      const recorded = this.position.get(key);
      if (recorded !== i) {
        fail(`element at slot ${i} is indexed at slot ${recorded ?? "none"}`);
      }
    }
  }
}
