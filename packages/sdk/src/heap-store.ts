/**
 * Array-backed d-ary min-heap
 *
 * Priorities and elements live in two parallel arrays. Slots [0, count) form
 * a heap keyed by priority; slots [count, capacity) are holes and hold no
 * references. Both sift routines carry a held-out (element, priority) pair and
 * write it once at its final slot instead of swapping at every level.
 */

import {
  ConcurrentModificationError,
  EmptyContainerError,
  HeapInvariantError,
} from "./errors.js";
import { logger } from "./observability/logs.js";
import type {
  Comparer,
  HeapEntry,
  HeapOptions,
  PriorityQueueView,
  SlotListener,
} from "./types.js";
import { resolveHeapOptions } from "./validation.js";

/**
 * Capacity allocated by the first growth of an empty heap
 */
export const DEFAULT_CAPACITY = 4;

/**
 * trimExcess() only shrinks when less than this fraction of capacity is used
 */
const TRIM_THRESHOLD = 0.9;

export class HeapStore<TElement, TPriority = number> implements PriorityQueueView<TElement, TPriority> {
  private priorities: TPriority[];
  private elements: TElement[];
  private size = 0;
  private version = 0;
  private readonly compare: Comparer<TPriority>;
  private readonly d: number;
  private readonly name: string | undefined;

  /**
   * @param options - Capacity, ordering and branching factor
   * @param listener - Notified of every element write, including the final
   *   placement of each sift; IndexedHeap uses it to keep its position map current
   */
  constructor(
    options: HeapOptions<TPriority> = {},
    private readonly listener?: SlotListener<TElement>
  ) {
    const resolved = resolveHeapOptions(options);
    this.compare = resolved.comparer;
    this.d = resolved.arity;
    this.name = resolved.label;
    this.priorities = new Array<TPriority>(resolved.initialCapacity);
    this.elements = new Array<TElement>(resolved.initialCapacity);
  }

  /**
   * Build a heap from unordered pairs in linear time
   */
  static from<TElement, TPriority = number>(
    pairs: Iterable<HeapEntry<TElement, TPriority>>,
    options?: HeapOptions<TPriority>
  ): HeapStore<TElement, TPriority> {
    const heap = new HeapStore<TElement, TPriority>(options);
    heap.bulkLoad(pairs);
    return heap;
  }

  get count(): number {
    return this.size;
  }

  get capacity(): number {
    return this.elements.length;
  }

  get arity(): number {
    return this.d;
  }

  get comparer(): Comparer<TPriority> {
    return this.compare;
  }

  get label(): string | undefined {
    return this.name;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  /**
   * Add a pair; O(log n) amortized
   */
  insert(element: TElement, priority: TPriority): void {
    this.version++;
    if (this.size === this.elements.length) {
      this.grow(this.size + 1);
    }

    this.siftUp(this.size++, element, priority);
  }

  /**
   * Return the minimum without removing it
   * @throws EmptyContainerError
   */
  peekMin(): HeapEntry<TElement, TPriority> {
    if (this.size === 0) {
      throw new EmptyContainerError("peek");
    }

    return { element: this.elements[0], priority: this.priorities[0] };
  }

  tryPeekMin(): HeapEntry<TElement, TPriority> | undefined {
    return this.size === 0 ? undefined : this.peekMin();
  }

  /**
   * Remove and return the minimum
   * @throws EmptyContainerError
   */
  extractMin(): HeapEntry<TElement, TPriority> {
    if (this.size === 0) {
      throw new EmptyContainerError("extract the minimum");
    }

    return this.removeAt(0);
  }

  tryExtractMin(): HeapEntry<TElement, TPriority> | undefined {
    return this.size === 0 ? undefined : this.removeAt(0);
  }

  /**
   * Insert a pair and extract the minimum in a single sift-down pass.
   *
   * When the heap is empty or `priority` does not exceed the current minimum
   * the given pair would come straight back out, so it is returned and the
   * heap is left untouched.
   */
  replaceMin(element: TElement, priority: TPriority): HeapEntry<TElement, TPriority> {
    if (this.size === 0 || this.compare(priority, this.priorities[0]) <= 0) {
      return { element, priority };
    }

    this.version++;
    const min = { element: this.elements[0], priority: this.priorities[0] };
    this.siftDown(0, element, priority);
    return min;
  }

  /**
   * Add many pairs at once.
   *
   * An empty heap appends the batch unordered and heapifies bottom-up in O(n);
   * a non-empty heap sifts each pair up as insert() does.
   */
  bulkLoad(pairs: Iterable<HeapEntry<TElement, TPriority>>): void {
    const batch = Array.from(pairs);
    if (batch.length === 0) return;

    this.version++;
    if (this.size + batch.length > this.elements.length) {
      this.grow(this.size + batch.length);
    }

    if (this.size === 0) {
      for (const { element, priority } of batch) {
        this.place(this.size++, element, priority);
      }
      this.heapify();
      return;
    }

    for (const { element, priority } of batch) {
      this.siftUp(this.size++, element, priority);
    }
  }

  /**
   * Remove every pair and release the references they held.
   * Capacity is kept.
   */
  clear(): void {
    this.version++;
    if (this.size === 0) return;

    const released = this.size;
    this.priorities = new Array<TPriority>(this.priorities.length);
    this.elements = new Array<TElement>(this.elements.length);
    this.size = 0;

    logger.debug("heap.clear", { heap: this.name, details: { released } });
  }

  /**
   * Shrink capacity to count when under 90% of the slots are in use
   */
  trimExcess(): void {
    const capacity = this.elements.length;
    if (this.size >= Math.floor(capacity * TRIM_THRESHOLD)) return;

    this.priorities.length = this.size;
    this.elements.length = this.size;
    logger.debug("heap.trim", { heap: this.name, details: { from: capacity, to: this.size } });
  }

  /**
   * Pair stored at a slot
   * @throws RangeError when index is outside [0, count)
   */
  entryAt(index: number): HeapEntry<TElement, TPriority> {
    this.checkIndex(index);
    return { element: this.elements[index], priority: this.priorities[index] };
  }

  /**
   * Remove the pair at an arbitrary slot.
   *
   * The last pair fills the hole; it may belong above or below its new slot,
   * so it is sifted up when it ranks before the new parent and down otherwise.
   * @throws RangeError when index is outside [0, count)
   */
  removeAt(index: number): HeapEntry<TElement, TPriority> {
    this.checkIndex(index);
    this.version++;

    const removed = { element: this.elements[index], priority: this.priorities[index] };
    const last = --this.size;
    const lastElement = this.elements[last];
    const lastPriority = this.priorities[last];

    delete this.elements[last];
    delete this.priorities[last];

    if (index < last) {
      if (index > 0 && this.compare(lastPriority, this.priorities[this.parentOf(index)]) < 0) {
        this.siftUp(index, lastElement, lastPriority);
      } else {
        this.siftDown(index, lastElement, lastPriority);
      }
    }

    return removed;
  }

  /**
   * Change the priority stored at a slot: smaller sifts up, larger sifts
   * down, an equal priority leaves the heap untouched
   * @throws RangeError when index is outside [0, count)
   */
  updateAt(index: number, priority: TPriority): void {
    this.checkIndex(index);

    const order = this.compare(priority, this.priorities[index]);
    if (order === 0) return;

    this.version++;
    if (order < 0) {
      this.siftUp(index, this.elements[index], priority);
    } else {
      this.siftDown(index, this.elements[index], priority);
    }
  }

  /**
   * Snapshot of the valid slots in array order
   */
  toArray(): HeapEntry<TElement, TPriority>[] {
    const out: HeapEntry<TElement, TPriority>[] = [];
    for (let i = 0; i < this.size; i++) {
      out.push({ element: this.elements[i], priority: this.priorities[i] });
    }
    return out;
  }

  /**
   * Extract pairs in priority order until the heap is empty
   * (or the consumer stops pulling)
   */
  *drain(): Generator<HeapEntry<TElement, TPriority>, void, undefined> {
    while (this.size > 0) {
      yield this.removeAt(0);
    }
  }

  /**
   * Iterate valid slots in array order. Any mutation of the heap after this
   * call makes the next step throw ConcurrentModificationError.
   */
  [Symbol.iterator](): Iterator<HeapEntry<TElement, TPriority>> {
    return this.iterateFrom(this.version);
  }

  private *iterateFrom(version: number): Generator<HeapEntry<TElement, TPriority>, void, undefined> {
    for (let i = 0; ; i++) {
      if (this.version !== version) {
        throw new ConcurrentModificationError();
      }
      if (i >= this.size) return;
      yield { element: this.elements[i], priority: this.priorities[i] };
    }
  }

  /**
   * Re-check array lengths, the heap property over [0, count) and that no
   * slot past count holds a value
   * @throws HeapInvariantError
   */
  validate(): void {
    const fail = (detail: string): never => {
      logger.error("heap.invariant_violation", { heap: this.name, message: detail });
      throw new HeapInvariantError(detail);
    };

    if (this.priorities.length !== this.elements.length) {
      fail(`priorities length ${this.priorities.length} differs from elements length ${this.elements.length}`);
    }

    if (this.size > this.elements.length) {
      fail(`count ${this.size} exceeds capacity ${this.elements.length}`);
    }

    for (let i = 1; i < this.size; i++) {
      const parent = this.parentOf(i);
      if (this.compare(this.priorities[parent], this.priorities[i]) > 0) {
        fail(`slot ${i} ranks before its parent slot ${parent}`);
      }
    }

    for (let i = this.size; i < this.elements.length; i++) {
      if (i in this.elements || i in this.priorities) {
        fail(`unused slot ${i} still holds a value`);
      }
    }
  }

  private parentOf(index: number): number {
    return Math.floor((index - 1) / this.d);
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new RangeError(`Slot index ${index} is outside [0, ${this.size})`);
    }
  }

  private place(index: number, element: TElement, priority: TPriority): void {
    this.priorities[index] = priority;
    this.elements[index] = element;
    this.listener?.(element, index);
  }

  /**
   * Double capacity (an empty array gets DEFAULT_CAPACITY) until it fits `required`
   */
  private grow(required: number): void {
    const from = this.elements.length;
    let to = from === 0 ? DEFAULT_CAPACITY : from * 2;
    while (to < required) {
      to *= 2;
    }

    this.priorities.length = to;
    this.elements.length = to;
    logger.debug("heap.grow", { heap: this.name, details: { from, to } });
  }

  /**
   * Move the held-out pair toward the root, shifting larger parents down
   */
  private siftUp(index: number, element: TElement, priority: TPriority): void {
    while (index > 0) {
      const parent = this.parentOf(index);
      const parentPriority = this.priorities[parent];

      if (this.compare(parentPriority, priority) <= 0) {
        break;
      }

      this.place(index, this.elements[parent], parentPriority);
      index = parent;
    }

    this.place(index, element, priority);
  }

  /**
   * Move the held-out pair toward the leaves, pulling the smallest child up.
   * Equal children resolve to the lowest index.
   */
  private siftDown(index: number, element: TElement, priority: TPriority): void {
    const count = this.size;
    const priorities = this.priorities;
    const d = this.d;

    let minChild: number;
    while ((minChild = d * index + 1) < count) {
      let minPriority = priorities[minChild];
      const upper = Math.min(count, minChild + d);

      for (let child = minChild + 1; child < upper; child++) {
        if (this.compare(priorities[child], minPriority) < 0) {
          minChild = child;
          minPriority = priorities[child];
        }
      }

      if (this.compare(priority, minPriority) <= 0) {
        break;
      }

      this.place(index, this.elements[minChild], minPriority);
      index = minChild;
    }

    this.place(index, element, priority);
  }

  private heapify(): void {
    for (let i = this.parentOf(this.size - 1); i >= 0; i--) {
      this.siftDown(i, this.elements[i], this.priorities[i]);
    }
  }
}
