/**
 * Unit tests for HeapStore
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { createRandom, randomIntArray, sampleLengths } from "@prioset/testkit";
import { HeapStore, DEFAULT_CAPACITY } from "./heap-store.js";
import { reverseComparer, defaultComparer } from "./comparers.js";
import {
  ConcurrentModificationError,
  EmptyContainerError,
  HeapInvariantError,
  InvalidOptionError,
} from "./errors.js";
import type { HeapEntry } from "./types.js";

const ascending = (values: number[]): number[] => [...values].sort((a, b) => a - b);

function entries(priorities: number[]): HeapEntry<number, number>[] {
  return priorities.map((priority, element) => ({ element, priority }));
}

function drainPriorities<E>(heap: HeapStore<E, number>): number[] {
  const out: number[] = [];
  while (!heap.isEmpty()) {
    out.push(heap.extractMin().priority);
    heap.validate();
  }
  return out;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("HeapStore", () => {
  describe("construction", () => {
    it("starts empty with no allocated slots", () => {
      const heap = new HeapStore<string>();

      expect(heap.count).toBe(0);
      expect(heap.capacity).toBe(0);
      expect(heap.arity).toBe(4);
      expect(heap.isEmpty()).toBe(true);
      heap.validate();
    });

    it("pre-allocates initialCapacity slots", () => {
      const heap = new HeapStore<string>({ initialCapacity: 10 });

      expect(heap.capacity).toBe(10);
      expect(heap.count).toBe(0);
      heap.validate();
    });

    it("rejects invalid options", () => {
      expect(() => new HeapStore({ arity: 1 })).toThrow(InvalidOptionError);
      expect(() => new HeapStore({ arity: 1 })).toThrow('Invalid heap option "arity": arity must be at least 2');
      expect(() => new HeapStore({ initialCapacity: -1 })).toThrow(
        'Invalid heap option "initialCapacity": initialCapacity must be non-negative'
      );
    });

    it("keeps the label for log events", () => {
      expect(new HeapStore({ label: "jobs" }).label).toBe("jobs");
      expect(new HeapStore().label).toBeUndefined();
    });
  });

  describe("insert and extractMin", () => {
    it("extracts in ascending priority order", () => {
      const heap = new HeapStore<string>();
      heap.insert("e", 5);
      heap.insert("c", 3);
      heap.insert("i", 9);
      heap.insert("a", 1);
      heap.insert("g", 7);
      heap.insert("c2", 3);

      expect(drainPriorities(heap)).toEqual([1, 3, 3, 5, 7, 9]);
    });

    it("returns the element with its priority", () => {
      const heap = new HeapStore<string>();
      heap.insert("later", 20);
      heap.insert("sooner", 10);

      expect(heap.peekMin()).toEqual({ element: "sooner", priority: 10 });
      expect(heap.extractMin()).toEqual({ element: "sooner", priority: 10 });
      expect(heap.extractMin()).toEqual({ element: "later", priority: 20 });
    });

    it("lays out slots as a 4-ary heap", () => {
      const heap = new HeapStore<string>();
      heap.insert("a", 5);
      heap.insert("b", 3);
      heap.insert("c", 9);
      heap.insert("d", 1);

      expect(heap.toArray().map((e) => e.element)).toEqual(["d", "a", "c", "b"]);
    });

    it("lays out slots as a binary heap with arity 2", () => {
      const heap = new HeapStore<string>({ arity: 2 });
      heap.insert("a", 5);
      heap.insert("b", 3);
      heap.insert("c", 9);
      heap.insert("d", 1);

      expect(heap.toArray().map((e) => e.element)).toEqual(["d", "b", "c", "a"]);
    });

    it("resolves equal children to the lowest slot", () => {
      const heap = new HeapStore<string>();
      heap.insert("x", 0);
      heap.insert("a", 1);
      heap.insert("b", 1);
      heap.insert("c", 5);

      heap.extractMin();

      expect(heap.toArray()).toEqual([
        { element: "a", priority: 1 },
        { element: "c", priority: 5 },
        { element: "b", priority: 1 },
      ]);
    });

    it("orders with a custom comparer", () => {
      const heap = HeapStore.from(entries([4, 8, 1, 6]), { comparer: reverseComparer(defaultComparer) });

      expect(drainPriorities(heap)).toEqual([8, 6, 4, 1]);
    });

    it("throws EmptyContainerError on an empty heap", () => {
      const heap = new HeapStore<string>();

      expect(() => heap.peekMin()).toThrow(EmptyContainerError);
      expect(() => heap.peekMin()).toThrow("Cannot peek: the heap is empty");
      expect(() => heap.extractMin()).toThrow("Cannot extract the minimum: the heap is empty");
    });

    it("returns undefined from the try variants on an empty heap", () => {
      const heap = new HeapStore<string>();

      expect(heap.tryPeekMin()).toBeUndefined();
      expect(heap.tryExtractMin()).toBeUndefined();

      heap.insert("only", 1);
      expect(heap.tryExtractMin()).toEqual({ element: "only", priority: 1 });
      expect(heap.tryExtractMin()).toBeUndefined();
    });

    it("sorts NaN before every other number", () => {
      const heap = HeapStore.from(entries([3, Number.NaN, -1]));

      const drained = drainPriorities(heap);
      expect(drained[0]).toBeNaN();
      expect(drained.slice(1)).toEqual([-1, 3]);
    });
  });

  describe("capacity", () => {
    it("allocates DEFAULT_CAPACITY on first insert, then doubles", () => {
      const heap = new HeapStore<number>();
      const seen: number[] = [];

      for (let i = 0; i < 9; i++) {
        heap.insert(i, i);
        seen.push(heap.capacity);
      }

      expect(DEFAULT_CAPACITY).toBe(4);
      expect(seen).toEqual([4, 4, 4, 4, 8, 8, 8, 8, 16]);
    });

    it("grows a pre-allocated heap by doubling", () => {
      const heap = new HeapStore<number>({ initialCapacity: 3 });
      for (let i = 0; i < 4; i++) heap.insert(i, i);

      expect(heap.capacity).toBe(6);
    });

    it("grows once to fit a bulk load", () => {
      const heap = HeapStore.from(entries(randomIntArray(createRandom(1), 20)));

      expect(heap.count).toBe(20);
      expect(heap.capacity).toBe(32);
      heap.validate();
    });

    it("releases vacated slots", () => {
      const heap = HeapStore.from(entries([1, 2, 3, 4, 5]));
      heap.extractMin();
      heap.removeAt(2);

      expect(heap.count).toBe(3);
      expect(heap.capacity).toBe(8);
      heap.validate();
    });

    it("trimExcess shrinks to count when under 90% used", () => {
      const heap = HeapStore.from(entries([1, 2, 3, 4, 5]));
      expect(heap.capacity).toBe(8);

      heap.trimExcess();

      expect(heap.capacity).toBe(5);
      heap.validate();
    });

    it("trimExcess keeps capacity at or above the threshold", () => {
      const heap = new HeapStore<number>({ initialCapacity: 10 });
      for (let i = 0; i < 9; i++) heap.insert(i, i);

      heap.trimExcess();
      expect(heap.capacity).toBe(10);

      heap.extractMin();
      heap.trimExcess();
      expect(heap.capacity).toBe(8);
    });

    it("trimExcess on an empty heap releases every slot", () => {
      const heap = new HeapStore<number>({ initialCapacity: 16 });
      heap.trimExcess();

      expect(heap.capacity).toBe(0);
      heap.insert(1, 1);
      expect(heap.capacity).toBe(4);
    });

    it("clear keeps capacity", () => {
      const heap = HeapStore.from(entries([1, 2, 3, 4, 5]));
      heap.clear();

      expect(heap.count).toBe(0);
      expect(heap.capacity).toBe(8);
      expect(heap.toArray()).toEqual([]);
      heap.validate();
    });
  });

  describe("bulkLoad", () => {
    it("heapifies an empty heap bottom-up", () => {
      const heap = HeapStore.from(entries([5, 3, 9, 1, 7]));

      expect(heap.toArray().map((e) => e.priority)).toEqual([1, 3, 9, 5, 7]);
      heap.validate();
    });

    it("sifts each pair into a non-empty heap", () => {
      const heap = new HeapStore<number>();
      heap.insert(100, 4);
      heap.bulkLoad(entries([6, 2, 8]));

      expect(heap.count).toBe(4);
      expect(drainPriorities(heap)).toEqual([2, 4, 6, 8]);
    });

    it("accepts any iterable and ignores an empty batch", () => {
      const heap = new HeapStore<string>();
      heap.bulkLoad([]);
      expect(heap.capacity).toBe(0);

      function* pairs(): Generator<HeapEntry<string, number>> {
        yield { element: "b", priority: 2 };
        yield { element: "a", priority: 1 };
      }
      heap.bulkLoad(pairs());

      expect(heap.peekMin()).toEqual({ element: "a", priority: 1 });
    });
  });

  describe("replaceMin", () => {
    it("swaps out the minimum for a larger priority", () => {
      const heap = HeapStore.from(entries([10, 20, 30]));

      expect(heap.replaceMin(99, 25)).toEqual({ element: 0, priority: 10 });
      expect(heap.count).toBe(3);
      expect(drainPriorities(heap)).toEqual([20, 25, 30]);
    });

    it("hands back a pair that would be the new minimum", () => {
      const heap = HeapStore.from(entries([10, 20]));

      expect(heap.replaceMin(99, 5)).toEqual({ element: 99, priority: 5 });
      expect(heap.replaceMin(98, 10)).toEqual({ element: 98, priority: 10 });
      expect(heap.toArray().map((e) => e.element)).toEqual([0, 1]);
    });

    it("hands back the pair on an empty heap", () => {
      const heap = new HeapStore<string>();

      expect(heap.replaceMin("x", 1)).toEqual({ element: "x", priority: 1 });
      expect(heap.count).toBe(0);
    });
  });

  describe("slot operations", () => {
    it("entryAt reads a slot", () => {
      const heap = HeapStore.from(entries([5, 3, 9]));

      expect(heap.entryAt(0)).toEqual({ element: 1, priority: 3 });
    });

    it("rejects slots outside [0, count)", () => {
      const heap = HeapStore.from(entries([5, 3, 9]));

      expect(() => heap.entryAt(3)).toThrow(RangeError);
      expect(() => heap.entryAt(3)).toThrow("Slot index 3 is outside [0, 3)");
      expect(() => heap.removeAt(-1)).toThrow("Slot index -1 is outside [0, 3)");
      expect(() => heap.updateAt(1.5, 0)).toThrow("Slot index 1.5 is outside [0, 3)");
    });

    it("removeAt sifts the moved pair up when it ranks before its new parent", () => {
      const heap = HeapStore.from(entries([0, 10, 1, 11, 12, 2, 3]), { arity: 2 });
      expect(heap.toArray().map((e) => e.priority)).toEqual([0, 10, 1, 11, 12, 2, 3]);

      expect(heap.removeAt(3)).toEqual({ element: 3, priority: 11 });

      expect(heap.toArray().map((e) => e.priority)).toEqual([0, 3, 1, 10, 12, 2]);
      heap.validate();
    });

    it("removeAt of the last slot leaves the rest untouched", () => {
      const heap = HeapStore.from(entries([1, 2, 3]));

      heap.removeAt(2);

      expect(heap.toArray().map((e) => e.priority)).toEqual([1, 2]);
    });

    it("updateAt moves a slot in either direction", () => {
      const heap = HeapStore.from(entries([1, 2, 3, 4, 5]));

      heap.updateAt(4, 0);
      expect(heap.peekMin()).toEqual({ element: 4, priority: 0 });

      heap.updateAt(0, 100);
      heap.validate();
      expect(drainPriorities(heap)).toEqual([1, 2, 3, 4, 100]);
    });
  });

  describe("iteration", () => {
    it("yields the valid slots in array order", () => {
      const heap = HeapStore.from(entries([5, 3, 9, 1, 7]));

      expect([...heap]).toEqual(heap.toArray());
    });

    it("throws ConcurrentModificationError after a mutation", () => {
      const heap = HeapStore.from(entries([1, 2, 3]));
      const iterator = heap[Symbol.iterator]();

      iterator.next();
      heap.insert(3, 4);

      expect(() => iterator.next()).toThrow(ConcurrentModificationError);
    });

    it("throws when the mutation happens before the first step", () => {
      const heap = HeapStore.from(entries([1, 2, 3]));
      const iterator = heap[Symbol.iterator]();

      heap.insert(9, 0);

      expect(() => iterator.next()).toThrow(ConcurrentModificationError);
    });

    it("throws even when the mutation happens after the last item", () => {
      const heap = HeapStore.from(entries([1]));
      const iterator = heap[Symbol.iterator]();

      iterator.next();
      heap.extractMin();

      expect(() => iterator.next()).toThrow("Heap was modified during iteration");
    });

    it("throws inside for...of", () => {
      const heap = HeapStore.from(entries([1, 2, 3]));

      expect(() => {
        for (const entry of heap) {
          heap.insert(entry.element + 10, entry.priority);
        }
      }).toThrow(ConcurrentModificationError);
    });

    it("is not invalidated by operations that change nothing", () => {
      const heap = HeapStore.from(entries([1, 2, 3]));
      const seen: number[] = [];

      for (const entry of heap) {
        heap.updateAt(0, 1);
        heap.trimExcess();
        heap.replaceMin(9, 0);
        seen.push(entry.priority);
      }

      expect(seen).toEqual([1, 2, 3]);
    });

    it("drain extracts in priority order", () => {
      const heap = HeapStore.from(entries([3, 1, 2]));

      expect([...heap.drain()].map((e) => e.priority)).toEqual([1, 2, 3]);
      expect(heap.isEmpty()).toBe(true);
    });

    it("drain stops where the consumer stops", () => {
      const heap = HeapStore.from(entries([3, 1, 2]));

      for (const entry of heap.drain()) {
        if (entry.priority === 1) break;
      }

      expect(heap.count).toBe(2);
    });
  });

  describe("validate", () => {
    it("reports a broken heap property", () => {
      vi.spyOn(console, "error").mockImplementation(() => {});
      let flipped = false;
      const heap = new HeapStore<string>({
        comparer: (a, b) => (flipped ? b - a : a - b),
      });
      heap.insert("a", 1);
      heap.insert("b", 2);

      flipped = true;

      expect(() => heap.validate()).toThrow(HeapInvariantError);
      expect(() => heap.validate()).toThrow("Heap invariant violated: slot 1 ranks before its parent slot 0");
    });
  });

  describe("properties", () => {
    const random = createRandom(7);
    const lengths = sampleLengths(random, 30);

    it("extracts any input in sorted order", () => {
      for (const length of lengths) {
        const values = randomIntArray(random, length, -50, 50);
        const heap = new HeapStore<number>({ arity: random.int(2, 8) });

        for (const [i, value] of values.entries()) {
          heap.insert(i, value);
          heap.validate();
        }

        expect(drainPriorities(heap)).toEqual(ascending(values));
      }
    });

    it("bulk loads any input into a valid heap", () => {
      for (const length of lengths) {
        const values = randomIntArray(random, length);
        const heap = HeapStore.from(entries(values), { arity: random.int(2, 8) });

        heap.validate();
        expect(heap.count).toBe(length);
        expect(drainPriorities(heap)).toEqual(ascending(values));
      }
    });

    it("removes arbitrary slots until empty", () => {
      for (const length of lengths) {
        const values = randomIntArray(random, length, -20, 20);
        const heap = HeapStore.from(entries(values), { arity: random.int(2, 5) });
        const removed: number[] = [];

        while (!heap.isEmpty()) {
          removed.push(heap.removeAt(random.int(0, heap.count - 1)).priority);
          heap.validate();
        }

        expect(ascending(removed)).toEqual(ascending(values));
      }
    });
  });
});
