/**
 * Performance benchmarks for heap workloads
 * Run with: npm run bench
 */

import { describe, it, expect } from "vitest";
import { clock, createRandom, randomIntArray, runGC } from "@prioset/testkit";
import { HeapStore } from "../src/heap-store.js";
import { IndexedHeap } from "../src/indexed-heap.js";
import { countingComparer, defaultComparer } from "../src/comparers.js";

const SIZE = 100_000;

describe("Heap Performance Benchmarks", () => {
  const priorities = randomIntArray(createRandom(2024), SIZE);
  const sorted = [...priorities].sort((a, b) => a - b);

  it("100k inserts + extracts, 4-ary - < 500ms", { timeout: 30000 }, () => {
    runGC();
    const [drained, duration] = clock.measure(() => {
      const heap = new HeapStore<number>();
      for (let i = 0; i < SIZE; i++) heap.insert(i, priorities[i]);
      const out: number[] = [];
      while (!heap.isEmpty()) out.push(heap.extractMin().priority);
      return out;
    });

    console.log(`Heap sort (d=4): ${SIZE} items in ${duration.toFixed(1)}ms`);
    expect(drained).toEqual(sorted);
    expect(duration).toBeLessThanOrEqual(500);
  });

  it("100k bulk load + extracts - < 400ms", { timeout: 30000 }, () => {
    runGC();
    const [drained, duration] = clock.measure(() => {
      const heap = HeapStore.from(priorities.map((priority, element) => ({ element, priority })));
      const out: number[] = [];
      while (!heap.isEmpty()) out.push(heap.extractMin().priority);
      return out;
    });

    console.log(`Bulk load + drain: ${SIZE} items in ${duration.toFixed(1)}ms`);
    expect(drained).toEqual(sorted);
    expect(duration).toBeLessThanOrEqual(400);
  });

  it("100k decrease-key on an indexed heap - < 800ms", { timeout: 30000 }, () => {
    runGC();
    const heap = new IndexedHeap<number>();
    for (let i = 0; i < SIZE; i++) heap.insert(i, priorities[i]);

    const [, duration] = clock.measure(() => {
      for (let i = 0; i < SIZE; i++) heap.tryUpdate(i, priorities[i] - 2_000_000);
    });

    console.log(`Decrease-key: ${SIZE} updates in ${duration.toFixed(1)}ms`);
    heap.validate();
    expect(duration).toBeLessThanOrEqual(800);
  });

  it("Comparison counts by arity", { timeout: 30000 }, () => {
    for (const arity of [2, 4, 8]) {
      const counter = countingComparer<number>(defaultComparer);
      const heap = new HeapStore<number>({ arity, comparer: counter.compare });
      for (let i = 0; i < SIZE; i++) heap.insert(i, priorities[i]);
      while (!heap.isEmpty()) heap.extractMin();

      console.log(`Heap sort (d=${arity}): ${counter.count} comparisons`);
      expect(counter.count).toBeGreaterThan(SIZE);
    }
  });
});
