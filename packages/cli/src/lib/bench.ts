/**
 * Heap benchmark scenarios for `prioset bench`
 */

import {
  HeapStore,
  IndexedHeap,
  countingComparer,
  defaultComparer,
  type HeapEntry,
} from "@prioset/sdk";
import { clock, createRandom, randomIntArray, runGC } from "@prioset/testkit";

export const BENCH_SCENARIOS = ["heapsort", "bulk", "update", "replace"] as const;

export type BenchScenario = (typeof BENCH_SCENARIOS)[number];

export interface BenchOptions {
  scenario: BenchScenario;
  size: number;
  iterations: number;
  arity: number;
  seed: number;
}

export interface BenchReport {
  scenario: BenchScenario;
  size: number;
  arity: number;
  iterations: number;
  meanMs: number;
  minMs: number;
  maxMs: number;
  /** Priority comparisons performed by one iteration */
  comparisons: number;
}

/**
 * Run a scenario `iterations` times over the same seeded priorities
 */
export function runBenchmark(options: BenchOptions): BenchReport {
  const { scenario, size, iterations, arity, seed } = options;
  const priorities = randomIntArray(createRandom(seed), size, -2_147_483_648, 2_147_483_647);
  const counter = countingComparer<number>(defaultComparer);
  const heapOptions = { arity, comparer: counter.compare, initialCapacity: size };

  const run = scenarios[scenario];

  runGC();
  const timing = clock.repeat(
    iterations,
    () => {
      counter.reset();
      return heapOptions;
    },
    (opts) => run(priorities, opts)
  );

  return {
    scenario,
    size,
    arity,
    iterations: timing.iterations,
    meanMs: round(timing.meanMs),
    minMs: round(timing.minMs),
    maxMs: round(timing.maxMs),
    comparisons: counter.count,
  };
}

type HeapSettings = { arity: number; comparer: (a: number, b: number) => number; initialCapacity: number };

const scenarios: Record<BenchScenario, (priorities: number[], opts: HeapSettings) => void> = {
  // insert everything, then extract everything
  heapsort(priorities, opts) {
    const heap = new HeapStore<number, number>(opts);
    for (let i = 0; i < priorities.length; i++) {
      heap.insert(i, priorities[i]);
    }
    while (!heap.isEmpty()) heap.extractMin();
  },

  bulk(priorities, opts) {
    const entries: HeapEntry<number, number>[] = priorities.map((priority, element) => ({ element, priority }));
    const heap = HeapStore.from(entries, opts);
    while (!heap.isEmpty()) heap.extractMin();
  },

  // insert, move every element to the negated priority, drain
  update(priorities, opts) {
    const heap = new IndexedHeap<number, number>(opts);
    for (let i = 0; i < priorities.length; i++) {
      heap.insert(i, priorities[i]);
    }
    for (let i = 0; i < priorities.length; i++) {
      heap.tryUpdate(i, -priorities[i]);
    }
    while (!heap.isEmpty()) heap.extractMin();
  },

  // keep the largest tenth with replaceMin, then drain
  replace(priorities, opts) {
    const k = Math.max(1, Math.floor(priorities.length / 10));
    const heap = new HeapStore<number, number>({ ...opts, initialCapacity: k });
    for (let i = 0; i < priorities.length; i++) {
      if (heap.count < k) {
        heap.insert(i, priorities[i]);
      } else {
        heap.replaceMin(i, priorities[i]);
      }
    }
    while (!heap.isEmpty()) heap.extractMin();
  },
};

function round(ms: number): number {
  return Math.round(ms * 1000) / 1000;
}
