/**
 * Timing utilities for benchmarks
 */

import { performance } from "node:perf_hooks";

/**
 * Summary of repeated timings
 */
export interface TimingSummary {
  iterations: number;
  meanMs: number;
  minMs: number;
  maxMs: number;
}

/**
 * High-resolution clock using performance.now()
 */
export const clock = {
  /**
   * Get current time in milliseconds (high resolution)
   */
  now(): number {
    return performance.now();
  },

  /**
   * Measure execution time of a synchronous function
   * @returns Tuple of [result, duration in ms]
   */
  measure<T>(fn: () => T): [T, number] {
    const start = performance.now();
    const result = fn();
    const duration = performance.now() - start;
    return [result, duration];
  },

  /**
   * Run `fn` repeatedly and summarize the durations.
   * `setup` runs before every iteration and is not timed.
   */
  repeat<S>(iterations: number, setup: () => S, fn: (state: S) => void): TimingSummary {
    if (!Number.isInteger(iterations) || iterations < 1) {
      throw new RangeError(`iterations must be a positive integer, got ${iterations}`);
    }

    const samples: number[] = [];
    for (let i = 0; i < iterations; i++) {
      const state = setup();
      const [, duration] = clock.measure(() => fn(state));
      samples.push(duration);
    }

    const total = samples.reduce((sum, ms) => sum + ms, 0);
    return {
      iterations,
      meanMs: total / iterations,
      minMs: Math.min(...samples),
      maxMs: Math.max(...samples),
    };
  },
};

/**
 * Run garbage collection if available
 * Note: Requires --expose-gc flag
 */
export function runGC(): void {
  if (global.gc) {
    global.gc();
  }
}
