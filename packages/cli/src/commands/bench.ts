/**
 * `prioset bench`: timing and comparison counts for heap workloads
 */

import { Command } from "commander";
import { parseArity, parseChoice, parseNonNegativeInt, parsePositiveInt } from "../lib/arg.js";
import { BENCH_SCENARIOS, runBenchmark, type BenchScenario } from "../lib/bench.js";
import { isVerbose, resolveArity } from "../lib/env.js";
import type { CliIo } from "../lib/io.js";
import { printJson } from "../lib/render.js";
import { emitMetric, withTiming } from "../lib/telemetry.js";

interface BenchCommandOptions {
  size: number;
  iterations: number;
  arity?: number;
  seed: number;
  raw?: boolean;
}

/**
 * Create the bench command
 */
export function createBenchCommand(program: Command, io: CliIo): Command {
  return new Command("bench")
    .description(`Benchmark a heap workload (${BENCH_SCENARIOS.join(", ")})`)
    .argument("<scenario>", "Workload to run", (v) => parseChoice(v, "scenario", BENCH_SCENARIOS))
    .option("--size <n>", "Number of priorities", (v) => parsePositiveInt(v, "--size", 1_000_000), 1000)
    .option("--iterations <n>", "Timed repetitions", (v) => parsePositiveInt(v, "--iterations", 10_000), 10)
    .option("--arity <n>", "Heap branching factor", (v) => parseArity(v, "--arity"))
    .option("--seed <n>", "Seed for the generated priorities", (v) => parseNonNegativeInt(v, "--seed"), 42)
    .option("--raw", "Compact JSON output")
    .addHelpText(
      "after",
      `
Examples:
  $ prioset bench heapsort --size 30000
  $ prioset bench update --arity 2 --iterations 5`
    )
    .action(async (scenario: BenchScenario, opts: BenchCommandOptions) => {
      const globals = program.opts<{ verbose?: boolean; quiet?: boolean }>();
      const ctx = { io, verbose: isVerbose(globals.verbose) };

      await withTiming(ctx, "cli.bench", async () => {
        const report = runBenchmark({
          scenario,
          size: opts.size,
          iterations: opts.iterations,
          arity: resolveArity(opts.arity),
          seed: opts.seed,
        });

        emitMetric(ctx, `bench.${scenario}`, { mean_ms: report.meanMs, comparisons: report.comparisons });

        if (!globals.quiet) {
          printJson(io, report, { raw: opts.raw });
        }
      });
    });
}
