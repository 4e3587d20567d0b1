/**
 * `prioset sort`: heap sort of numbers or named entries
 */

import { Command } from "commander";
import {
  HeapStore,
  IndexedHeap,
  defaultComparer,
  reverseComparer,
  type Comparer,
  type HeapEntry,
} from "@prioset/sdk";
import { parseArity, parseChoice, parsePositiveInt } from "../lib/arg.js";
import { resolveArity, isVerbose } from "../lib/env.js";
import { CliError } from "../lib/errors.js";
import { parseSortInput } from "../lib/input.js";
import type { CliIo } from "../lib/io.js";
import { printJson, printLines } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

const LOAD_MODES = ["bulk", "insert"] as const;

type LoadMode = (typeof LOAD_MODES)[number];

interface SortOptions {
  arity?: number;
  mode: LoadMode;
  desc?: boolean;
  top?: number;
  raw?: boolean;
}

/**
 * Create the sort command
 */
export function createSortCommand(program: Command, io: CliIo): Command {
  return new Command("sort")
    .description("Heap-sort numbers, or { element, priority } entries, read from a file or stdin")
    .argument("[file]", "Input file (default: stdin)")
    .option("--arity <n>", "Heap branching factor", (v) => parseArity(v, "--arity"))
    .option("--mode <mode>", "Load with one bulk heapify or one insert per item", (v) => parseChoice(v, "--mode", LOAD_MODES), "bulk")
    .option("--desc", "Largest priority first")
    .option("--top <k>", "Stop after k items", (v) => parsePositiveInt(v, "--top"))
    .option("--raw", "Compact JSON output")
    .addHelpText(
      "after",
      `
Examples:
  $ echo "5 3 9 1" | prioset sort
  $ prioset sort --desc --top 3 numbers.txt
  $ prioset sort entries.json`
    )
    .action(async (file: string | undefined, opts: SortOptions) => {
      const globals = program.opts<{ verbose?: boolean; quiet?: boolean }>();
      const ctx = { io, verbose: isVerbose(globals.verbose) };

      await withTiming(ctx, "cli.sort", async () => {
        const text = await readInput(io, file);
        const input = parseSortInput(text, file ?? "stdin");
        const comparer: Comparer<number> = opts.desc ? reverseComparer(defaultComparer) : defaultComparer;
        const arity = resolveArity(opts.arity);
        const limit = opts.top ?? Number.POSITIVE_INFINITY;

        if (input.kind === "numbers") {
          const heap = new HeapStore<number, number>({ arity, comparer });
          load(heap, input.values.map((value) => ({ element: value, priority: value })), opts.mode);

          const lines: string[] = [];
          while (lines.length < limit && !heap.isEmpty()) {
            lines.push(String(heap.extractMin().priority));
          }
          if (!globals.quiet) {
            printLines(io, lines);
          }
          return;
        }

        const heap = new IndexedHeap<string, number>({ arity, comparer });
        load(heap, input.entries, opts.mode);

        const sorted: HeapEntry<string, number>[] = [];
        while (sorted.length < limit && !heap.isEmpty()) {
          sorted.push(heap.extractMin());
        }
        if (!globals.quiet) {
          printJson(io, sorted, { raw: opts.raw });
        }
      });
    });
}

async function readInput(io: CliIo, file: string | undefined): Promise<string> {
  if (file !== undefined) {
    try {
      return await io.readFile(file);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new CliError(`Failed to read ${file}: ${reason}`, { cause: err });
    }
  }

  if (io.stdinIsTTY()) {
    throw new CliError("No input: pass a file or pipe numbers on stdin");
  }

  return await io.readStdin();
}

function load<TElement>(
  heap: HeapStore<TElement, number> | IndexedHeap<TElement, number>,
  entries: HeapEntry<TElement, number>[],
  mode: LoadMode
): void {
  if (mode === "bulk") {
    heap.bulkLoad(entries);
    return;
  }

  for (const { element, priority } of entries) {
    heap.insert(element, priority);
  }
}
