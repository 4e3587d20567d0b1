/**
 * Parsing of `prioset sort` input
 */

import { z } from "zod";
import type { HeapEntry } from "@prioset/sdk";
import { parseJson } from "./arg.js";
import { CliError } from "./errors.js";

const NumberListSchema = z.array(z.number().finite());

const EntryListSchema = z.array(
  z
    .object({
      element: z.string().min(1, "element must be a non-empty string"),
      priority: z.number().finite(),
    })
    .strict()
);

export type SortInput =
  | { kind: "numbers"; values: number[] }
  | { kind: "entries"; entries: HeapEntry<string, number>[] };

/**
 * Interpret input text.
 *
 * - JSON array of numbers -> numbers
 * - JSON array of { element, priority } objects -> entries
 * - anything else -> whitespace-separated numbers
 */
export function parseSortInput(text: string, source: string): SortInput {
  const trimmed = text.trim();

  if (trimmed.startsWith("[")) {
    let json: unknown;
    try {
      json = parseJson(trimmed, source);
    } catch (err) {
      // InvalidArgumentError is a CommanderError, which runProgram does not print
      throw new CliError(err instanceof Error ? err.message : String(err), { cause: err });
    }

    const numbers = NumberListSchema.safeParse(json);
    if (numbers.success) {
      return { kind: "numbers", values: numbers.data };
    }

    const entries = EntryListSchema.safeParse(json);
    if (entries.success) {
      return { kind: "entries", entries: entries.data };
    }

    const issue = entries.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${formatPath(issue.path)}` : "";
    throw new CliError(
      `Invalid input in ${source}${where}: expected an array of numbers or of { "element", "priority" } objects`,
      { cause: entries.error }
    );
  }

  const values: number[] = [];
  const tokens = trimmed === "" ? [] : trimmed.split(/\s+/);
  tokens.forEach((token, i) => {
    const value = Number(token);
    if (!Number.isFinite(value)) {
      throw new CliError(`Invalid number "${token}" at position ${i + 1} in ${source}`);
    }
    values.push(value);
  });

  return { kind: "numbers", values };
}

function formatPath(path: (string | number)[]): string {
  return path.map((part) => (typeof part === "number" ? `[${part}]` : `.${part}`)).join("");
}
