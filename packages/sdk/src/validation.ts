/**
 * Validation of heap construction options
 */

import { z } from "zod";
import { defaultComparer } from "./comparers.js";
import { InvalidOptionError } from "./errors.js";
import type { Comparer, HeapOptions, ResolvedHeapOptions } from "./types.js";

export const DEFAULT_ARITY = 4;
export const MAX_ARITY = 64;

/**
 * Largest length a JavaScript array can have
 */
export const MAX_CAPACITY = 2 ** 32 - 1;

const isFunction = (value: unknown): boolean => typeof value === "function";

export const HeapOptionsSchema = z.object({
  initialCapacity: z
    .number()
    .int("initialCapacity must be an integer")
    .min(0, "initialCapacity must be non-negative")
    .max(MAX_CAPACITY, `initialCapacity must be <= ${MAX_CAPACITY}`)
    .default(0),
  arity: z
    .number()
    .int("arity must be an integer")
    .min(2, "arity must be at least 2")
    .max(MAX_ARITY, `arity must be <= ${MAX_ARITY}`)
    .default(DEFAULT_ARITY),
  comparer: z.custom<Comparer<unknown>>(isFunction, "comparer must be a function").optional(),
  keyOf: z.custom<(element: unknown) => unknown>(isFunction, "keyOf must be a function").optional(),
  label: z.string().min(1, "label must be a non-empty string").optional(),
});

/**
 * Validate options and fill in defaults
 * @throws InvalidOptionError naming the first offending option
 */
export function resolveHeapOptions<TPriority>(
  options: HeapOptions<TPriority> = {}
): ResolvedHeapOptions<TPriority> {
  const result = HeapOptionsSchema.safeParse(options);

  if (!result.success) {
    const issue = result.error.issues[0];
    const option = issue?.path.join(".") || "options";
    throw new InvalidOptionError(option, issue?.message ?? "invalid value", {
      cause: result.error,
    });
  }

  return {
    initialCapacity: result.data.initialCapacity,
    arity: result.data.arity,
    // Taken from the input: the schema only checks that it is callable
    comparer: options.comparer ?? defaultComparer,
    label: result.data.label,
  };
}
