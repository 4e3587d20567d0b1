/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { MAX_ARITY } from "@prioset/sdk";

/**
 * Parse a positive integer argument
 */
export function parsePositiveInt(value: string, name: string, max = 10_000_000): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a positive integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  if (parsed === 0) {
    throw new InvalidArgumentError(`${name} must be a positive integer`);
  }

  if (parsed > max) {
    throw new InvalidArgumentError(`${name} must be <= ${max}`);
  }

  return parsed;
}

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  return Number.parseInt(trimmed, 10);
}

/**
 * Parse a heap branching factor (2..64)
 */
export function parseArity(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be an integer between 2 and ${MAX_ARITY}`);
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (parsed < 2 || parsed > MAX_ARITY) {
    throw new InvalidArgumentError(`${name} must be an integer between 2 and ${MAX_ARITY}`);
  }

  return parsed;
}

/**
 * Parse one of a fixed set of values
 */
export function parseChoice<T extends string>(value: string, name: string, choices: readonly T[]): T {
  const match = choices.find((choice) => choice === value.trim());
  if (match === undefined) {
    throw new InvalidArgumentError(`${name} must be one of: ${choices.join(", ")}`);
  }
  return match;
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}
