/**
 * Environment and configuration resolution
 */

import { DEFAULT_ARITY, MAX_ARITY } from "@prioset/sdk";
import { CliError } from "./errors.js";

/**
 * Resolve the heap branching factor
 * Priority: CLI option > PRIOSET_ARITY env var > default 4
 */
export function resolveArity(cliArity?: number): number {
  if (cliArity !== undefined) {
    return cliArity;
  }

  const fromEnv = process.env.PRIOSET_ARITY;
  if (fromEnv === undefined || fromEnv.trim() === "") {
    return DEFAULT_ARITY;
  }

  const trimmed = fromEnv.trim();
  const parsed = Number.parseInt(trimmed, 10);
  if (!/^\d+$/.test(trimmed) || parsed < 2 || parsed > MAX_ARITY) {
    throw new CliError(`PRIOSET_ARITY must be an integer between 2 and ${MAX_ARITY}, got "${fromEnv}"`);
  }

  return parsed;
}

/**
 * Check if running in verbose mode (--verbose or PRIOSET_CLI_DEBUG=1)
 */
export function isVerbose(flag?: boolean): boolean {
  return flag === true || process.env.PRIOSET_CLI_DEBUG === "1";
}
