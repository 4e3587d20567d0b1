/**
 * Telemetry and observability helpers
 */

import type { CliIo } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Where metrics go and whether they are emitted at all
 */
export interface TelemetryContext {
  io: CliIo;
  verbose: boolean;
}

/**
 * Emit a metric to stderr if verbose mode is enabled
 */
export function emitMetric(ctx: TelemetryContext, key: string, fields: Record<string, unknown>): void {
  if (!ctx.verbose) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  ctx.io.writeErr(parts.join(" ") + "\n");
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(
  ctx: TelemetryContext,
  label: string,
  fn: () => Promise<T>
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    const duration = Date.now() - start;
    emitMetric(ctx, label, {
      duration_ms: duration,
      success,
    });
  }
}
