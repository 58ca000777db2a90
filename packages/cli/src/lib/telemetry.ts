/**
 * Telemetry and observability helpers
 */

import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Format a metric line: `metric <key> k=v ...`
 */
export function formatMetric(key: string, fields: Record<string, unknown>): string {
  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }
  return parts.join(" ");
}

/**
 * Where metric lines go; by default stderr, when TIMEKV_CLI_DEBUG=1
 */
export interface MetricSink {
  enabled?: boolean;
  write?: (line: string) => void;
}

/**
 * Emit a metric line if the sink is enabled
 */
export function emitMetric(
  key: string,
  fields: Record<string, unknown>,
  sink: MetricSink = {}
): void {
  if (!(sink.enabled ?? isVerbose())) {
    return;
  }
  (sink.write ?? writeStderr)(formatMetric(key, fields) + "\n");
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(
  label: string,
  fn: () => Promise<T>,
  sink: MetricSink = {}
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    const duration = Date.now() - start;
    emitMetric(
      label,
      {
        duration_ms: duration,
        success,
      },
      sink
    );
  }
}
