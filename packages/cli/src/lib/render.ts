/**
 * Output rendering helpers
 */

import type { CliIO } from "./io.js";

type Color = "red" | "green" | "yellow";

/**
 * Print JSON to stdout
 */
export function printJson(io: CliIO, data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  io.stdout(json + "\n");
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(io: CliIO, lines: readonly string[]): void {
  lines.forEach((line) => io.stdout(line + "\n"));
}

/**
 * Payload bytes as text; missing payloads as null
 */
export function payloadText(value: Uint8Array | null): string | null {
  return value === null ? null : Buffer.from(value).toString("utf8");
}

/**
 * Apply ANSI color only when enabled
 */
export function colorize(text: string, color: Color, enabled: boolean): string {
  if (!enabled) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
