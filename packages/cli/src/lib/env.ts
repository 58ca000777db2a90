/**
 * Environment and configuration resolution
 */

import { InvalidArgumentError } from "commander";
import { DEFAULT_REDIS_URL, DELIM_PIPE, DELIM_UNIT } from "@timekv/sdk";

export const DEFAULT_NAMESPACE = "timekv";

const DELIMITERS = {
  unit: DELIM_UNIT,
  pipe: DELIM_PIPE,
} as const;

export type DelimiterName = keyof typeof DELIMITERS;

export type ConnectionFlags = {
  url?: string;
  namespace?: string;
  delimiter?: string;
};

export interface Connection {
  url: string;
  namespace: string;
  delimiter: string;
}

function isDelimiterName(value: string): value is DelimiterName {
  return Object.hasOwn(DELIMITERS, value);
}

/**
 * Resolve a delimiter name to the separator it stands for
 */
export function resolveDelimiter(name: string): string {
  if (!isDelimiterName(name)) {
    throw new InvalidArgumentError(
      `delimiter must be one of ${Object.keys(DELIMITERS).join(", ")}, got "${name}"`
    );
  }
  return DELIMITERS[name];
}

/**
 * Resolve where and how to open the store
 * Priority: CLI option > TIMEKV_* env var > default
 */
export function resolveConnection(flags: ConnectionFlags = {}): Connection {
  const env = process.env;

  return {
    url: flags.url ?? env.TIMEKV_REDIS_URL ?? DEFAULT_REDIS_URL,
    namespace: flags.namespace ?? env.TIMEKV_NAMESPACE ?? DEFAULT_NAMESPACE,
    delimiter: resolveDelimiter(flags.delimiter ?? env.TIMEKV_DELIMITER ?? "unit"),
  };
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.TIMEKV_CLI_DEBUG === "1";
}
