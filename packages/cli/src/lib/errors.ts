/**
 * CLI error handling and exit code mapping
 */

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_NOT_FOUND = 2;

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? EXIT_ERROR;
  }
}

/**
 * Map errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/store/unknown error
 * - 2: record not found
 *
 * SDK errors (validation, store, script) all map to 1; only a CliError
 * carries a different code.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }
  return EXIT_ERROR;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
