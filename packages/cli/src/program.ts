/**
 * timekv command-line program
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { z } from "zod";
import type { BulkSetRecord, PageItem, Store, Timestamp } from "@timekv/sdk";
import { parseNonNegativeInt, parsePageSize, parseTimestamp } from "./lib/arg.js";
import { isVerbose, resolveConnection, type ConnectionFlags } from "./lib/env.js";
import { CliError, EXIT_NOT_FOUND, EXIT_OK, exitCodeFor, formatCliError } from "./lib/errors.js";
import { processIO, readFileBytes, readJsonFromFile, type CliIO } from "./lib/io.js";
import { colorize, payloadText, printJson, printLines } from "./lib/render.js";
import { openCliStore, type StoreFactory } from "./lib/store.js";
import { withTiming } from "./lib/telemetry.js";

export const VERSION = "0.1.0";

export interface ProgramDeps {
  openStore: StoreFactory;
  io: CliIO;
  /** Clock for `set` and `import` without an explicit time */
  now: () => Date;
}

type GlobalOptions = ConnectionFlags & {
  verbose?: boolean;
  quiet?: boolean;
};

interface SetOptions {
  data?: string;
  file?: string;
  at?: Timestamp;
}

interface RangeOptions {
  from?: Timestamp;
  to?: Timestamp;
  offset: number;
  limit: number;
  consistent?: boolean;
  all?: boolean;
  json?: boolean;
}

const ImportFileSchema = z.array(
  z.object({
    id: z.union([z.string(), z.array(z.string()).min(1)]),
    data: z.string(),
    lastModified: z.string().optional(),
  })
);

const DEFAULT_DEPS: ProgramDeps = {
  openStore: openCliStore,
  io: processIO,
  now: () => new Date(),
};

/**
 * Build the commander program
 *
 * `state.exitCode` collects a non-error exit status (such as `exists` on an
 * absent record); failures are thrown and mapped by {@link runCli}.
 */
export function createProgram(
  deps: ProgramDeps,
  state: { exitCode: number } = { exitCode: EXIT_OK }
): Command {
  const { io } = deps;
  const program = new Command();

  program
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(colorize(str, "red", io.colors)),
    })
    .exitOverride();

  // Global options
  program
    .name("timekv")
    .description("Key/value records with a last-modified index, on Redis")
    .version(VERSION)
    .option("--url <url>", "Redis URL (TIMEKV_REDIS_URL)")
    .option("--namespace <name>", "Key namespace (TIMEKV_NAMESPACE)")
    .option("--delimiter <name>", "Key delimiter: unit or pipe (TIMEKV_DELIMITER)")
    .option("--verbose", "Verbose diagnostics: error causes and timing metrics")
    .option("--quiet", "Suppress non-error output");

  /**
   * Time a command; metric lines go to stderr under --verbose or TIMEKV_CLI_DEBUG=1
   */
  function timed<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const verbose = program.opts<GlobalOptions>().verbose === true || isVerbose();
    return withTiming(label, fn, { enabled: verbose, write: io.stderr });
  }

  /**
   * Open the store for one command and close it afterwards
   */
  async function withStore<T>(fn: (store: Store, opts: GlobalOptions) => Promise<T>): Promise<T> {
    const opts = program.opts<GlobalOptions>();
    const store = deps.openStore(resolveConnection(opts));
    try {
      return await fn(store, opts);
    } finally {
      await store.close();
    }
  }

  // Get command
  program
    .command("get <id...>")
    .description("Print a record's payload")
    .action(async (id: string[]) => {
      await timed("cli.get", () =>
        withStore(async (store) => {
          const value = await store.get(id);

          if (value === null) {
            throw new CliError(`Record not found: ${id.join(" ")}`, {
              exitCode: EXIT_NOT_FOUND,
            });
          }

          io.stdout(Buffer.from(value).toString("utf8"));
        })
      );
    });

  // Set command
  program
    .command("set <id...>")
    .description("Write a record; the payload comes from --data, --file or stdin")
    .option("--data <text>", "Inline payload")
    .option("--file <path>", "Read payload from a file")
    .option("--at <time>", "Last-modified time: ISO-8601 or nanoseconds (default now)", (val) =>
      parseTimestamp(val, "--at")
    )
    .action(async (id: string[], options: SetOptions) => {
      await timed("cli.set", async () => {
        const data = await readPayload(io, options);

        await withStore(async (store, opts) => {
          const existed = await store.set(id, data, options.at ?? deps.now());

          if (!opts.quiet) {
            io.stdout(existed ? "Updated\n" : "Created\n");
          }
        });
      });
    });

  // Remove command
  program
    .command("rm <id...>")
    .description("Remove a record")
    .option("--force", "Force removal without confirmation")
    .action(async (id: string[], options: { force?: boolean }) => {
      await timed("cli.rm", async () => {
        // Require confirmation unless --force
        if (!options.force) {
          if (!io.stdinIsTTY()) {
            throw new CliError("Use --force to confirm removal in non-interactive mode");
          }
          if (!(await io.confirm(`Remove ${id.join(" ")}?`))) {
            throw new CliError("Aborted by user");
          }
        }

        await withStore(async (store, opts) => {
          await store.delete(id);

          if (!opts.quiet) {
            io.stdout(`Removed ${id.join(" ")}\n`);
          }
        });
      });
    });

  // Exists command
  program
    .command("exists <id...>")
    .description("Print whether a record exists; exit code 2 when it does not")
    .action(async (id: string[]) => {
      await timed("cli.exists", () =>
        withStore(async (store) => {
          const found = await store.exists(id);
          io.stdout(`${found}\n`);
          if (!found) {
            state.exitCode = EXIT_NOT_FOUND;
          }
        })
      );
    });

  // Import command
  program
    .command("import")
    .description("Write many records in one transaction from a JSON file")
    .requiredOption("--file <path>", "JSON array of { id, data, lastModified? }")
    .action(async (options: { file: string }) => {
      await timed("cli.import", async () => {
        const parsed = ImportFileSchema.safeParse(await readJsonFromFile(options.file));
        if (!parsed.success) {
          const issue = parsed.error.issues[0];
          throw new CliError(
            `Invalid import file ${options.file}: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown issue"}`
          );
        }

        const fallback = deps.now();
        const records: BulkSetRecord[] = parsed.data.map((entry, i) => ({
          id: entry.id,
          data: Buffer.from(entry.data, "utf8"),
          lastModified:
            entry.lastModified === undefined
              ? fallback
              : parseTimestamp(entry.lastModified, `record ${i} lastModified`),
        }));

        await withStore(async (store, opts) => {
          await store.bulkSet(records);

          if (!opts.quiet) {
            io.stdout(`Imported ${records.length} records\n`);
          }
        });
      });
    });

  // Range command
  program
    .command("range")
    .description("Print payloads whose last-modified time is in a range, oldest first")
    .option("--from <time>", "Lower bound, inclusive (default unbounded)", (val) =>
      parseTimestamp(val, "--from")
    )
    .option("--to <time>", "Upper bound, inclusive (default unbounded)", (val) =>
      parseTimestamp(val, "--to")
    )
    .option("--offset <n>", "Skip N records", (val) => parseNonNegativeInt(val, "--offset"), 0)
    .option("--limit <n>", "Page size", (val) => parsePageSize(val, "--limit"), 100)
    .option("--consistent", "Read each page as one server-side snapshot")
    .option("--all", "Follow pages until the range is exhausted")
    .option("--json", "Output as JSON")
    .action(async (options: RangeOptions) => {
      await timed("cli.range", () =>
        withStore(async (store, opts) => {
          const range = { from: options.from, to: options.to };
          const fetch = options.consistent ? store.fetchPageConsistent : store.fetchPage;

          let items: AsyncIterable<PageItem>;
          let total: number | undefined;
          if (options.all) {
            items = await store.paginate(range, options.offset, options.limit, {
              consistent: options.consistent,
            });
          } else {
            const page = await fetch(range, options.offset, options.limit);
            items = page.items;
            total = page.total;
          }

          const values: Array<string | null> = [];
          for await (const item of items) {
            if (!item.ok) {
              throw item.error;
            }
            values.push(payloadText(item.value));
          }

          if (options.json) {
            printJson(io, total === undefined ? { values } : { total, values });
            return;
          }

          printLines(io, values.map((value) => value ?? ""));
          if (total !== undefined && !opts.quiet) {
            io.stderr(`${values.length} of ${total} records from offset ${options.offset}\n`);
          }
        })
      );
    });

  return program;
}

/**
 * Payload for `set`, from exactly one of --data, --file or stdin
 */
async function readPayload(io: CliIO, options: SetOptions): Promise<Buffer> {
  if (options.data !== undefined && options.file !== undefined) {
    throw new CliError("Cannot use both --file and --data; choose one or use stdin");
  }

  if (options.data !== undefined) {
    return Buffer.from(options.data, "utf8");
  }
  if (options.file !== undefined) {
    return readFileBytes(options.file);
  }

  if (io.stdinIsTTY()) {
    throw new CliError("No input provided. Use --file, --data, or pipe the payload to stdin");
  }
  try {
    return await io.readStdin();
  } catch (err) {
    throw new CliError(err instanceof Error ? err.message : "Failed to read from stdin", {
      cause: err,
    });
  }
}

/**
 * Run the program on user arguments (without the node and script paths)
 *
 * @returns The process exit code
 */
export async function runCli(
  args: readonly string[],
  overrides: Partial<ProgramDeps> = {}
): Promise<number> {
  const deps: ProgramDeps = { ...DEFAULT_DEPS, ...overrides };
  const state = { exitCode: EXIT_OK };
  const program = createProgram(deps, state);

  try {
    await program.parseAsync([...args], { from: "user" });
    return state.exitCode;
  } catch (err) {
    // Commander has already printed its own usage errors, help and version
    if (err instanceof CommanderError && !(err instanceof InvalidArgumentError)) {
      return err.exitCode;
    }

    const opts = program.opts<GlobalOptions>();
    const message = formatCliError(err, opts.verbose);
    deps.io.stderr(colorize(`Error: ${message}`, "red", deps.io.colors) + "\n");

    return exitCodeFor(err);
  }
}
