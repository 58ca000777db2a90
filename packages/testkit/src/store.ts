/**
 * Store test utilities
 */

import {
  Logger,
  MemoryBackend,
  MetricsCollector,
  openStore,
  type BulkSetRecord,
  type LogLevel,
  type MemoryBackendOptions,
  type Store,
  type StoreOptions,
} from "@timekv/sdk";

/**
 * Store over a fresh in-process backend, with its own logger and metrics
 */
export interface MemoryStoreHandle {
  store: Store;
  backend: MemoryBackend;
  metrics: MetricsCollector;
  /** Lines written by the store's logger */
  logs: string[];
}

/**
 * Logger that records formatted lines instead of printing them
 * @param minLevel - Lowest level recorded (default: "debug")
 */
export function recordingLogger(minLevel: LogLevel = "debug"): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger({ minLevel, sink: (_level, line) => lines.push(line) });
  return { logger, lines };
}

/**
 * Create a store over a new MemoryBackend
 * @param options - Store options (backend, logger and metrics are provided)
 */
export function createMemoryStore(
  options: Partial<Omit<StoreOptions, "backend">> = {},
  backendOptions?: MemoryBackendOptions
): MemoryStoreHandle {
  const backend = new MemoryBackend(backendOptions);
  const metrics = new MetricsCollector();
  const { logger, lines } = recordingLogger();

  const store = openStore({
    namespace: "test",
    logger,
    metrics,
    ...options,
    backend,
  });

  return { store, backend, metrics, logs: lines };
}

/**
 * Records `entity/<i>` with payload `{"n":i}`, the i-th at `base + i` seconds
 */
export function sampleRecords(count: number, base: Date): BulkSetRecord[] {
  return Array.from({ length: count }, (_, i) => ({
    id: ["entity", String(i)],
    data: Buffer.from(JSON.stringify({ n: i })),
    lastModified: new Date(base.getTime() + i * 1000),
  }));
}
