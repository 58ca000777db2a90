/**
 * Store adapter for CLI
 */

import { openStore, RedisBackend, type Store } from "@timekv/sdk";
import type { Connection } from "./env.js";

/**
 * Opens the store a command works on; swapped out in tests
 */
export type StoreFactory = (connection: Connection) => Store;

/**
 * Open a store on the Redis server named by the connection
 *
 * A CLI run is a single request, so a down server fails the command
 * after one retry instead of queueing.
 */
export const openCliStore: StoreFactory = (connection) =>
  openStore({
    backend: new RedisBackend(connection.url, { maxRetriesPerRequest: 1 }),
    namespace: connection.namespace,
    delimiter: connection.delimiter,
  });
