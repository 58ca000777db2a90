/**
 * Shared test helpers for timekv packages
 */

export {
  createMemoryStore,
  recordingLogger,
  sampleRecords,
  type MemoryStoreHandle,
} from "./store.js";
export { pageSource, type PageSource, type PageCall } from "./pages.js";
export { drain, take, type Drained } from "./sequence.js";
export { BASE_TIME, at } from "./timers.js";
