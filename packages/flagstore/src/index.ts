/**
 * @contactshare/flagstore - Persisted flag stores for ContactShare
 */

export { InMemoryFlagStore } from "./in-memory-flag-store.js";
export { JsonFileFlagStore, type JsonFileFlagStoreOptions } from "./json-file-flag-store.js";
