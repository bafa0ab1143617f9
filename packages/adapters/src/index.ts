/**
 * @contactshare/store-in-memory - In-process record store for ContactShare
 */

export {
  InMemoryCloud,
  InMemoryContainer,
  InMemoryDatabase,
  type InMemoryCloudOptions,
  type CloudSnapshot,
  type ChangeEntry,
  type CloudOperation,
  type OperationLogEntry,
} from "./in-memory-cloud.js";
export { JsonFileCloud, isCloudSnapshot, type JsonFileCloudOptions } from "./json-file-cloud.js";
