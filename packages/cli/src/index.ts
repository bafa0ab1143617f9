/**
 * @contactshare/cli - Command line client for ContactShare
 */

export {
  openSession,
  withSession,
  refreshOnce,
  loadContacts,
  addContact,
  shareContact,
  acceptShare,
  formatContact,
  formatContacts,
  type Session,
  type SessionOptions,
  type LoadedState,
} from "./runner.js";
export { loadConfigFile, parseConfig, expandEnvVar, expandEnvVars } from "./parser.js";
export { loadStore, loadFlagStore, resolveConnPath, type LoadedStore } from "./loaders.js";
export type { ConfigFile, StoreConfigRaw, FlagsConfigRaw, RefreshConfigRaw, DriverName } from "./config.js";
