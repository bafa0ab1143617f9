/**
 * Construction of record stores and flag stores from configuration.
 */

import * as path from "path";
import type { FlagStore } from "@contactshare/core";
import { InMemoryCloud, JsonFileCloud } from "@contactshare/store-in-memory";
import { InMemoryFlagStore, JsonFileFlagStore } from "@contactshare/flagstore";
import type { FlagsConfigRaw, StoreConfigRaw } from "./config.js";

/**
 * A record store plus the means to persist it after a command.
 */
export interface LoadedStore {
  cloud: InMemoryCloud;
  /**
   * Save changes made during the session.
   * @returns Whether anything was written
   */
  persist(): Promise<boolean>;
}

/**
 * Resolve a connection path relative to the config file's directory.
 */
export function resolveConnPath(conn: string, configFilePath: string): string {
  return path.isAbsolute(conn) ? conn : path.resolve(path.dirname(configFilePath), conn);
}

/**
 * Open the record store named by the configuration.
 * @param containerIdentifier - Container the store serves
 * @param configFilePath - Path to the config file (for resolving relative paths)
 */
export async function loadStore(
  storeConfig: StoreConfigRaw,
  containerIdentifier: string,
  configFilePath: string
): Promise<LoadedStore> {
  const options = { containerIdentifier, pageSize: storeConfig.page_size };

  switch (storeConfig.driver) {
    case "in-memory": {
      const cloud = new InMemoryCloud(options);
      return { cloud, persist: async () => false };
    }
    case "file": {
      const cloud = await JsonFileCloud.open(resolveConnPath(storeConfig.conn, configFilePath), options);
      return { cloud, persist: () => cloud.flush() };
    }
    default:
      return unknownDriver(storeConfig.driver);
  }
}

/**
 * Create the flag store named by the configuration.
 */
export function loadFlagStore(flagsConfig: FlagsConfigRaw, configFilePath: string): FlagStore {
  switch (flagsConfig.driver) {
    case "in-memory":
      return new InMemoryFlagStore();
    case "file":
      return new JsonFileFlagStore({ conn: resolveConnPath(flagsConfig.conn, configFilePath) });
    default:
      return unknownDriver(flagsConfig.driver);
  }
}

function unknownDriver(driver: never): never {
  throw new Error(`Unknown driver: ${String(driver)}`);
}
