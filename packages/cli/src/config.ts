/**
 * Type definitions for JSONC configuration file format.
 * These types represent the configuration as it appears in the JSONC file,
 * after environment variables are expanded and the structure is validated.
 */

import type { LevelWithSilent } from "pino";

/**
 * Backend drivers shipped with the CLI.
 */
export type DriverName = "in-memory" | "file";

export const DRIVER_NAMES: readonly DriverName[] = ["in-memory", "file"];

/**
 * Record store configuration.
 * Uses snake_case to match JSONC format.
 */
export interface StoreConfigRaw {
  driver: DriverName;
  conn: string; // Snapshot path for "file", ignored for "in-memory"
  page_size?: number;
}

/**
 * Flag store configuration.
 */
export interface FlagsConfigRaw {
  driver: DriverName;
  conn: string;
}

export interface RefreshConfigRaw {
  schedule?: string; // Cron expression used by `watch`
}

/**
 * Complete configuration file structure.
 */
export interface ConfigFile {
  container: string;
  account: string;
  zone?: string;
  store: StoreConfigRaw;
  flags: FlagsConfigRaw;
  refresh?: RefreshConfigRaw;
  log_level?: LevelWithSilent;
}
