/**
 * JSONC configuration file parsing and environment variable expansion.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { parse as parseJsonc, printParseErrorCode, type ParseError } from "jsonc-parser";
import * as cron from "node-cron";
import { isLogLevel } from "@contactshare/core";
import { DRIVER_NAMES, type ConfigFile, type DriverName, type FlagsConfigRaw, type StoreConfigRaw } from "./config.js";

type Environment = { [name: string]: string | undefined };

type JsonObject = { [key: string]: unknown };

/**
 * Load, expand and validate a JSONC configuration file.
 * @throws Error naming the file if it cannot be read, parsed or validated
 */
export async function loadConfigFile(configPath: string, env: Environment = process.env): Promise<ConfigFile> {
  const fullPath = path.resolve(configPath);

  try {
    const content = await fs.readFile(fullPath, "utf-8");
    return parseConfig(content, env);
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(`Failed to load config from ${fullPath}: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Parse configuration text (comments and trailing commas allowed).
 */
export function parseConfig(content: string, env: Environment = process.env): ConfigFile {
  const errors: ParseError[] = [];
  const parsed: unknown = parseJsonc(content, errors, {
    allowTrailingComma: true,
    disallowComments: false,
  });

  if (errors.length > 0) {
    const messages = errors.map((e) => `Error at offset ${e.offset}: ${printParseErrorCode(e.error)}`);
    throw new Error(`Failed to parse JSONC file: ${messages.join(", ")}`);
  }

  return validateConfig(expandEnvVars(parsed, env));
}

/**
 * Expand environment variables in a string.
 * Supports ${VAR} and ${VAR:-default} syntax.
 * Unknown variables without a default are left as written.
 */
export function expandEnvVar(value: string, env: Environment = process.env): string {
  return value.replace(/\$\{([^}:]+)(?::-([^}]*))?\}/g, (match: string, name: string, fallback?: string) => {
    const envValue = env[name];
    if (envValue !== undefined) {
      return envValue;
    }
    return fallback ?? match;
  });
}

/**
 * Recursively expand environment variables in every string of a parsed document.
 */
export function expandEnvVars(value: unknown, env: Environment = process.env): unknown {
  if (typeof value === "string") {
    return expandEnvVar(value, env);
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => expandEnvVars(item, env));
  }

  if (isObject(value)) {
    const expanded: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      expanded[key] = expandEnvVars(item, env);
    }
    return expanded;
  }

  return value;
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isDriverName(value: unknown): value is DriverName {
  return DRIVER_NAMES.some((driver) => driver === value);
}

function requireString(section: JsonObject, key: string, label: string): string {
  const value = section[key];
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`Configuration must include '${label}' string`);
  }
  return value;
}

function optionalString(section: JsonObject, key: string, label: string): string | undefined {
  const value = section[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`'${label}' must be a non-empty string`);
  }
  return value;
}

function requireSection(config: JsonObject, key: string): JsonObject {
  const section = config[key];
  if (!isObject(section)) {
    throw new Error(`Configuration must include '${key}' section`);
  }
  return section;
}

function validateDriver(section: JsonObject, key: string): DriverName {
  const driver = section.driver;
  if (!isDriverName(driver)) {
    throw new Error(`'${key}.driver' must be one of: ${DRIVER_NAMES.join(", ")}`);
  }
  return driver;
}

function validateStore(config: JsonObject): StoreConfigRaw {
  const section = requireSection(config, "store");
  const store: StoreConfigRaw = {
    driver: validateDriver(section, "store"),
    conn: requireString(section, "conn", "store.conn"),
  };

  const pageSize = section.page_size;
  if (pageSize !== undefined) {
    if (typeof pageSize !== "number" || !Number.isInteger(pageSize) || pageSize < 1) {
      throw new Error("'store.page_size' must be a positive integer");
    }
    store.page_size = pageSize;
  }
  return store;
}

function validateFlags(config: JsonObject): FlagsConfigRaw {
  const section = requireSection(config, "flags");
  return {
    driver: validateDriver(section, "flags"),
    conn: requireString(section, "conn", "flags.conn"),
  };
}

/**
 * Validate the structure of the configuration object.
 * @throws Error naming the offending field
 */
function validateConfig(value: unknown): ConfigFile {
  if (!isObject(value)) {
    throw new Error("Configuration file must contain an object");
  }

  const config: ConfigFile = {
    container: requireString(value, "container", "container"),
    account: requireString(value, "account", "account"),
    store: validateStore(value),
    flags: validateFlags(value),
  };

  const zone = optionalString(value, "zone", "zone");
  if (zone !== undefined) {
    config.zone = zone;
  }

  const refresh = value.refresh;
  if (refresh !== undefined) {
    if (!isObject(refresh)) {
      throw new Error("'refresh' must be an object");
    }
    const schedule = optionalString(refresh, "schedule", "refresh.schedule");
    if (schedule !== undefined && !cron.validate(schedule)) {
      throw new Error(`'refresh.schedule' is not a valid cron expression: ${schedule}`);
    }
    config.refresh = schedule === undefined ? {} : { schedule };
  }

  const logLevel = value.log_level;
  if (logLevel !== undefined) {
    if (typeof logLevel !== "string" || !isLogLevel(logLevel)) {
      throw new Error("'log_level' must be one of: fatal, error, warn, info, debug, trace, silent");
    }
    config.log_level = logLevel;
  }

  return config;
}
