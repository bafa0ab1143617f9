/**
 * JsonFileFlagStore - FlagStore persisted as a JSON object in a file.
 * The file is read on every `get` and rewritten on every `set`.
 */

import * as fs from "fs/promises";
import * as path from "path";
import type { FlagStore } from "@contactshare/core";
import { isMissingFileError } from "@contactshare/core";

export interface JsonFileFlagStoreOptions {
  /**
   * Path of the JSON file. Created on first write.
   */
  conn: string;
}

export class JsonFileFlagStore implements FlagStore {
  readonly filePath: string;

  constructor(options: JsonFileFlagStoreOptions) {
    if (!options.conn) {
      throw new Error("JsonFileFlagStore requires conn");
    }
    this.filePath = path.resolve(options.conn);
  }

  async get(key: string): Promise<boolean> {
    const flags = await this.load();
    return flags[key] ?? false;
  }

  async set(key: string, value: boolean): Promise<void> {
    const flags = await this.load();
    flags[key] = value;
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(flags, null, 2), "utf-8");
  }

  private async load(): Promise<{ [key: string]: boolean }> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFileError(error)) {
        return {};
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(content);
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new Error(`Flag file ${this.filePath} must contain a JSON object`);
    }

    const flags: { [key: string]: boolean } = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value !== "boolean") {
        throw new Error(`Flag '${key}' in ${this.filePath} must be a boolean`);
      }
      flags[key] = value;
    }
    return flags;
  }
}
