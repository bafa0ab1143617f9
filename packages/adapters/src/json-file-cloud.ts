/**
 * JsonFileCloud - an InMemoryCloud persisted to a JSON snapshot file,
 * so command line sessions keep their records between runs.
 */

import * as fs from "fs/promises";
import * as path from "path";
import type { RemoteRecord, ZoneID } from "@contactshare/core";
import { isMissingFileError } from "@contactshare/core";
import { InMemoryCloud, type ChangeEntry, type CloudSnapshot, type InMemoryCloudOptions } from "./in-memory-cloud.js";

export type JsonFileCloudOptions = Omit<InMemoryCloudOptions, "snapshot">;

export class JsonFileCloud extends InMemoryCloud {
  readonly filePath: string;
  private written: string | null;

  /**
   * @param written - File content the snapshot was loaded from, if any
   */
  constructor(filePath: string, options: InMemoryCloudOptions, written: string | null = null) {
    super(options);
    this.filePath = filePath;
    this.written = written;
  }

  /**
   * Load the snapshot at `filePath`, or start empty if the file does not exist yet.
   */
  static async open(filePath: string, options: JsonFileCloudOptions): Promise<JsonFileCloud> {
    const fullPath = path.resolve(filePath);
    let content: string;
    try {
      content = await fs.readFile(fullPath, "utf-8");
    } catch (error) {
      if (isMissingFileError(error)) {
        return new JsonFileCloud(fullPath, options);
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(content);
    if (!isCloudSnapshot(parsed)) {
      throw new Error(`Invalid cloud snapshot in ${fullPath}`);
    }
    return new JsonFileCloud(fullPath, { ...options, snapshot: parsed }, serialize(parsed));
  }

  /**
   * Write the current state to disk, unless it matches what was last loaded or written.
   * @returns Whether the file was written
   */
  async flush(): Promise<boolean> {
    const content = serialize(this.snapshot());
    if (content === this.written) {
      return false;
    }

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    await fs.writeFile(tmpPath, content, "utf-8");
    await fs.rename(tmpPath, this.filePath);
    this.written = content;
    return true;
  }
}

function serialize(snapshot: CloudSnapshot): string {
  return JSON.stringify(snapshot, null, 2);
}

function isObject(value: unknown): value is { [key: string]: unknown } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isZoneId(value: unknown): value is ZoneID {
  return isObject(value) && typeof value.zoneName === "string" && typeof value.ownerName === "string";
}

function isRecord(value: unknown): value is RemoteRecord {
  return (
    isObject(value) &&
    isObject(value.recordId) &&
    typeof value.recordId.recordName === "string" &&
    isZoneId(value.recordId.zoneId) &&
    typeof value.recordType === "string" &&
    isObject(value.fields)
  );
}

function isChangeEntry(value: unknown): value is ChangeEntry {
  return (
    isObject(value) &&
    typeof value.seq === "number" &&
    typeof value.recordName === "string" &&
    typeof value.deleted === "boolean"
  );
}

export function isCloudSnapshot(value: unknown): value is CloudSnapshot {
  if (!isObject(value) || value.version !== 1 || typeof value.seq !== "number" || !Array.isArray(value.zones)) {
    return false;
  }
  return value.zones.every(
    (zone: unknown) =>
      isObject(zone) &&
      isZoneId(zone.zoneId) &&
      Array.isArray(zone.records) &&
      zone.records.every(isRecord) &&
      Array.isArray(zone.log) &&
      zone.log.every(isChangeEntry)
  );
}
