/**
 * Shared fixtures for core tests.
 */

import { InMemoryCloud } from "@contactshare/store-in-memory";
import { InMemoryFlagStore } from "@contactshare/flagstore";
import type {
  AcceptSharesResponse,
  AppState,
  ChangePage,
  ChangeToken,
  CloudContainer,
  CloudDatabase,
  Contact,
  DatabaseScope,
  RecordFields,
  RecordID,
  RemoteRecord,
  Share,
  ShareMetadata,
  ZoneID,
} from "../src/types";
import { zoneKey } from "../src/types";
import { createLogger } from "../src/logger";
import { SharingClient } from "../src/client";

export const CONTAINER_ID = "iCloud.test.contacts";

export const silentLogger = createLogger({ level: "silent" });

export function zone(zoneName: string, ownerName = "alice"): ZoneID {
  return { zoneName, ownerName };
}

export function record(
  recordName: string,
  fields: RecordFields,
  options: { zoneId?: ZoneID; recordType?: string } = {}
): RemoteRecord {
  return {
    recordId: { recordName, zoneId: options.zoneId ?? zone("Contacts") },
    recordType: options.recordType ?? "Contact",
    fields,
    share: null,
  };
}

export function page(
  changedRecords: RemoteRecord[],
  moreComing: boolean,
  nextToken: string,
  deletedRecordIds: RecordID[] = []
): ChangePage {
  return { changedRecords, deletedRecordIds, moreComing, nextToken: { value: nextToken } };
}

/**
 * Database that replays a fixed sequence of change pages per zone.
 */
export class ScriptedDatabase implements CloudDatabase {
  readonly scope: DatabaseScope;
  readonly calls: Array<{ zone: string; token: string | null }> = [];
  private readonly pages = new Map<string, ChangePage[]>();
  private readonly failures = new Map<string, Error>();

  constructor(scope: DatabaseScope) {
    this.scope = scope;
  }

  script(zoneId: ZoneID, pages: ChangePage[]): this {
    this.pages.set(zoneKey(zoneId), [...pages]);
    return this;
  }

  fail(zoneId: ZoneID, error: Error): this {
    this.failures.set(zoneKey(zoneId), error);
    return this;
  }

  async fetchChangePage(zoneId: ZoneID, token: ChangeToken): Promise<ChangePage> {
    const key = zoneKey(zoneId);
    this.calls.push({ zone: key, token: token.value });
    const failure = this.failures.get(key);
    if (failure) {
      throw failure;
    }
    const next = this.pages.get(key)?.shift();
    if (!next) {
      throw new Error(`No scripted page left for ${key}`);
    }
    return next;
  }

  async createZone(): Promise<void> {
    throw new Error("not scripted");
  }

  async listZones(): Promise<ZoneID[]> {
    return Array.from(this.pages.keys()).map((key) => {
      const [ownerName, zoneName] = key.split("/");
      return { zoneName, ownerName };
    });
  }

  async fetchRecord(): Promise<RemoteRecord> {
    throw new Error("not scripted");
  }

  async saveRecord(): Promise<RemoteRecord> {
    throw new Error("not scripted");
  }

  async saveRecords(): Promise<RemoteRecord[]> {
    throw new Error("not scripted");
  }

  createShare(): { share: Share; rootRecord: RemoteRecord } {
    throw new Error("not scripted");
  }
}

export class ScriptedContainer implements CloudContainer {
  readonly identifier = CONTAINER_ID;
  readonly databases = {
    private: new ScriptedDatabase("private"),
    shared: new ScriptedDatabase("shared"),
  };

  database(scope: DatabaseScope): ScriptedDatabase {
    return this.databases[scope];
  }

  async fetchShareMetadata(): Promise<ShareMetadata> {
    throw new Error("not scripted");
  }

  async acceptShares(): Promise<AcceptSharesResponse> {
    throw new Error("not scripted");
  }
}

/**
 * Sharing clients for several accounts backed by one fresh InMemoryCloud.
 */
export function createTestCloud(options: { pageSize?: number } = {}) {
  const cloud = new InMemoryCloud({ containerIdentifier: CONTAINER_ID, pageSize: options.pageSize });

  function clientFor(account: string, clientOptions: { generateId?: () => string } = {}) {
    const flagStore = new InMemoryFlagStore();
    const client = new SharingClient({
      container: cloud.container(account),
      flagStore,
      logger: silentLogger,
      generateId: clientOptions.generateId,
    });
    return { client, flagStore };
  }

  return { cloud, clientFor };
}

/**
 * Contacts of a loaded state, failing the test if the state is not loaded.
 */
export function loadedContacts(state: AppState): { privateContacts: readonly Contact[]; sharedContacts: readonly Contact[] } {
  if (state.status !== "loaded") {
    throw new Error(`Expected loaded state, got ${state.status}`);
  }
  return { privateContacts: state.privateContacts, sharedContacts: state.sharedContacts };
}
