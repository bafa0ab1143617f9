/**
 * InMemoryCloud - An in-memory implementation of the record store for testing and demos.
 * Holds every account's zones, keeps a change log per zone, and serves
 * containers whose private and shared databases page through those logs.
 */

import { v4 as uuidv4 } from "uuid";
import type {
  AcceptShareResult,
  AcceptSharesResponse,
  ChangePage,
  ChangeToken,
  CloudContainer,
  CloudDatabase,
  DatabaseScope,
  RecordID,
  RemoteRecord,
  SavePolicy,
  Share,
  ShareMetadata,
  ZoneID,
} from "@contactshare/core";
import {
  DEFAULT_OWNER_NAME,
  RecordStoreError,
  SHARE_RECORD_TYPE,
  SHARE_TITLE_FIELD,
  isShare,
  recordKey,
  zoneKey,
} from "@contactshare/core";

/**
 * One entry of a zone's change log.
 */
export interface ChangeEntry {
  seq: number;
  recordName: string;
  deleted: boolean;
}

/**
 * Serializable state of a cloud, see JsonFileCloud.
 */
export interface CloudSnapshot {
  version: 1;
  seq: number;
  zones: Array<{ zoneId: ZoneID; records: RemoteRecord[]; log: ChangeEntry[] }>;
}

export type CloudOperation =
  | "createZone"
  | "listZones"
  | "fetchChangePage"
  | "fetchRecord"
  | "saveRecord"
  | "saveRecords"
  | "fetchShareMetadata"
  | "acceptShares";

export interface OperationLogEntry {
  account: string;
  scope: DatabaseScope | null;
  operation: CloudOperation;
}

/**
 * Configuration options for InMemoryCloud.
 */
export interface InMemoryCloudOptions {
  containerIdentifier: string;
  /**
   * Maximum number of changes per page of a change feed.
   */
  pageSize?: number;
  /**
   * State to start from.
   */
  snapshot?: CloudSnapshot;
}

interface ZoneState {
  zoneId: ZoneID;
  records: Map<string, RemoteRecord>;
  log: ChangeEntry[];
}

interface QueuedFailure {
  operation: CloudOperation;
  scope: DatabaseScope | null;
  error: Error;
}

const DEFAULT_PAGE_SIZE = 100;

export class InMemoryCloud {
  readonly containerIdentifier: string;
  readonly pageSize: number;
  private zones: Map<string, ZoneState>;
  private seq: number;
  private operations: OperationLogEntry[];
  private failures: QueuedFailure[];

  constructor(options: InMemoryCloudOptions) {
    if (!options.containerIdentifier) {
      throw new Error("InMemoryCloud requires containerIdentifier");
    }
    if (options.pageSize !== undefined && options.pageSize < 1) {
      throw new Error("InMemoryCloud pageSize must be at least 1");
    }

    this.containerIdentifier = options.containerIdentifier;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.zones = new Map();
    this.seq = 0;
    this.operations = [];
    this.failures = [];

    if (options.snapshot) {
      this.restore(options.snapshot);
    }
  }

  /**
   * Container for an account, as that account's client sees it.
   */
  container(account: string): CloudContainer {
    if (!account || account === DEFAULT_OWNER_NAME) {
      throw new Error(`Invalid account name: '${account}'`);
    }
    return new InMemoryContainer(this, account);
  }

  // --- Store operations (called by containers and databases) ---

  createZone(account: string, scope: DatabaseScope, zoneId: ZoneID): void {
    this.begin(account, scope, "createZone");
    if (scope !== "private") {
      throw new RecordStoreError("permissionFailure", "Zones can only be created in the private database");
    }

    const canonical = this.resolveZoneId(account, scope, zoneId);
    const key = zoneKey(canonical);
    if (!this.zones.has(key)) {
      this.zones.set(key, { zoneId: canonical, records: new Map(), log: [] });
    }
  }

  listZones(account: string, scope: DatabaseScope): ZoneID[] {
    this.begin(account, scope, "listZones");
    const result: ZoneID[] = [];
    for (const zone of this.zones.values()) {
      if (scope === "private" && zone.zoneId.ownerName === account) {
        result.push({ ...zone.zoneId });
      }
      if (scope === "shared" && zone.zoneId.ownerName !== account && this.hasVisibleRecords(zone, account)) {
        result.push({ ...zone.zoneId });
      }
    }
    return result;
  }

  fetchChangePage(
    account: string,
    scope: DatabaseScope,
    zoneId: ZoneID,
    token: ChangeToken
  ): ChangePage {
    this.begin(account, scope, "fetchChangePage");
    const zone = this.requireZone(account, scope, zoneId);
    const after = this.parseToken(token);

    // Latest entry per record, ordered by when it last changed
    const latest = new Map<string, ChangeEntry>();
    for (const entry of zone.log) {
      if (entry.seq > after) {
        latest.delete(entry.recordName);
        latest.set(entry.recordName, entry);
      }
    }

    const visible = Array.from(latest.values()).filter((entry) => {
      if (entry.deleted) {
        return true;
      }
      const record = zone.records.get(entry.recordName);
      return record !== undefined && (scope === "private" || this.isVisible(zone, record, account));
    });

    const page = visible.slice(0, this.pageSize);
    const moreComing = visible.length > page.length;
    const lastSeq = zone.log.length > 0 ? zone.log[zone.log.length - 1].seq : 0;
    const nextSeq = moreComing ? page[page.length - 1].seq : Math.max(after, lastSeq);

    const changedRecords: RemoteRecord[] = [];
    const deletedRecordIds: RecordID[] = [];
    for (const entry of page) {
      const record = zone.records.get(entry.recordName);
      if (entry.deleted || !record) {
        deletedRecordIds.push({ recordName: entry.recordName, zoneId: { ...zone.zoneId } });
      } else {
        changedRecords.push(copyRecord(record));
      }
    }

    return {
      changedRecords,
      deletedRecordIds,
      moreComing,
      nextToken: { value: String(nextSeq) },
    };
  }

  fetchRecord(account: string, scope: DatabaseScope, recordId: RecordID): RemoteRecord {
    this.begin(account, scope, "fetchRecord");
    const zone = this.requireZone(account, scope, recordId.zoneId);
    const record = zone.records.get(recordId.recordName);
    if (!record || (scope === "shared" && !this.isVisible(zone, record, account))) {
      throw new RecordStoreError("notFound", `Record not found: ${recordKey(recordId)}`);
    }
    return copyRecord(record);
  }

  saveRecord(account: string, scope: DatabaseScope, record: RemoteRecord, policy: SavePolicy): RemoteRecord {
    this.begin(account, scope, "saveRecord");
    const [saved] = this.applySave(account, scope, [record], [], policy);
    return saved;
  }

  saveRecords(
    account: string,
    scope: DatabaseScope,
    records: RemoteRecord[],
    deletions: RecordID[],
    policy: SavePolicy
  ): RemoteRecord[] {
    this.begin(account, scope, "saveRecords");
    return this.applySave(account, scope, records, deletions, policy);
  }

  fetchShareMetadata(account: string, url: string): ShareMetadata {
    this.begin(account, null, "fetchShareMetadata");
    for (const zone of this.zones.values()) {
      for (const record of zone.records.values()) {
        if (isShare(record) && record.url === url) {
          const title = record.fields[SHARE_TITLE_FIELD];
          return {
            containerIdentifier: this.containerIdentifier,
            shareRecordId: copyRecordId(record.recordId),
            rootRecordId: copyRecordId(record.rootRecordId),
            ownerName: zone.zoneId.ownerName,
            title: typeof title === "string" ? title : null,
          };
        }
      }
    }
    throw new RecordStoreError("notFound", `No share found for URL ${url}`);
  }

  acceptShares(account: string, metadatas: ShareMetadata[]): AcceptSharesResponse {
    this.begin(account, null, "acceptShares");
    const results: AcceptShareResult[] = metadatas.map((metadata) => {
      const zone = this.zones.get(zoneKey(metadata.shareRecordId.zoneId));
      const share = zone?.records.get(metadata.shareRecordId.recordName);
      if (!zone || !share || !isShare(share)) {
        return {
          metadata,
          error: new RecordStoreError("notFound", `Share not found: ${recordKey(metadata.shareRecordId)}`),
        };
      }

      if (zone.zoneId.ownerName !== account && !share.participants.includes(account)) {
        const accepted: Share = { ...share, participants: [...share.participants, account] };
        this.put(zone, accepted);
      }
      return { metadata, error: null };
    });

    const failed = results.filter((result) => result.error !== null).length;
    return {
      results,
      error:
        failed > 0
          ? new RecordStoreError("partialFailure", `Failed to accept ${failed} of ${results.length} share(s)`)
          : null,
    };
  }

  // --- Share construction ---

  createShare(
    scope: DatabaseScope,
    rootRecord: RemoteRecord,
    title: string
  ): { share: Share; rootRecord: RemoteRecord } {
    if (scope !== "private") {
      throw new RecordStoreError("permissionFailure", "Shares can only be created in the private database");
    }

    const share: Share = {
      recordId: { recordName: uuidv4(), zoneId: { ...rootRecord.recordId.zoneId } },
      recordType: SHARE_RECORD_TYPE,
      fields: { [SHARE_TITLE_FIELD]: title },
      share: null,
      rootRecordId: copyRecordId(rootRecord.recordId),
      url: null,
      participants: [],
    };

    return {
      share,
      rootRecord: { ...rootRecord, share: { recordId: copyRecordId(share.recordId) } },
    };
  }

  // --- Helper methods for testing/debugging ---

  /**
   * Make the next matching operation reject with the given error.
   * @param scope - Restrict to one database scope (any scope when omitted)
   */
  failNext(operation: CloudOperation, error: Error, scope?: DatabaseScope): void {
    this.failures.push({ operation, scope: scope ?? null, error });
  }

  clearFailures(): void {
    this.failures = [];
  }

  /**
   * Operations performed so far, optionally filtered by name.
   */
  getOperations(operation?: CloudOperation): OperationLogEntry[] {
    return this.operations.filter((entry) => operation === undefined || entry.operation === operation);
  }

  clearOperations(): void {
    this.operations = [];
  }

  /**
   * Get all records in a zone (useful for testing/debugging).
   */
  getRecords(ownerName: string, zoneName: string): RemoteRecord[] {
    const zone = this.zones.get(zoneKey({ zoneName, ownerName }));
    return zone ? Array.from(zone.records.values()).map(copyRecord) : [];
  }

  /**
   * Write a record directly, bypassing save policies (useful for seeding tests).
   */
  putRecord(record: RemoteRecord): RemoteRecord {
    const key = zoneKey(record.recordId.zoneId);
    let zone = this.zones.get(key);
    if (!zone) {
      zone = { zoneId: { ...record.recordId.zoneId }, records: new Map(), log: [] };
      this.zones.set(key, zone);
    }
    return copyRecord(this.put(zone, record));
  }

  snapshot(): CloudSnapshot {
    return {
      version: 1,
      seq: this.seq,
      zones: Array.from(this.zones.values()).map((zone) => ({
        zoneId: { ...zone.zoneId },
        records: Array.from(zone.records.values()).map(copyRecord),
        log: zone.log.map((entry) => ({ ...entry })),
      })),
    };
  }

  // --- Internals ---

  private restore(snapshot: CloudSnapshot): void {
    this.seq = snapshot.seq;
    for (const zone of snapshot.zones) {
      this.zones.set(zoneKey(zone.zoneId), {
        zoneId: { ...zone.zoneId },
        records: new Map(zone.records.map((record) => [record.recordId.recordName, copyRecord(record)])),
        log: zone.log.map((entry) => ({ ...entry })),
      });
    }
  }

  private begin(account: string, scope: DatabaseScope | null, operation: CloudOperation): void {
    this.operations.push({ account, scope, operation });
    const index = this.failures.findIndex(
      (failure) => failure.operation === operation && (failure.scope === null || failure.scope === scope)
    );
    if (index >= 0) {
      const [failure] = this.failures.splice(index, 1);
      throw failure.error;
    }
  }

  /**
   * Validate every change first, then apply them all, so a save is all-or-nothing.
   */
  private applySave(
    account: string,
    scope: DatabaseScope,
    records: RemoteRecord[],
    deletions: RecordID[],
    policy: SavePolicy
  ): RemoteRecord[] {
    if (scope !== "private") {
      throw new RecordStoreError("permissionFailure", "Shared records are read-only for participants");
    }

    const prepared = records.map((record) => {
      const zone = this.requireZone(account, scope, record.recordId.zoneId);
      const recordId = { recordName: record.recordId.recordName, zoneId: { ...zone.zoneId } };
      const existing = zone.records.get(recordId.recordName);

      if (
        policy === "ifServerRecordUnchanged" &&
        existing &&
        record.changeTag !== existing.changeTag
      ) {
        throw new RecordStoreError(
          "serverRecordChanged",
          `Record ${recordKey(recordId)} changed on the server`
        );
      }

      const fields =
        policy === "changedKeys" && existing ? { ...existing.fields, ...record.fields } : { ...record.fields };
      // Saves that omit the share reference keep the server's
      const shareRef = record.share
        ? { recordId: this.canonicalRecordId(account, scope, record.share.recordId) }
        : existing?.share ?? null;

      return { zone, existing, record: { ...record, recordId, fields, share: shareRef } };
    });

    for (const { zone, existing, record } of prepared) {
      if (!isShare(record)) {
        if (existing?.share && record.share && existing.share.recordId.recordName !== record.share.recordId.recordName) {
          throw new RecordStoreError("serverRecordChanged", `Record ${recordKey(record.recordId)} is already shared`);
        }
        continue;
      }

      const rootName = record.rootRecordId.recordName;
      const root =
        prepared.find((candidate) => candidate.zone === zone && candidate.record.recordId.recordName === rootName)
          ?.record ?? zone.records.get(rootName);
      if (!root) {
        throw new RecordStoreError("notFound", `Root record not found for share ${recordKey(record.recordId)}`);
      }
      if (root.share?.recordId.recordName !== record.recordId.recordName) {
        throw new RecordStoreError(
          "serverRecordChanged",
          `Root record ${recordKey(root.recordId)} does not reference share ${recordKey(record.recordId)}`
        );
      }
    }

    const deleted = deletions.map((recordId) => ({
      zone: this.requireZone(account, scope, recordId.zoneId),
      recordName: recordId.recordName,
    }));

    const saved = prepared.map(({ zone, existing, record }) => {
      if (isShare(record)) {
        const participants = existing && isShare(existing) ? existing.participants : [];
        const share: Share = {
          ...record,
          rootRecordId: this.canonicalRecordId(account, scope, record.rootRecordId),
          url: record.url ?? this.shareUrl(record.recordId.recordName),
          participants: [...participants],
        };
        return copyRecord(this.put(zone, share));
      }
      return copyRecord(this.put(zone, record));
    });

    for (const { zone, recordName } of deleted) {
      if (zone.records.delete(recordName)) {
        this.seq++;
        zone.log.push({ seq: this.seq, recordName, deleted: true });
      }
    }

    return saved;
  }

  private put(zone: ZoneState, record: RemoteRecord): RemoteRecord {
    this.seq++;
    const stored: RemoteRecord = {
      ...record,
      changeTag: String(this.seq),
      modifiedAt: Date.now(),
    };
    zone.records.set(record.recordId.recordName, stored);
    zone.log.push({ seq: this.seq, recordName: record.recordId.recordName, deleted: false });
    return stored;
  }

  private shareUrl(recordName: string): string {
    return `memory://${encodeURIComponent(this.containerIdentifier)}/shares/${recordName}`;
  }

  private parseToken(token: ChangeToken): number {
    if (token.value === null) {
      return 0;
    }
    const seq = Number(token.value);
    if (!Number.isInteger(seq) || seq < 0) {
      throw new RecordStoreError("notFound", `Unknown change token: ${token.value}`);
    }
    return seq;
  }

  private resolveZoneId(account: string, scope: DatabaseScope, zoneId: ZoneID): ZoneID {
    const ownerName = zoneId.ownerName === DEFAULT_OWNER_NAME ? account : zoneId.ownerName;
    if (scope === "private" && ownerName !== account) {
      throw new RecordStoreError("permissionFailure", `Zone ${zoneKey(zoneId)} is not in the private database`);
    }
    if (scope === "shared" && ownerName === account) {
      throw new RecordStoreError("permissionFailure", `Zone ${zoneKey(zoneId)} is not in the shared database`);
    }
    return { zoneName: zoneId.zoneName, ownerName };
  }

  private canonicalRecordId(account: string, scope: DatabaseScope, recordId: RecordID): RecordID {
    return {
      recordName: recordId.recordName,
      zoneId: this.resolveZoneId(account, scope, recordId.zoneId),
    };
  }

  private requireZone(account: string, scope: DatabaseScope, zoneId: ZoneID): ZoneState {
    const canonical = this.resolveZoneId(account, scope, zoneId);
    const zone = this.zones.get(zoneKey(canonical));
    if (!zone) {
      throw new RecordStoreError("zoneNotFound", `Zone not found: ${zoneKey(canonical)}`);
    }
    return zone;
  }

  /**
   * A record is visible to a participant if it is a share they accepted,
   * or the root of one.
   */
  private isVisible(zone: ZoneState, record: RemoteRecord, account: string): boolean {
    if (isShare(record)) {
      return record.participants.includes(account);
    }
    if (!record.share) {
      return false;
    }
    const share = zone.records.get(record.share.recordId.recordName);
    return share !== undefined && isShare(share) && share.participants.includes(account);
  }

  private hasVisibleRecords(zone: ZoneState, account: string): boolean {
    for (const record of zone.records.values()) {
      if (this.isVisible(zone, record, account)) {
        return true;
      }
    }
    return false;
  }
}

/**
 * Container view of an InMemoryCloud for one account.
 */
export class InMemoryContainer implements CloudContainer {
  readonly identifier: string;
  private readonly cloud: InMemoryCloud;
  private readonly account: string;
  private readonly databases: { [S in DatabaseScope]: InMemoryDatabase };

  constructor(cloud: InMemoryCloud, account: string) {
    this.identifier = cloud.containerIdentifier;
    this.cloud = cloud;
    this.account = account;
    this.databases = {
      private: new InMemoryDatabase(cloud, account, "private"),
      shared: new InMemoryDatabase(cloud, account, "shared"),
    };
  }

  database(scope: DatabaseScope): CloudDatabase {
    return this.databases[scope];
  }

  async fetchShareMetadata(url: string): Promise<ShareMetadata> {
    return this.cloud.fetchShareMetadata(this.account, url);
  }

  async acceptShares(metadatas: ShareMetadata[]): Promise<AcceptSharesResponse> {
    return this.cloud.acceptShares(this.account, metadatas);
  }
}

/**
 * One database scope of an account.
 */
export class InMemoryDatabase implements CloudDatabase {
  readonly scope: DatabaseScope;
  private readonly cloud: InMemoryCloud;
  private readonly account: string;

  constructor(cloud: InMemoryCloud, account: string, scope: DatabaseScope) {
    this.cloud = cloud;
    this.account = account;
    this.scope = scope;
  }

  async createZone(zoneId: ZoneID): Promise<void> {
    this.cloud.createZone(this.account, this.scope, zoneId);
  }

  async listZones(): Promise<ZoneID[]> {
    return this.cloud.listZones(this.account, this.scope);
  }

  async fetchChangePage(zoneId: ZoneID, token: ChangeToken): Promise<ChangePage> {
    return this.cloud.fetchChangePage(this.account, this.scope, zoneId, token);
  }

  async fetchRecord(recordId: RecordID): Promise<RemoteRecord> {
    return this.cloud.fetchRecord(this.account, this.scope, recordId);
  }

  async saveRecord(record: RemoteRecord, policy: SavePolicy): Promise<RemoteRecord> {
    return this.cloud.saveRecord(this.account, this.scope, record, policy);
  }

  async saveRecords(records: RemoteRecord[], deletions: RecordID[], policy: SavePolicy): Promise<RemoteRecord[]> {
    return this.cloud.saveRecords(this.account, this.scope, records, deletions, policy);
  }

  createShare(rootRecord: RemoteRecord, title: string): { share: Share; rootRecord: RemoteRecord } {
    return this.cloud.createShare(this.scope, rootRecord, title);
  }
}

function copyRecordId(recordId: RecordID): RecordID {
  return { recordName: recordId.recordName, zoneId: { ...recordId.zoneId } };
}

function copyRecord<T extends RemoteRecord>(record: T): T {
  return {
    ...record,
    recordId: copyRecordId(record.recordId),
    fields: { ...record.fields },
    share: record.share ? { recordId: copyRecordId(record.share.recordId) } : null,
  };
}
