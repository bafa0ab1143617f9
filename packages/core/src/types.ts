/**
 * Core type definitions and contracts for ContactShare.
 * These interfaces define the protocol a managed record store must implement
 * for the client workflow to drive it.
 */

/**
 * Placeholder owner for zones in the current account's private database.
 * The record store resolves it to the signed-in account.
 */
export const DEFAULT_OWNER_NAME = "__defaultOwner__";

/**
 * Record type of share records, as reported in change feeds.
 */
export const SHARE_RECORD_TYPE = "cloudkit.share";

/**
 * Field holding the human-readable title of a share.
 */
export const SHARE_TITLE_FIELD = "title";

/**
 * Database scope: records owned by the account, or shared to it by others.
 */
export type DatabaseScope = "private" | "shared";

/**
 * Identifies a logical partition of records within a database.
 */
export interface ZoneID {
  zoneName: string;
  ownerName: string;
}

/**
 * Identifies a record within a zone.
 */
export interface RecordID {
  recordName: string;
  zoneId: ZoneID;
}

/**
 * A pointer from one record to another (e.g. a root record to its share).
 */
export interface RecordReference {
  recordId: RecordID;
}

export type FieldValue = string | number | boolean | null;

export type RecordFields = { [key: string]: FieldValue | undefined };

/**
 * An opaque record as the store hands it out.
 * Mappers are responsible for turning it into a domain entity.
 */
export interface RemoteRecord {
  readonly recordId: RecordID;
  readonly recordType: string;
  readonly fields: Readonly<RecordFields>;
  /** Reference to the share this record is the root of, if any */
  readonly share: RecordReference | null;
  /** Server version tag; absent until the record is first saved */
  readonly changeTag?: string;
  /** Last server modification, epoch milliseconds */
  readonly modifiedAt?: number;
}

/**
 * A share grants other accounts access to a root record via a link.
 */
export interface Share extends RemoteRecord {
  readonly recordType: typeof SHARE_RECORD_TYPE;
  readonly rootRecordId: RecordID;
  /** Assigned by the store on first save */
  readonly url: string | null;
  /** Accounts that accepted the share */
  readonly participants: readonly string[];
}

/**
 * Opaque position in a zone's change feed.
 * A null value means "from the beginning".
 */
export interface ChangeToken {
  value: string | null;
}

/**
 * One page of a zone's change feed.
 */
export interface ChangePage {
  changedRecords: RemoteRecord[];
  deletedRecordIds: RecordID[];
  moreComing: boolean;
  nextToken: ChangeToken;
}

/**
 * How a save reconciles with the server copy of a record.
 * - ifServerRecordUnchanged: reject when the record's change tag is stale
 * - changedKeys: merge the provided fields into the server copy
 * - allKeys: overwrite every field (last writer wins)
 */
export type SavePolicy = "ifServerRecordUnchanged" | "changedKeys" | "allKeys";

/**
 * Everything needed to accept a share, resolved from its URL.
 */
export interface ShareMetadata {
  containerIdentifier: string;
  shareRecordId: RecordID;
  rootRecordId: RecordID;
  ownerName: string;
  title: string | null;
}

export interface AcceptShareResult {
  metadata: ShareMetadata;
  error: Error | null;
}

export interface AcceptSharesResponse {
  results: AcceptShareResult[];
  /** Set when the operation as a whole failed */
  error: Error | null;
}

/**
 * A database scope of the record store.
 */
export interface CloudDatabase {
  readonly scope: DatabaseScope;

  /**
   * Create a zone. Creating a zone that already exists is a no-op.
   */
  createZone(zoneId: ZoneID): Promise<void>;

  /**
   * List the zones visible in this database.
   */
  listZones(): Promise<ZoneID[]>;

  /**
   * Fetch the next page of changes in a zone after the given token.
   * @param token - Position returned by the previous page ({ value: null } to start over)
   */
  fetchChangePage(zoneId: ZoneID, token: ChangeToken): Promise<ChangePage>;

  /**
   * Fetch a single record. Rejects with a `notFound` RecordStoreError if it does not exist.
   */
  fetchRecord(recordId: RecordID): Promise<RemoteRecord>;

  /**
   * Save a single record and return the server copy.
   */
  saveRecord(record: RemoteRecord, policy: SavePolicy): Promise<RemoteRecord>;

  /**
   * Save and delete several records atomically: either every change is applied or none is.
   */
  saveRecords(
    records: RemoteRecord[],
    deletions: RecordID[],
    policy: SavePolicy
  ): Promise<RemoteRecord[]>;

  /**
   * Construct (but do not save) a share for a root record.
   * Returns the share and a copy of the root record referencing it.
   */
  createShare(
    rootRecord: RemoteRecord,
    title: string
  ): { share: Share; rootRecord: RemoteRecord };
}

/**
 * A container groups the private and shared databases of one account.
 */
export interface CloudContainer {
  readonly identifier: string;

  database(scope: DatabaseScope): CloudDatabase;

  /**
   * Resolve the metadata behind a share URL.
   */
  fetchShareMetadata(url: string): Promise<ShareMetadata>;

  /**
   * Accept shares on behalf of the container's account.
   */
  acceptShares(metadatas: ShareMetadata[]): Promise<AcceptSharesResponse>;
}

/**
 * Persisted key/value store for boolean markers (e.g. "zone created").
 * Implementations may keep values in memory, a file, or a database.
 */
export interface FlagStore {
  get(key: string): Promise<boolean>;
  set(key: string, value: boolean): Promise<void>;
}

/**
 * A contact as presented to the application.
 * Immutable; a new instance replaces it on every refetch.
 */
export interface Contact {
  readonly id: string;
  readonly name: string;
  readonly phoneNumber: string;
  readonly associatedRecord: RemoteRecord;
}

/**
 * Application state driving presentation.
 */
export type AppState =
  | { status: "loading" }
  | {
      status: "loaded";
      privateContacts: readonly Contact[];
      sharedContacts: readonly Contact[];
    }
  | { status: "error"; error: Error };

export type AppStateListener = (state: AppState) => void;

/**
 * Type guard for share records.
 */
export function isShare(record: RemoteRecord): record is Share {
  return record.recordType === SHARE_RECORD_TYPE && "rootRecordId" in record;
}

/**
 * Stable string key for a zone, used for maps and log output.
 */
export function zoneKey(zoneId: ZoneID): string {
  return `${zoneId.ownerName}/${zoneId.zoneName}`;
}

/**
 * Stable string key for a record, used for maps and log output.
 */
export function recordKey(recordId: RecordID): string {
  return `${zoneKey(recordId.zoneId)}/${recordId.recordName}`;
}
