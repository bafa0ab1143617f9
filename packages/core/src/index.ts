/**
 * @contactshare/core - Client-side sync and sharing workflow for ContactShare
 *
 * This package provides:
 * - Type definitions and contracts (CloudContainer, CloudDatabase, FlagStore, AppState)
 * - Record mapping between remote records and Contact values
 * - Zone provisioning, change fetching and sync orchestration
 * - Share resolution and acceptance
 *
 * Core never imports a record store; callers wire one in at runtime.
 */

export type {
  ZoneID,
  RecordID,
  RecordReference,
  FieldValue,
  RecordFields,
  RemoteRecord,
  Share,
  ChangeToken,
  ChangePage,
  SavePolicy,
  ShareMetadata,
  AcceptShareResult,
  AcceptSharesResponse,
  DatabaseScope,
  CloudDatabase,
  CloudContainer,
  FlagStore,
  Contact,
  AppState,
  AppStateListener,
} from "./types.js";
export {
  DEFAULT_OWNER_NAME,
  SHARE_RECORD_TYPE,
  SHARE_TITLE_FIELD,
  isShare,
  zoneKey,
  recordKey,
} from "./types.js";

export {
  RecordStoreError,
  ShareResolutionError,
  InvalidStateError,
  isRecordStoreError,
  isMissingFileError,
  toError,
  type RecordStoreErrorCode,
} from "./errors.js";

export { createLogger, parseLogLevel, isLogLevel, type Logger, type LoggerOptions } from "./logger.js";

export {
  CONTACT_RECORD_TYPE,
  CONTACT_FIELDS,
  contactMapper,
  contactFromRecord,
  type RecordMapper,
} from "./mapper.js";

export { ZoneProvisioner, ZONE_CREATED_FLAG, type ZoneProvisionerOptions } from "./zone-provisioner.js";
export { ChangeFetcher, type ChangeFetcherOptions } from "./change-fetcher.js";
export {
  SyncOrchestrator,
  type SyncOrchestratorOptions,
  type ContactLists,
} from "./sync-orchestrator.js";
export {
  ShareResolver,
  shareTitle,
  type ShareResolverOptions,
  type ResolvedShare,
} from "./share-resolver.js";
export { ContactWriter, type ContactWriterOptions } from "./contact-writer.js";
export { ShareAcceptor, type ShareAcceptorOptions } from "./share-acceptor.js";
export { SharingClient, DEFAULT_ZONE_NAME, type SharingClientOptions } from "./client.js";
