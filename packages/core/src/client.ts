/**
 * SharingClient - the library's entry point, composing every component
 * around one container, one managed zone and one flag store.
 */

import type {
  AppState,
  AppStateListener,
  CloudContainer,
  Contact,
  FlagStore,
  RecordID,
  ShareMetadata,
  ZoneID,
} from "./types.js";
import { DEFAULT_OWNER_NAME } from "./types.js";
import { ZoneProvisioner } from "./zone-provisioner.js";
import { ChangeFetcher } from "./change-fetcher.js";
import { SyncOrchestrator, type ContactLists } from "./sync-orchestrator.js";
import { ShareResolver, type ResolvedShare } from "./share-resolver.js";
import { ContactWriter } from "./contact-writer.js";
import { ShareAcceptor } from "./share-acceptor.js";
import { createLogger, type Logger } from "./logger.js";

/**
 * Sharing requires a custom zone; this is its default name.
 */
export const DEFAULT_ZONE_NAME = "Contacts";

export interface SharingClientOptions {
  container: CloudContainer;
  flagStore: FlagStore;
  zoneName?: string;
  initialState?: AppState;
  logger?: Logger;
  generateId?: () => string;
}

export class SharingClient {
  readonly container: CloudContainer;
  readonly zoneId: ZoneID;
  private readonly orchestrator: SyncOrchestrator;
  private readonly writer: ContactWriter;
  private readonly resolver: ShareResolver;
  private readonly acceptor: ShareAcceptor;

  constructor(options: SharingClientOptions) {
    const logger = options.logger ?? createLogger();
    const { container } = options;
    const privateDatabase = container.database("private");

    this.container = container;
    this.zoneId = {
      zoneName: options.zoneName ?? DEFAULT_ZONE_NAME,
      ownerName: DEFAULT_OWNER_NAME,
    };

    this.orchestrator = new SyncOrchestrator({
      container,
      zoneId: this.zoneId,
      provisioner: new ZoneProvisioner({
        database: privateDatabase,
        flagStore: options.flagStore,
        zoneId: this.zoneId,
        logger: logger.child({ component: "zone-provisioner" }),
      }),
      fetcher: new ChangeFetcher({
        container,
        logger: logger.child({ component: "change-fetcher" }),
      }),
      initialState: options.initialState,
      logger: logger.child({ component: "sync-orchestrator" }),
    });
    this.writer = new ContactWriter({
      database: privateDatabase,
      zoneId: this.zoneId,
      generateId: options.generateId,
      logger: logger.child({ component: "contact-writer" }),
    });
    this.resolver = new ShareResolver({
      container,
      logger: logger.child({ component: "share-resolver" }),
    });
    this.acceptor = new ShareAcceptor({
      container,
      logger: logger.child({ component: "share-acceptor" }),
    });
  }

  getState(): AppState {
    return this.orchestrator.getState();
  }

  subscribe(listener: AppStateListener): () => void {
    return this.orchestrator.subscribe(listener);
  }

  initialize(): Promise<AppState> {
    return this.orchestrator.initialize();
  }

  refresh(): Promise<AppState> {
    return this.orchestrator.refresh();
  }

  fetchPrivateAndSharedContacts(): Promise<ContactLists> {
    return this.orchestrator.fetchPrivateAndSharedContacts();
  }

  addContact(name: string, phoneNumber: string): Promise<void> {
    return this.writer.addContact(name, phoneNumber);
  }

  fetchOrCreateShare(contact: Contact): Promise<ResolvedShare> {
    return this.resolver.resolveShare(contact);
  }

  acceptShare(metadata: ShareMetadata): Promise<RecordID> {
    return this.acceptor.acceptShare(metadata);
  }

  acceptShareUrl(url: string): Promise<RecordID> {
    return this.acceptor.acceptShareUrl(url);
  }
}
