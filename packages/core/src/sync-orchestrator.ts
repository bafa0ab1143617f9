/**
 * SyncOrchestrator - sole owner of the application state.
 * Implements the refresh flow:
 * 1. Transition to loading
 * 2. Fetch private contacts (managed zone) and shared contacts (every shared zone) concurrently
 * 3. Join both branches
 * 4. Transition to loaded with both lists, or to error with the first failure
 */

import type {
  AppState,
  AppStateListener,
  CloudContainer,
  Contact,
  ZoneID,
} from "./types.js";
import { ChangeFetcher } from "./change-fetcher.js";
import { ZoneProvisioner } from "./zone-provisioner.js";
import { toError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

export interface SyncOrchestratorOptions {
  container: CloudContainer;
  zoneId: ZoneID;
  provisioner: ZoneProvisioner;
  fetcher: ChangeFetcher;
  initialState?: AppState;
  logger?: Logger;
}

export interface ContactLists {
  privateContacts: Contact[];
  sharedContacts: Contact[];
}

export class SyncOrchestrator {
  private readonly container: CloudContainer;
  private readonly zoneId: ZoneID;
  private readonly provisioner: ZoneProvisioner;
  private readonly fetcher: ChangeFetcher;
  private readonly logger: Logger;
  private readonly listeners = new Set<AppStateListener>();
  private state: AppState;

  constructor(options: SyncOrchestratorOptions) {
    this.container = options.container;
    this.zoneId = options.zoneId;
    this.provisioner = options.provisioner;
    this.fetcher = options.fetcher;
    this.logger = options.logger ?? createLogger();
    this.state = options.initialState ?? { status: "loading" };
  }

  getState(): AppState {
    return this.state;
  }

  /**
   * Register a listener called synchronously on every state transition.
   * A listener that throws is logged and does not affect the transition or other listeners.
   * @returns A function removing the listener
   */
  subscribe(listener: AppStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Create the zone if needed, then refresh.
   * A provisioning failure moves the state to error and rejects.
   */
  async initialize(): Promise<AppState> {
    try {
      await this.provisioner.ensureZone();
    } catch (error) {
      this.setState({ status: "error", error: toError(error) });
      throw error;
    }
    return this.refresh();
  }

  /**
   * Refetch both scopes and replace the state. Never rejects.
   * Overlapping calls are not deduplicated: the last one to finish wins.
   */
  async refresh(): Promise<AppState> {
    this.setState({ status: "loading" });

    let next: AppState;
    try {
      const { privateContacts, sharedContacts } = await this.fetchPrivateAndSharedContacts();
      next = { status: "loaded", privateContacts, sharedContacts };
    } catch (error) {
      this.logger.error({ err: error }, "Failed to refresh contacts");
      next = { status: "error", error: toError(error) };
    }

    this.setState(next);
    return next;
  }

  /**
   * Fetch private and shared contacts concurrently.
   * Rejects with whichever branch fails first.
   */
  async fetchPrivateAndSharedContacts(): Promise<ContactLists> {
    const [privateContacts, sharedContacts] = await Promise.all([
      this.fetcher.fetchChanges("private", [this.zoneId]),
      this.fetchSharedContacts(),
    ]);
    return { privateContacts, sharedContacts };
  }

  /**
   * Discover every zone in the shared database, then fetch contacts in all of them.
   */
  private async fetchSharedContacts(): Promise<Contact[]> {
    const zones = await this.container.database("shared").listZones();
    if (zones.length === 0) {
      return [];
    }
    return this.fetcher.fetchChanges("shared", zones);
  }

  private setState(state: AppState): void {
    this.state = state;
    if (state.status === "loaded") {
      this.logger.info(
        { private: state.privateContacts.length, shared: state.sharedContacts.length },
        "Contacts loaded"
      );
    }
    for (const listener of this.listeners) {
      try {
        listener(state);
      } catch (error) {
        this.logger.error({ err: error, status: state.status }, "State listener failed");
      }
    }
  }
}
