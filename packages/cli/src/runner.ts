/**
 * Wire everything together: parse config, open the stores, build a client, run a command.
 */

import type { AppState, Contact, Logger, RecordID, Share } from "@contactshare/core";
import { InvalidStateError, SharingClient, createLogger } from "@contactshare/core";
import type { ConfigFile } from "./config.js";
import { loadFlagStore, loadStore, type LoadedStore } from "./loaders.js";

export type LoadedState = Extract<AppState, { status: "loaded" }>;

export interface Session {
  config: ConfigFile;
  client: SharingClient;
  store: LoadedStore;
  logger: Logger;
}

export interface SessionOptions {
  logger?: Logger;
}

/**
 * Build a client for the configured account.
 * @param configFilePath - Path to the config file (for resolving relative store paths)
 */
export async function openSession(
  config: ConfigFile,
  configFilePath: string,
  options: SessionOptions = {}
): Promise<Session> {
  const logger = options.logger ?? createLogger({ level: config.log_level });
  const store = await loadStore(config.store, config.container, configFilePath);
  const client = new SharingClient({
    container: store.cloud.container(config.account),
    flagStore: loadFlagStore(config.flags, configFilePath),
    zoneName: config.zone,
    logger,
  });
  return { config, client, store, logger };
}

/**
 * Run an action against a fresh session, persisting the store afterwards
 * whether or not the action succeeded. A persist failure after a failed
 * action is logged; the action's error is the one rethrown.
 */
export async function withSession<T>(
  config: ConfigFile,
  configFilePath: string,
  action: (session: Session) => Promise<T>,
  options: SessionOptions = {}
): Promise<T> {
  const session = await openSession(config, configFilePath, options);
  let result: T;
  try {
    result = await action(session);
  } catch (error) {
    try {
      await session.store.persist();
    } catch (persistError) {
      session.logger.error({ err: persistError }, "Failed to persist store after command error");
    }
    throw error;
  }
  await session.store.persist();
  return result;
}

/**
 * Load both contact lists from a session opened for this call only,
 * so each refresh reads the store as it is now.
 */
export async function refreshOnce(
  config: ConfigFile,
  configFilePath: string,
  options: SessionOptions = {}
): Promise<LoadedState> {
  return withSession(config, configFilePath, ({ client }) => loadContacts(client), options);
}

/**
 * Provision the zone and load both contact lists.
 * @throws The refresh error when the state ends in `error`
 */
export async function loadContacts(client: SharingClient): Promise<LoadedState> {
  const state = await client.initialize();
  if (state.status === "error") {
    throw state.error;
  }
  if (state.status !== "loaded") {
    throw new InvalidStateError(`Refresh finished in state ${state.status}`);
  }
  return state;
}

export async function addContact(client: SharingClient, name: string, phoneNumber: string): Promise<void> {
  await loadContacts(client);
  await client.addContact(name, phoneNumber);
}

/**
 * Share one of the account's own contacts, creating the share on first use.
 */
export async function shareContact(client: SharingClient, contactId: string): Promise<Share> {
  const { privateContacts } = await loadContacts(client);
  const contact = privateContacts.find((candidate) => candidate.id === contactId);
  if (!contact) {
    throw new Error(`Contact not found: ${contactId}`);
  }
  const { share } = await client.fetchOrCreateShare(contact);
  return share;
}

export function acceptShare(client: SharingClient, url: string): Promise<RecordID> {
  return client.acceptShareUrl(url);
}

/**
 * One line per contact: record name, name and phone number, tab separated.
 */
export function formatContact(contact: Contact): string {
  return [contact.id, contact.name, contact.phoneNumber].join("\t");
}

export function formatContacts(state: LoadedState): string[] {
  const lines = ["Private contacts:"];
  lines.push(...(state.privateContacts.length > 0 ? state.privateContacts.map(formatContact) : ["  (none)"]));
  lines.push("Shared contacts:");
  lines.push(...(state.sharedContacts.length > 0 ? state.sharedContacts.map(formatContact) : ["  (none)"]));
  return lines;
}
