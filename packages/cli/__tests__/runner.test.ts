/**
 * Tests for the CLI runner: sessions over file-backed stores shared by several accounts
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import type { Contact } from "@contactshare/core";
import { RecordStoreError, createLogger } from "@contactshare/core";
import { InMemoryCloud, JsonFileCloud } from "@contactshare/store-in-memory";
import { InMemoryFlagStore, JsonFileFlagStore } from "@contactshare/flagstore";
import type { ConfigFile } from "../src/config";
import { loadFlagStore, loadStore, resolveConnPath } from "../src/loaders";
import {
  acceptShare,
  addContact,
  formatContacts,
  loadContacts,
  openSession,
  refreshOnce,
  shareContact,
  withSession,
} from "../src/runner";

const logger = createLogger({ level: "silent" });

function fileConfig(account: string): ConfigFile {
  return {
    container: "iCloud.test.contacts",
    account,
    store: { driver: "file", conn: "cloud.json" },
    flags: { driver: "file", conn: `flags-${account}.json` },
  };
}

const memoryConfig: ConfigFile = {
  container: "iCloud.test.contacts",
  account: "alice",
  store: { driver: "in-memory", conn: "unused", page_size: 10 },
  flags: { driver: "in-memory", conn: "unused" },
};

describe("CLI runner", () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "contactshare-cli-"));
    configPath = path.join(dir, "contactshare.jsonc");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe("Loaders", () => {
    it("should resolve relative paths against the config file's directory", () => {
      expect(resolveConnPath("data/cloud.json", "/srv/contactshare/contactshare.jsonc")).toBe(
        "/srv/contactshare/data/cloud.json"
      );
      expect(resolveConnPath("/var/cloud.json", "/srv/contactshare/contactshare.jsonc")).toBe("/var/cloud.json");
    });

    it("should build in-memory stores", async () => {
      const store = await loadStore(memoryConfig.store, memoryConfig.container, configPath);

      expect(store.cloud).toBeInstanceOf(InMemoryCloud);
      expect(store.cloud.pageSize).toBe(10);
      expect(loadFlagStore(memoryConfig.flags, configPath)).toBeInstanceOf(InMemoryFlagStore);
    });

    it("should build file stores next to the config file", async () => {
      const config = fileConfig("alice");
      const store = await loadStore(config.store, config.container, configPath);
      const flags = loadFlagStore(config.flags, configPath);

      expect(store.cloud).toBeInstanceOf(JsonFileCloud);
      expect(flags).toBeInstanceOf(JsonFileFlagStore);
      expect(flags).toMatchObject({ filePath: path.join(dir, "flags-alice.json") });
    });
  });

  describe("Commands", () => {
    it("should share a contact with another account across sessions", async () => {
      await withSession(fileConfig("alice"), configPath, ({ client }) => addContact(client, "Jane Doe", "555-0100"), {
        logger,
      });

      const aliceState = await withSession(fileConfig("alice"), configPath, ({ client }) => loadContacts(client), {
        logger,
      });
      expect(aliceState.privateContacts.map((contact) => contact.name)).toEqual(["Jane Doe"]);
      const [contact] = aliceState.privateContacts;

      const share = await withSession(fileConfig("alice"), configPath, ({ client }) => shareContact(client, contact.id), {
        logger,
      });
      if (!share.url) {
        throw new Error("Saved share has no URL");
      }
      const url = share.url;

      const rootRecordId = await withSession(fileConfig("bob"), configPath, ({ client }) => acceptShare(client, url), {
        logger,
      });
      expect(rootRecordId).toEqual(contact.associatedRecord.recordId);

      const bobState = await withSession(fileConfig("bob"), configPath, ({ client }) => loadContacts(client), {
        logger,
      });
      expect(bobState.privateContacts).toEqual([]);
      expect(bobState.sharedContacts.map((shared) => [shared.id, shared.name, shared.phoneNumber])).toEqual([
        [contact.id, "Jane Doe", "555-0100"],
      ]);

      const flags: unknown = JSON.parse(await fs.readFile(path.join(dir, "flags-alice.json"), "utf-8"));
      expect(flags).toEqual({ isZoneCreated: true });
    });

    it("should return the existing share when sharing again", async () => {
      await withSession(fileConfig("alice"), configPath, ({ client }) => addContact(client, "Jane Doe", "555-0100"), {
        logger,
      });
      const { privateContacts } = await withSession(fileConfig("alice"), configPath, ({ client }) => loadContacts(client), {
        logger,
      });
      const contactId = privateContacts[0].id;

      const first = await withSession(fileConfig("alice"), configPath, ({ client }) => shareContact(client, contactId), {
        logger,
      });
      const second = await withSession(fileConfig("alice"), configPath, ({ client }) => shareContact(client, contactId), {
        logger,
      });

      expect(second.recordId).toEqual(first.recordId);
      expect(second.url).toBe(first.url);
    });

    it("should reject sharing an unknown contact", async () => {
      await expect(
        withSession(fileConfig("alice"), configPath, ({ client }) => shareContact(client, "missing"), { logger })
      ).rejects.toThrow("Contact not found: missing");
    });

    it("should persist the store even when the command fails", async () => {
      const failure = new Error("interrupted");

      await expect(
        withSession(
          fileConfig("alice"),
          configPath,
          async ({ client }) => {
            await addContact(client, "Jane Doe", "555-0100");
            throw failure;
          },
          { logger }
        )
      ).rejects.toBe(failure);

      const reopened = await JsonFileCloud.open(path.join(dir, "cloud.json"), { containerIdentifier: "iCloud.test.contacts" });
      expect(reopened.getRecords("alice", "Contacts").map((record) => record.fields.name)).toEqual(["Jane Doe"]);
    });

    it("should keep the command error when persisting also fails", async () => {
      const config: ConfigFile = { ...fileConfig("alice"), store: { driver: "file", conn: "nested/cloud.json" } };
      const failure = new Error("interrupted");

      await expect(
        withSession(
          config,
          configPath,
          async () => {
            await fs.writeFile(path.join(dir, "nested"), "not a directory", "utf-8");
            throw failure;
          },
          { logger }
        )
      ).rejects.toBe(failure);
    });

    it("should not rewrite the store file for a read-only command", async () => {
      const cloudPath = path.join(dir, "cloud.json");
      await refreshOnce(fileConfig("alice"), configPath, { logger });
      await withSession(fileConfig("alice"), configPath, ({ client }) => addContact(client, "Jane Doe", "555-0100"), {
        logger,
      });
      const before = await fs.stat(cloudPath);

      const state = await refreshOnce(fileConfig("alice"), configPath, { logger });

      expect(state.privateContacts.map((contact) => contact.name)).toEqual(["Jane Doe"]);
      expect((await fs.stat(cloudPath)).ino).toBe(before.ino);
    });

    it("should see changes made by other commands between refreshes", async () => {
      const first = await refreshOnce(fileConfig("alice"), configPath, { logger });
      await withSession(fileConfig("alice"), configPath, ({ client }) => addContact(client, "Jane Doe", "555-0100"), {
        logger,
      });

      const second = await refreshOnce(fileConfig("alice"), configPath, { logger });

      expect(first.privateContacts).toEqual([]);
      expect(second.privateContacts.map((contact) => contact.name)).toEqual(["Jane Doe"]);
      const reopened = await JsonFileCloud.open(path.join(dir, "cloud.json"), { containerIdentifier: "iCloud.test.contacts" });
      expect(reopened.getRecords("alice", "Contacts").map((record) => record.fields.name)).toEqual(["Jane Doe"]);
    });

    it("should surface a failed refresh as the refresh error", async () => {
      const session = await openSession(memoryConfig, configPath, { logger });
      const failure = new RecordStoreError("networkFailure", "offline");
      session.store.cloud.failNext("fetchChangePage", failure, "private");

      await expect(loadContacts(session.client)).rejects.toBe(failure);
      expect(session.client.getState()).toEqual({ status: "error", error: failure });
    });

    it("should use the configured zone name", async () => {
      const session = await openSession({ ...memoryConfig, zone: "Family" }, configPath, { logger });

      await addContact(session.client, "Jane Doe", "555-0100");

      expect(session.store.cloud.getRecords("alice", "Family")).toHaveLength(1);
      expect(session.store.cloud.getRecords("alice", "Contacts")).toEqual([]);
    });
  });

  describe("formatContacts", () => {
    it("should print one line per contact and mark empty lists", () => {
      const contact: Contact = {
        id: "contact-1",
        name: "Jane Doe",
        phoneNumber: "555-0100",
        associatedRecord: {
          recordId: { recordName: "contact-1", zoneId: { zoneName: "Contacts", ownerName: "alice" } },
          recordType: "Contact",
          fields: { name: "Jane Doe", phoneNumber: "555-0100" },
          share: null,
        },
      };

      expect(formatContacts({ status: "loaded", privateContacts: [contact], sharedContacts: [] })).toEqual([
        "Private contacts:",
        "contact-1\tJane Doe\t555-0100",
        "Shared contacts:",
        "  (none)",
      ]);
    });
  });
});
