#!/usr/bin/env tsx
/**
 * ContactShare CLI - Main entry point
 */

import { Command } from "commander";
import * as path from "path";
import * as fs from "fs/promises";
import { config as loadEnv } from "dotenv";
import * as cron from "node-cron";
import { createLogger, recordKey, type Logger } from "@contactshare/core";
import type { ConfigFile } from "./config.js";
import { loadConfigFile } from "./parser.js";
import {
  acceptShare,
  addContact,
  formatContacts,
  loadContacts,
  refreshOnce,
  shareContact,
  withSession,
  type LoadedState,
  type Session,
} from "./runner.js";

// Load environment variables from .env file if it exists
loadEnv();

const DEFAULT_CONFIG = "contactshare.jsonc";

interface CommandOptions {
  config: string;
}

const program = new Command();

program
  .name("contactshare")
  .description("Sync and share contacts through a managed record store")
  .version("0.1.0");

/**
 * Resolve and load the config file, exiting when it is missing.
 */
async function readConfig(configOption: string): Promise<{ configPath: string; config: ConfigFile }> {
  const configPath = path.resolve(configOption);
  try {
    await fs.access(configPath);
  } catch {
    console.error(`Error: Configuration file not found: ${configPath}`);
    process.exit(1);
  }
  return { configPath, config: await loadConfigFile(configPath) };
}

function cliLogger(config: ConfigFile): Logger {
  return createLogger({ level: config.log_level, pretty: process.stdout.isTTY });
}

/**
 * Run a command in a session and exit with its status.
 */
async function execute(options: CommandOptions, action: (session: Session) => Promise<void>): Promise<void> {
  try {
    const { configPath, config } = await readConfig(options.config);
    await withSession(config, configPath, action, { logger: cliLogger(config) });
    process.exit(0);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

program
  .command("init")
  .description("Create the contacts zone if needed and load contacts once")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG)
  .action((options: CommandOptions) =>
    execute(options, async ({ client, config }) => {
      const state = await loadContacts(client);
      console.log(`Zone '${client.zoneId.zoneName}' ready for account '${config.account}'`);
      console.log(`  Private: ${state.privateContacts.length}, shared: ${state.sharedContacts.length}`);
    })
  );

program
  .command("list")
  .description("List private and shared contacts")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG)
  .action((options: CommandOptions) =>
    execute(options, async ({ client }) => {
      const state = await loadContacts(client);
      for (const line of formatContacts(state)) {
        console.log(line);
      }
    })
  );

program
  .command("add <name> <phone>")
  .description("Add a contact to the account's zone")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG)
  .action((name: string, phone: string, options: CommandOptions) =>
    execute(options, async ({ client }) => {
      await addContact(client, name, phone);
      console.log(`Added ${name}`);
    })
  );

program
  .command("share <contactId>")
  .description("Share a contact and print the share URL")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG)
  .action((contactId: string, options: CommandOptions) =>
    execute(options, async ({ client }) => {
      const share = await shareContact(client, contactId);
      console.log(share.url ?? `Share ${share.recordId.recordName} has no URL yet`);
    })
  );

program
  .command("accept <url>")
  .description("Accept a contact shared by another account")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG)
  .action((url: string, options: CommandOptions) =>
    execute(options, async ({ client }) => {
      const rootRecordId = await acceptShare(client, url);
      console.log(`Accepted share of ${recordKey(rootRecordId)}`);
    })
  );

program
  .command("watch")
  .description("Refresh contacts on the configured schedule")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG)
  .action(async (options: CommandOptions) => {
    try {
      const { configPath, config } = await readConfig(options.config);
      const schedule = config.refresh?.schedule;
      if (!schedule) {
        console.error("Error: 'refresh.schedule' is not set");
        process.exit(1);
      }

      const logger = cliLogger(config);
      const report = (state: LoadedState) => {
        console.log(
          `[${new Date().toISOString()}] private: ${state.privateContacts.length}, shared: ${state.sharedContacts.length}`
        );
      };
      report(await refreshOnce(config, configPath, { logger }));

      const task = cron.schedule(
        schedule,
        async () => {
          try {
            report(await refreshOnce(config, configPath, { logger }));
          } catch (error) {
            logger.error({ err: error }, "Scheduled refresh failed");
          }
        },
        {
          scheduled: true,
          timezone: "UTC",
        }
      );

      console.log(`Refreshing with cron: ${schedule}. Press Ctrl+C to stop.`);

      process.on("SIGINT", () => {
        console.log("\nShutting down...");
        task.stop();
        process.exit(0);
      });

      // Keep process alive
      await new Promise(() => {}); // Never resolves
    } catch (error) {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    }
  });

program
  .command("validate")
  .description("Validate a configuration file without contacting the store")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG)
  .action(async (options: CommandOptions) => {
    try {
      const { configPath, config } = await readConfig(options.config);

      console.log(`✓ Configuration file is valid: ${configPath}`);
      console.log(`  Container: ${config.container}`);
      console.log(`  Account: ${config.account}`);
      console.log(`  Store: ${config.store.driver} (${config.store.conn})`);
      console.log(`  Flags: ${config.flags.driver} (${config.flags.conn})`);
      console.log(`  Refresh: ${config.refresh?.schedule ?? "manual"}`);

      process.exit(0);
    } catch (error) {
      console.error("Configuration validation failed:", error);
      process.exit(1);
    }
  });

// Parse command line arguments
program.parse();
