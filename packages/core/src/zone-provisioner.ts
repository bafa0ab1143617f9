/**
 * ZoneProvisioner - creates the managed zone once per installation.
 */

import type { CloudDatabase, FlagStore, ZoneID } from "./types.js";
import { zoneKey } from "./types.js";
import { createLogger, type Logger } from "./logger.js";

/**
 * Flag recording that the managed zone exists.
 */
export const ZONE_CREATED_FLAG = "isZoneCreated";

export interface ZoneProvisionerOptions {
  database: CloudDatabase;
  flagStore: FlagStore;
  zoneId: ZoneID;
  logger?: Logger;
}

/**
 * Ensures the zone exists before any read or write.
 * Not guarded against concurrent callers: the flag is read, then written,
 * without a transaction, so callers run it once at startup.
 */
export class ZoneProvisioner {
  private readonly database: CloudDatabase;
  private readonly flagStore: FlagStore;
  private readonly zoneId: ZoneID;
  private readonly logger: Logger;

  constructor(options: ZoneProvisionerOptions) {
    this.database = options.database;
    this.flagStore = options.flagStore;
    this.zoneId = options.zoneId;
    this.logger = options.logger ?? createLogger();
  }

  /**
   * Create the zone unless the flag says it was already created.
   * On failure the flag stays unset, so the next call retries.
   */
  async ensureZone(): Promise<void> {
    if (await this.flagStore.get(ZONE_CREATED_FLAG)) {
      return;
    }

    const zone = zoneKey(this.zoneId);
    try {
      await this.database.createZone(this.zoneId);
    } catch (error) {
      this.logger.error({ zone, err: error }, "Failed to create custom zone");
      throw error;
    }

    await this.flagStore.set(ZONE_CREATED_FLAG, true);
    this.logger.info({ zone }, "Created custom zone");
  }
}
