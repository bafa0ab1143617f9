/**
 * ChangeFetcher - pages through zone change feeds and collects contacts.
 */

import type {
  ChangeToken,
  CloudContainer,
  CloudDatabase,
  Contact,
  DatabaseScope,
  ZoneID,
} from "./types.js";
import { recordKey, zoneKey } from "./types.js";
import { CONTACT_RECORD_TYPE, contactMapper, type RecordMapper } from "./mapper.js";
import { createLogger, type Logger } from "./logger.js";

export interface ChangeFetcherOptions {
  container: CloudContainer;
  mapper?: RecordMapper<Contact>;
  logger?: Logger;
}

/**
 * Fetches every contact in a set of zones, starting from the beginning of each feed.
 */
export class ChangeFetcher {
  private readonly container: CloudContainer;
  private readonly mapper: RecordMapper<Contact>;
  private readonly logger: Logger;

  constructor(options: ChangeFetcherOptions) {
    this.container = options.container;
    this.mapper = options.mapper ?? contactMapper;
    this.logger = options.logger ?? createLogger();
  }

  /**
   * Fetch contacts for the given zones in one database scope.
   * Zones are fetched concurrently; the first failing zone rejects the call.
   * The returned list has no ordering guarantee.
   */
  async fetchChanges(scope: DatabaseScope, zones: ZoneID[]): Promise<Contact[]> {
    const database = this.container.database(scope);
    const perZone = await Promise.all(
      zones.map((zoneId) => this.fetchZone(database, zoneId))
    );
    return perZone.flat();
  }

  /**
   * Follow one zone's feed until the store reports no more changes.
   * Pages are requested strictly in order: page N's token is needed for page N+1.
   */
  private async fetchZone(database: CloudDatabase, zoneId: ZoneID): Promise<Contact[]> {
    const contacts = new Map<string, Contact>();
    let token: ChangeToken = { value: null };
    let moreComing = true;
    let pages = 0;
    let dropped = 0;

    while (moreComing) {
      const page = await database.fetchChangePage(zoneId, token);
      pages++;

      for (const record of page.changedRecords) {
        const key = recordKey(record.recordId);
        // Non-contact records (shares included) are not part of the result
        if (record.recordType !== CONTACT_RECORD_TYPE) {
          continue;
        }

        const contact = this.mapper.fromRecord(record);
        if (!contact) {
          dropped++;
          this.logger.debug({ record: key }, "Dropping record with missing contact fields");
          contacts.delete(key);
          continue;
        }
        contacts.set(key, contact);
      }

      for (const recordId of page.deletedRecordIds) {
        contacts.delete(recordKey(recordId));
      }

      token = page.nextToken;
      moreComing = page.moreComing;
    }

    this.logger.debug(
      { scope: database.scope, zone: zoneKey(zoneId), pages, contacts: contacts.size, dropped },
      "Fetched zone changes"
    );

    return Array.from(contacts.values());
  }
}
