/**
 * ContactWriter - persists new contacts in the managed zone.
 */

import { v4 as uuidv4 } from "uuid";
import type { CloudDatabase, Contact, ZoneID } from "./types.js";
import { recordKey } from "./types.js";
import { contactMapper, type RecordMapper } from "./mapper.js";
import { createLogger, type Logger } from "./logger.js";

export interface ContactWriterOptions {
  database: CloudDatabase;
  zoneId: ZoneID;
  mapper?: RecordMapper<Contact>;
  logger?: Logger;
  /** Record name generator, random UUIDs by default */
  generateId?: () => string;
}

export class ContactWriter {
  private readonly database: CloudDatabase;
  private readonly zoneId: ZoneID;
  private readonly mapper: RecordMapper<Contact>;
  private readonly logger: Logger;
  private readonly generateId: () => string;

  constructor(options: ContactWriterOptions) {
    this.database = options.database;
    this.zoneId = options.zoneId;
    this.mapper = options.mapper ?? contactMapper;
    this.logger = options.logger ?? createLogger();
    this.generateId = options.generateId ?? uuidv4;
  }

  /**
   * Save a new contact record, overwriting every field on conflict.
   * Nothing is returned: the contact becomes visible on the next refresh.
   */
  async addContact(name: string, phoneNumber: string): Promise<void> {
    const record = this.mapper.toRecord(
      { recordName: this.generateId(), zoneId: this.zoneId },
      { name, phoneNumber }
    );

    try {
      await this.database.saveRecord(record, "allKeys");
    } catch (error) {
      this.logger.error({ record: recordKey(record.recordId), err: error }, "Error adding contact");
      throw error;
    }
    this.logger.info({ record: recordKey(record.recordId) }, "Added contact");
  }
}
