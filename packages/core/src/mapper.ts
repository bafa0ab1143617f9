/**
 * Conversion between remote records and Contact values.
 */

import type { Contact, RecordID, RemoteRecord } from "./types.js";

export const CONTACT_RECORD_TYPE = "Contact";

export const CONTACT_FIELDS = {
  name: "name",
  phoneNumber: "phoneNumber",
} as const;

/**
 * Maps records between the store's representation and a domain entity.
 */
export interface RecordMapper<T> {
  /**
   * Build an entity from a record, or return null if required fields are missing.
   */
  fromRecord(record: RemoteRecord): T | null;

  /**
   * Build an unsaved record for an entity's fields.
   */
  toRecord(recordId: RecordID, value: Omit<T, "id" | "associatedRecord">): RemoteRecord;
}

export const contactMapper: RecordMapper<Contact> = {
  fromRecord(record) {
    const name = record.fields[CONTACT_FIELDS.name];
    const phoneNumber = record.fields[CONTACT_FIELDS.phoneNumber];
    if (typeof name !== "string" || typeof phoneNumber !== "string") {
      return null;
    }

    return {
      id: record.recordId.recordName,
      name,
      phoneNumber,
      associatedRecord: record,
    };
  },

  toRecord(recordId, value) {
    return {
      recordId,
      recordType: CONTACT_RECORD_TYPE,
      fields: {
        [CONTACT_FIELDS.name]: value.name,
        [CONTACT_FIELDS.phoneNumber]: value.phoneNumber,
      },
      share: null,
    };
  },
};

export function contactFromRecord(record: RemoteRecord): Contact | null {
  return contactMapper.fromRecord(record);
}
