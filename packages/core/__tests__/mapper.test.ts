/**
 * Tests for the contact record mapper.
 */

import { contactFromRecord, contactMapper, CONTACT_RECORD_TYPE } from "../src/mapper";
import { record, zone } from "./helpers";

describe("contactMapper", () => {
  describe("fromRecord", () => {
    it("should map a record with both fields", () => {
      const source = record("c1", { name: "Jane Doe", phoneNumber: "555-0100" });

      const contact = contactFromRecord(source);

      expect(contact).toEqual({
        id: "c1",
        name: "Jane Doe",
        phoneNumber: "555-0100",
        associatedRecord: source,
      });
      expect(contact?.associatedRecord).toBe(source);
    });

    it("should return null when the name is missing", () => {
      expect(contactFromRecord(record("c1", { phoneNumber: "555-0100" }))).toBeNull();
    });

    it("should return null when a field has the wrong type", () => {
      expect(contactFromRecord(record("c1", { name: "Jane Doe", phoneNumber: 5550100 }))).toBeNull();
      expect(contactFromRecord(record("c2", { name: null, phoneNumber: "555-0100" }))).toBeNull();
    });

    it("should accept empty strings", () => {
      expect(contactFromRecord(record("c1", { name: "", phoneNumber: "" }))?.name).toBe("");
    });
  });

  describe("toRecord", () => {
    it("should build an unsaved contact record", () => {
      const recordId = { recordName: "c9", zoneId: zone("Contacts") };

      expect(contactMapper.toRecord(recordId, { name: "John Roe", phoneNumber: "555-0199" })).toEqual({
        recordId,
        recordType: CONTACT_RECORD_TYPE,
        fields: { name: "John Roe", phoneNumber: "555-0199" },
        share: null,
      });
    });
  });
});
