/**
 * ShareResolver - returns a contact's existing share, or creates one.
 */

import type { CloudContainer, CloudDatabase, Contact, RecordID, RemoteRecord, Share } from "./types.js";
import { isShare, recordKey } from "./types.js";
import { ShareResolutionError, isRecordStoreError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

export interface ShareResolverOptions {
  container: CloudContainer;
  logger?: Logger;
}

export interface ResolvedShare {
  share: Share;
  container: CloudContainer;
}

/**
 * Title given to a new share for a contact.
 */
export function shareTitle(contact: Contact): string {
  return `Contact: ${contact.name}`;
}

export class ShareResolver {
  private readonly container: CloudContainer;
  private readonly database: CloudDatabase;
  private readonly logger: Logger;

  constructor(options: ShareResolverOptions) {
    this.container = options.container;
    this.database = options.container.database("private");
    this.logger = options.logger ?? createLogger();
  }

  async resolveShare(contact: Contact): Promise<ResolvedShare> {
    const root = contact.associatedRecord;
    const shareRef = root.share ?? (await this.currentShareReference(root));

    if (shareRef) {
      const share = await this.fetchShare(shareRef.recordId);
      return { share, container: this.container };
    }

    const created = this.database.createShare(root, shareTitle(contact));

    let saved: RemoteRecord[];
    try {
      saved = await this.database.saveRecords(
        [created.rootRecord, created.share],
        [],
        "ifServerRecordUnchanged"
      );
    } catch (error) {
      this.logger.error({ record: recordKey(root.recordId), err: error }, "Error saving share");
      throw error;
    }

    const share = saved.find(isShare) ?? created.share;
    this.logger.info(
      { record: recordKey(root.recordId), share: share.recordId.recordName },
      "Created share"
    );
    return { share, container: this.container };
  }

  /**
   * The contact value may predate a share created since it was fetched,
   * so read the server copy before creating a second one.
   * A record the server has never seen has no share.
   */
  private async currentShareReference(root: RemoteRecord): Promise<RemoteRecord["share"]> {
    try {
      const current = await this.database.fetchRecord(root.recordId);
      return current.share;
    } catch (error) {
      if (isRecordStoreError(error, "notFound")) {
        return null;
      }
      throw error;
    }
  }

  private async fetchShare(recordId: RecordID): Promise<Share> {
    let record: RemoteRecord;
    try {
      record = await this.database.fetchRecord(recordId);
    } catch (error) {
      throw new ShareResolutionError(
        `Failed to fetch share ${recordKey(recordId)}`,
        { cause: error }
      );
    }

    if (!isShare(record)) {
      throw new ShareResolutionError(
        `Record ${recordKey(recordId)} is not a share (type ${record.recordType})`
      );
    }
    return record;
  }
}
