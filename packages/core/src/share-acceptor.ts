/**
 * ShareAcceptor - accepts shares sent to this account by other users.
 */

import type { CloudContainer, RecordID, ShareMetadata } from "./types.js";
import { recordKey } from "./types.js";
import { InvalidStateError, RecordStoreError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

export interface ShareAcceptorOptions {
  container: CloudContainer;
  logger?: Logger;
}

export class ShareAcceptor {
  private readonly container: CloudContainer;
  private readonly logger: Logger;

  constructor(options: ShareAcceptorOptions) {
    this.container = options.container;
    this.logger = options.logger ?? createLogger();
  }

  /**
   * Accept a share in this container.
   * Metadata issued for another container is rejected without calling the store.
   * @returns The root record ID of the accepted share
   */
  async acceptShare(metadata: ShareMetadata): Promise<RecordID> {
    if (metadata.containerIdentifier !== this.container.identifier) {
      this.logger.warn(
        { container: metadata.containerIdentifier, expected: this.container.identifier },
        "Shared container identifier did not match known identifier"
      );
      throw new InvalidStateError(
        `Share belongs to container ${metadata.containerIdentifier}, expected ${this.container.identifier}`
      );
    }

    const rootRecord = recordKey(metadata.rootRecordId);
    this.logger.debug({ rootRecord, owner: metadata.ownerName }, "Accepting share");

    const response = await this.container.acceptShares([metadata]);

    for (const result of response.results) {
      const root = recordKey(result.metadata.rootRecordId);
      if (result.error) {
        this.logger.error({ rootRecord: root, err: result.error }, "Error accepting share");
      } else {
        this.logger.info({ rootRecord: root }, "Accepted share");
      }
    }

    const failure =
      response.results.find((result) => result.error !== null)?.error ?? response.error;
    if (failure) {
      throw failure;
    }
    if (response.results.length === 0) {
      throw new RecordStoreError("partialFailure", `No result reported for share of ${rootRecord}`);
    }

    return metadata.rootRecordId;
  }

  /**
   * Resolve a share URL to its metadata, then accept it.
   */
  async acceptShareUrl(url: string): Promise<RecordID> {
    const metadata = await this.container.fetchShareMetadata(url);
    return this.acceptShare(metadata);
  }
}
