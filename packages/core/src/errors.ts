/**
 * Error taxonomy for the client workflow.
 */

export type RecordStoreErrorCode =
  | "notFound"
  | "zoneNotFound"
  | "serverRecordChanged"
  | "permissionFailure"
  | "networkFailure"
  | "partialFailure";

/**
 * Failure reported by the record store (transport, auth, quota, missing records).
 * Forwarded as-is by every component.
 */
export class RecordStoreError extends Error {
  readonly code: RecordStoreErrorCode;

  constructor(code: RecordStoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RecordStoreError";
    this.code = code;
  }
}

/**
 * A share referenced by a record could not be fetched, or was not a share.
 */
export class ShareResolutionError extends Error {
  readonly code = "invalidRemoteShare";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ShareResolutionError";
  }
}

/**
 * A locally expected invariant did not hold.
 */
export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidStateError";
  }
}

export function isRecordStoreError(
  error: unknown,
  code?: RecordStoreErrorCode
): error is RecordStoreError {
  return error instanceof RecordStoreError && (code === undefined || error.code === code);
}

/**
 * Normalize a rejection value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Whether a filesystem error reports a missing file.
 * Checks the `code` property rather than the class, since fs errors may come from another realm.
 */
export function isMissingFileError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
