// ---------------------------------------------------------------------------
// Project Store Errors
// ---------------------------------------------------------------------------

export type ProjectStoreErrorCode =
  | "NOT_FOUND"
  | "DUPLICATE_ID"
  | "INDEX_OUT_OF_RANGE"
  | "CORRUPT_INDEX"
  | "STORAGE_IO"
  | "INVALID_VALUE"
  | "STORE_CLOSED"
  | "STALE_RECORD";

export class ProjectStoreError extends Error {
  public readonly code: ProjectStoreErrorCode;

  constructor(code: ProjectStoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProjectStoreError";
    this.code = code;
  }
}

export class NotFoundError extends ProjectStoreError {
  constructor(message: string) {
    super("NOT_FOUND", message);
    this.name = "NotFoundError";
  }
}

export class DuplicateIdError extends ProjectStoreError {
  constructor(public readonly projectId: string) {
    super("DUPLICATE_ID", `project already exists: ${projectId}`);
    this.name = "DuplicateIdError";
  }
}

export class IndexOutOfRangeError extends ProjectStoreError {
  constructor(
    public readonly index: number,
    public readonly length: number,
  ) {
    super("INDEX_OUT_OF_RANGE", `comment index ${index} out of range (0..${length - 1})`);
    this.name = "IndexOutOfRangeError";
  }
}

export class CorruptIndexError extends ProjectStoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CORRUPT_INDEX", message, options);
    this.name = "CorruptIndexError";
  }
}

/** Underlying read/write failure. Always carries the fs error as `cause`. */
export class StorageIOError extends ProjectStoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STORAGE_IO", message, options);
    this.name = "StorageIOError";
  }
}

export class InvalidValueError extends ProjectStoreError {
  constructor(message: string) {
    super("INVALID_VALUE", message);
    this.name = "InvalidValueError";
  }
}

export class StoreClosedError extends ProjectStoreError {
  constructor() {
    super("STORE_CLOSED", "project store is not open");
    this.name = "StoreClosedError";
  }
}

/** The instance passed to `save` is not the one the store currently holds for its id. */
export class StaleRecordError extends ProjectStoreError {
  constructor(public readonly projectId: string) {
    super("STALE_RECORD", `project ${projectId} was reloaded or replaced; get it again before saving`);
    this.name = "StaleRecordError";
  }
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}
