export { ProjectRecord, type ProjectRecordOptions } from "./projects/record.js";
export { ProjectStore, type ProjectStoreDeps } from "./projects/service.js";
export { openProjectStore } from "./projects/bootstrap.js";
export {
  ProjectStoreError,
  NotFoundError,
  DuplicateIdError,
  IndexOutOfRangeError,
  CorruptIndexError,
  StorageIOError,
  InvalidValueError,
  StoreClosedError,
  StaleRecordError,
  type ProjectStoreErrorCode,
} from "./projects/errors.js";
export { contentHash, storageKeyFor } from "./projects/hash.js";
export { resolveProjectStoreRoot } from "./projects/store.js";
export { PROJECT_STATUSES, INITIAL_STATUS, isProjectStatus } from "./projects/types.js";
export type {
  ChangeLogEntry,
  ChangeValue,
  Customer,
  ProjectComment,
  ProjectCreateInput,
  ProjectFilter,
  ProjectIndexRow,
  ProjectRecordData,
  ProjectStatus,
  ShippingAddress,
  VersionEntry,
  WriteOptions,
} from "./projects/types.js";
export { loadConfig, resolveConfigPath, ConfigError, type PrintdeskConfig } from "./config/config.js";
export { createLogger, setLogger, getLogger, getChildLogger } from "./logging.js";
