// ---------------------------------------------------------------------------
// Project Types – print jobs, their history and the store index
// ---------------------------------------------------------------------------

import type { Customer, ProjectStatus } from "./schema.js";

export type {
  ChangeLogEntry,
  ChangeValue,
  Customer,
  IndexFile,
  IndexRowTuple,
  ProjectComment,
  ProjectRecordData,
  ProjectRecordFile,
  ProjectStatus,
  ShippingAddress,
  VersionEntry,
} from "./schema.js";

export const PROJECT_STATUSES = [
  "Received",
  "InProgress",
  "OnHold",
  "Shipped",
  "Cancelled",
] as const satisfies readonly ProjectStatus[];

export const INITIAL_STATUS: ProjectStatus = "Received";

export function isProjectStatus(value: unknown): value is ProjectStatus {
  return PROJECT_STATUSES.some((status) => status === value);
}

export type ProjectCreateInput = {
  id: string;
  customer: Customer;
  responsible: string;
  status?: ProjectStatus;
  name?: string;
  quantity?: number;
};

export type ProjectFilter = {
  status?: ProjectStatus;
};

/** One row of the index table. */
export type ProjectIndexRow = {
  id: string;
  status: ProjectStatus;
  responsible: string;
  lastModifiedMs: number;
  /** 64-char hex name of the record file, without extension */
  storageKey: string;
};

export type WriteOptions = {
  /** Checked before any bytes are written; a write in progress always runs to completion. */
  signal?: AbortSignal;
};
