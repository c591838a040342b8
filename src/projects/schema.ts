// ---------------------------------------------------------------------------
// Project Schemas – TypeBox definitions for every persisted file
// ---------------------------------------------------------------------------
// Records and the index are plain JSON on disk. Each file is checked against
// these schemas on load so a hand-edited or truncated file never reaches a
// ProjectRecord.
// ---------------------------------------------------------------------------

import { Type, type Static } from "@sinclair/typebox";

export const ProjectStatusSchema = Type.Union([
  Type.Literal("Received"),
  Type.Literal("InProgress"),
  Type.Literal("OnHold"),
  Type.Literal("Shipped"),
  Type.Literal("Cancelled"),
]);

export const ShippingAddressSchema = Type.Object({
  street: Type.String(),
  city: Type.String(),
  postCode: Type.String(),
  country: Type.String(),
});

export const CustomerSchema = Type.Object({
  name: Type.String(),
  customerId: Type.Optional(Type.String()),
  shipping: Type.Optional(ShippingAddressSchema),
});

export const ProjectCommentSchema = Type.Object({
  createdAtMs: Type.Number(),
  author: Type.String(),
  text: Type.String(),
  editedAtMs: Type.Optional(Type.Number()),
});

export const ChangeValueSchema = Type.Union([
  Type.String(),
  Type.Number(),
  Type.Null(),
  CustomerSchema,
  ProjectCommentSchema,
]);

export const ChangeLogEntrySchema = Type.Object({
  atMs: Type.Number(),
  field: Type.String({ minLength: 1 }),
  oldValue: ChangeValueSchema,
  newValue: ChangeValueSchema,
  actor: Type.String(),
});

export const VersionEntrySchema = Type.Object({
  versionNumber: Type.Integer({ minimum: 1 }),
  contentHash: Type.String({ pattern: "^[0-9a-f]{64}$" }),
  archivedAtMs: Type.Number(),
  originalFilename: Type.String(),
  sizeBytes: Type.Integer({ minimum: 0 }),
});

export const ProjectRecordDataSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  status: ProjectStatusSchema,
  responsible: Type.String(),
  customer: CustomerSchema,
  name: Type.Optional(Type.String()),
  quantity: Type.Integer({ minimum: 1 }),
  comments: Type.Array(ProjectCommentSchema),
  changeLog: Type.Array(ChangeLogEntrySchema),
  versions: Type.Array(VersionEntrySchema),
  createdAtMs: Type.Number(),
  updatedAtMs: Type.Number(),
});

export const ProjectRecordFileSchema = Type.Object({
  version: Type.Literal(1),
  record: ProjectRecordDataSchema,
});

export const INDEX_COLUMNS = ["id", "status", "responsible", "lastModifiedMs", "storageKey"] as const;

// One row per project, in INDEX_COLUMNS order.
export const IndexRowTupleSchema = Type.Tuple([
  Type.String({ minLength: 1 }),
  ProjectStatusSchema,
  Type.String(),
  Type.Number(),
  Type.String({ pattern: "^[0-9a-f]{64}$" }),
]);

export const IndexFileSchema = Type.Object({
  version: Type.Literal(1),
  columns: Type.Array(Type.String()),
  rows: Type.Array(IndexRowTupleSchema),
});

export type ProjectStatus = Static<typeof ProjectStatusSchema>;
export type ShippingAddress = Static<typeof ShippingAddressSchema>;
export type Customer = Static<typeof CustomerSchema>;
export type ProjectComment = Static<typeof ProjectCommentSchema>;
export type ChangeValue = Static<typeof ChangeValueSchema>;
export type ChangeLogEntry = Static<typeof ChangeLogEntrySchema>;
export type VersionEntry = Static<typeof VersionEntrySchema>;
export type ProjectRecordData = Static<typeof ProjectRecordDataSchema>;
export type ProjectRecordFile = Static<typeof ProjectRecordFileSchema>;
export type IndexRowTuple = Static<typeof IndexRowTupleSchema>;
export type IndexFile = Static<typeof IndexFileSchema>;
