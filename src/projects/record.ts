// ---------------------------------------------------------------------------
// ProjectRecord – in-memory state of one print job
// ---------------------------------------------------------------------------
// Mutations go through methods so that every field change lands in the
// change log. Comments and versions keep their own ordered trails; the
// change log only ever grows.
// ---------------------------------------------------------------------------

import type {
  ChangeLogEntry,
  ChangeValue,
  Customer,
  ProjectComment,
  ProjectCreateInput,
  ProjectRecordData,
  ProjectStatus,
  VersionEntry,
} from "./types.js";
import { IndexOutOfRangeError, InvalidValueError } from "./errors.js";
import { contentHash } from "./hash.js";
import { INITIAL_STATUS, isProjectStatus } from "./types.js";

export type ProjectRecordOptions = {
  nowMs?: () => number;
};

function assertStatus(value: unknown): asserts value is ProjectStatus {
  if (!isProjectStatus(value)) {
    throw new InvalidValueError(`unknown project status: ${String(value)}`);
  }
}

function assertQuantity(value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidValueError(`quantity must be a positive integer, got ${value}`);
  }
}

function cloneCustomer(customer: Customer): Customer {
  return {
    ...customer,
    shipping: customer.shipping ? { ...customer.shipping } : undefined,
  };
}

function freezeCustomer(customer: Customer): Readonly<Customer> {
  const shipping = customer.shipping ? Object.freeze({ ...customer.shipping }) : undefined;
  return Object.freeze({ ...customer, shipping });
}

/** Frozen copy of a logged value; nested shipping addresses included. */
function freezeValue(value: ChangeValue): ChangeValue {
  if (value === null || typeof value !== "object") {
    return value;
  }
  if ("author" in value) {
    return Object.freeze({ ...value });
  }
  return freezeCustomer(value);
}

function cloneValue(value: ChangeValue): ChangeValue {
  if (value === null || typeof value !== "object") {
    return value;
  }
  if ("author" in value) {
    return { ...value };
  }
  return cloneCustomer(value);
}

export class ProjectRecord {
  readonly id: string;
  private _status: ProjectStatus;
  private _responsible: string;
  private _customer: Readonly<Customer>;
  private _name: string | undefined;
  private _quantity: number;
  private readonly _comments: Readonly<ProjectComment>[];
  private readonly _changeLog: ChangeLogEntry[];
  private readonly _versions: VersionEntry[];
  readonly createdAtMs: number;
  private _updatedAtMs: number;
  private readonly nowMs: () => number;

  private constructor(data: ProjectRecordData, opts?: ProjectRecordOptions) {
    this.id = data.id;
    this._status = data.status;
    this._responsible = data.responsible;
    this._customer = freezeCustomer(data.customer);
    this._name = data.name;
    this._quantity = data.quantity;
    this._comments = data.comments.map((c) => Object.freeze({ ...c }));
    this._changeLog = data.changeLog.map((e) =>
      Object.freeze({ ...e, oldValue: freezeValue(e.oldValue), newValue: freezeValue(e.newValue) }),
    );
    this._versions = data.versions.map((v) => Object.freeze({ ...v }));
    this.createdAtMs = data.createdAtMs;
    this._updatedAtMs = data.updatedAtMs;
    this.nowMs = opts?.nowMs ?? Date.now;
  }

  static create(input: ProjectCreateInput, opts?: ProjectRecordOptions): ProjectRecord {
    if (!input.id.trim()) {
      throw new InvalidValueError("project id must be a non-empty string");
    }
    const status = input.status ?? INITIAL_STATUS;
    assertStatus(status);
    const quantity = input.quantity ?? 1;
    assertQuantity(quantity);

    const now = (opts?.nowMs ?? Date.now)();
    return new ProjectRecord(
      {
        id: input.id,
        status,
        responsible: input.responsible,
        customer: input.customer,
        name: input.name,
        quantity,
        comments: [],
        changeLog: [],
        versions: [],
        createdAtMs: now,
        updatedAtMs: now,
      },
      opts,
    );
  }

  /** Rebuild a record from a snapshot produced by `toJSON()`. */
  static fromJSON(data: ProjectRecordData, opts?: ProjectRecordOptions): ProjectRecord {
    return new ProjectRecord(data, opts);
  }

  get status(): ProjectStatus {
    return this._status;
  }

  get responsible(): string {
    return this._responsible;
  }

  get customer(): Readonly<Customer> {
    return this._customer;
  }

  get name(): string | undefined {
    return this._name;
  }

  get quantity(): number {
    return this._quantity;
  }

  get comments(): readonly Readonly<ProjectComment>[] {
    return this._comments;
  }

  get changeLog(): readonly Readonly<ChangeLogEntry>[] {
    return this._changeLog;
  }

  get versions(): readonly Readonly<VersionEntry>[] {
    return this._versions;
  }

  get updatedAtMs(): number {
    return this._updatedAtMs;
  }

  latestVersion(): Readonly<VersionEntry> | undefined {
    return this._versions[this._versions.length - 1];
  }

  // =========================================================================
  // Field updates (each call appends exactly one change-log entry)
  // =========================================================================

  /** Same-value transitions are still logged. */
  setStatus(newStatus: ProjectStatus, actor: string): void {
    assertStatus(newStatus);
    const old = this._status;
    this._status = newStatus;
    this.log("status", old, newStatus, actor);
  }

  setResponsible(responsible: string, actor: string): void {
    const old = this._responsible;
    this._responsible = responsible;
    this.log("responsible", old, responsible, actor);
  }

  setCustomer(customer: Customer, actor: string): void {
    const old = this._customer;
    this._customer = freezeCustomer(customer);
    this.log("customer", old, this._customer, actor);
  }

  setName(name: string, actor: string): void {
    const old = this._name ?? null;
    this._name = name;
    this.log("name", old, name, actor);
  }

  setQuantity(quantity: number, actor: string): void {
    assertQuantity(quantity);
    const old = this._quantity;
    this._quantity = quantity;
    this.log("quantity", old, quantity, actor);
  }

  // =========================================================================
  // Comments
  // =========================================================================

  addComment(author: string, text: string): Readonly<ProjectComment> {
    const comment = Object.freeze({ createdAtMs: this.nowMs(), author, text });
    this._comments.push(comment);
    this.touch();
    return comment;
  }

  editComment(index: number, newText: string, actor: string): void {
    const comment = this.commentAt(index);
    const oldText = comment.text;
    this._comments[index] = Object.freeze({ ...comment, text: newText, editedAtMs: this.nowMs() });
    this.log(`comments[${index}]`, oldText, newText, actor);
  }

  removeComment(index: number, actor: string): void {
    const comment = this.commentAt(index);
    this._comments.splice(index, 1);
    this.log(`comments[${index}]`, comment, null, actor);
  }

  // =========================================================================
  // Versions
  // =========================================================================

  /** Appends a version entry for `bytes` and returns its content hash. Never replaces an entry. */
  archiveVersion(bytes: Uint8Array, originalFilename: string): string {
    return this.appendVersion(bytes, originalFilename).contentHash;
  }

  appendVersion(bytes: Uint8Array, originalFilename: string): Readonly<VersionEntry> {
    const previous = this.latestVersion();
    const entry: Readonly<VersionEntry> = Object.freeze({
      versionNumber: (previous?.versionNumber ?? 0) + 1,
      contentHash: contentHash(bytes),
      archivedAtMs: this.nowMs(),
      originalFilename,
      sizeBytes: bytes.byteLength,
    });
    this._versions.push(entry);
    this.touch();
    return entry;
  }

  toJSON(): ProjectRecordData {
    return {
      id: this.id,
      status: this._status,
      responsible: this._responsible,
      customer: cloneCustomer(this._customer),
      name: this._name,
      quantity: this._quantity,
      comments: this._comments.map((c) => ({ ...c })),
      changeLog: this._changeLog.map((e) => ({
        ...e,
        oldValue: cloneValue(e.oldValue),
        newValue: cloneValue(e.newValue),
      })),
      versions: this._versions.map((v) => ({ ...v })),
      createdAtMs: this.createdAtMs,
      updatedAtMs: this._updatedAtMs,
    };
  }

  // =========================================================================
  // Internals
  // =========================================================================

  private commentAt(index: number): Readonly<ProjectComment> {
    const comment = Number.isInteger(index) && index >= 0 ? this._comments[index] : undefined;
    if (!comment) {
      throw new IndexOutOfRangeError(index, this._comments.length);
    }
    return comment;
  }

  private log(field: string, oldValue: ChangeValue, newValue: ChangeValue, actor: string): void {
    const atMs = this.nowMs();
    this._changeLog.push(
      Object.freeze({
        atMs,
        field,
        oldValue: freezeValue(oldValue),
        newValue: freezeValue(newValue),
        actor,
      }),
    );
    this._updatedAtMs = atMs;
  }

  private touch(): void {
    this._updatedAtMs = this.nowMs();
  }
}
