// ---------------------------------------------------------------------------
// ProjectStore – persistence and indexing for ProjectRecords
// ---------------------------------------------------------------------------
// Explicitly constructed, explicitly opened and closed. Writes for one
// project id are serialised through a promise chain; index writes share a
// single store-wide chain. Every persist rewrites the record file and the
// index file through temp-file + rename.
// ---------------------------------------------------------------------------

import * as path from "node:path";
import type {
  ProjectCreateInput,
  ProjectFilter,
  ProjectIndexRow,
  ProjectStatus,
  VersionEntry,
  WriteOptions,
} from "./types.js";
import {
  CorruptIndexError,
  DuplicateIdError,
  NotFoundError,
  StaleRecordError,
  StorageIOError,
  StoreClosedError,
} from "./errors.js";
import { contentHash, storageKeyFor } from "./hash.js";
import { ProjectIndex } from "./index-table.js";
import { ProjectRecord } from "./record.js";
import {
  listRecordKeys,
  readIndexFile,
  readRecordFile,
  readTextIfExists,
  readVersionBlob,
  resolveRecordPath,
  restoreFile,
  writeIndexFile,
  writeRecordFile,
  writeVersionBlob,
} from "./store.js";

// ---------------------------------------------------------------------------
// Dependencies (injected at construction)
// ---------------------------------------------------------------------------

export type ProjectStoreDeps = {
  rootDir: string;
  log: {
    info: (msg: string) => void;
    warn: (msg: string) => void;
    error: (msg: string) => void;
  };
  broadcast?: (event: string, payload: unknown) => void;
  nowMs?: () => number;
};

// ---------------------------------------------------------------------------
// Store state
// ---------------------------------------------------------------------------

type ProjectStorePhase = "new" | "open" | "closed";

type ProjectStoreState = {
  deps: ProjectStoreDeps;
  phase: ProjectStorePhase;
  /** Set when recovery failed; every later call rethrows it. */
  fatal: Error | null;
  index: ProjectIndex;
  records: Map<string, ProjectRecord>;
  /** Change-log length already sent to the audit sink, per id. */
  emitted: Map<string, number>;
  pending: Set<Promise<unknown>>;
};

function createStoreState(deps: ProjectStoreDeps): ProjectStoreState {
  return {
    deps,
    phase: "new",
    fatal: null,
    index: new ProjectIndex(),
    records: new Map(),
    emitted: new Map(),
    pending: new Set(),
  };
}

// ---------------------------------------------------------------------------
// Serialised lock (keyed by root + id, shared across instances on one root)
// ---------------------------------------------------------------------------

const storeLocks = new Map<string, Promise<unknown>>();

function resolveChain(p: Promise<unknown>): Promise<void> {
  return p.then(
    () => {},
    () => {},
  );
}

async function locked<T>(state: ProjectStoreState, key: string, fn: () => Promise<T>): Promise<T> {
  const lockKey = path.join(state.deps.rootDir, key);
  const prev = storeLocks.get(lockKey) ?? Promise.resolve();
  const next = resolveChain(prev).then(fn);
  const keepAlive = resolveChain(next);
  storeLocks.set(lockKey, keepAlive);
  state.pending.add(keepAlive);
  try {
    return await next;
  } finally {
    state.pending.delete(keepAlive);
    if (storeLocks.get(lockKey) === keepAlive) {
      storeLocks.delete(lockKey);
    }
  }
}

const INDEX_LOCK = "index";

function recordLock(projectId: string): string {
  return `record:${storageKeyFor(projectId)}`;
}

function describeValue(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

// ---------------------------------------------------------------------------
// ProjectStore
// ---------------------------------------------------------------------------

export class ProjectStore {
  private readonly state: ProjectStoreState;

  constructor(deps: ProjectStoreDeps) {
    this.state = createStoreState(deps);
  }

  get rootDir(): string {
    return this.state.deps.rootDir;
  }

  private now(): number {
    return this.state.deps.nowMs?.() ?? Date.now();
  }

  private emit(event: string, payload: unknown): void {
    this.state.deps.broadcast?.(event, payload);
  }

  private ensureOpen(): void {
    if (this.state.fatal) {
      throw this.state.fatal;
    }
    if (this.state.phase !== "open") {
      throw new StoreClosedError();
    }
  }

  // =========================================================================
  // Lifecycle
  // =========================================================================

  /** Loads the index, rebuilding it from the record files when it is missing or inconsistent. */
  async open(): Promise<void> {
    if (this.state.fatal) {
      throw this.state.fatal;
    }
    if (this.state.phase === "open") {
      return;
    }
    await this.loadIndex();
    this.state.phase = "open";
    this.state.deps.log.info(
      `project store opened: ${this.rootDir} (${this.state.index.size} projects)`,
    );
  }

  /** Waits for in-flight writes, then drops cached records. */
  async close(): Promise<void> {
    if (this.state.phase !== "open") {
      return;
    }
    this.state.phase = "closed";
    await Promise.all([...this.state.pending]);
    this.state.records.clear();
    this.state.emitted.clear();
    this.state.deps.log.info(`project store closed: ${this.rootDir}`);
  }

  // =========================================================================
  // Records
  // =========================================================================

  async get(projectId: string): Promise<ProjectRecord> {
    this.ensureOpen();
    const cached = this.state.records.get(projectId);
    if (cached) {
      return cached;
    }
    return locked(this.state, recordLock(projectId), () => this.load(projectId));
  }

  async create(input: ProjectCreateInput, opts?: WriteOptions): Promise<ProjectRecord> {
    this.ensureOpen();
    return locked(this.state, recordLock(input.id), async () => {
      if (this.state.index.has(input.id)) {
        throw new DuplicateIdError(input.id);
      }
      const record = ProjectRecord.create(input, { nowMs: () => this.now() });
      await this.persist(record, opts);

      this.emit("project.created", { id: record.id, status: record.status });
      this.state.deps.log.info(`project created: ${record.id} (${record.customer.name})`);
      return record;
    });
  }

  /** Only the instance handed out by `get`, `create` or `update` can be saved. */
  async save(record: ProjectRecord, opts?: WriteOptions): Promise<void> {
    this.ensureOpen();
    await locked(this.state, recordLock(record.id), async () => {
      if (!this.state.index.has(record.id)) {
        throw new NotFoundError(`project not found: ${record.id}`);
      }
      if ((await this.load(record.id)) !== record) {
        throw new StaleRecordError(record.id);
      }
      await this.persist(record, opts);
      this.emit("project.saved", { id: record.id, status: record.status });
    });
  }

  /** Loads the record, applies `mutate` and saves it under the project's lock. */
  async update(
    projectId: string,
    mutate: (record: ProjectRecord) => void | Promise<void>,
    opts?: WriteOptions,
  ): Promise<ProjectRecord> {
    this.ensureOpen();
    return locked(this.state, recordLock(projectId), async () => {
      const record = await this.load(projectId);
      try {
        await mutate(record);
      } catch (err) {
        // Drop a possibly half-mutated instance; the next get reloads from disk.
        this.forget(projectId);
        throw err;
      }
      await this.persist(record, opts);
      this.emit("project.saved", { id: record.id, status: record.status });
      return record;
    });
  }

  // =========================================================================
  // Archived files
  // =========================================================================

  /**
   * Stores `bytes` under their content hash (once per distinct content) and
   * appends a version entry to the project before saving it.
   */
  async archiveFile(
    projectId: string,
    bytes: Uint8Array,
    originalFilename: string,
    opts?: WriteOptions,
  ): Promise<Readonly<VersionEntry>> {
    this.ensureOpen();
    return locked(this.state, recordLock(projectId), async () => {
      const record = await this.load(projectId);
      opts?.signal?.throwIfAborted();

      const hash = contentHash(bytes);
      const written = await writeVersionBlob(this.rootDir, hash, bytes);
      const entry = record.appendVersion(bytes, originalFilename);
      await this.persist(record);

      this.emit("project.version.archived", { id: projectId, version: entry });
      this.state.deps.log.info(
        `project ${projectId}: archived v${entry.versionNumber} ${originalFilename} (${hash.slice(0, 12)}${written ? "" : ", deduplicated"})`,
      );
      return entry;
    });
  }

  async readVersion(projectId: string, versionNumber: number): Promise<Uint8Array> {
    const record = await this.get(projectId);
    const entry = record.versions.find((v) => v.versionNumber === versionNumber);
    if (!entry) {
      throw new NotFoundError(`project ${projectId} has no version ${versionNumber}`);
    }
    const bytes = await readVersionBlob(this.rootDir, entry.contentHash);
    if (!bytes) {
      throw new NotFoundError(
        `archived content ${entry.contentHash} for ${projectId} v${versionNumber} is missing`,
      );
    }
    return bytes;
  }

  // =========================================================================
  // Index
  // =========================================================================

  /** Index rows only; no record file is read. */
  list(filter?: ProjectFilter): Iterable<Readonly<ProjectIndexRow>> {
    this.ensureOpen();
    return this.state.index.rows(filter);
  }

  countByStatus(): Record<ProjectStatus, number> {
    this.ensureOpen();
    return this.state.index.countByStatus();
  }

  /** Rebuilds index.json from the record files and returns the row count. */
  async rebuildIndex(): Promise<number> {
    this.ensureOpen();
    return this.rebuild();
  }

  // =========================================================================
  // Internals
  // =========================================================================

  private async load(projectId: string): Promise<ProjectRecord> {
    const cached = this.state.records.get(projectId);
    if (cached) {
      return cached;
    }
    const row = this.state.index.get(projectId);
    if (!row) {
      throw new NotFoundError(`project not found: ${projectId}`);
    }

    const data = await readRecordFile(resolveRecordPath(this.rootDir, row.storageKey));
    if (!data) {
      this.state.deps.log.warn(`record file missing for ${projectId}; rebuilding index`);
      await this.rebuild();
      throw new NotFoundError(`project not found: ${projectId}`);
    }
    if (data.id !== projectId) {
      throw new CorruptIndexError(
        `record ${row.storageKey} holds project ${data.id}, expected ${projectId}`,
      );
    }

    const record = ProjectRecord.fromJSON(data, { nowMs: () => this.now() });
    this.state.records.set(projectId, record);
    this.state.emitted.set(projectId, record.changeLog.length);
    return record;
  }

  private forget(projectId: string): void {
    this.state.records.delete(projectId);
    this.state.emitted.delete(projectId);
  }

  private async persist(record: ProjectRecord, opts?: WriteOptions): Promise<void> {
    opts?.signal?.throwIfAborted();

    const storageKey = storageKeyFor(record.id);
    const recordPath = resolveRecordPath(this.rootDir, storageKey);
    try {
      const previous = await readTextIfExists(recordPath);
      await writeRecordFile(recordPath, record.toJSON());
      try {
        await this.writeIndexRow({
          id: record.id,
          status: record.status,
          responsible: record.responsible,
          lastModifiedMs: this.now(),
          storageKey,
        });
      } catch (err) {
        await this.rollbackRecordFile(record.id, recordPath, previous, err);
        throw err;
      }
    } catch (err) {
      // The cached instance may now be ahead of disk; reload on next access.
      this.forget(record.id);
      this.state.deps.log.error(
        `failed to save project ${record.id}: ${err instanceof Error ? err.message : String(err)}`,
      );
      throw err;
    }

    this.state.records.set(record.id, record);
    this.emitChangeLog(record);
  }

  /** Undoes a record write whose index row could not be committed. */
  private async rollbackRecordFile(
    projectId: string,
    recordPath: string,
    previous: string | null,
    cause: unknown,
  ): Promise<void> {
    try {
      await restoreFile(recordPath, previous);
    } catch (restoreErr) {
      throw new StorageIOError(
        `failed to save project ${projectId}; record file could not be restored`,
        { cause: new AggregateError([cause, restoreErr]) },
      );
    }
  }

  private async writeIndexRow(row: ProjectIndexRow): Promise<void> {
    await locked(this.state, INDEX_LOCK, async () => {
      const index = this.state.index;
      const rows = [...index.rows()].map((r) => (r.id === row.id ? row : r));
      if (!index.has(row.id)) {
        rows.push(row);
      }
      await writeIndexFile(this.rootDir, rows);
      index.upsert(row);
    });
  }

  private emitChangeLog(record: ProjectRecord): void {
    const from = this.state.emitted.get(record.id) ?? 0;
    for (const entry of record.changeLog.slice(from)) {
      this.emit("project.changelog", { id: record.id, entry });
      this.state.deps.log.info(
        `project ${record.id}: ${entry.field} ${describeValue(entry.oldValue)} → ${describeValue(entry.newValue)} by ${entry.actor}`,
      );
    }
    this.state.emitted.set(record.id, record.changeLog.length);
  }

  private async loadIndex(): Promise<void> {
    let rows: ProjectIndexRow[] | null;
    try {
      rows = await readIndexFile(this.rootDir);
    } catch (err) {
      if (!(err instanceof CorruptIndexError)) {
        throw err;
      }
      this.state.deps.log.warn(`${err.message}; rebuilding index`);
      await this.rebuild();
      return;
    }

    const keys = await listRecordKeys(this.rootDir);
    if (rows === null) {
      if (keys.length > 0) {
        this.state.deps.log.warn(`index file missing with ${keys.length} records; rebuilding index`);
        await this.rebuild();
      } else {
        this.state.index = new ProjectIndex();
      }
      return;
    }

    const problem = findInconsistency(rows, keys);
    if (problem) {
      this.state.deps.log.warn(`index inconsistent (${problem}); rebuilding index`);
      await this.rebuild();
      return;
    }
    this.state.index = new ProjectIndex(rows);
  }

  private async rebuild(): Promise<number> {
    try {
      return await locked(this.state, INDEX_LOCK, async () => {
        const rows: ProjectIndexRow[] = [];
        for (const storageKey of await listRecordKeys(this.rootDir)) {
          const data = await readRecordFile(resolveRecordPath(this.rootDir, storageKey));
          if (!data) {
            continue;
          }
          if (storageKeyFor(data.id) !== storageKey) {
            throw new CorruptIndexError(`record ${storageKey} holds project ${data.id} under the wrong key`);
          }
          rows.push({
            id: data.id,
            status: data.status,
            responsible: data.responsible,
            lastModifiedMs: data.updatedAtMs,
            storageKey,
          });
        }

        await writeIndexFile(this.rootDir, rows);
        const index = new ProjectIndex(rows);
        this.state.index = index;
        for (const id of [...this.state.records.keys()]) {
          if (!index.has(id)) {
            this.forget(id);
          }
        }

        this.emit("project.index.rebuilt", { count: rows.length });
        this.state.deps.log.info(`project index rebuilt: ${rows.length} projects`);
        return rows.length;
      });
    } catch (err) {
      if (err instanceof CorruptIndexError) {
        this.state.fatal = err;
        this.state.deps.log.error(`project index rebuild failed: ${err.message}`);
      }
      throw err;
    }
  }
}

function findInconsistency(rows: ProjectIndexRow[], keys: string[]): string | null {
  if (rows.length !== keys.length) {
    return `${rows.length} rows for ${keys.length} record files`;
  }
  const onDisk = new Set(keys);
  const seen = new Set<string>();
  for (const row of rows) {
    if (seen.has(row.id)) {
      return `duplicate row for ${row.id}`;
    }
    seen.add(row.id);
    if (row.storageKey !== storageKeyFor(row.id)) {
      return `storage key mismatch for ${row.id}`;
    }
    if (!onDisk.has(row.storageKey)) {
      return `record file missing for ${row.id}`;
    }
  }
  return null;
}
