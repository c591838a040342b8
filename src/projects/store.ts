// ---------------------------------------------------------------------------
// Project Store Files – on-disk layout and atomic IO
// ---------------------------------------------------------------------------
// Storage layout:
//   ~/.printdesk/store/
//     index.json            – { version: 1, columns, rows: [[id, status, ...]] }
//     projects/{key}.json   – { version: 1, record }   key = sha256(project id)
//     versions/{hash}       – raw archived file bytes  hash = sha256(content)
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Value } from "@sinclair/typebox/value";
import type { ProjectIndexRow, ProjectRecordData, ProjectRecordFile, IndexFile } from "./types.js";
import { CorruptIndexError, StorageIOError, errorCode } from "./errors.js";
import { INDEX_COLUMNS, IndexFileSchema, ProjectRecordFileSchema } from "./schema.js";

// ---------------------------------------------------------------------------
// Path resolution
// ---------------------------------------------------------------------------

const DEFAULT_DIR = ".printdesk";

const RECORD_EXT = ".json";
const TMP_EXT = ".tmp";

export function resolveProjectStoreRoot(
  customPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (customPath) {
    return path.resolve(customPath);
  }
  const home = env.HOME ?? env.USERPROFILE ?? ".";
  return path.join(home, DEFAULT_DIR, "store");
}

export function resolveIndexPath(rootDir: string): string {
  return path.join(rootDir, "index.json");
}

export function resolveProjectsDir(rootDir: string): string {
  return path.join(rootDir, "projects");
}

export function resolveRecordPath(rootDir: string, storageKey: string): string {
  return path.join(resolveProjectsDir(rootDir), `${storageKey}${RECORD_EXT}`);
}

export function resolveVersionsDir(rootDir: string): string {
  return path.join(rootDir, "versions");
}

export function resolveVersionPath(rootDir: string, contentHash: string): string {
  return path.join(resolveVersionsDir(rootDir), contentHash);
}

// ---------------------------------------------------------------------------
// Atomic write helper
// ---------------------------------------------------------------------------
// The temp file lives beside the target so the rename never crosses a
// filesystem. Its name is unique per call: two writers of the same target
// never share a temp file.

async function discardTempFile(tmpPath: string, filePath: string, cause: unknown): Promise<never> {
  try {
    await fs.rm(tmpPath, { force: true });
  } catch (cleanupErr) {
    throw new StorageIOError(`failed to write ${filePath}; temp file ${tmpPath} left behind`, {
      cause: new AggregateError([cause, cleanupErr]),
    });
  }
  throw new StorageIOError(`failed to write ${filePath}`, { cause });
}

export async function atomicWrite(filePath: string, data: string | Uint8Array): Promise<void> {
  const tmpPath = `${filePath}.${randomUUID()}${TMP_EXT}`;
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tmpPath, data);
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await discardTempFile(tmpPath, filePath, err);
  }
}

export async function readTextIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return null;
    }
    throw new StorageIOError(`failed to read ${filePath}`, { cause: err });
  }
}

function parseJson(raw: string, filePath: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new CorruptIndexError(`unparsable JSON in ${filePath}`, { cause: err });
  }
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export async function readRecordFile(filePath: string): Promise<ProjectRecordData | null> {
  const raw = await readTextIfExists(filePath);
  if (raw === null) {
    return null;
  }
  const parsed = parseJson(raw, filePath);
  if (!Value.Check(ProjectRecordFileSchema, parsed)) {
    const first = Value.Errors(ProjectRecordFileSchema, parsed).First();
    throw new CorruptIndexError(
      `invalid project record ${filePath}${first ? `: ${first.path} ${first.message}` : ""}`,
    );
  }
  return parsed.record;
}

export async function writeRecordFile(filePath: string, record: ProjectRecordData): Promise<void> {
  const file: ProjectRecordFile = { version: 1, record };
  await atomicWrite(filePath, JSON.stringify(file, null, 2));
}

/** Puts back content read before a write; `null` removes the file again. */
export async function restoreFile(filePath: string, previous: string | null): Promise<void> {
  if (previous !== null) {
    await atomicWrite(filePath, previous);
    return;
  }
  try {
    await fs.rm(filePath, { force: true });
  } catch (err) {
    throw new StorageIOError(`failed to remove ${filePath}`, { cause: err });
  }
}

/** Storage keys of every committed record file; temp files are skipped. */
export async function listRecordKeys(rootDir: string): Promise<string[]> {
  const dir = resolveProjectsDir(rootDir);
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return [];
    }
    throw new StorageIOError(`failed to list ${dir}`, { cause: err });
  }
  return entries
    .filter((name) => name.endsWith(RECORD_EXT))
    .map((name) => name.slice(0, -RECORD_EXT.length))
    .sort();
}

// ---------------------------------------------------------------------------
// Index
// ---------------------------------------------------------------------------

/** Returns null when no index file exists yet. Throws CorruptIndexError when it cannot be used. */
export async function readIndexFile(rootDir: string): Promise<ProjectIndexRow[] | null> {
  const filePath = resolveIndexPath(rootDir);
  const raw = await readTextIfExists(filePath);
  if (raw === null) {
    return null;
  }
  const parsed = parseJson(raw, filePath);
  if (!Value.Check(IndexFileSchema, parsed)) {
    throw new CorruptIndexError(`invalid index file ${filePath}`);
  }
  if (parsed.columns.join(",") !== INDEX_COLUMNS.join(",")) {
    throw new CorruptIndexError(`unexpected index columns: ${parsed.columns.join(",")}`);
  }
  return parsed.rows.map(([id, status, responsible, lastModifiedMs, storageKey]) => ({
    id,
    status,
    responsible,
    lastModifiedMs,
    storageKey,
  }));
}

export async function writeIndexFile(rootDir: string, rows: Iterable<ProjectIndexRow>): Promise<void> {
  const file: IndexFile = {
    version: 1,
    columns: [...INDEX_COLUMNS],
    rows: [...rows].map((r) => [r.id, r.status, r.responsible, r.lastModifiedMs, r.storageKey]),
  };
  await atomicWrite(resolveIndexPath(rootDir), JSON.stringify(file, null, 2));
}

// ---------------------------------------------------------------------------
// Archived file content (content-addressed, write-once)
// ---------------------------------------------------------------------------

/** Returns false when a blob with this hash already exists and nothing was written. */
export async function writeVersionBlob(
  rootDir: string,
  contentHash: string,
  bytes: Uint8Array,
): Promise<boolean> {
  const blobPath = resolveVersionPath(rootDir, contentHash);
  try {
    await fs.access(blobPath);
    return false;
  } catch (err) {
    if (errorCode(err) !== "ENOENT") {
      throw new StorageIOError(`failed to stat ${blobPath}`, { cause: err });
    }
  }
  await atomicWrite(blobPath, bytes);
  return true;
}

export async function readVersionBlob(rootDir: string, contentHash: string): Promise<Uint8Array | null> {
  const blobPath = resolveVersionPath(rootDir, contentHash);
  try {
    return new Uint8Array(await fs.readFile(blobPath));
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return null;
    }
    throw new StorageIOError(`failed to read ${blobPath}`, { cause: err });
  }
}
