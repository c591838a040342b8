import { createHash } from "node:crypto";

/** SHA-256 of the raw bytes, lowercase hex. Used as the blob name under versions/. */
export function contentHash(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}

/** Record file name (without extension) for a project id. */
export function storageKeyFor(projectId: string): string {
  return createHash("sha256").update(projectId, "utf8").digest("hex");
}
