import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { getLogger } from "../logging.js";
import { openProjectStore } from "./bootstrap.js";

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "printdesk-boot-"));
});

afterEach(async () => {
  getLogger().close();
  await fs.rm(tmpDir, { recursive: true, force: true });
});

async function readLogLines(logFile: string): Promise<unknown[]> {
  const raw = await fs.readFile(logFile, "utf-8");
  return raw
    .trim()
    .split("\n")
    .map((line): unknown => JSON.parse(line));
}

describe("openProjectStore", () => {
  it("opens a store at the configured root and writes project logs to the configured file", async () => {
    const rootDir = path.join(tmpDir, "store");
    const logFile = path.join(tmpDir, "printdesk.log");
    const events: string[] = [];
    const store = await openProjectStore({
      cfg: { storage: { root: rootDir }, logging: { level: "info", file: logFile } },
      broadcast: (event) => events.push(event),
    });

    await store.create({ id: "P1", customer: { name: "Acme" }, responsible: "alice" });
    await store.close();

    expect(store.rootDir).toBe(rootDir);
    expect(events).toEqual(["project.created"]);
    await vi.waitFor(
      async () => {
        expect(await readLogLines(logFile)).toContainEqual(
          expect.objectContaining({ message: "project created: P1 (Acme)", module: "projects" }),
        );
      },
      { timeout: 5000, interval: 50 },
    );
  });

  it("drops lines below the configured level", async () => {
    const logFile = path.join(tmpDir, "printdesk.log");
    const store = await openProjectStore({
      cfg: { storage: { root: path.join(tmpDir, "store") }, logging: { level: "warn", file: logFile } },
    });
    await store.create({ id: "P1", customer: { name: "Acme" }, responsible: "alice" });
    await store.close();

    getLogger().warn("store check done");
    await vi.waitFor(
      async () => {
        expect(await readLogLines(logFile)).toContainEqual(
          expect.objectContaining({ level: "warn", message: "store check done" }),
        );
      },
      { timeout: 5000, interval: 50 },
    );
    const messages = (await readLogLines(logFile)).map((line) =>
      typeof line === "object" && line !== null && "message" in line ? line.message : undefined,
    );
    expect(messages).toEqual(["store check done"]);
  });
});
