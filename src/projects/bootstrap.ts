// ---------------------------------------------------------------------------
// Project Store Builder – wires config and logging into an opened store
// ---------------------------------------------------------------------------

import type { PrintdeskConfig } from "../config/config.js";
import { createLogger, getChildLogger, setLogger } from "../logging.js";
import { ProjectStore } from "./service.js";

/** Installs the configured root logger, then opens the store at the configured root. */
export async function openProjectStore(params: {
  cfg: PrintdeskConfig;
  broadcast?: (event: string, payload: unknown) => void;
}): Promise<ProjectStore> {
  setLogger(createLogger(params.cfg.logging));
  const projectLogger = getChildLogger({ module: "projects" });

  const store = new ProjectStore({
    rootDir: params.cfg.storage.root,
    log: {
      info: (msg) => projectLogger.info(msg),
      warn: (msg) => projectLogger.warn(msg),
      error: (msg) => projectLogger.error(msg),
    },
    broadcast: params.broadcast,
  });
  await store.open();
  return store;
}
