// ---------------------------------------------------------------------------
// Config – ~/.printdesk/config.yaml with environment overrides
// ---------------------------------------------------------------------------
// Example:
//   storage:
//     root: /srv/printdesk/store
//   logging:
//     level: debug
//     file: /var/log/printdesk.log
// ---------------------------------------------------------------------------

import { readFileSync } from "node:fs";
import * as path from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { parse as parseYaml } from "yaml";
import { resolveProjectStoreRoot } from "../projects/store.js";
import { errorCode } from "../projects/errors.js";

const DEFAULT_DIR = ".printdesk";

export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;

const LogLevelSchema = Type.Union([
  Type.Literal("error"),
  Type.Literal("warn"),
  Type.Literal("info"),
  Type.Literal("debug"),
]);

const ConfigFileSchema = Type.Object(
  {
    storage: Type.Optional(
      Type.Object({
        root: Type.Optional(Type.String({ minLength: 1 })),
      }),
    ),
    logging: Type.Optional(
      Type.Object({
        level: Type.Optional(LogLevelSchema),
        file: Type.Optional(Type.String({ minLength: 1 })),
      }),
    ),
  },
  { additionalProperties: false },
);

export type LogLevel = Static<typeof LogLevelSchema>;
export type ConfigFile = Static<typeof ConfigFileSchema>;

export type PrintdeskConfig = {
  storage: { root: string };
  logging: { level: LogLevel; file?: string };
};

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.PRINTDESK_CONFIG) {
    return path.resolve(env.PRINTDESK_CONFIG);
  }
  const home = env.HOME ?? env.USERPROFILE ?? ".";
  return path.join(home, DEFAULT_DIR, "config.yaml");
}

function readConfigFile(configPath: string): ConfigFile {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return {};
    }
    throw new ConfigError(`cannot read config ${configPath}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new ConfigError(`invalid YAML in ${configPath}`, { cause: err });
  }
  // An empty file parses to null.
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!Value.Check(ConfigFileSchema, parsed)) {
    const issues = [...Value.Errors(ConfigFileSchema, parsed)].map(
      (e) => `${e.path || "/"}: ${e.message}`,
    );
    throw new ConfigError(`invalid config ${configPath}: ${issues.join("; ")}`);
  }
  return parsed;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function loadConfig(opts?: { configPath?: string; env?: NodeJS.ProcessEnv }): PrintdeskConfig {
  const env = opts?.env ?? process.env;
  const configPath = opts?.configPath ?? resolveConfigPath(env);
  const file = readConfigFile(configPath);

  const envLevel = env.PRINTDESK_LOG_LEVEL;
  if (envLevel !== undefined && !isLogLevel(envLevel)) {
    throw new ConfigError(
      `PRINTDESK_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got ${envLevel}`,
    );
  }

  // A relative root in the file is taken relative to the file itself.
  const fileRoot = file.storage?.root
    ? path.resolve(path.dirname(configPath), file.storage.root)
    : undefined;
  const logFile = env.PRINTDESK_LOG_FILE ?? file.logging?.file;
  return {
    storage: {
      root: resolveProjectStoreRoot(env.PRINTDESK_ROOT || fileRoot, env),
    },
    logging: {
      level: envLevel ?? file.logging?.level ?? "info",
      ...(logFile ? { file: logFile } : {}),
    },
  };
}
