// ---------------------------------------------------------------------------
// Logging – winston root logger and per-module children
// ---------------------------------------------------------------------------

import winston from "winston";
import type { PrintdeskConfig } from "./config/config.js";

export type LoggingConfig = PrintdeskConfig["logging"];

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  winston.format.printf(({ timestamp, level, message, module, ...meta }) => {
    const scope = typeof module === "string" ? ` [${module}]` : "";
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
    return `${String(timestamp)} ${level}${scope}: ${String(message)}${metaStr}`;
  }),
);

export function createLogger(cfg: LoggingConfig): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({ format: consoleFormat }),
  ];
  if (cfg.file) {
    transports.push(
      new winston.transports.File({
        filename: cfg.file,
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      }),
    );
  }
  return winston.createLogger({
    level: cfg.level,
    format: winston.format.combine(winston.format.errors({ stack: true }), winston.format.timestamp()),
    transports,
    exitOnError: false,
  });
}

let rootLogger: winston.Logger | null = null;

export function setLogger(instance: winston.Logger): void {
  rootLogger = instance;
}

/** Root logger; falls back to info-level console output until `setLogger` is called. */
export function getLogger(): winston.Logger {
  if (!rootLogger) {
    rootLogger = createLogger({ level: "info" });
  }
  return rootLogger;
}

export function getChildLogger(meta: { module: string }): winston.Logger {
  return getLogger().child(meta);
}
