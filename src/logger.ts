import path from "node:path";
import log from "electron-log/node";
import { appConfig } from "./config.js";

// Rotate at 5MB
log.transports.file.maxSize = 5 * 1024 * 1024;
log.transports.file.resolvePathFn = () => path.join(appConfig.dataDir, "logs", "main.log");

log.transports.file.format = "[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}]{scope} {text}";
log.transports.console.format = "[{h}:{i}:{s}] [{level}]{scope} {text}";

log.transports.file.level = appConfig.logLevel;
log.transports.console.level = process.env.NODE_ENV === "production" ? "warn" : appConfig.logLevel;

if (process.env.VITEST) {
  log.transports.file.level = false;
  log.transports.console.level = "error";
}

export type Logger = ReturnType<typeof log.scope>;

/** Scoped logger tagged with the module name. */
export function createLogger(tag: string): Logger {
  return log.scope(tag);
}

/** Masks an API key for log output. */
export function maskSecret(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length <= 8) {
    return "***";
  }
  return `${trimmed.slice(0, 4)}...${trimmed.slice(-4)}`;
}

export default log;
