import os from "node:os";
import path from "node:path";

export type LogLevel = "error" | "warn" | "info" | "verbose" | "debug" | "silly";

export type AppConfig = {
  dataDir: string;
  modelServerPort: number;
  logLevel: LogLevel;
  requestTimeoutMs: number;
  connectionTestTimeoutMs: number;
  systemInstruction: string;
};

export const DEFAULT_MODEL_SERVER_PORT = 8765;

const LOG_LEVELS: LogLevel[] = ["error", "warn", "info", "verbose", "debug", "silly"];

export const appConfig: Readonly<AppConfig> = Object.freeze({
  dataDir: resolveDataDir(process.env.POLYCHAT_HOME),
  modelServerPort: parsePort(process.env.POLYCHAT_SERVER_PORT),
  logLevel: parseLogLevel(process.env.POLYCHAT_LOG_LEVEL),
  requestTimeoutMs: 30_000,
  connectionTestTimeoutMs: 10_000,
  systemInstruction: "You are a helpful assistant.",
});

export function resolveDataDir(override: string | undefined): string {
  const trimmed = override?.trim();
  if (trimmed) {
    return path.resolve(trimmed);
  }
  return path.join(os.homedir(), ".polychat");
}

export function parsePort(raw: string | undefined): number {
  const trimmed = raw?.trim() ?? "";
  if (!/^\d+$/.test(trimmed)) {
    return DEFAULT_MODEL_SERVER_PORT;
  }
  const port = Number(trimmed);
  if (port < 1 || port > 65_535) {
    return DEFAULT_MODEL_SERVER_PORT;
  }
  return port;
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toLowerCase() ?? "";
  return LOG_LEVELS.find((level) => level === normalized) ?? "info";
}
