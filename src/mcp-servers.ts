import fs from "node:fs";
import path from "node:path";
import { describeError } from "./errors.js";
import { createLogger } from "./logger.js";
import { isRecord, readBoolean, readOptionalString, readStringArray, readStringRecord } from "./utils/json.js";

const log = createLogger("McpServers");

export const MCP_SERVERS_FILE_NAME = "mcp-servers.json";

export type McpInputConfig = {
  id: string;
  type: string;
  description: string;
  password: boolean;
};

export type McpServer = {
  command?: string;
  args: string[];
  env: Record<string, string>;
  url?: string;
  type?: string;
  headers: Record<string, string>;
  enabled: boolean;
  workingDirectory?: string;
};

export type McpServersConfig = {
  servers: Record<string, McpServer>;
  inputs: McpInputConfig[];
  enabled: boolean;
  dangerousModeEnabled: boolean;
};

export type McpTransport =
  | { kind: "stdio"; command: string; args: string[]; env: Record<string, string>; cwd?: string }
  | { kind: "http"; url: string; headers: Record<string, string> }
  | { kind: "sse"; url: string; headers: Record<string, string> };

export type McpConfigUpdateResult = { ok: true } | { ok: false; error: string };

export function defaultMcpServersConfig(): McpServersConfig {
  return {
    servers: {},
    inputs: [],
    enabled: true,
    dangerousModeEnabled: false,
  };
}

export function stdioServer(command: string, args: string[]): McpServer {
  return { command, args, env: {}, headers: {}, enabled: true };
}

export function httpServer(url: string): McpServer {
  return { args: [], env: {}, url, type: "http", headers: {}, enabled: true };
}

export function sseServer(url: string): McpServer {
  return { args: [], env: {}, url, type: "sse", headers: {}, enabled: true };
}

export function createSampleConfig(): McpServersConfig {
  const config = defaultMcpServersConfig();
  config.servers["my-mcp-server"] = httpServer("http://localhost:8931");
  config.servers.filesystem = {
    ...stdioServer("npx", ["-y", "@modelcontextprotocol/server-filesystem", "/Users/username/Desktop"]),
    enabled: false,
  };
  return config;
}

export function transportOf(server: McpServer): McpTransport | null {
  if (server.command) {
    return {
      kind: "stdio",
      command: server.command,
      args: [...server.args],
      env: { ...server.env },
      cwd: server.workingDirectory,
    };
  }
  if (server.url) {
    return {
      kind: server.type === "sse" ? "sse" : "http",
      url: server.url,
      headers: { ...server.headers },
    };
  }
  return null;
}

export class McpServersStore {
  readonly filePath: string;
  private config: McpServersConfig;

  private constructor(filePath: string, config: McpServersConfig) {
    this.filePath = filePath;
    this.config = config;
  }

  static load(filePath: string): McpServersStore {
    return new McpServersStore(filePath, readConfigFromPath(filePath) ?? defaultMcpServersConfig());
  }

  static forDataDir(dataDir: string): McpServersStore {
    return McpServersStore.load(path.join(dataDir, MCP_SERVERS_FILE_NAME));
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  get dangerousModeEnabled(): boolean {
    return this.config.dangerousModeEnabled;
  }

  snapshot(): McpServersConfig {
    return structuredClone(this.config);
  }

  getServer(id: string): McpServer | undefined {
    const server = this.config.servers[id];
    return server ? structuredClone(server) : undefined;
  }

  addServer(id: string, server: McpServer): void {
    this.config.servers[id] = structuredClone(server);
    this.save();
  }

  removeServer(id: string): boolean {
    if (!(id in this.config.servers)) {
      return false;
    }
    delete this.config.servers[id];
    this.save();
    return true;
  }

  listEnabledServers(): Array<[string, McpServer]> {
    return Object.entries(this.config.servers)
      .filter(([, server]) => server.enabled)
      .map(([id, server]): [string, McpServer] => [id, structuredClone(server)]);
  }

  setEnabled(enabled: boolean): void {
    this.config.enabled = enabled;
    this.save();
  }

  setDangerousModeEnabled(enabled: boolean): void {
    this.config.dangerousModeEnabled = enabled;
    this.save();
  }

  toJson(): string {
    return serializeMcpServersConfig(this.config);
  }

  /** Replaces the whole config from user-edited JSON. Invalid input leaves it untouched. */
  updateFromJson(json: string): McpConfigUpdateResult {
    let parsed: unknown;
    try {
      parsed = JSON.parse(json);
    } catch (error) {
      return { ok: false, error: describeError(error) };
    }
    const config = parseMcpServersConfig(parsed);
    if (!config) {
      return { ok: false, error: "expected an object with a \"servers\" map" };
    }
    this.config = config;
    this.save();
    return { ok: true };
  }

  save(): void {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, `${this.toJson()}\n`, "utf8");
    } catch (error) {
      log.error(`failed to write MCP servers config ${this.filePath}:`, error);
    }
  }
}

export function serializeMcpServersConfig(config: McpServersConfig): string {
  const servers: Record<string, Record<string, unknown>> = {};
  for (const [id, server] of Object.entries(config.servers)) {
    const row: Record<string, unknown> = {};
    if (server.command !== undefined) {
      row.command = server.command;
    }
    if (server.args.length > 0) {
      row.args = server.args;
    }
    if (Object.keys(server.env).length > 0) {
      row.env = server.env;
    }
    if (server.url !== undefined) {
      row.url = server.url;
    }
    if (server.type !== undefined) {
      row.type = server.type;
    }
    if (Object.keys(server.headers).length > 0) {
      row.headers = server.headers;
    }
    if (!server.enabled) {
      row.enabled = false;
    }
    if (server.workingDirectory !== undefined) {
      row.workingDirectory = server.workingDirectory;
    }
    servers[id] = row;
  }

  const payload: Record<string, unknown> = { servers };
  if (config.inputs.length > 0) {
    payload.inputs = config.inputs;
  }
  payload.enabled = config.enabled;
  payload.dangerousModeEnabled = config.dangerousModeEnabled;
  return JSON.stringify(payload, null, 2);
}

export function parseMcpServersConfig(value: unknown): McpServersConfig | null {
  if (!isRecord(value) || !isRecord(value.servers)) {
    return null;
  }

  const servers: Record<string, McpServer> = {};
  for (const [id, raw] of Object.entries(value.servers)) {
    if (!isRecord(raw)) {
      return null;
    }
    servers[id] = {
      command: readOptionalString(raw.command),
      args: readStringArray(raw.args),
      env: readStringRecord(raw.env),
      url: readOptionalString(raw.url),
      type: readOptionalString(raw.type),
      headers: readStringRecord(raw.headers),
      enabled: readBoolean(raw.enabled, true),
      workingDirectory: readOptionalString(raw.workingDirectory),
    };
  }

  const inputs: McpInputConfig[] = [];
  if (Array.isArray(value.inputs)) {
    for (const item of value.inputs) {
      if (!isRecord(item) || typeof item.id !== "string" || typeof item.type !== "string") {
        continue;
      }
      inputs.push({
        id: item.id,
        type: item.type,
        description: typeof item.description === "string" ? item.description : "",
        password: readBoolean(item.password, false),
      });
    }
  }

  return {
    servers,
    inputs,
    enabled: readBoolean(value.enabled, true),
    dangerousModeEnabled: readBoolean(value.dangerousModeEnabled, false),
  };
}

function readConfigFromPath(filePath: string): McpServersConfig | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }
  try {
    const config = parseMcpServersConfig(JSON.parse(fs.readFileSync(filePath, "utf8")));
    if (!config) {
      log.error(`MCP servers config ${filePath} has no servers map`);
    }
    return config;
  } catch (error) {
    log.error(`failed to read MCP servers config ${filePath}:`, error);
    return null;
  }
}
