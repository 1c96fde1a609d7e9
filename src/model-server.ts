import { appConfig } from "./config.js";
import { describeError } from "./errors.js";
import { createLogger } from "./logger.js";
import type { FetchLike } from "./providers/connection.js";
import { isRecord, readTrimmedString } from "./utils/json.js";

const log = createLogger("ModelServer");

const REQUEST_TIMEOUT_MS = 30_000;

export type ServerConnectionStatus =
  | { state: "disconnected" }
  | { state: "connecting" }
  | { state: "connected" }
  | { state: "error"; message: string };

export type ModelFile = {
  id: string;
  name: string;
  size: string;
  quantization: string;
  downloaded: boolean;
};

export type ServerModel = {
  id: string;
  name: string;
  summary: string;
  author: string;
  files: ModelFile[];
};

export type DownloadedFile = {
  file: ModelFile;
  modelId: string;
  downloadedAt: string;
};

export type PendingDownload = {
  file: ModelFile;
  modelId: string;
  progress: number;
  status: string;
};

export type ModelServerClientOptions = {
  port?: number;
  fetchImpl?: FetchLike;
  timeoutMs?: number;
};

/**
 * Client for the local companion server that searches and downloads model
 * files. Every call is a single request; nothing is retried.
 */
export class ModelServerClient {
  readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private status: ServerConnectionStatus = { state: "disconnected" };

  constructor(options: ModelServerClientOptions = {}) {
    this.baseUrl = `http://localhost:${options.port ?? appConfig.modelServerPort}`;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  get connectionStatus(): ServerConnectionStatus {
    return { ...this.status };
  }

  async testConnection(): Promise<ServerConnectionStatus> {
    this.status = { state: "connecting" };
    try {
      const response = await this.request(`${this.baseUrl}/ping`, { method: "GET" });
      if (response.ok) {
        this.status = { state: "connected" };
        log.info(`connected to model server at ${this.baseUrl}`);
      } else {
        this.status = { state: "error", message: `Server returned status: ${response.status}` };
      }
    } catch (error) {
      this.status = { state: "error", message: describeConnectionError(error) };
    }
    if (this.status.state === "error") {
      log.warn(`model server unavailable: ${this.status.message}`);
    }
    return this.connectionStatus;
  }

  getFeaturedModels(): Promise<ServerModel[]> {
    return this.getList(`${this.baseUrl}/models/featured`, parseServerModel);
  }

  searchModels(query: string): Promise<ServerModel[]> {
    return this.getList(`${this.baseUrl}/models/search?q=${encodeURIComponent(query)}`, parseServerModel);
  }

  getDownloadedFiles(): Promise<DownloadedFile[]> {
    return this.getList(`${this.baseUrl}/files`, parseDownloadedFile);
  }

  getPendingDownloads(): Promise<PendingDownload[]> {
    return this.getList(`${this.baseUrl}/downloads`, parsePendingDownload);
  }

  async downloadFile(fileId: string): Promise<void> {
    const response = await this.send(`${this.baseUrl}/downloads`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ file_id: fileId }),
    });
    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new Error(`Failed to start download: ${body}`);
    }
  }

  async pauseDownload(fileId: string): Promise<void> {
    const response = await this.send(`${this.baseUrl}/downloads/${encodeURIComponent(fileId)}`, { method: "POST" });
    if (!response.ok) {
      throw new Error(`Failed to pause download: ${response.status}`);
    }
  }

  async cancelDownload(fileId: string): Promise<void> {
    const response = await this.send(`${this.baseUrl}/downloads/${encodeURIComponent(fileId)}`, { method: "DELETE" });
    if (!response.ok) {
      throw new Error(`Failed to cancel download: ${response.status}`);
    }
  }

  async deleteFile(fileId: string): Promise<void> {
    const response = await this.send(`${this.baseUrl}/files/${encodeURIComponent(fileId)}`, { method: "DELETE" });
    if (!response.ok) {
      throw new Error(`Failed to delete file: ${response.status}`);
    }
  }

  private request(url: string, init: RequestInit): Promise<Response> {
    return this.fetchImpl(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
  }

  private async send(url: string, init: RequestInit): Promise<Response> {
    try {
      return await this.request(url, init);
    } catch (error) {
      throw new Error(`Request failed: ${describeError(error)}`, { cause: error });
    }
  }

  private async getList<T>(url: string, parseItem: (value: unknown) => T | null): Promise<T[]> {
    const response = await this.send(url, { method: "GET" });
    if (!response.ok) {
      throw new Error(`Server returned status: ${response.status}`);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new Error(`Failed to parse response: ${describeError(error)}`, { cause: error });
    }
    if (!Array.isArray(payload)) {
      throw new Error("Failed to parse response: expected an array");
    }

    const items: T[] = [];
    for (const [index, value] of payload.entries()) {
      const item = parseItem(value);
      if (!item) {
        throw new Error(`Failed to parse response: invalid item at index ${index}`);
      }
      items.push(item);
    }
    return items;
  }
}

function describeConnectionError(error: unknown): string {
  if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
    return "Connection timed out";
  }
  if (error instanceof TypeError) {
    return "Failed to connect to model server. Is it running?";
  }
  return `Connection error: ${describeError(error)}`;
}

function parseModelFile(value: unknown): ModelFile | null {
  if (!isRecord(value)) {
    return null;
  }
  const id = readTrimmedString(value.id);
  if (!id) {
    return null;
  }
  return {
    id,
    name: readTrimmedString(value.name) || id,
    size: readTrimmedString(value.size),
    quantization: readTrimmedString(value.quantization),
    downloaded: value.downloaded === true,
  };
}

function parseServerModel(value: unknown): ServerModel | null {
  if (!isRecord(value)) {
    return null;
  }
  const id = readTrimmedString(value.id);
  if (!id) {
    return null;
  }
  const files: ModelFile[] = [];
  for (const raw of Array.isArray(value.files) ? value.files : []) {
    const file = parseModelFile(raw);
    if (file) {
      files.push(file);
    }
  }
  const author = isRecord(value.author) ? readTrimmedString(value.author.name) : readTrimmedString(value.author);
  return {
    id,
    name: readTrimmedString(value.name) || id,
    summary: readTrimmedString(value.summary),
    author,
    files,
  };
}

function parseDownloadedFile(value: unknown): DownloadedFile | null {
  if (!isRecord(value)) {
    return null;
  }
  const file = parseModelFile(value.file);
  if (!file) {
    return null;
  }
  return {
    file,
    modelId: isRecord(value.model) ? readTrimmedString(value.model.id) : readTrimmedString(value.model_id),
    downloadedAt: readTrimmedString(value.downloaded_at),
  };
}

function parsePendingDownload(value: unknown): PendingDownload | null {
  if (!isRecord(value)) {
    return null;
  }
  const file = parseModelFile(value.file);
  if (!file) {
    return null;
  }
  return {
    file,
    modelId: isRecord(value.model) ? readTrimmedString(value.model.id) : readTrimmedString(value.model_id),
    progress: typeof value.progress === "number" ? value.progress : 0,
    status: readTrimmedString(value.status) || "initializing",
  };
}
