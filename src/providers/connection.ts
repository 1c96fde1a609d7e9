import { appConfig } from "../config.js";
import { ProviderRequestError, httpStatusError } from "../errors.js";
import { createLogger } from "../logger.js";
import { isRecord, readTrimmedString } from "../utils/json.js";

const log = createLogger("ProviderConnection");

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type ConnectionTestResult = {
  modelCount: number;
  models: string[];
};

export type ConnectionTestOptions = {
  fetchImpl?: FetchLike;
  timeoutMs?: number;
};

/**
 * Probes an OpenAI-compatible server for its model list. `/models` and
 * `/v1/models` are tried before the bare base URL; a 404 moves on to the next
 * candidate, any other failure stops the probe.
 */
export async function testProviderConnection(
  baseUrl: string,
  apiKey: string,
  options: ConnectionTestOptions = {},
): Promise<ConnectionTestResult> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const timeoutMs = options.timeoutMs ?? appConfig.connectionTestTimeoutMs;
  const root = baseUrl.trim().replace(/\/+$/, "");
  const endpoints = [`${root}/models`, `${root}/v1/models`, root];

  let lastError: Error | null = null;
  for (const endpoint of endpoints) {
    let response: Response;
    try {
      response = await fetchImpl(endpoint, {
        method: "GET",
        headers: {
          Authorization: `Bearer ${apiKey}`,
          "Content-Type": "application/json",
        },
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw toConnectionError(error);
    }

    if (response.status === 404) {
      log.debug(`no models endpoint at ${endpoint}`);
      lastError = httpStatusError(404, await response.text().catch(() => ""));
      continue;
    }
    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw httpStatusError(response.status, body);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      log.warn(`models endpoint ${endpoint} returned a body that is not json:`, error);
      return { modelCount: 0, models: [] };
    }
    const models = extractModelNames(payload);
    log.info(`connected to ${root}, ${models.length} models`);
    return { modelCount: models.length, models };
  }

  throw new ProviderRequestError("http", "Could not find models endpoint", { cause: lastError ?? undefined });
}

/** Accepts `{ data: [{ id }] }` and `{ models: [{ name }] }` payloads. */
export function extractModelNames(payload: unknown): string[] {
  if (!isRecord(payload)) {
    return [];
  }
  const rows = Array.isArray(payload.data) ? payload.data : Array.isArray(payload.models) ? payload.models : [];
  const names: string[] = [];
  for (const row of rows) {
    if (!isRecord(row)) {
      continue;
    }
    const name = readTrimmedString(row.id) || readTrimmedString(row.name);
    if (name && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

function toConnectionError(error: unknown): ProviderRequestError {
  if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
    return new ProviderRequestError("timeout", "Connection timed out", { cause: error });
  }
  return new ProviderRequestError("network", "Failed to connect to server", { cause: error });
}
