export type ProviderErrorKind = "network" | "timeout" | "auth" | "rate_limit" | "http" | "parse";

export class ProviderRequestError extends Error {
  readonly kind: ProviderErrorKind;
  readonly status?: number;
  readonly providerId?: string;

  constructor(
    kind: ProviderErrorKind,
    message: string,
    options: { status?: number; providerId?: string; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ProviderRequestError";
    this.kind = kind;
    this.status = options.status;
    this.providerId = options.providerId;
  }
}

/**
 * Maps a non-2xx status to the error surfaced to the user. 401/403/429 get
 * fixed wording, everything else carries the status and a trimmed body.
 */
export function httpStatusError(status: number, body: string, providerId?: string): ProviderRequestError {
  switch (status) {
    case 401:
      return new ProviderRequestError("auth", "Invalid API key", { status, providerId });
    case 403:
      return new ProviderRequestError("auth", "Access denied", { status, providerId });
    case 429:
      return new ProviderRequestError("rate_limit", "Rate limited", { status, providerId });
    default:
      return new ProviderRequestError("http", `HTTP ${status}: ${summarizeHttpError(body)}`, {
        status,
        providerId,
      });
  }
}

export function summarizeHttpError(payload: string): string {
  const text = payload.trim();
  if (!text) {
    return "empty response body";
  }
  return text.length <= 180 ? text : `${text.slice(0, 177)}...`;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

export function createAbortError(message = "Request aborted."): Error {
  const error = new Error(message);
  error.name = "AbortError";
  return error;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}
