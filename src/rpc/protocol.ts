import { isRecord } from "../utils/json.js";

export type JsonRpcId = string | number | null;

export type JsonRpcRequest = {
  jsonrpc: "2.0";
  id?: JsonRpcId;
  method: string;
  params?: unknown;
};

export type JsonRpcErrorObject = {
  code: number;
  message: string;
  data?: Record<string, unknown>;
};

export const JSON_RPC_ERROR = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

export class RpcMethodError extends Error {
  readonly code: number;
  readonly data?: Record<string, unknown>;

  constructor(code: number, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = "RpcMethodError";
    this.code = code;
    this.data = data;
  }

  toJSON(): JsonRpcErrorObject {
    return {
      code: this.code,
      message: this.message,
      ...(this.data ? { data: this.data } : {}),
    };
  }
}

export function buildRpcMethodError(code: number, message: string, data?: Record<string, unknown>): RpcMethodError {
  return new RpcMethodError(code, message, data);
}

export function isRpcMethodError(error: unknown): error is RpcMethodError {
  return error instanceof RpcMethodError;
}

function invalidParams(message: string, field: string | undefined, method: string): RpcMethodError {
  return buildRpcMethodError(JSON_RPC_ERROR.INVALID_PARAMS, `${method}: ${message}`, {
    reason: "invalid_params",
    ...(field ? { field } : {}),
  });
}

export function assertObjectParams(params: unknown, method: string): Record<string, unknown> {
  if (!isRecord(params)) {
    throw invalidParams("params must be an object", undefined, method);
  }
  return params;
}

export function assertString(value: unknown, field: string, method: string): string {
  if (typeof value !== "string" || !value.trim()) {
    throw invalidParams(`${field} must be a non-empty string`, field, method);
  }
  return value;
}

export function assertOptionalString(value: unknown, field: string, method: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw invalidParams(`${field} must be a string`, field, method);
  }
  return value;
}

export function assertBoolean(value: unknown, field: string, method: string): boolean {
  if (typeof value !== "boolean") {
    throw invalidParams(`${field} must be a boolean`, field, method);
  }
  return value;
}

export function assertOptionalBoolean(value: unknown, field: string, method: string): boolean | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  return assertBoolean(value, field, method);
}

export function assertNumber(value: unknown, field: string, method: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw invalidParams(`${field} must be a number`, field, method);
  }
  return value;
}

export function assertOptionalNumber(value: unknown, field: string, method: string): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  return assertNumber(value, field, method);
}
