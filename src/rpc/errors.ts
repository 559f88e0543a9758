import type { JsonRpcErrorObject, JsonRpcResponse, RequestId } from "./messages.js";

/**
 * Error categories answered to the server when one of its calls fails. Each
 * entry provides the JSON-RPC code and the default message for that category.
 */
export const RPC_ERROR_TAXONOMY = {
  PARSE_ERROR: { code: -32700, message: "Parse error" },
  INVALID_REQUEST: { code: -32600, message: "Invalid request" },
  METHOD_NOT_FOUND: { code: -32601, message: "Method not found" },
  INVALID_PARAMS: { code: -32602, message: "Invalid params" },
  INTERNAL: { code: -32603, message: "Internal error" },
  UNKNOWN_SESSION: { code: -32001, message: "Unknown session" },
  HANDLER_FAILED: { code: -32001, message: "Handler failed" },
} as const;

export type RpcErrorCategory = keyof typeof RPC_ERROR_TAXONOMY;

export interface RpcErrorOptions {
  code?: number;
  data?: unknown;
}

/** Typed JSON-RPC error carried back to the server as an error response. */
export class JsonRpcError extends Error {
  readonly category: RpcErrorCategory;
  readonly code: number;
  readonly data: unknown;

  constructor(category: RpcErrorCategory, message?: string, options: RpcErrorOptions = {}) {
    const taxonomy = RPC_ERROR_TAXONOMY[category];
    super(message ?? taxonomy.message);
    this.name = "JsonRpcError";
    this.category = category;
    this.code = options.code ?? taxonomy.code;
    this.data = options.data;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toErrorObject(): JsonRpcErrorObject {
    return {
      code: this.code,
      message: this.message,
      ...(this.data !== undefined ? { data: this.data } : {}),
    };
  }
}

export class MethodNotFoundError extends JsonRpcError {
  constructor(method: string) {
    super("METHOD_NOT_FOUND", `Unknown method: ${method}`);
  }
}

export class UnknownSessionError extends JsonRpcError {
  constructor(sessionId: string) {
    super("UNKNOWN_SESSION", `Unknown session: ${sessionId}`);
  }
}

export class InvalidParamsError extends JsonRpcError {
  constructor(message?: string, data?: unknown) {
    super("INVALID_PARAMS", message, { data });
  }
}

/** Formats an error response envelope for `id`. */
export function toErrorResponse(id: RequestId | null, error: JsonRpcError): JsonRpcResponse {
  return { jsonrpc: "2.0", id, error: error.toErrorObject() };
}
