import { ConnectionClosedError, RemoteRpcError, RequestTimeoutError, TransportError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { armDeadline } from "../runtime/timers.js";
import { JsonRpcError, toErrorResponse } from "./errors.js";
import type { MessageChannel } from "./framing.js";
import {
  classifyFrame,
  type JsonRpcNotification,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type RequestId,
} from "./messages.js";

/** Default deadline applied to outbound requests. */
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

export interface RequestOptions {
  /** Deadline for this call; `null` waits indefinitely. */
  readonly timeoutMs?: number | null;
}

export interface JsonRpcConnectionOptions {
  readonly logger: StructuredLogger;
  readonly defaultTimeoutMs?: number;
}

interface PendingRequest {
  readonly method: string;
  readonly resolve: (value: unknown) => void;
  readonly reject: (error: Error) => void;
  readonly disarm: () => void;
}

/**
 * JSON-RPC endpoint over a {@link MessageChannel}. It owns the correlation
 * table of outbound requests: each entry settles exactly once, with the
 * result, the remote error, a timeout, or a closed-connection error.
 * Inbound requests and notifications are handed to the registered handlers.
 */
export class JsonRpcConnection {
  private readonly logger: StructuredLogger;
  private readonly defaultTimeoutMs: number;
  private readonly pending = new Map<RequestId, PendingRequest>();
  private readonly closeListeners: Array<(reason: string) => void> = [];
  private requestHandler: ((message: JsonRpcRequest) => void) | null = null;
  private notificationHandler: ((message: JsonRpcNotification) => void) | null = null;
  private nextId = 1;
  private closed = false;

  constructor(
    private readonly channel: MessageChannel,
    options: JsonRpcConnectionOptions,
  ) {
    this.logger = options.logger;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    channel.onMessage((message) => this.handleFrame(message));
    channel.onError((error) => {
      this.logger.warn("rpc_frame_error", { message: error.message });
    });
    channel.onClose(() => this.close("transport closed"));
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of outbound requests still waiting for an answer. */
  get pendingCount(): number {
    return this.pending.size;
  }

  onRequest(handler: (message: JsonRpcRequest) => void): void {
    this.requestHandler = handler;
  }

  onNotification(handler: (message: JsonRpcNotification) => void): void {
    this.notificationHandler = handler;
  }

  onClose(listener: (reason: string) => void): void {
    this.closeListeners.push(listener);
  }

  /** Sends a request and resolves with its `result`. */
  request(method: string, params: unknown, options: RequestOptions = {}): Promise<unknown> {
    if (this.closed) {
      return Promise.reject(new ConnectionClosedError(method));
    }
    const id = this.nextId++;
    const timeoutMs = options.timeoutMs === undefined ? this.defaultTimeoutMs : options.timeoutMs;

    return new Promise<unknown>((resolve, reject) => {
      const disarm = armDeadline(timeoutMs, () => {
        if (this.pending.delete(id)) {
          this.logger.warn("rpc_request_timeout", { method, id, timeout_ms: timeoutMs });
          reject(new RequestTimeoutError(`Request "${method}" timed out after ${timeoutMs}ms`, timeoutMs ?? 0, { method }));
        }
      });
      this.pending.set(id, { method, resolve, reject, disarm });
      this.logger.debug("rpc_request_sent", { method, id });

      this.channel.write({ jsonrpc: "2.0", id, method, params }).catch((error: unknown) => {
        const entry = this.pending.get(id);
        if (!entry) {
          return;
        }
        this.pending.delete(id);
        entry.disarm();
        entry.reject(
          error instanceof TransportError
            ? error
            : new TransportError(`Failed to send "${method}": ${error instanceof Error ? error.message : String(error)}`, error),
        );
      });
    });
  }

  /** Sends a notification; no answer is expected. */
  async notify(method: string, params?: unknown): Promise<void> {
    if (this.closed) {
      throw new ConnectionClosedError(method);
    }
    await this.channel.write({ jsonrpc: "2.0", method, ...(params !== undefined ? { params } : {}) });
  }

  /** Answers an inbound request with a result. */
  async respond(id: RequestId, result: unknown): Promise<void> {
    await this.writeResponse({ jsonrpc: "2.0", id, result: result === undefined ? null : result });
  }

  /** Answers an inbound request with an error. */
  async respondError(id: RequestId | null, error: JsonRpcError): Promise<void> {
    await this.writeResponse(toErrorResponse(id, error));
  }

  /**
   * Closes the connection: disposes the channel and rejects every pending
   * request with {@link ConnectionClosedError}. Idempotent.
   */
  close(reason = "closed by client"): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const entries = [...this.pending.values()];
    this.pending.clear();
    for (const entry of entries) {
      entry.disarm();
      entry.reject(new ConnectionClosedError(entry.method, reason));
    }
    this.channel.dispose();
    this.logger.debug("rpc_connection_closed", { reason, rejected: entries.length });
    for (const listener of this.closeListeners) {
      listener(reason);
    }
  }

  private async writeResponse(response: JsonRpcResponse): Promise<void> {
    if (this.closed) {
      this.logger.debug("rpc_response_dropped", { id: response.id, reason: "connection closed" });
      return;
    }
    await this.channel.write(response);
  }

  private handleFrame(raw: unknown): void {
    const frame = classifyFrame(raw);
    switch (frame.kind) {
      case "response":
        this.settle(frame.message);
        return;
      case "request":
        if (this.requestHandler) {
          this.requestHandler(frame.message);
        } else {
          this.logger.warn("rpc_request_unhandled", { method: frame.message.method });
        }
        return;
      case "notification":
        this.notificationHandler?.(frame.message);
        return;
      case "invalid":
        this.logger.warn("rpc_frame_invalid", { reason: frame.reason, id: frame.id });
        if (frame.id !== null) {
          this.respondError(frame.id, new JsonRpcError("INVALID_REQUEST", frame.reason)).catch((error: unknown) => {
            this.logger.warn("rpc_response_write_failed", { id: frame.id, error });
          });
        }
        return;
    }
  }

  private settle(response: JsonRpcResponse): void {
    if (response.id === null) {
      this.logger.warn("rpc_response_without_id", { error: response.error });
      return;
    }
    const entry = this.pending.get(response.id);
    if (!entry) {
      this.logger.debug("rpc_response_unmatched", { id: response.id });
      return;
    }
    this.pending.delete(response.id);
    entry.disarm();
    if (response.error) {
      entry.reject(new RemoteRpcError(entry.method, response.error.code, response.error.message, response.error.data));
      return;
    }
    entry.resolve(response.result);
  }
}
