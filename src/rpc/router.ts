import pLimit from "p-limit";
import type { z } from "zod";

import type { CallbackBridge } from "../bridge/callbacks.js";
import { defaultPermissionDenial } from "../bridge/results.js";
import { EventStream } from "../events/broadcaster.js";
import type { ClientNotification, SessionLifecycleEvent } from "../events/types.js";
import type { StructuredLogger } from "../logger.js";
import type { ClientSnapshot, SessionRecord, StateCell } from "../state/clientState.js";
import type { JsonRpcConnection } from "./connection.js";
import { runWithInboundCallContext } from "./context.js";
import { InvalidParamsError, JsonRpcError, MethodNotFoundError, UnknownSessionError } from "./errors.js";
import {
  formatIssues,
  HooksInvokeParamsSchema,
  PermissionRequestParamsSchema,
  SessionEventParamsSchema,
  SessionLifecycleParamsSchema,
  toLifecycleEvent,
  toSessionEvent,
  ToolCallParamsSchema,
  UserInputParamsSchema,
  type JsonRpcNotification,
  type JsonRpcRequest,
} from "./messages.js";

/** Inbound call names, with the aliases accepted for user input. */
const INBOUND_METHODS = new Map<string, InboundMethod>([
  ["tool.call", "tool.call"],
  ["permission.request", "permission.request"],
  ["userInput.request", "userInput.request"],
  ["user-input.request", "userInput.request"],
  ["ask_user", "userInput.request"],
  ["hooks.invoke", "hooks.invoke"],
]);

type InboundMethod = "tool.call" | "permission.request" | "userInput.request" | "hooks.invoke";

export type LifecycleHandler = (event: SessionLifecycleEvent) => void;

export interface ProtocolRouterOptions {
  readonly logger: StructuredLogger;
  readonly state: StateCell<ClientSnapshot>;
  readonly bridge: CallbackBridge;
  /** Capacity of the queue of notifications without session scope. */
  readonly notificationQueueSize: number;
  /** Maximum number of callbacks running at once. */
  readonly callbackConcurrency: number;
}

interface LifecycleSubscription {
  readonly type: string | null;
  readonly handler: LifecycleHandler;
}

/**
 * Dispatches inbound traffic of a {@link JsonRpcConnection}: session events
 * go to the owning session's broadcaster, lifecycle events to the registered
 * handlers, other notifications to a bounded queue, and server calls to the
 * {@link CallbackBridge} through a bounded pool. The read path never awaits
 * user code.
 */
export class ProtocolRouter {
  private readonly logger: StructuredLogger;
  private readonly state: StateCell<ClientSnapshot>;
  private readonly bridge: CallbackBridge;
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly queue: EventStream<ClientNotification>;
  private readonly lifecycleSubscriptions = new Set<LifecycleSubscription>();

  constructor(options: ProtocolRouterOptions) {
    this.logger = options.logger;
    this.state = options.state;
    this.bridge = options.bridge;
    this.limit = pLimit(Math.max(1, Math.floor(options.callbackConcurrency)));
    this.queue = new EventStream<ClientNotification>(options.notificationQueueSize);
  }

  /** Number of callbacks running or waiting for a pool slot. */
  get pendingCallbacks(): number {
    return this.limit.activeCount + this.limit.pendingCount;
  }

  /** Number of queued notifications not read yet. */
  get queuedNotifications(): number {
    return this.queue.size;
  }

  /** Routes the inbound traffic of `connection` through this router. */
  attach(connection: JsonRpcConnection): void {
    connection.onNotification((message) => this.handleNotification(message));
    connection.onRequest((message) => this.handleRequest(connection, message));
  }

  /** Registers a lifecycle handler, optionally for a single event type. */
  onLifecycleEvent(type: string | null, handler: LifecycleHandler): () => void {
    const subscription: LifecycleSubscription = { type, handler };
    this.lifecycleSubscriptions.add(subscription);
    return () => {
      this.lifecycleSubscriptions.delete(subscription);
    };
  }

  clearLifecycleHandlers(): void {
    this.lifecycleSubscriptions.clear();
  }

  /**
   * Reads the notification queue. Leaving the loop early keeps the queue
   * intact for the next reader.
   */
  async *notifications(): AsyncGenerator<ClientNotification, void, undefined> {
    while (true) {
      const next = await this.queue.next();
      if (next.done) {
        return;
      }
      yield next.value;
    }
  }

  handleNotification(message: JsonRpcNotification): void {
    switch (message.method) {
      case "session.event":
        this.dispatchSessionEvent(message.params);
        return;
      case "session.lifecycle":
        this.dispatchLifecycleEvent(message.params);
        this.enqueue({ method: message.method, params: message.params });
        return;
      default:
        this.enqueue({ method: message.method, params: message.params });
    }
  }

  handleRequest(connection: JsonRpcConnection, message: JsonRpcRequest): void {
    void this.limit(() => this.answerCall(connection, message));
  }

  private dispatchSessionEvent(params: unknown): void {
    const parsed = SessionEventParamsSchema.safeParse(params);
    if (!parsed.success) {
      this.logger.warn("session_event_invalid", { reason: formatIssues(parsed.error) });
      return;
    }
    const { sessionId, event } = parsed.data;
    const record = this.state.get().sessions.get(sessionId);
    if (!record || record.destroyed) {
      this.logger.debug("session_event_dropped", {
        session_id: sessionId,
        type: event.type,
        reason: record ? "destroyed" : "unknown_session",
      });
      return;
    }
    record.io.broadcaster.publish(toSessionEvent(event));
  }

  private dispatchLifecycleEvent(params: unknown): void {
    const parsed = SessionLifecycleParamsSchema.safeParse(params);
    if (!parsed.success) {
      this.logger.warn("lifecycle_event_invalid", { reason: formatIssues(parsed.error) });
      return;
    }
    const event = toLifecycleEvent(parsed.data);
    for (const subscription of [...this.lifecycleSubscriptions]) {
      if (subscription.type !== null && subscription.type !== event.type) {
        continue;
      }
      try {
        subscription.handler(event);
      } catch (error) {
        this.logger.warn("lifecycle_handler_failed", { type: event.type, session_id: event.sessionId, error });
      }
    }
  }

  private enqueue(notification: ClientNotification): void {
    if (!this.queue.offer(notification)) {
      this.logger.warn("notification_dropped", { method: notification.method, capacity: this.queue.capacity });
    }
  }

  private async answerCall(connection: JsonRpcConnection, message: JsonRpcRequest): Promise<void> {
    const sessionId = readSessionId(message.params);
    const context = { requestId: message.id, method: message.method, sessionId };
    try {
      const result = await runWithInboundCallContext(context, () => this.invoke(message));
      await connection.respond(message.id, result);
    } catch (error) {
      const rpcError = error instanceof JsonRpcError ? error : new JsonRpcError("INTERNAL");
      if (!(error instanceof JsonRpcError)) {
        this.logger.error("inbound_call_failed", { method: message.method, id: message.id, error });
      }
      await connection.respondError(message.id, rpcError).catch((writeError: unknown) => {
        this.logger.warn("rpc_response_write_failed", { id: message.id, error: writeError });
      });
    }
  }

  private async invoke(message: JsonRpcRequest): Promise<unknown> {
    const method = INBOUND_METHODS.get(message.method);
    switch (method) {
      case "tool.call": {
        const params = parseParams(ToolCallParamsSchema, message.params);
        const record = this.requireSession(params.sessionId);
        return { result: await this.bridge.handleToolCall(record, params) };
      }
      case "permission.request": {
        const params = parseParams(PermissionRequestParamsSchema, message.params);
        const record = this.state.get().sessions.get(params.sessionId);
        if (!record) {
          return { result: defaultPermissionDenial() };
        }
        return { result: await this.bridge.handlePermissionRequest(record, params) };
      }
      case "userInput.request": {
        const params = parseParams(UserInputParamsSchema, message.params);
        const record = this.requireSession(params.sessionId);
        return this.bridge.handleUserInputRequest(record, params);
      }
      case "hooks.invoke": {
        const params = parseParams(HooksInvokeParamsSchema, message.params);
        const record = this.state.get().sessions.get(params.sessionId);
        return record ? this.bridge.handleHookInvoke(record, params) : null;
      }
      case undefined:
        throw new MethodNotFoundError(message.method);
    }
  }

  private requireSession(sessionId: string): SessionRecord {
    const record = this.state.get().sessions.get(sessionId);
    if (!record) {
      throw new UnknownSessionError(sessionId);
    }
    return record;
  }
}

function parseParams<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, params: unknown): T {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    throw new InvalidParamsError(formatIssues(parsed.error));
  }
  return parsed.data;
}

function readSessionId(params: unknown): string | null {
  if (params && typeof params === "object" && "sessionId" in params && typeof params.sessionId === "string") {
    return params.sessionId;
  }
  return null;
}
