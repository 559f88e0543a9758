import { randomUUID } from "node:crypto";

import { EventStream } from "./events/broadcaster.js";
import { SESSION_EVENT_TYPES, type SessionEvent } from "./events/types.js";
import { RequestTimeoutError, SessionDestroyedError, SessionEventError } from "./errors.js";
import type { StructuredLogger } from "./logger.js";
import type { RequestOptions } from "./rpc/connection.js";
import { GetMessagesResultSchema, ModelIdResultSchema, SendResultSchema, toSessionEvent } from "./rpc/messages.js";
import { createDeadline, type Deadline } from "./runtime/timers.js";
import type { SessionRecord } from "./state/clientState.js";

export interface SelectionRange {
  readonly start: { readonly line: number; readonly character: number };
  readonly end: { readonly line: number; readonly character: number };
}

export type Attachment =
  | { readonly type: "file" | "directory"; readonly path: string; readonly displayName?: string }
  | {
      readonly type: "selection";
      readonly filePath: string;
      readonly displayName: string;
      readonly selection?: SelectionRange;
      readonly text?: string;
    };

export interface MessageOptions {
  readonly prompt: string;
  readonly attachments?: readonly Attachment[];
  /** `enqueue` waits for the current turn, `immediate` interrupts it. */
  readonly mode?: "enqueue" | "immediate";
}

export interface StreamOptions {
  /** Deadline for the whole exchange; `null` waits indefinitely. */
  readonly timeoutMs?: number | null;
}

export interface SentMessageStream {
  readonly messageId: string | null;
  readonly events: AsyncIterableIterator<SessionEvent>;
}

/**
 * Services a session handle needs from its client. Handles keep no mutable
 * state of their own; everything is looked up here by session id.
 */
export interface SessionHost {
  readonly logger: StructuredLogger;
  readonly sendAndWaitTimeoutMs: number;
  readonly destroyTimeoutMs: number;
  readonly eventBufferSize: number;
  /** Sends a request, starting the client first when auto-start allows it. */
  request(method: string, params: unknown, options?: RequestOptions): Promise<unknown>;
  /** Sends a request only when already connected. */
  requestIfConnected(method: string, params: unknown, options?: RequestOptions): Promise<unknown>;
  sessionRecord(sessionId: string): SessionRecord | undefined;
  /** Marks the session destroyed; returns the previous record, or `undefined` when it already was. */
  markSessionDestroyed(sessionId: string): SessionRecord | undefined;
}

const DEFAULT_STREAM_TIMEOUT_MS = 300_000;

function idleTimeoutMessage(timeoutMs: number): string {
  return `Timeout after ${timeoutMs}ms waiting for session.idle`;
}

/** Handle on one conversation multiplexed over the client connection. */
export class AgentSession {
  constructor(
    private readonly host: SessionHost,
    readonly sessionId: string,
    readonly workspacePath: string | null = null,
  ) {}

  /** True once the session was destroyed or its client stopped. */
  get isDestroyed(): boolean {
    const record = this.host.sessionRecord(this.sessionId);
    return !record || record.destroyed;
  }

  /** Sends a message and returns its id without waiting for the reply. */
  async send(message: MessageOptions | string): Promise<string | null> {
    this.requireLive();
    const raw = await this.host.request("session.send", this.sendParams(message));
    return SendResultSchema.parse(raw ?? {}).messageId ?? null;
  }

  /**
   * Sends a message and waits for `session.idle`. Resolves with the last
   * `assistant.message` seen before idle, `undefined` when there was none.
   * Concurrent calls on the same session run one after the other; the
   * deadline starts once this call owns the session.
   */
  async sendAndWait(message: MessageOptions | string, timeoutMs?: number): Promise<SessionEvent | undefined> {
    const record = this.requireLive();
    const timeout = timeoutMs ?? this.host.sendAndWaitTimeoutMs;
    const release = await record.io.sendLock.acquire();
    const stream = record.io.broadcaster.subscribe();
    const deadline = createDeadline(
      timeout,
      () => new RequestTimeoutError(idleTimeoutMessage(timeout), timeout, { sessionId: this.sessionId }),
      () => stream.close(),
    );
    try {
      await Promise.race([this.send(message), deadline.expired]);
      let last: SessionEvent | undefined;
      while (true) {
        const next = await stream.next();
        if (next.done) {
          throw deadline.error ?? new SessionDestroyedError(this.sessionId);
        }
        const event = next.value;
        if (event.type === SESSION_EVENT_TYPES.ASSISTANT_MESSAGE) {
          last = event;
        } else if (event.type === SESSION_EVENT_TYPES.IDLE) {
          return last;
        } else if (event.type === SESSION_EVENT_TYPES.ERROR) {
          throw new SessionEventError(this.sessionId, event);
        }
      }
    } finally {
      deadline.disarm();
      record.io.broadcaster.unsubscribe(stream);
      release();
    }
  }

  /**
   * Sends a message and streams the session events until `session.idle` or
   * `session.error`. A failed send or an elapsed deadline surfaces as a
   * final synthetic `session.error` event.
   */
  sendAsync(message: MessageOptions | string, options: StreamOptions = {}): AsyncIterableIterator<SessionEvent> {
    const record = this.requireLive();
    const output = new EventStream<SessionEvent>(this.host.eventBufferSize);
    void this.relay(record, message, options, output, {
      onSent: () => {},
      onSendFailed: (error) => this.emit(output, this.failureEvent(error)),
    });
    return output;
  }

  /** Like {@link sendAsync} but resolves once the message id is known. A failed send rejects. */
  sendWithId(message: MessageOptions | string, options: StreamOptions = {}): Promise<SentMessageStream> {
    const record = this.requireLive();
    const output = new EventStream<SessionEvent>(this.host.eventBufferSize);
    return new Promise<SentMessageStream>((resolve, reject) => {
      void this.relay(record, message, options, output, {
        onSent: (messageId) => resolve({ messageId, events: output }),
        onSendFailed: reject,
      });
    });
  }

  /** Aborts the turn in progress. */
  async abort(): Promise<void> {
    this.requireLive();
    await this.host.request("session.abort", { sessionId: this.sessionId });
  }

  /** Full event history kept by the server. */
  async getMessages(): Promise<SessionEvent[]> {
    this.requireLive();
    const raw = await this.host.request("session.getMessages", { sessionId: this.sessionId });
    return GetMessagesResultSchema.parse(raw ?? {}).events.map(toSessionEvent);
  }

  async getCurrentModel(): Promise<string | null> {
    this.requireLive();
    const raw = await this.host.request("session.model.getCurrent", { sessionId: this.sessionId });
    return ModelIdResultSchema.parse(raw ?? {}).modelId ?? null;
  }

  async switchModel(modelId: string): Promise<void> {
    this.requireLive();
    await this.host.request("session.model.switchTo", { sessionId: this.sessionId, modelId });
  }

  /**
   * Destroys the session: handlers are cleared at once, the server is told on
   * a best-effort basis, and every subscriber stream then ends. Later calls
   * do nothing.
   */
  async destroy(): Promise<void> {
    const previous = this.host.markSessionDestroyed(this.sessionId);
    if (!previous) {
      return;
    }
    try {
      await this.host.requestIfConnected(
        "session.destroy",
        { sessionId: this.sessionId },
        { timeoutMs: this.host.destroyTimeoutMs },
      );
    } catch (error) {
      this.host.logger.warn("session_destroy_notify_failed", { session_id: this.sessionId, error });
    } finally {
      previous.io.broadcaster.close();
    }
  }

  /**
   * Opens a stream of this session's events. On a destroyed session the
   * stream is already ended.
   */
  subscribe(capacity?: number): EventStream<SessionEvent> {
    const record = this.host.sessionRecord(this.sessionId);
    if (!record) {
      const ended = new EventStream<SessionEvent>(1);
      ended.end();
      return ended;
    }
    return record.io.broadcaster.subscribe(capacity);
  }

  /** Stops delivery to `stream`; other subscribers keep receiving. */
  unsubscribe(stream: EventStream<SessionEvent>): void {
    const record = this.host.sessionRecord(this.sessionId);
    if (record) {
      record.io.broadcaster.unsubscribe(stream);
      return;
    }
    stream.close();
  }

  private requireLive(): SessionRecord {
    const record = this.host.sessionRecord(this.sessionId);
    if (!record || record.destroyed) {
      throw new SessionDestroyedError(this.sessionId);
    }
    return record;
  }

  private sendParams(message: MessageOptions | string): Record<string, unknown> {
    const options = typeof message === "string" ? { prompt: message } : message;
    return {
      sessionId: this.sessionId,
      prompt: options.prompt,
      ...(options.attachments !== undefined ? { attachments: options.attachments } : {}),
      ...(options.mode !== undefined ? { mode: options.mode } : {}),
    };
  }

  private async relay(
    record: SessionRecord,
    message: MessageOptions | string,
    options: StreamOptions,
    output: EventStream<SessionEvent>,
    callbacks: { onSent: (messageId: string | null) => void; onSendFailed: (error: unknown) => void },
  ): Promise<void> {
    const timeout = options.timeoutMs === undefined ? DEFAULT_STREAM_TIMEOUT_MS : options.timeoutMs;
    const release = await record.io.sendLock.acquire();
    const stream = record.io.broadcaster.subscribe();
    const deadline: Deadline = createDeadline(
      timeout,
      () => new RequestTimeoutError(idleTimeoutMessage(timeout ?? 0), timeout ?? 0, { sessionId: this.sessionId }),
      () => stream.close(),
    );
    try {
      let messageId: string | null;
      try {
        messageId = await Promise.race([this.send(message), deadline.expired]);
      } catch (error) {
        callbacks.onSendFailed(error);
        return;
      }
      callbacks.onSent(messageId);
      while (true) {
        const next = await stream.next();
        if (next.done) {
          if (deadline.error) {
            this.emit(output, this.failureEvent(deadline.error));
          }
          return;
        }
        this.emit(output, next.value);
        if (next.value.type === SESSION_EVENT_TYPES.IDLE || next.value.type === SESSION_EVENT_TYPES.ERROR) {
          return;
        }
      }
    } catch (error) {
      this.emit(output, this.failureEvent(error));
    } finally {
      deadline.disarm();
      record.io.broadcaster.unsubscribe(stream);
      release();
      output.end();
    }
  }

  private emit(output: EventStream<SessionEvent>, event: SessionEvent): void {
    if (!output.offer(event)) {
      this.host.logger.debug("event_dropped_subscriber_full", {
        session_id: this.sessionId,
        capacity: output.capacity,
        type: event.type,
      });
    }
  }

  /** Terminal `session.error` standing in for a failed send or an elapsed deadline. */
  private failureEvent(error: unknown): SessionEvent {
    if (error instanceof RequestTimeoutError) {
      return this.syntheticError(error.message, { timeoutMs: error.timeoutMs });
    }
    return this.syntheticError(error instanceof Error ? error.message : String(error));
  }

  private syntheticError(message: string, extra: Record<string, unknown> = {}): SessionEvent {
    return Object.freeze({
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      parentId: null,
      type: SESSION_EVENT_TYPES.ERROR,
      data: Object.freeze({ message, ...extra }),
    });
  }
}
