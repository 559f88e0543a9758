/**
 * Event emitted by the agent server for one session. Events are delivered in
 * arrival order and never mutated after decoding.
 */
export interface SessionEvent {
  readonly id: string;
  readonly timestamp: string;
  readonly parentId: string | null;
  readonly type: string;
  readonly data: Readonly<Record<string, unknown>>;
  readonly ephemeral?: boolean;
}

/** Event types the runtime itself reacts to. */
export const SESSION_EVENT_TYPES = {
  START: "session.start",
  IDLE: "session.idle",
  ERROR: "session.error",
  USER_MESSAGE: "user.message",
  ASSISTANT_MESSAGE: "assistant.message",
  ASSISTANT_MESSAGE_DELTA: "assistant.message_delta",
  ASSISTANT_TURN_START: "assistant.turn_start",
  ASSISTANT_TURN_END: "assistant.turn_end",
  TOOL_EXECUTION_START: "tool.execution_start",
  TOOL_EXECUTION_COMPLETE: "tool.execution_complete",
} as const;

/** Lifecycle event types broadcast for the client as a whole. */
export const LIFECYCLE_EVENT_TYPES = [
  "session.created",
  "session.deleted",
  "session.updated",
  "session.foreground",
  "session.background",
] as const;

export type LifecycleEventType = (typeof LIFECYCLE_EVENT_TYPES)[number];

export interface SessionLifecycleEvent {
  readonly type: string;
  readonly sessionId: string;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

/** Notification without session scope, queued for `client.notifications()`. */
export interface ClientNotification {
  readonly method: string;
  readonly params: unknown;
}

/** Returns the textual content of an `assistant.message` event, if any. */
export function eventContent(event: SessionEvent): string | undefined {
  const content = event.data["content"];
  return typeof content === "string" ? content : undefined;
}
