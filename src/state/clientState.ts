import type { EventBroadcaster } from "../events/broadcaster.js";
import type { SessionEvent } from "../events/types.js";
import type { JsonRpcConnection } from "../rpc/connection.js";
import type { ModelInfo } from "../rpc/messages.js";
import type { ServerProcess } from "../serverProcess.js";
import type { SendLock } from "../sessions/sendLock.js";
import type { PermissionHandler, SessionHooks, Tool, UserInputHandler } from "../bridge/types.js";

/** Connection lifecycle of a client. `error` is reachable from any state. */
export type ConnectionState = "disconnected" | "connecting" | "connected" | "error";

/** I/O primitives owned by one session. They outlive record replacements. */
export interface SessionIo {
  readonly broadcaster: EventBroadcaster<SessionEvent>;
  readonly sendLock: SendLock;
}

/**
 * Immutable bookkeeping of one session. Updates replace the record inside the
 * state cell; handles only keep the session id.
 */
export interface SessionRecord {
  readonly sessionId: string;
  readonly workspacePath: string | null;
  readonly tools: ReadonlyMap<string, Tool>;
  readonly permissionHandler: PermissionHandler | null;
  readonly userInputHandler: UserInputHandler | null;
  readonly hooks: SessionHooks | null;
  readonly destroyed: boolean;
  readonly io: SessionIo;
}

export interface ClientSnapshot {
  readonly status: ConnectionState;
  /** True while an explicit stop runs; suppresses auto-restart. */
  readonly stopping: boolean;
  /** True while an auto-restart runs; a second trigger is ignored. */
  readonly restarting: boolean;
  readonly restartAttempts: number;
  readonly connection: JsonRpcConnection | null;
  readonly process: ServerProcess | null;
  readonly sessions: ReadonlyMap<string, SessionRecord>;
  readonly modelsCache: readonly ModelInfo[] | null;
}

export const INITIAL_CLIENT_SNAPSHOT: ClientSnapshot = Object.freeze({
  status: "disconnected",
  stopping: false,
  restarting: false,
  restartAttempts: 0,
  connection: null,
  process: null,
  sessions: new Map<string, SessionRecord>(),
  modelsCache: null,
});

/**
 * Single mutable cell holding an immutable value. Every mutation is a pure
 * transformation of the current value, so readers never observe a half-applied
 * update and conditional updates behave like compare-and-swap.
 */
export class StateCell<T> {
  private value: T;

  constructor(initial: T) {
    this.value = initial;
  }

  get(): T {
    return this.value;
  }

  /** Applies `transform` and returns the new value. */
  update(transform: (current: T) => T): T {
    this.value = transform(this.value);
    return this.value;
  }

  /**
   * Applies `transform` only when `predicate` holds for the current value.
   * Returns whether the update happened.
   */
  updateIf(predicate: (current: T) => boolean, transform: (current: T) => T): boolean {
    if (!predicate(this.value)) {
      return false;
    }
    this.value = transform(this.value);
    return true;
  }
}

/** Returns a copy of `sessions` with `record` stored under its id. */
export function withSession(
  sessions: ReadonlyMap<string, SessionRecord>,
  record: SessionRecord,
): ReadonlyMap<string, SessionRecord> {
  const next = new Map(sessions);
  next.set(record.sessionId, record);
  return next;
}

/** Returns a copy of `sessions` without `sessionId`. */
export function withoutSession(
  sessions: ReadonlyMap<string, SessionRecord>,
  sessionId: string,
): ReadonlyMap<string, SessionRecord> {
  if (!sessions.has(sessionId)) {
    return sessions;
  }
  const next = new Map(sessions);
  next.delete(sessionId);
  return next;
}

/** Destroyed copy of `record`: handler maps cleared, I/O kept for the caller to close. */
export function markDestroyed(record: SessionRecord): SessionRecord {
  return {
    ...record,
    destroyed: true,
    tools: new Map(),
    permissionHandler: null,
    userInputHandler: null,
    hooks: null,
  };
}
