import type { PermissionHandler, SessionHooks, Tool, UserInputHandler } from "../../src/bridge/types.js";
import { EventBroadcaster } from "../../src/events/broadcaster.js";
import type { SessionEvent } from "../../src/events/types.js";
import { SendLock } from "../../src/sessions/sendLock.js";
import type { SessionRecord } from "../../src/state/clientState.js";

export interface RecordOverrides {
  readonly sessionId?: string;
  readonly tools?: readonly Tool[];
  readonly permissionHandler?: PermissionHandler;
  readonly userInputHandler?: UserInputHandler;
  readonly hooks?: SessionHooks;
  readonly destroyed?: boolean;
}

/** Builds a live session record the way the client registers one. */
export function buildSessionRecord(overrides: RecordOverrides = {}): SessionRecord {
  const sessionId = overrides.sessionId ?? "session-test";
  return {
    sessionId,
    workspacePath: null,
    tools: new Map((overrides.tools ?? []).map((tool) => [tool.name, tool])),
    permissionHandler: overrides.permissionHandler ?? null,
    userInputHandler: overrides.userInputHandler ?? null,
    hooks: overrides.hooks ?? null,
    destroyed: overrides.destroyed ?? false,
    io: {
      broadcaster: new EventBroadcaster<SessionEvent>({ label: sessionId }),
      sendLock: new SendLock(),
    },
  };
}
