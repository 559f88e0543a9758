import type { SessionEvent } from "./events/types.js";

/**
 * Base error of the client runtime. Each subclass fixes a stable `code` so
 * callers can branch without matching on messages, plus a `hint` describing
 * the usual remedy.
 */
export class AgentWireError extends Error {
  public readonly code: string;
  public readonly hint: string | undefined;
  public readonly details: Readonly<Record<string, unknown>>;

  constructor(
    code: string,
    message: string,
    options: { hint?: string; details?: Record<string, unknown>; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.hint = options.hint;
    this.details = Object.freeze({ ...(options.details ?? {}) });
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The server executable could not be launched. */
export class SpawnError extends AgentWireError {
  constructor(command: string, cause: unknown) {
    super("E-SPAWN", `Failed to spawn agent server "${command}": ${describeCause(cause)}`, {
      hint: "check cliPath and that the executable is on PATH",
      details: { command },
      cause,
    });
  }
}

/** The server never announced its listening port. */
export class PortAnnouncementTimeoutError extends AgentWireError {
  constructor(timeoutMs: number, stderr: string | null) {
    super("E-PORT-TIMEOUT", withStderr(`Timed out after ${timeoutMs}ms waiting for the server port announcement`, stderr), {
      details: { timeoutMs, stderr },
    });
  }
}

/** The server process exited while the client still depended on it. */
export class ServerExitedError extends AgentWireError {
  public readonly exitCode: number | null;

  constructor(exitCode: number | null, signal: string | null, stderr: string | null) {
    const reason = exitCode !== null ? `code ${exitCode}` : `signal ${signal ?? "unknown"}`;
    super("E-SERVER-EXITED", withStderr(`Agent server exited with ${reason}`, stderr), {
      details: { exitCode, signal, stderr },
    });
    this.exitCode = exitCode;
  }
}

/** Socket or stream level failure. */
export class TransportError extends AgentWireError {
  constructor(message: string, cause?: unknown) {
    super("E-TRANSPORT", message, { cause });
  }
}

/** The connection closed while a request was still pending. */
export class ConnectionClosedError extends AgentWireError {
  constructor(method: string | null, reason?: string) {
    super(
      "E-CONNECTION-CLOSED",
      method ? `Connection closed before "${method}" completed${reason ? `: ${reason}` : ""}` : `Connection closed${reason ? `: ${reason}` : ""}`,
      { details: { method } },
    );
  }
}

/** The remote party answered a request with a JSON-RPC error. */
export class RemoteRpcError extends AgentWireError {
  public readonly rpcCode: number;
  public readonly rpcData: unknown;
  public readonly method: string;

  constructor(method: string, rpcCode: number, message: string, rpcData?: unknown) {
    super("E-RPC", message, { details: { method, rpcCode } });
    this.method = method;
    this.rpcCode = rpcCode;
    this.rpcData = rpcData;
  }
}

/** A deadline elapsed before the awaited outcome arrived. */
export class RequestTimeoutError extends AgentWireError {
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, details: Record<string, unknown> = {}) {
    super("E-TIMEOUT", message, { details: { ...details, timeoutMs } });
    this.timeoutMs = timeoutMs;
  }
}

/** The server reported a `session.error` event while the caller was waiting. */
export class SessionEventError extends AgentWireError {
  public readonly event: SessionEvent;

  constructor(sessionId: string, event: SessionEvent) {
    const data = event.data;
    const message =
      data && typeof data === "object" && "message" in data && typeof data.message === "string"
        ? data.message
        : "Session error";
    super("E-SESSION-ERROR", message, { details: { sessionId, eventId: event.id } });
    this.event = event;
  }
}

/** The session was destroyed and accepts no further operations. */
export class SessionDestroyedError extends AgentWireError {
  constructor(sessionId: string) {
    super("E-SESSION-DESTROYED", "Session has been destroyed", {
      hint: "create or resume a new session",
      details: { sessionId },
    });
  }
}

/** An operation needed a connection while the client was not connected. */
export class NotConnectedError extends AgentWireError {
  constructor() {
    super("E-NOT-CONNECTED", "Client not connected. Call start() first.", {
      hint: "call start() or enable autoStart",
    });
  }
}

/** The server speaks a different protocol version. */
export class ProtocolVersionMismatchError extends AgentWireError {
  constructor(expected: number, actual: number | null) {
    super(
      "E-PROTOCOL-VERSION",
      actual === null
        ? `Protocol version mismatch: client expects version ${expected}, but the server does not report a protocol version.`
        : `Protocol version mismatch: client expects version ${expected}, but the server reports version ${actual}`,
      { details: { expected, actual } },
    );
  }
}

/** Options or a session configuration failed validation. */
export class InvalidOptionsError extends AgentWireError {
  public readonly issues: ReadonlyArray<{ path: string; message: string }>;

  constructor(subject: string, issues: ReadonlyArray<{ path: string; message: string }>) {
    const summary = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join("; ");
    super("E-INVALID-OPTIONS", `Invalid ${subject}: ${summary}`, { details: { subject } });
    this.issues = issues;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

function withStderr(message: string, stderr: string | null): string {
  return stderr ? `${message}\nstderr: ${stderr}` : message;
}
