import type { Duplex, Readable, Writable } from "node:stream";

import { CallbackBridge } from "./bridge/callbacks.js";
import { resolveClientOptions, type ClientOptions, type ResolvedClientOptions } from "./config/options.js";
import {
  buildCreateSessionParams,
  buildSessionParams,
  validateResumeSessionConfig,
  validateSessionConfig,
  type ResumeSessionConfig,
  type SessionConfig,
} from "./config/sessionConfig.js";
import {
  AgentWireError,
  InvalidOptionsError,
  NotConnectedError,
  ProtocolVersionMismatchError,
  ServerExitedError,
} from "./errors.js";
import { EventBroadcaster } from "./events/broadcaster.js";
import type { ClientNotification, SessionEvent } from "./events/types.js";
import type { ChildProcessGateway } from "./gateways/childProcess.js";
import { StructuredLogger } from "./logger.js";
import { JsonRpcConnection, type RequestOptions } from "./rpc/connection.js";
import { connectSocket, createMessageChannel } from "./rpc/framing.js";
import {
  AuthStatusResultSchema,
  CreateSessionResultSchema,
  ModelsListResultSchema,
  PingResultSchema,
  SessionIdResultSchema,
  SessionListResultSchema,
  StatusResultSchema,
  SuccessResultSchema,
  ToolsListResultSchema,
  type AuthStatus,
  type ModelInfo,
  type PingResult,
  type ServerStatus,
  type SessionMetadata,
  type ToolInfo,
} from "./rpc/messages.js";
import { ProtocolRouter, type LifecycleHandler } from "./rpc/router.js";
import { ServerProcess, type ServerExit } from "./serverProcess.js";
import { AgentSession, type SessionHost } from "./session.js";
import { SendLock } from "./sessions/sendLock.js";
import {
  INITIAL_CLIENT_SNAPSHOT,
  markDestroyed,
  StateCell,
  withoutSession,
  withSession,
  type ClientSnapshot,
  type ConnectionState,
  type SessionRecord,
} from "./state/clientState.js";

/** Protocol version this client speaks; the server must report the same. */
export const PROTOCOL_VERSION = 2;

const LOOPBACK_HOST = "127.0.0.1";

export interface AgentClientDeps {
  readonly logger?: StructuredLogger;
  readonly gateway?: ChildProcessGateway;
  /** Environment consulted for `AGENTWIRE_*` overrides. */
  readonly env?: NodeJS.ProcessEnv;
}

export interface SessionListFilter {
  readonly cwd?: string;
  readonly gitRoot?: string;
  readonly repository?: string;
  readonly branch?: string;
}

/**
 * Client driving one agent server. It supervises the server process (or
 * attaches to an external one), multiplexes sessions over the connection and
 * answers the server's callbacks.
 *
 * All bookkeeping lives in one {@link StateCell}; every mutation replaces the
 * snapshot, so readers never see a half-applied change.
 */
export class AgentClient {
  readonly options: ResolvedClientOptions;
  readonly logger: StructuredLogger;

  private readonly cell = new StateCell<ClientSnapshot>(INITIAL_CLIENT_SNAPSHOT);
  private readonly bridge: CallbackBridge;
  private readonly router: ProtocolRouter;
  private readonly gateway: ChildProcessGateway | undefined;
  private readonly host: SessionHost;
  private startPromise: Promise<void> | null = null;
  /** Set while attached through {@link connectWithStreams}; such connections are never restarted. */
  private streamsAttached = false;
  private modelsRequest: Promise<ModelInfo[]> | null = null;

  constructor(options: ClientOptions = {}, deps: AgentClientDeps = {}) {
    this.options = resolveClientOptions(options, deps.env ?? process.env);
    this.logger = deps.logger ?? new StructuredLogger({ level: this.options.logLevel });
    this.gateway = deps.gateway;
    this.bridge = new CallbackBridge({ logger: this.logger, toolTimeoutMs: this.options.toolTimeoutMs });
    this.router = new ProtocolRouter({
      logger: this.logger,
      state: this.cell,
      bridge: this.bridge,
      notificationQueueSize: this.options.notificationQueueSize,
      callbackConcurrency: this.options.callbackConcurrency,
    });
    this.host = {
      logger: this.logger,
      sendAndWaitTimeoutMs: this.options.sendAndWaitTimeoutMs,
      destroyTimeoutMs: this.options.destroyTimeoutMs,
      eventBufferSize: this.options.eventBufferSize,
      request: (method, params, requestOptions) => this.request(method, params, requestOptions),
      requestIfConnected: (method, params, requestOptions) => this.requestIfConnected(method, params, requestOptions),
      sessionRecord: (sessionId) => this.cell.get().sessions.get(sessionId),
      markSessionDestroyed: (sessionId) => this.markSessionDestroyed(sessionId),
    };
  }

  /** Current connection state. */
  get state(): ConnectionState {
    return this.cell.get().status;
  }

  /** Number of automatic restarts attempted so far. */
  get restartAttempts(): number {
    return this.cell.get().restartAttempts;
  }

  /** Ids of the sessions currently tracked, destroyed ones included. */
  get sessionIds(): string[] {
    return [...this.cell.get().sessions.keys()];
  }

  /**
   * Spawns (or attaches to) the server and performs the protocol handshake.
   * Concurrent calls share the same attempt. On failure the state becomes
   * `error` and the cause is rethrown.
   */
  start(): Promise<void> {
    if (this.cell.get().status === "connected") {
      return Promise.resolve();
    }
    if (!this.startPromise) {
      this.startPromise = this.connect().finally(() => {
        this.startPromise = null;
      });
    }
    return this.startPromise;
  }

  /**
   * Attaches to a server already reachable over `readable`/`writable`. No
   * process is supervised and a lost connection is not restarted.
   */
  async connectWithStreams(readable: Readable, writable: Writable): Promise<void> {
    this.streamsAttached = true;
    this.cell.update((snapshot) => ({ ...snapshot, status: "connecting", stopping: false }));
    try {
      const connection = this.openConnection(readable, writable);
      await this.handshake(connection, null);
      this.cell.update((snapshot) => ({ ...snapshot, status: "connected" }));
    } catch (error) {
      this.failStart();
      throw error;
    }
  }

  /**
   * Destroys every session, closes the connection and terminates the server
   * gracefully. Resolves with the errors met on the way; the client ends up
   * `disconnected` regardless.
   */
  async stop(): Promise<Error[]> {
    return this.shutdown({ clearHandlers: true });
  }

  /** Drops every session without notifying the server and kills the process. */
  async forceStop(): Promise<void> {
    const snapshot = this.cell.update((current) => ({ ...current, stopping: true }));
    for (const record of snapshot.sessions.values()) {
      record.io.broadcaster.close();
    }
    snapshot.connection?.close("client force-stopped");
    snapshot.process?.kill();
    this.modelsRequest = null;
    this.cell.update((current) => ({
      ...current,
      status: "disconnected",
      stopping: false,
      connection: null,
      process: null,
      sessions: new Map(),
      modelsCache: null,
    }));
    this.logger.info("client_force_stopped", { sessions: snapshot.sessions.size });
  }

  async ping(message?: string): Promise<PingResult> {
    const raw = await this.request("ping", message === undefined ? {} : { message });
    return PingResultSchema.parse(raw ?? {});
  }

  async getStatus(): Promise<ServerStatus> {
    return StatusResultSchema.parse(await this.request("status.get", {}));
  }

  async getAuthStatus(): Promise<AuthStatus> {
    return AuthStatusResultSchema.parse(await this.request("auth.getStatus", {}));
  }

  /** Lists the available models. The first answer is cached until the client stops. */
  async listModels(): Promise<ModelInfo[]> {
    const cached = this.cell.get().modelsCache;
    if (cached) {
      return [...cached];
    }
    if (!this.modelsRequest) {
      const request = this.request("models.list", {}).then((raw) => {
        const models = ModelsListResultSchema.parse(raw ?? {}).models;
        if (this.modelsRequest === request) {
          this.cell.update((snapshot) => ({ ...snapshot, modelsCache: Object.freeze([...models]) }));
        }
        return models;
      });
      this.modelsRequest = request;
      void request.then(
        () => this.clearModelsRequest(request),
        () => this.clearModelsRequest(request),
      );
    }
    return [...(await this.modelsRequest)];
  }

  async listTools(model?: string): Promise<ToolInfo[]> {
    const raw = await this.request("tools.list", model === undefined ? {} : { model });
    return ToolsListResultSchema.parse(raw ?? {}).tools;
  }

  async listSessions(filter?: SessionListFilter): Promise<SessionMetadata[]> {
    const raw = await this.request("session.list", filter === undefined ? {} : { filter });
    return SessionListResultSchema.parse(raw ?? {}).sessions;
  }

  /** Deletes a session on the server and forgets it locally. */
  async deleteSession(sessionId: string): Promise<void> {
    const result = SuccessResultSchema.parse(await this.request("session.delete", { sessionId }));
    if (!result.success) {
      throw new AgentWireError("E-SESSION-DELETE", `Failed to delete session ${sessionId}: ${result.error ?? "unknown error"}`, {
        details: { sessionId },
      });
    }
    const previous = this.cell.get().sessions.get(sessionId);
    this.cell.update((snapshot) => ({ ...snapshot, sessions: withoutSession(snapshot.sessions, sessionId) }));
    previous?.io.broadcaster.close();
  }

  async getLastSessionId(): Promise<string | null> {
    const raw = await this.request("session.getLastId", {});
    return SessionIdResultSchema.parse(raw ?? {}).sessionId ?? null;
  }

  async getForegroundSessionId(): Promise<string | null> {
    const raw = await this.request("session.getForeground", {});
    return SessionIdResultSchema.parse(raw ?? {}).sessionId ?? null;
  }

  async setForegroundSessionId(sessionId: string): Promise<void> {
    const result = SuccessResultSchema.parse(await this.request("session.setForeground", { sessionId }));
    if (!result.success) {
      throw new AgentWireError(
        "E-SESSION-FOREGROUND",
        `Failed to set foreground session ${sessionId}: ${result.error ?? "unknown error"}`,
        { details: { sessionId } },
      );
    }
  }

  /** Subscribes to session lifecycle events. Returns the unsubscribe function. */
  onLifecycleEvent(handler: LifecycleHandler): () => void;
  onLifecycleEvent(type: string, handler: LifecycleHandler): () => void;
  onLifecycleEvent(typeOrHandler: string | LifecycleHandler, handler?: LifecycleHandler): () => void {
    if (typeof typeOrHandler === "function") {
      return this.router.onLifecycleEvent(null, typeOrHandler);
    }
    if (!handler) {
      throw new TypeError("onLifecycleEvent(type, handler) requires a handler");
    }
    return this.router.onLifecycleEvent(typeOrHandler, handler);
  }

  /** Notifications without session scope, in arrival order. */
  notifications(): AsyncGenerator<ClientNotification, void, undefined> {
    return this.router.notifications();
  }

  async createSession(config: SessionConfig = {}): Promise<AgentSession> {
    validateSessionConfig(config);
    const raw = await this.request("session.create", buildCreateSessionParams(config));
    const result = CreateSessionResultSchema.parse(raw);
    const session = this.registerSession(result.sessionId, result.workspacePath ?? null, config);
    this.logger.info("session_created", { session_id: result.sessionId });
    return session;
  }

  async resumeSession(sessionId: string, config: ResumeSessionConfig = {}): Promise<AgentSession> {
    validateResumeSessionConfig(config);
    const raw = await this.request("session.resume", { sessionId, ...buildSessionParams(config) });
    const result = CreateSessionResultSchema.parse(raw);
    const session = this.registerSession(result.sessionId, result.workspacePath ?? null, config);
    this.logger.info("session_resumed", { session_id: result.sessionId });
    return session;
  }

  /** Sends a request, starting the client first when `autoStart` allows it. */
  async request(method: string, params: unknown, options?: RequestOptions): Promise<unknown> {
    const connection = await this.ensureConnected();
    return connection.request(method, params, options);
  }

  private async requestIfConnected(method: string, params: unknown, options?: RequestOptions): Promise<unknown> {
    const { status, connection } = this.cell.get();
    if (status !== "connected" || !connection || connection.isClosed) {
      throw new NotConnectedError();
    }
    return connection.request(method, params, options);
  }

  private async ensureConnected(): Promise<JsonRpcConnection> {
    const current = this.cell.get();
    if (current.status === "connected" && current.connection && !current.connection.isClosed) {
      return current.connection;
    }
    if (!this.options.autoStart) {
      throw new NotConnectedError();
    }
    await this.start();
    const connection = this.cell.get().connection;
    if (!connection) {
      throw new NotConnectedError();
    }
    return connection;
  }

  private registerSession(sessionId: string, workspacePath: string | null, config: ResumeSessionConfig): AgentSession {
    const existing = this.cell.get().sessions.get(sessionId);
    if (existing && !existing.destroyed) {
      throw new InvalidOptionsError("session config", [
        { path: "sessionId", message: `session ${sessionId} is already open on this client` },
      ]);
    }
    const record: SessionRecord = {
      sessionId,
      workspacePath,
      tools: new Map((config.tools ?? []).map((tool) => [tool.name, tool])),
      permissionHandler: config.onPermissionRequest ?? null,
      userInputHandler: config.onUserInputRequest ?? null,
      hooks: config.hooks ?? null,
      destroyed: false,
      io: {
        broadcaster: new EventBroadcaster<SessionEvent>({
          capacity: this.options.eventBufferSize,
          logger: this.logger,
          label: sessionId,
        }),
        sendLock: new SendLock(),
      },
    };
    this.cell.update((snapshot) => ({ ...snapshot, sessions: withSession(snapshot.sessions, record) }));
    return new AgentSession(this.host, sessionId, workspacePath);
  }

  private markSessionDestroyed(sessionId: string): SessionRecord | undefined {
    let previous: SessionRecord | undefined;
    this.cell.updateIf(
      (snapshot) => {
        previous = snapshot.sessions.get(sessionId);
        return previous !== undefined && !previous.destroyed;
      },
      (snapshot) => {
        const record = snapshot.sessions.get(sessionId);
        return record ? { ...snapshot, sessions: withSession(snapshot.sessions, markDestroyed(record)) } : snapshot;
      },
    );
    return previous && !previous.destroyed ? previous : undefined;
  }

  private async connect(): Promise<void> {
    this.streamsAttached = false;
    this.cell.update((snapshot) => ({ ...snapshot, status: "connecting", stopping: false }));
    this.logger.info("client_starting", {
      external: this.options.external !== null,
      transport: this.options.useStdio ? "stdio" : "tcp",
    });
    try {
      const external = this.options.external;
      if (external) {
        const socket = await connectSocket(external.host, external.port, this.options.portTimeoutMs);
        const connection = this.openConnection(socket, socket, socket);
        await this.handshake(connection, null);
      } else {
        const serverProcess = await ServerProcess.spawn(
          {
            cliPath: this.options.cliPath,
            cliArgs: this.options.cliArgs,
            cwd: this.options.cwd,
            useStdio: this.options.useStdio,
            port: this.options.port,
            logLevel: this.options.logLevel,
            env: this.options.env,
            authToken: this.options.authToken,
            useLoggedInUser: this.options.useLoggedInUser,
          },
          { logger: this.logger, ...(this.gateway ? { gateway: this.gateway } : {}) },
        );
        this.cell.update((snapshot) => ({ ...snapshot, process: serverProcess }));
        let connection: JsonRpcConnection;
        if (this.options.useStdio) {
          connection = this.openConnection(serverProcess.stdout, serverProcess.stdin);
        } else {
          const port = await serverProcess.awaitPort(this.options.portTimeoutMs);
          const socket = await connectSocket(LOOPBACK_HOST, port, this.options.portTimeoutMs);
          connection = this.openConnection(socket, socket, socket);
        }
        await this.handshake(connection, serverProcess);
        this.watchProcess(serverProcess);
      }
      this.cell.update((snapshot) => ({ ...snapshot, status: "connected" }));
      this.logger.info("client_connected", { pid: this.cell.get().process?.pid ?? null });
    } catch (error) {
      this.failStart();
      this.logger.error("client_start_failed", { error });
      throw error;
    }
  }

  private failStart(): void {
    const snapshot = this.cell.get();
    this.cell.update((current) => ({ ...current, status: "error", connection: null, process: null }));
    snapshot.connection?.close("start failed");
    snapshot.process?.kill();
  }

  private openConnection(readable: Readable, writable: Writable, owned?: Duplex): JsonRpcConnection {
    const channel = createMessageChannel(this.options.framing, readable, writable, owned ? { owned } : {});
    const connection = new JsonRpcConnection(channel, {
      logger: this.logger,
      defaultTimeoutMs: this.options.requestTimeoutMs,
    });
    this.router.attach(connection);
    connection.onClose((reason) => this.handleConnectionLost(connection, reason));
    this.cell.update((snapshot) => ({ ...snapshot, connection }));
    return connection;
  }

  /** Pings the server and checks its protocol version, failing early if the process dies. */
  private async handshake(connection: JsonRpcConnection, serverProcess: ServerProcess | null): Promise<void> {
    const ping = connection.request("ping", {});
    const raw = serverProcess
      ? await Promise.race([
          ping,
          serverProcess.exited.then((exit): never => {
            throw new ServerExitedError(exit.code, exit.signal, serverProcess.stderrTail());
          }),
        ])
      : await ping;
    const result = PingResultSchema.parse(raw ?? {});
    const version = result.protocolVersion ?? null;
    if (version !== PROTOCOL_VERSION) {
      throw new ProtocolVersionMismatchError(PROTOCOL_VERSION, version);
    }
  }

  private watchProcess(serverProcess: ServerProcess): void {
    const exit = serverProcess.exitSignal();
    if (exit) {
      void exit.then((status) => this.handleProcessExit(serverProcess, status));
    }
  }

  private handleProcessExit(serverProcess: ServerProcess, exit: ServerExit): void {
    const snapshot = this.cell.get();
    if (snapshot.process !== serverProcess || snapshot.stopping) {
      return;
    }
    this.logger.warn("server_process_exited", { code: exit.code, signal: exit.signal, stderr: serverProcess.stderrTail() });
    this.handleUnexpectedLoss("process exited");
  }

  private handleConnectionLost(connection: JsonRpcConnection, reason: string): void {
    const snapshot = this.cell.get();
    if (snapshot.connection !== connection || snapshot.stopping) {
      return;
    }
    this.logger.warn("connection_lost", { reason });
    this.handleUnexpectedLoss(reason);
  }

  /**
   * Restarts the client after an unexpected exit or disconnect. Only one
   * restart runs at a time, and none while an explicit stop is in progress.
   */
  private handleUnexpectedLoss(reason: string): void {
    if (!this.options.autoRestart || this.streamsAttached) {
      const lost = this.cell.get();
      const marked = this.cell.updateIf(
        (snapshot) => snapshot.status === "connected" && !snapshot.stopping,
        (snapshot) => ({ ...snapshot, status: "error", connection: null, process: null }),
      );
      if (marked) {
        // A TCP server can outlive its socket; the next start spawns a fresh one.
        lost.connection?.close(reason);
        lost.process?.kill();
      }
      return;
    }
    const claimed = this.cell.updateIf(
      (snapshot) => snapshot.status === "connected" && !snapshot.stopping && !snapshot.restarting,
      (snapshot) => ({ ...snapshot, restarting: true, restartAttempts: snapshot.restartAttempts + 1 }),
    );
    if (claimed) {
      void this.restart(reason);
    }
  }

  private async restart(reason: string): Promise<void> {
    this.logger.info("client_restarting", { reason, attempt: this.cell.get().restartAttempts });
    try {
      const errors = await this.shutdown({ clearHandlers: false });
      if (errors.length > 0) {
        this.logger.warn("client_restart_stop_errors", { errors });
      }
      await this.start();
    } catch (error) {
      this.logger.error("client_restart_failed", { error });
    } finally {
      this.cell.update((snapshot) => ({ ...snapshot, restarting: false }));
    }
  }

  private async shutdown(options: { clearHandlers: boolean }): Promise<Error[]> {
    const errors: Error[] = [];
    const snapshot = this.cell.update((current) => ({ ...current, stopping: true }));
    this.logger.info("client_stopping", { sessions: snapshot.sessions.size });

    for (const sessionId of snapshot.sessions.keys()) {
      const previous = this.markSessionDestroyed(sessionId);
      if (!previous) {
        continue;
      }
      try {
        await this.requestIfConnected("session.destroy", { sessionId }, { timeoutMs: this.options.destroyTimeoutMs });
      } catch (error) {
        errors.push(
          new AgentWireError(
            "E-SESSION-DESTROY",
            `Failed to destroy session ${sessionId}: ${error instanceof Error ? error.message : String(error)}`,
            { details: { sessionId }, cause: error },
          ),
        );
      } finally {
        previous.io.broadcaster.close();
      }
    }

    snapshot.connection?.close("client stopped");
    if (snapshot.process) {
      try {
        await snapshot.process.terminate(this.options.shutdownGraceMs);
      } catch (error) {
        errors.push(error instanceof Error ? error : new Error(String(error)));
      }
    }

    this.modelsRequest = null;
    if (options.clearHandlers) {
      this.router.clearLifecycleHandlers();
    }
    this.cell.update((current) => ({
      ...current,
      status: "disconnected",
      stopping: false,
      connection: null,
      process: null,
      sessions: new Map(),
      modelsCache: null,
    }));
    this.logger.info("client_stopped", { errors: errors.length });
    return errors;
  }

  private clearModelsRequest(request: Promise<ModelInfo[]>): void {
    if (this.modelsRequest === request) {
      this.modelsRequest = null;
    }
  }
}
