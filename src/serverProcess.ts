import type { Readable, Writable } from "node:stream";

import { AUTH_TOKEN_ENV } from "./config/options.js";
import { PortAnnouncementTimeoutError, ServerExitedError, SpawnError } from "./errors.js";
import { createChildProcessGateway, type ChildProcessGateway, type ServerChild } from "./gateways/childProcess.js";
import type { LogLevel, StructuredLogger } from "./logger.js";
import { armDeadline } from "./runtime/timers.js";

/** Pattern announced on stdout by a server started in TCP mode. */
export const PORT_ANNOUNCEMENT_PATTERN = /listening on port (\d+)/i;

/** Number of stderr lines retained for error context. */
const STDERR_TAIL_LINES = 100;

/** Characters of stdout kept while scanning for the port announcement. */
const PORT_SCAN_WINDOW = 4_096;

export interface ServerProcessConfig {
  readonly cliPath: string;
  readonly cliArgs: readonly string[];
  readonly cwd: string;
  readonly useStdio: boolean;
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly authToken: string | null;
  readonly useLoggedInUser: boolean;
}

export interface ServerExit {
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;
}

export interface ServerProcessDeps {
  readonly logger: StructuredLogger;
  readonly gateway?: ChildProcessGateway;
}

/** Command line used to start the server in headless JSON-RPC mode. */
export function buildServerArgs(config: ServerProcessConfig): string[] {
  const args = [...config.cliArgs, "--server", "--no-auto-update", "--log-level", config.logLevel];
  if (config.useStdio) {
    args.push("--stdio");
  } else if (config.port > 0) {
    args.push("--port", String(config.port));
  }
  if (config.authToken !== null) {
    args.push("--auth-token-env", AUTH_TOKEN_ENV);
  }
  if (!config.useLoggedInUser) {
    args.push("--no-auto-login");
  }
  return args;
}

/**
 * Supervised agent server process. The instance exists only once the child
 * has spawned; {@link ServerProcess.spawn} rejects with {@link SpawnError}
 * otherwise.
 */
export class ServerProcess {
  /** Resolves once with the exit status; never rejects. */
  readonly exited: Promise<ServerExit>;

  private exitInfo: ServerExit | null = null;
  private exitSignalConsumed = false;
  private readonly stderrLines: string[] = [];
  private stderrBuffer = "";

  private constructor(
    readonly child: ServerChild,
    private readonly logger: StructuredLogger,
  ) {
    this.exited = new Promise<ServerExit>((resolve) => {
      child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
        this.exitInfo = { code, signal };
        this.flushStderr();
        this.logger.debug("server_process_exit", { pid: child.pid ?? null, code, signal });
        resolve(this.exitInfo);
      });
    });
    child.on("error", (error: Error) => {
      this.logger.warn("server_process_error", { pid: child.pid ?? null, message: error.message });
    });
    child.stderr.setEncoding("utf8");
    child.stderr.on("data", (chunk: string) => this.consumeStderr(chunk));
    // Writes to a dead child surface as EPIPE on stdin; the exit watcher reports the real cause.
    child.stdin.on("error", (error: Error) => {
      this.logger.debug("server_stdin_error", { message: error.message });
    });
  }

  /** Spawns the server and waits for the OS to confirm the launch. */
  static async spawn(config: ServerProcessConfig, deps: ServerProcessDeps): Promise<ServerProcess> {
    const gateway = deps.gateway ?? createChildProcessGateway();
    const args = buildServerArgs(config);
    const extraEnv: Record<string, string | undefined> = { ...config.env };
    if (config.authToken !== null) {
      extraEnv[AUTH_TOKEN_ENV] = config.authToken;
    }

    let child: ServerChild;
    try {
      child = gateway.spawn({
        command: config.cliPath,
        args,
        cwd: config.cwd,
        extraEnv,
        removeEnvKeys: ["NODE_DEBUG"],
      });
    } catch (error) {
      throw new SpawnError(config.cliPath, error);
    }

    await new Promise<void>((resolve, reject) => {
      const onSpawn = () => {
        child.off("error", onError);
        resolve();
      };
      const onError = (error: Error) => {
        child.off("spawn", onSpawn);
        reject(new SpawnError(config.cliPath, error));
      };
      child.once("spawn", onSpawn);
      child.once("error", onError);
    });

    deps.logger.debug("server_process_spawned", { pid: child.pid ?? null, command: config.cliPath, args });
    return new ServerProcess(child, deps.logger);
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get stdin(): Writable {
    return this.child.stdin;
  }

  get stdout(): Readable {
    return this.child.stdout;
  }

  isAlive(): boolean {
    return this.exitInfo === null && this.child.exitCode === null && this.child.signalCode === null;
  }

  /**
   * One-shot exit notification: the first caller receives the exit promise,
   * every later caller receives `null`.
   */
  exitSignal(): Promise<ServerExit> | null {
    if (this.exitSignalConsumed) {
      return null;
    }
    this.exitSignalConsumed = true;
    return this.exited;
  }

  /**
   * Scans stdout for the port announcement. Once found, stdout keeps being
   * drained in the background so the child never blocks on a full pipe.
   */
  awaitPort(timeoutMs: number): Promise<number> {
    const stdout = this.child.stdout;
    stdout.setEncoding("utf8");

    return new Promise<number>((resolve, reject) => {
      let window = "";
      let settled = false;

      const finish = (outcome: { port: number } | { error: Error }) => {
        if (settled) {
          return;
        }
        settled = true;
        disarm();
        stdout.off("data", onScan);
        stdout.on("data", onDrain);
        if ("port" in outcome) {
          resolve(outcome.port);
        } else {
          reject(outcome.error);
        }
      };

      const onScan = (chunk: string) => {
        window = (window + chunk).slice(-PORT_SCAN_WINDOW);
        const match = PORT_ANNOUNCEMENT_PATTERN.exec(window);
        if (match?.[1] !== undefined) {
          const port = Number.parseInt(match[1], 10);
          this.logger.debug("server_port_announced", { port });
          finish({ port });
        }
      };
      const onDrain = (chunk: string) => {
        this.logger.debug("server_stdout", { text: chunk.trimEnd() });
      };
      const onExit = (exit: ServerExit) => {
        finish({ error: new ServerExitedError(exit.code, exit.signal, this.stderrTail()) });
      };

      const disarm = armDeadline(timeoutMs, () => {
        finish({ error: new PortAnnouncementTimeoutError(timeoutMs, this.stderrTail()) });
      });
      stdout.on("data", onScan);
      void this.exited.then(onExit);
    });
  }

  /**
   * SIGTERM first; SIGKILL when the child is still alive after `graceMs`.
   * Resolves with the exit status.
   */
  async terminate(graceMs: number): Promise<ServerExit> {
    if (!this.isAlive()) {
      return this.exitInfo ?? (await this.exited);
    }
    this.child.kill("SIGTERM");
    const graceful = await new Promise<ServerExit | null>((resolve) => {
      const disarm = armDeadline(graceMs, () => resolve(null));
      void this.exited.then((exit) => {
        disarm();
        resolve(exit);
      });
    });
    if (graceful) {
      return graceful;
    }
    this.logger.warn("server_process_kill_escalated", { pid: this.child.pid ?? null, grace_ms: graceMs });
    this.child.kill("SIGKILL");
    return this.exited;
  }

  /** Immediate SIGKILL, without waiting. */
  kill(): void {
    if (this.isAlive()) {
      this.child.kill("SIGKILL");
    }
  }

  /** Last lines written to stderr, or `null` when there were none. */
  stderrTail(): string | null {
    this.flushStderr();
    return this.stderrLines.length > 0 ? this.stderrLines.join("\n") : null;
  }

  private consumeStderr(chunk: string): void {
    this.stderrBuffer += chunk;
    let newlineIndex = this.stderrBuffer.indexOf("\n");
    while (newlineIndex !== -1) {
      const rawLine = this.stderrBuffer.slice(0, newlineIndex);
      this.stderrBuffer = this.stderrBuffer.slice(newlineIndex + 1);
      this.recordStderr(rawLine);
      newlineIndex = this.stderrBuffer.indexOf("\n");
    }
  }

  private flushStderr(): void {
    if (this.stderrBuffer.length > 0) {
      this.recordStderr(this.stderrBuffer);
      this.stderrBuffer = "";
    }
  }

  private recordStderr(line: string): void {
    const cleaned = line.replace(/\r$/, "");
    if (!cleaned.trim()) {
      return;
    }
    this.logger.debug("server_stderr", { line: cleaned });
    this.stderrLines.push(cleaned);
    if (this.stderrLines.length > STDERR_TAIL_LINES) {
      this.stderrLines.splice(0, this.stderrLines.length - STDERR_TAIL_LINES);
    }
  }
}
