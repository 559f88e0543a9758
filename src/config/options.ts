import { z } from "zod";

import { InvalidOptionsError } from "../errors.js";
import { LOG_LEVELS, type LogLevel } from "../logger.js";
import type { FramingMode } from "../rpc/framing.js";
import {
  type EnvSource,
  readOptionalBool,
  readOptionalEnum,
  readOptionalInt,
  readOptionalString,
} from "./env.js";

const positiveInt = z.number().int().positive();

/** Options accepted by `new AgentClient(options)`. */
export const ClientOptionsSchema = z
  .object({
    /** Agent server executable. */
    cliPath: z.string().min(1).optional(),
    /** Extra arguments placed before the server flags. */
    cliArgs: z.array(z.string()).optional(),
    /** Working directory of the spawned server. */
    cwd: z.string().min(1).optional(),
    /** TCP port requested from the server; 0 lets it pick one. */
    port: z.number().int().min(0).max(65_535).optional(),
    /** Talk over the child's stdio instead of a TCP socket. */
    useStdio: z.boolean().optional(),
    /** Address of an already running server (`port`, `host:port` or `http://host:port`). */
    cliUrl: z.string().min(1).optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
    autoStart: z.boolean().optional(),
    autoRestart: z.boolean().optional(),
    notificationQueueSize: positiveInt.optional(),
    eventBufferSize: positiveInt.optional(),
    toolTimeoutMs: positiveInt.optional(),
    requestTimeoutMs: positiveInt.optional(),
    sendAndWaitTimeoutMs: positiveInt.optional(),
    portTimeoutMs: positiveInt.optional(),
    shutdownGraceMs: positiveInt.optional(),
    destroyTimeoutMs: positiveInt.optional(),
    callbackConcurrency: positiveInt.optional(),
    framing: z.enum(["header", "line"]).optional(),
    /** Environment overrides applied on top of the inherited environment. */
    env: z.record(z.string().optional()).optional(),
    /** Token handed to the server through {@link AUTH_TOKEN_ENV}. */
    authToken: z.string().min(1).optional(),
    useLoggedInUser: z.boolean().optional(),
  })
  .strict();

export type ClientOptions = z.input<typeof ClientOptionsSchema>;

/** Environment variable carrying the auth token into the server process. */
export const AUTH_TOKEN_ENV = "AGENTWIRE_AUTH_TOKEN";

export interface ExternalServer {
  readonly host: string;
  readonly port: number;
}

/** Fully resolved configuration used by the client. */
export interface ResolvedClientOptions {
  readonly cliPath: string;
  readonly cliArgs: readonly string[];
  readonly cwd: string;
  readonly port: number;
  readonly useStdio: boolean;
  /** Set when the client attaches to a server it does not supervise. */
  readonly external: ExternalServer | null;
  readonly logLevel: LogLevel;
  readonly autoStart: boolean;
  readonly autoRestart: boolean;
  readonly notificationQueueSize: number;
  readonly eventBufferSize: number;
  readonly toolTimeoutMs: number;
  readonly requestTimeoutMs: number;
  readonly sendAndWaitTimeoutMs: number;
  readonly portTimeoutMs: number;
  readonly shutdownGraceMs: number;
  readonly destroyTimeoutMs: number;
  readonly callbackConcurrency: number;
  readonly framing: FramingMode;
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly authToken: string | null;
  readonly useLoggedInUser: boolean;
}

export const DEFAULT_CLIENT_OPTIONS = {
  cliPath: "copilot",
  port: 0,
  useStdio: true,
  logLevel: "info",
  autoStart: true,
  autoRestart: true,
  notificationQueueSize: 4_096,
  eventBufferSize: 1_024,
  toolTimeoutMs: 120_000,
  requestTimeoutMs: 60_000,
  sendAndWaitTimeoutMs: 300_000,
  portTimeoutMs: 10_000,
  shutdownGraceMs: 5_000,
  destroyTimeoutMs: 5_000,
  callbackConcurrency: 16,
  framing: "header",
} as const satisfies Partial<ResolvedClientOptions>;

/**
 * Validates `input` and merges it with environment overrides and defaults.
 * Explicit options win over `AGENTWIRE_*` variables, which win over the
 * defaults.
 */
export function resolveClientOptions(input: unknown = {}, env: EnvSource = process.env): ResolvedClientOptions {
  const parsed = ClientOptionsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new InvalidOptionsError(
      "client options",
      parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    );
  }
  const options = parsed.data;

  if (options.cliUrl !== undefined && options.useStdio === true) {
    throw new InvalidOptionsError("client options", [
      { path: "cliUrl", message: "cliUrl is mutually exclusive with useStdio" },
    ]);
  }
  if (options.cliUrl !== undefined && options.cliPath !== undefined) {
    throw new InvalidOptionsError("client options", [
      { path: "cliUrl", message: "cliUrl is mutually exclusive with cliPath" },
    ]);
  }
  if (options.cliUrl !== undefined && options.authToken !== undefined) {
    throw new InvalidOptionsError("client options", [
      { path: "authToken", message: "authToken cannot be used with cliUrl (the external server manages its own auth)" },
    ]);
  }

  const external = options.cliUrl !== undefined ? parseCliUrl(options.cliUrl) : null;
  const authToken = options.authToken ?? null;

  return {
    cliPath: options.cliPath ?? readOptionalString("AGENTWIRE_CLI_PATH", env) ?? DEFAULT_CLIENT_OPTIONS.cliPath,
    cliArgs: [...(options.cliArgs ?? [])],
    cwd: options.cwd ?? process.cwd(),
    port: options.port ?? DEFAULT_CLIENT_OPTIONS.port,
    useStdio: external ? false : (options.useStdio ?? DEFAULT_CLIENT_OPTIONS.useStdio),
    external,
    logLevel: options.logLevel ?? readOptionalEnum("AGENTWIRE_LOG_LEVEL", LOG_LEVELS, env) ?? DEFAULT_CLIENT_OPTIONS.logLevel,
    autoStart: options.autoStart ?? DEFAULT_CLIENT_OPTIONS.autoStart,
    autoRestart: options.autoRestart ?? readOptionalBool("AGENTWIRE_AUTO_RESTART", env) ?? DEFAULT_CLIENT_OPTIONS.autoRestart,
    notificationQueueSize: options.notificationQueueSize ?? DEFAULT_CLIENT_OPTIONS.notificationQueueSize,
    eventBufferSize: options.eventBufferSize ?? DEFAULT_CLIENT_OPTIONS.eventBufferSize,
    toolTimeoutMs:
      options.toolTimeoutMs ?? readOptionalInt("AGENTWIRE_TOOL_TIMEOUT_MS", { min: 1 }, env) ?? DEFAULT_CLIENT_OPTIONS.toolTimeoutMs,
    requestTimeoutMs:
      options.requestTimeoutMs ??
      readOptionalInt("AGENTWIRE_REQUEST_TIMEOUT_MS", { min: 1 }, env) ??
      DEFAULT_CLIENT_OPTIONS.requestTimeoutMs,
    sendAndWaitTimeoutMs: options.sendAndWaitTimeoutMs ?? DEFAULT_CLIENT_OPTIONS.sendAndWaitTimeoutMs,
    portTimeoutMs: options.portTimeoutMs ?? DEFAULT_CLIENT_OPTIONS.portTimeoutMs,
    shutdownGraceMs: options.shutdownGraceMs ?? DEFAULT_CLIENT_OPTIONS.shutdownGraceMs,
    destroyTimeoutMs: options.destroyTimeoutMs ?? DEFAULT_CLIENT_OPTIONS.destroyTimeoutMs,
    callbackConcurrency: options.callbackConcurrency ?? DEFAULT_CLIENT_OPTIONS.callbackConcurrency,
    framing: options.framing ?? DEFAULT_CLIENT_OPTIONS.framing,
    env: { ...(options.env ?? {}) },
    authToken,
    useLoggedInUser: options.useLoggedInUser ?? authToken === null,
  };
}

/**
 * Parses `8080`, `host:8080` or `scheme://host:8080` into host and port. The
 * host defaults to `localhost`.
 */
export function parseCliUrl(raw: string): ExternalServer {
  const withoutScheme = raw.trim().replace(/^[a-z][a-z0-9+.-]*:\/\//i, "").replace(/\/.*$/, "");
  const match = /^(?:(.*):)?(\d+)$/.exec(withoutScheme);
  const port = match?.[2] !== undefined ? Number.parseInt(match[2], 10) : Number.NaN;
  if (!match || !Number.isInteger(port) || port < 1 || port > 65_535) {
    throw new InvalidOptionsError("client options", [
      { path: "cliUrl", message: `cannot parse "${raw}" as [host:]port` },
    ]);
  }
  const host = match[1] !== undefined && match[1].length > 0 ? match[1] : "localhost";
  return { host, port };
}
