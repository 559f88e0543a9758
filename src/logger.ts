import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

import { isErrnoException } from "./nodePrimitives.js";
import { getInboundCallContext } from "./rpc/context.js";

/** Placeholder inserted when a secret is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Payload keys whose values are replaced when redaction is enabled. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "x-api-key",
  "api-key",
  "api_key",
  "apikey",
  "token",
  "authtoken",
  "auth_token",
  "access_token",
  "refresh_token",
  "password",
  "secret",
]);

/**
 * Parses `AGENTWIRE_LOG_REDACT`. The variable accepts comma-separated
 * directives such as `"on"`, `"off"` or `"on,sk-"`: toggles switch structured
 * redaction, anything else is a literal substring scrubbed from messages.
 * Redaction stays enabled unless a directive turns it off.
 */
export function parseRedactionDirectives(raw: string | undefined): {
  enabled: boolean;
  tokens: Array<string>;
} {
  if (!raw) {
    return { enabled: true, tokens: [] };
  }

  let enabled = true;
  const tokens: Array<string> = [];
  for (const directive of raw.split(",").map((value) => value.trim())) {
    if (directive.length === 0) {
      continue;
    }
    const normalised = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(normalised)) {
      enabled = false;
      continue;
    }
    if (REDACTION_ENABLE_TOKENS.has(normalised)) {
      enabled = true;
      continue;
    }
    tokens.push(directive);
  }

  return { enabled, tokens: Array.from(new Set(tokens)) };
}

const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MiB
const DEFAULT_MAX_FILE_COUNT = 5;

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
  request_id?: string | number;
  session_id?: string;
  method?: string;
}

/** Minimal writable surface the logger needs; `process.stderr` by default. */
export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  /** Lowest level emitted. Entries below it are discarded. */
  readonly level?: LogLevel;
  readonly logFile?: string | null;
  /** Maximum size in bytes before the mirrored log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of log files retained, including the active one. */
  readonly maxFileCount?: number;
  /** Literal strings or patterns scrubbed from messages. */
  readonly redactSecrets?: Array<string | RegExp>;
  /** Explicit toggle for structured payload redaction. */
  readonly redactionEnabled?: boolean;
  /** Destination of the JSON lines. */
  readonly sink?: LogSink | null;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * Structured logger that emits JSON lines on stderr and optionally mirrors
 * them to a file. File writes are queued sequentially to keep ordering.
 */
export class StructuredLogger {
  private level: LogLevel;
  private readonly logFile?: string;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly redactSecrets: Array<string | RegExp>;
  private readonly redactionEnabled: boolean;
  private readonly sink: LogSink | null;
  private readonly entryListener?: (entry: LogEntry) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.logFile = options.logFile ?? undefined;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    const directives = parseRedactionDirectives(process.env.AGENTWIRE_LOG_REDACT);
    this.redactSecrets = [...new Set<string | RegExp>([...directives.tokens, ...(options.redactSecrets ?? [])])];
    this.redactionEnabled = options.redactionEnabled ?? directives.enabled;
    this.sink = options.sink === undefined ? process.stderr : options.sink;
    this.entryListener = options.onEntry;
  }

  /** Current threshold. */
  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  /**
   * Waits for all pending file writes. Tests rely on it to assert the content
   * of mirrored log files deterministically.
   */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const context = getInboundCallContext();
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: this.scrub(message),
      ...(context ? { request_id: context.requestId, method: context.method } : {}),
      ...(context?.sessionId ? { session_id: context.sessionId } : {}),
      ...(payload !== undefined ? { payload: this.redactStructuredValue(payload) } : {}),
    };
    const line = `${safeStringify(entry)}\n`;
    this.sink?.write(line);
    if (this.entryListener) {
      this.entryListener(entry);
    }
    if (this.logFile) {
      this.enqueueFileWrite(this.logFile, line);
    }
  }

  private enqueueFileWrite(logFile: string, line: string): void {
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        await this.ensureLogDestination(logFile);
        await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
        await appendFile(logFile, line, "utf8");
      } catch (error) {
        // Reported on stderr directly: logging the failure through the queue would recurse.
        process.stderr.write(
          `${JSON.stringify({
            timestamp: new Date().toISOString(),
            level: "error",
            message: "log_file_write_failed",
            payload: { message: error instanceof Error ? error.message : String(error) },
          })}\n`,
        );
        this.logDirectoryReady = false;
      }
    });
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  /**
   * Rotates the mirrored file when appending `pendingBytes` would exceed the
   * size limit, keeping at most {@link maxFileCount} files.
   */
  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize = 0;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return;
      }
      throw error;
    }
    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    if (this.maxFileCount === 1) {
      await rm(logFile, { force: true });
      return;
    }
    await rm(`${logFile}.${this.maxFileCount - 1}`, { force: true });
    for (let index = this.maxFileCount - 2; index >= 1; index -= 1) {
      await renameIfPresent(`${logFile}.${index}`, `${logFile}.${index + 1}`);
    }
    await renameIfPresent(logFile, `${logFile}.1`);
  }

  private scrub(value: string): string {
    let sanitized = value;
    for (const pattern of this.redactSecrets) {
      if (typeof pattern === "string" && pattern.length > 0) {
        sanitized = sanitized.split(pattern).join(REDACTION_TOKEN);
      } else if (pattern instanceof RegExp) {
        sanitized = sanitized.replace(pattern, REDACTION_TOKEN);
      }
    }
    return sanitized;
  }

  private redactStructuredValue(value: unknown): unknown {
    if (!this.redactionEnabled) {
      return value;
    }
    return this.deepRedact(value, 0);
  }

  private deepRedact(value: unknown, depth: number): unknown {
    if (depth > 16) {
      return value;
    }
    if (typeof value === "string") {
      return this.scrub(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.deepRedact(item, depth + 1));
    }
    if (value instanceof Error) {
      return { name: value.name, message: this.scrub(value.message) };
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.deepRedact(entry, depth + 1);
      }
      return result;
    }
    return value;
  }
}

async function renameIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "ENOENT") {
      throw error;
    }
  }
}

/** JSON serialisation that tolerates bigints and cycles in payloads. */
function safeStringify(entry: LogEntry): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(entry, (_key, value: unknown) => {
    if (typeof value === "bigint") {
      return value.toString();
    }
    if (value instanceof Error) {
      return { name: value.name, message: value.message };
    }
    if (value && typeof value === "object") {
      if (seen.has(value)) {
        return "[Circular]";
      }
      seen.add(value);
    }
    return value;
  });
}
