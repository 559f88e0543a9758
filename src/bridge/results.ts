import { z } from "zod";

import { RequestTimeoutError } from "../errors.js";
import { armDeadline } from "../runtime/timers.js";
import {
  DEFAULT_PERMISSION_DENIAL,
  PERMISSION_KINDS,
  TOOL_RESULT_TYPES,
  type PermissionResult,
  type ToolResultObject,
  type UserInputAnswer,
} from "./types.js";

/** Tagged view of whatever a callback returned. */
export type HandlerOutcome =
  | { readonly kind: "value"; readonly value: unknown }
  | { readonly kind: "promise"; readonly promise: PromiseLike<unknown> }
  | { readonly kind: "stream"; readonly stream: AsyncIterable<unknown> };

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

function isAsyncIterable(value: unknown): value is AsyncIterable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.asyncIterator in value &&
    typeof value[Symbol.asyncIterator] === "function"
  );
}

/** Classifies a callback return value. This is the only place shapes are sniffed. */
export function classifyHandlerReturn(value: unknown): HandlerOutcome {
  if (isPromiseLike(value)) {
    return { kind: "promise", promise: value };
  }
  if (isAsyncIterable(value)) {
    return { kind: "stream", stream: value };
  }
  return { kind: "value", value };
}

async function firstItem(stream: AsyncIterable<unknown>): Promise<unknown> {
  for await (const item of stream) {
    return item;
  }
  return undefined;
}

/**
 * Invokes `invoke` and resolves with its settled value. Deferred outcomes are
 * awaited for at most `timeoutMs` (`null` waits indefinitely); a synchronous
 * throw becomes a rejection.
 */
export async function settleHandler(
  invoke: () => unknown,
  timeoutMs: number | null,
  label: string,
): Promise<unknown> {
  const outcome = classifyHandlerReturn(invoke());
  switch (outcome.kind) {
    case "value":
      return outcome.value;
    case "promise":
      return withDeadline(Promise.resolve(outcome.promise), timeoutMs, label);
    case "stream":
      return withDeadline(firstItem(outcome.stream), timeoutMs, label);
  }
}

function withDeadline<T>(promise: Promise<T>, timeoutMs: number | null, label: string): Promise<T> {
  if (timeoutMs === null) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const disarm = armDeadline(timeoutMs, () => {
      reject(new RequestTimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs));
    });
    promise.then(
      (value) => {
        disarm();
        resolve(value);
      },
      (error: unknown) => {
        disarm();
        reject(error);
      },
    );
  });
}

/* Tool results ------------------------------------------------------------ */

export const FAILED_TOOL_TEXT = "Invoking this tool produced an error. Detailed information is not available.";

/** Result for a tool name the session does not (or no longer) registers. */
export function unsupportedToolResult(toolName: string): ToolResultObject {
  return {
    textResultForLlm: `Tool '${toolName}' is not supported by this client instance.`,
    resultType: "failure",
    error: `tool '${toolName}' not supported`,
    toolTelemetry: {},
  };
}

/** Opaque failure for a handler that threw or timed out. */
export function failedToolResult(): ToolResultObject {
  return {
    textResultForLlm: FAILED_TOOL_TEXT,
    resultType: "failure",
    error: "tool execution failed",
    toolTelemetry: {},
  };
}

const ToolResultObjectSchema = z.object({
  textResultForLlm: z.string(),
  resultType: z.enum(TOOL_RESULT_TYPES),
  error: z.string().optional(),
  sessionLog: z.string().optional(),
  toolTelemetry: z.record(z.unknown()).optional(),
});

/**
 * Converts a settled handler value into the wire result: `null` is a
 * failure, strings are successes, result objects pass through and anything
 * else is JSON-encoded as a success.
 */
export function normalizeToolResult(value: unknown): ToolResultObject {
  if (value === null || value === undefined) {
    return {
      textResultForLlm: "Tool returned no result",
      resultType: "failure",
      error: "tool returned no result",
      toolTelemetry: {},
    };
  }
  if (typeof value === "string") {
    return { textResultForLlm: value, resultType: "success", toolTelemetry: {} };
  }
  const structured = ToolResultObjectSchema.safeParse(value);
  if (structured.success) {
    return structured.data;
  }
  const encoded = JSON.stringify(value);
  return {
    textResultForLlm: typeof encoded === "string" ? encoded : String(value),
    resultType: "success",
    toolTelemetry: {},
  };
}

/* Permission decisions ------------------------------------------------------ */

const PermissionResultSchema = z.object({
  kind: z.enum(PERMISSION_KINDS),
  rules: z.array(z.unknown()).optional(),
});

const WrappedPermissionResultSchema = z.object({ result: PermissionResultSchema });

/**
 * Accepts `{kind}` or `{result: {kind}}` with a recognised kind. Anything else
 * is `null`, which the bridge turns into the default denial.
 */
export function normalizePermissionResult(value: unknown): PermissionResult | null {
  const direct = PermissionResultSchema.safeParse(value);
  if (direct.success) {
    return direct.data;
  }
  const wrapped = WrappedPermissionResultSchema.safeParse(value);
  return wrapped.success ? wrapped.data.result : null;
}

export function defaultPermissionDenial(): PermissionResult {
  return { ...DEFAULT_PERMISSION_DENIAL };
}

/* User input ---------------------------------------------------------------- */

const UserInputResponseSchema = z.object({
  answer: z.string().optional(),
  response: z.string().optional(),
  wasFreeform: z.boolean().optional(),
});

/** Extracts a non-empty answer (`answer`, or its alias `response`); `null` otherwise. */
export function normalizeUserInputResponse(value: unknown): UserInputAnswer | null {
  const parsed = UserInputResponseSchema.safeParse(value);
  if (!parsed.success) {
    return null;
  }
  const answer = parsed.data.answer ?? parsed.data.response;
  if (answer === undefined || answer.length === 0) {
    return null;
  }
  return { answer, wasFreeform: parsed.data.wasFreeform ?? true };
}
