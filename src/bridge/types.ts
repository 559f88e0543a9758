import type { z } from "zod";

/**
 * What a user callback may hand back: a plain value, a promise, or an async
 * iterable whose first item is the answer.
 */
export type HandlerReturn<T> = T | PromiseLike<T> | AsyncIterable<T>;

/** Context passed to every callback alongside its input. */
export interface CallbackContext {
  readonly sessionId: string;
}

export interface ToolInvocation extends CallbackContext {
  readonly toolCallId: string;
  readonly toolName: string;
  readonly arguments: unknown;
}

export const TOOL_RESULT_TYPES = ["success", "failure", "rejected", "denied"] as const;
export type ToolResultType = (typeof TOOL_RESULT_TYPES)[number];

/** Wire result of a tool call. */
export interface ToolResultObject {
  textResultForLlm: string;
  resultType: ToolResultType;
  error?: string;
  sessionLog?: string;
  toolTelemetry?: Record<string, unknown>;
}

export type ToolHandler<TArgs = unknown> = (args: TArgs, invocation: ToolInvocation) => HandlerReturn<unknown>;

/** Tool registered on a session. `parameters` is the JSON schema sent to the server. */
export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly parameters?: Readonly<Record<string, unknown>>;
  readonly handler: ToolHandler;
}

export interface ToolConfigBase {
  readonly description: string;
  readonly parameters?: Readonly<Record<string, unknown>>;
}

export interface SchemaToolConfig<TArgs> extends ToolConfigBase {
  /** Parses the raw arguments before the handler sees them. */
  readonly argsSchema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
  readonly handler: ToolHandler<TArgs>;
}

export interface PlainToolConfig extends ToolConfigBase {
  readonly argsSchema?: undefined;
  readonly handler: ToolHandler;
}

export const PERMISSION_KINDS = [
  "approved",
  "denied-by-rules",
  "denied-no-approval-rule-and-could-not-request-from-user",
  "denied-interactively-by-user",
] as const;
export type PermissionKind = (typeof PERMISSION_KINDS)[number];

/** Answer given when nothing approved the request. */
export const DEFAULT_PERMISSION_DENIAL = {
  kind: "denied-no-approval-rule-and-could-not-request-from-user",
} as const satisfies PermissionResult;

export interface PermissionRequest {
  readonly kind?: string;
  readonly toolCallId?: string;
  readonly [key: string]: unknown;
}

export interface PermissionResult {
  kind: PermissionKind;
  rules?: unknown[];
}

export type PermissionHandler = (request: PermissionRequest, context: CallbackContext) => HandlerReturn<unknown>;

export interface UserInputRequest {
  readonly question: string;
  readonly choices?: readonly string[];
  readonly allowFreeform?: boolean;
}

export interface UserInputResponse {
  answer?: string;
  /** Accepted as an alias of `answer`. */
  response?: string;
  wasFreeform?: boolean;
}

export interface UserInputAnswer {
  answer: string;
  wasFreeform: boolean;
}

export type UserInputHandler = (request: UserInputRequest, context: CallbackContext) => HandlerReturn<unknown>;

export type HookHandler = (input: unknown, context: CallbackContext) => HandlerReturn<unknown>;

export interface SessionHooks {
  onPreToolUse?: HookHandler;
  onPostToolUse?: HookHandler;
  onUserPromptSubmitted?: HookHandler;
  onSessionStart?: HookHandler;
  onSessionEnd?: HookHandler;
  onErrorOccurred?: HookHandler;
}

/** Wire hook type to the {@link SessionHooks} key handling it. */
export const HOOK_HANDLER_KEYS: ReadonlyMap<string, keyof SessionHooks> = new Map<string, keyof SessionHooks>([
  ["preToolUse", "onPreToolUse"],
  ["postToolUse", "onPostToolUse"],
  ["userPromptSubmitted", "onUserPromptSubmitted"],
  ["sessionStart", "onSessionStart"],
  ["sessionEnd", "onSessionEnd"],
  ["errorOccurred", "onErrorOccurred"],
]);
