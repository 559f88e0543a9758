import { z } from "zod";

import type { SessionEvent, SessionLifecycleEvent } from "../events/types.js";

/**
 * Wire shapes of the JSON-RPC 2.0 traffic exchanged with the agent server.
 * Inbound frames are validated here before the router acts on them.
 */
export const RequestIdSchema = z.union([z.string(), z.number()]);
export type RequestId = z.infer<typeof RequestIdSchema>;

export const JsonRpcErrorObjectSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional(),
});
export type JsonRpcErrorObject = z.infer<typeof JsonRpcErrorObjectSchema>;

const RequestFrameSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: RequestIdSchema,
  method: z.string().min(1),
  params: z.unknown().optional(),
});

const NotificationFrameSchema = z.object({
  jsonrpc: z.literal("2.0"),
  method: z.string().min(1),
  params: z.unknown().optional(),
});

const ResponseFrameSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: RequestIdSchema.nullable(),
  result: z.unknown().optional(),
  error: JsonRpcErrorObjectSchema.optional(),
});

export interface JsonRpcRequest {
  jsonrpc: "2.0";
  id: RequestId;
  method: string;
  params?: unknown;
}

export interface JsonRpcNotification {
  jsonrpc: "2.0";
  method: string;
  params?: unknown;
}

export interface JsonRpcResponse {
  jsonrpc: "2.0";
  id: RequestId | null;
  result?: unknown;
  error?: JsonRpcErrorObject;
}

export type JsonRpcMessage = JsonRpcRequest | JsonRpcNotification | JsonRpcResponse;

export type ClassifiedFrame =
  | { kind: "request"; message: JsonRpcRequest }
  | { kind: "notification"; message: JsonRpcNotification }
  | { kind: "response"; message: JsonRpcResponse }
  | { kind: "invalid"; id: RequestId | null; reason: string };

/** Sorts a decoded frame into request, notification, response or invalid. */
export function classifyFrame(raw: unknown): ClassifiedFrame {
  if (raw && typeof raw === "object" && "method" in raw) {
    if ("id" in raw && raw.id !== undefined && raw.id !== null) {
      const parsed = RequestFrameSchema.safeParse(raw);
      return parsed.success
        ? { kind: "request", message: parsed.data }
        : { kind: "invalid", id: extractId(raw), reason: formatIssues(parsed.error) };
    }
    const parsed = NotificationFrameSchema.safeParse(raw);
    return parsed.success
      ? { kind: "notification", message: parsed.data }
      : { kind: "invalid", id: null, reason: formatIssues(parsed.error) };
  }
  const parsed = ResponseFrameSchema.safeParse(raw);
  if (parsed.success && (parsed.data.error !== undefined || "result" in parsed.data)) {
    return { kind: "response", message: parsed.data };
  }
  return {
    kind: "invalid",
    id: extractId(raw),
    reason: parsed.success ? "response carries neither result nor error" : formatIssues(parsed.error),
  };
}

function extractId(raw: unknown): RequestId | null {
  if (raw && typeof raw === "object" && "id" in raw) {
    const parsed = RequestIdSchema.safeParse(raw.id);
    return parsed.success ? parsed.data : null;
  }
  return null;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/* Session-scoped traffic ------------------------------------------------- */

export const SessionEventSchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  parentId: z.string().nullable().optional(),
  type: z.string().min(1),
  data: z.record(z.unknown()).nullable().optional(),
  ephemeral: z.boolean().optional(),
});

/** Freezes a decoded event into the public {@link SessionEvent} shape. */
export function toSessionEvent(raw: z.infer<typeof SessionEventSchema>): SessionEvent {
  return Object.freeze({
    id: raw.id,
    timestamp: raw.timestamp,
    parentId: raw.parentId ?? null,
    type: raw.type,
    data: Object.freeze({ ...(raw.data ?? {}) }),
    ...(raw.ephemeral !== undefined ? { ephemeral: raw.ephemeral } : {}),
  });
}

export const SessionEventParamsSchema = z.object({
  sessionId: z.string(),
  event: SessionEventSchema,
});

export const SessionLifecycleParamsSchema = z.object({
  type: z.string(),
  sessionId: z.string(),
  metadata: z.record(z.unknown()).optional(),
});

export function toLifecycleEvent(raw: z.infer<typeof SessionLifecycleParamsSchema>): SessionLifecycleEvent {
  return raw.metadata ? { type: raw.type, sessionId: raw.sessionId, metadata: raw.metadata } : { type: raw.type, sessionId: raw.sessionId };
}

/* Server-to-client calls ------------------------------------------------- */

export const ToolCallParamsSchema = z.object({
  sessionId: z.string(),
  toolCallId: z.string(),
  toolName: z.string(),
  arguments: z.unknown().optional(),
});
export type ToolCallParams = z.infer<typeof ToolCallParamsSchema>;

export const PermissionRequestParamsSchema = z.object({
  sessionId: z.string(),
  permissionRequest: z.record(z.unknown()).default({}),
});
export type PermissionRequestParams = z.infer<typeof PermissionRequestParamsSchema>;

export const UserInputParamsSchema = z.object({
  sessionId: z.string(),
  question: z.string(),
  choices: z.array(z.string()).optional(),
  allowFreeform: z.boolean().optional(),
});
export type UserInputParams = z.infer<typeof UserInputParamsSchema>;

export const HooksInvokeParamsSchema = z.object({
  sessionId: z.string(),
  hookType: z.string(),
  input: z.unknown().optional(),
});
export type HooksInvokeParams = z.infer<typeof HooksInvokeParamsSchema>;

/* Results of client-to-server requests ------------------------------------ */

export const PingResultSchema = z.object({
  message: z.string().nullable().optional(),
  timestamp: z.number().nullable().optional(),
  protocolVersion: z.number().nullable().optional(),
});

export const CreateSessionResultSchema = z.object({
  sessionId: z.string().min(1),
  workspacePath: z.string().nullable().optional(),
});

export const SendResultSchema = z.object({
  messageId: z.string().nullable().optional(),
});

export const GetMessagesResultSchema = z.object({
  events: z.array(SessionEventSchema).default([]),
});

export type PingResult = z.infer<typeof PingResultSchema>;

export const ModelIdResultSchema = z.object({
  modelId: z.string().nullable().optional(),
});

export const StatusResultSchema = z.object({
  version: z.string(),
  protocolVersion: z.number(),
});

export const AuthStatusResultSchema = z.object({
  isAuthenticated: z.boolean(),
  authType: z.string().optional(),
  host: z.string().optional(),
  login: z.string().optional(),
  statusMessage: z.string().optional(),
});

export type ServerStatus = z.infer<typeof StatusResultSchema>;
export type AuthStatus = z.infer<typeof AuthStatusResultSchema>;

export const ModelInfoSchema = z
  .object({
    id: z.string(),
    name: z.string(),
  })
  .passthrough();

export type ModelInfo = z.infer<typeof ModelInfoSchema>;

export const ModelsListResultSchema = z.object({
  models: z.array(ModelInfoSchema).default([]),
});

export const ToolInfoSchema = z.object({
  name: z.string(),
  namespacedName: z.string().optional(),
  description: z.string().default(""),
  parameters: z.record(z.unknown()).optional(),
  instructions: z.string().optional(),
});

export type ToolInfo = z.infer<typeof ToolInfoSchema>;

export const ToolsListResultSchema = z.object({
  tools: z.array(ToolInfoSchema).default([]),
});

export const SessionMetadataSchema = z.object({
  sessionId: z.string(),
  startTime: z.string(),
  modifiedTime: z.string(),
  summary: z.string().optional(),
  isRemote: z.boolean().default(false),
  context: z
    .object({
      cwd: z.string(),
      gitRoot: z.string().optional(),
      repository: z.string().optional(),
      branch: z.string().optional(),
    })
    .optional(),
});

export type SessionMetadata = z.infer<typeof SessionMetadataSchema>;

export const SessionListResultSchema = z.object({
  sessions: z.array(SessionMetadataSchema).default([]),
});

export const SuccessResultSchema = z.object({
  success: z.boolean(),
  error: z.string().optional(),
});

export const SessionIdResultSchema = z.object({
  sessionId: z.string().nullable().optional(),
});
