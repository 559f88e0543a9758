export { AgentClient, PROTOCOL_VERSION, type AgentClientDeps, type SessionListFilter } from "./client.js";
export {
  AgentSession,
  type Attachment,
  type MessageOptions,
  type SelectionRange,
  type SentMessageStream,
  type StreamOptions,
} from "./session.js";
export { approveAll, defineTool, toolFailure, toolSuccess } from "./tools.js";
export {
  AUTH_TOKEN_ENV,
  ClientOptionsSchema,
  DEFAULT_CLIENT_OPTIONS,
  parseCliUrl,
  resolveClientOptions,
  type ClientOptions,
  type ResolvedClientOptions,
} from "./config/options.js";
export type {
  CustomAgentConfig,
  InfiniteSessionConfig,
  LargeOutputConfig,
  McpServerConfig,
  ProviderConfig,
  ReasoningEffort,
  ResumeSessionConfig,
  SessionConfig,
  SystemMessageConfig,
} from "./config/sessionConfig.js";
export * from "./errors.js";
export { JsonRpcError, RPC_ERROR_TAXONOMY, type RpcErrorCategory } from "./rpc/errors.js";
export { EventStream, EventBroadcaster, DEFAULT_EVENT_BUFFER_SIZE } from "./events/broadcaster.js";
export {
  eventContent,
  LIFECYCLE_EVENT_TYPES,
  SESSION_EVENT_TYPES,
  type ClientNotification,
  type LifecycleEventType,
  type SessionEvent,
  type SessionLifecycleEvent,
} from "./events/types.js";
export type {
  AuthStatus,
  ModelInfo,
  PingResult,
  ServerStatus,
  SessionMetadata,
  ToolInfo,
} from "./rpc/messages.js";
export type { LifecycleHandler } from "./rpc/router.js";
export type { ConnectionState } from "./state/clientState.js";
export { StructuredLogger, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";
export {
  PERMISSION_KINDS,
  type CallbackContext,
  type HookHandler,
  type PermissionHandler,
  type PermissionKind,
  type PermissionRequest,
  type PermissionResult,
  type SessionHooks,
  type Tool,
  type ToolHandler,
  type ToolInvocation,
  type ToolResultObject,
  type ToolResultType,
  type UserInputAnswer,
  type UserInputHandler,
  type UserInputRequest,
  type UserInputResponse,
} from "./bridge/types.js";
