import type { StructuredLogger } from "../logger.js";
import { JsonRpcError } from "../rpc/errors.js";
import type { HooksInvokeParams, PermissionRequestParams, ToolCallParams, UserInputParams } from "../rpc/messages.js";
import type { SessionRecord } from "../state/clientState.js";
import {
  defaultPermissionDenial,
  failedToolResult,
  normalizePermissionResult,
  normalizeToolResult,
  normalizeUserInputResponse,
  settleHandler,
  unsupportedToolResult,
} from "./results.js";
import {
  HOOK_HANDLER_KEYS,
  type CallbackContext,
  type PermissionResult,
  type ToolInvocation,
  type ToolResultObject,
  type UserInputAnswer,
  type UserInputRequest,
} from "./types.js";

export interface CallbackBridgeOptions {
  readonly logger: StructuredLogger;
  /** Deadline for tool, permission and hook handlers; `null` waits indefinitely. */
  readonly toolTimeoutMs: number | null;
}

/** Response of `hooks.invoke`: the handler output, or `null` when nothing ran. */
export type HookInvokeResult = { output: unknown } | null;

/**
 * Runs user callbacks for inbound server calls and turns their outcome into
 * wire answers. Each kind fails differently:
 *
 * - tools answer a failure result, the exception text is only logged;
 * - permissions fall back to the fixed denial;
 * - user input raises a {@link JsonRpcError} the router answers as an error;
 * - hooks answer `null`.
 */
export class CallbackBridge {
  private readonly logger: StructuredLogger;
  private readonly toolTimeoutMs: number | null;

  constructor(options: CallbackBridgeOptions) {
    this.logger = options.logger;
    this.toolTimeoutMs = options.toolTimeoutMs;
  }

  async handleToolCall(record: SessionRecord, params: ToolCallParams): Promise<ToolResultObject> {
    const tool = record.tools.get(params.toolName);
    if (!tool) {
      this.logger.debug("tool_unsupported", { session_id: record.sessionId, tool: params.toolName });
      return unsupportedToolResult(params.toolName);
    }
    const invocation: ToolInvocation = {
      sessionId: record.sessionId,
      toolCallId: params.toolCallId,
      toolName: params.toolName,
      arguments: params.arguments,
    };
    try {
      const value = await settleHandler(
        () => tool.handler(params.arguments, invocation),
        this.toolTimeoutMs,
        `Tool "${params.toolName}"`,
      );
      return normalizeToolResult(value);
    } catch (error) {
      this.logger.error("tool_handler_failed", {
        session_id: record.sessionId,
        tool: params.toolName,
        tool_call_id: params.toolCallId,
        error,
      });
      return failedToolResult();
    }
  }

  async handlePermissionRequest(record: SessionRecord, params: PermissionRequestParams): Promise<PermissionResult> {
    const handler = record.permissionHandler;
    if (!handler) {
      return defaultPermissionDenial();
    }
    try {
      const value = await settleHandler(
        () => handler(params.permissionRequest, this.contextFor(record)),
        this.toolTimeoutMs,
        "Permission handler",
      );
      const decision = normalizePermissionResult(value);
      if (decision) {
        return decision;
      }
      this.logger.warn("permission_result_invalid", { session_id: record.sessionId });
    } catch (error) {
      this.logger.warn("permission_handler_failed", { session_id: record.sessionId, error });
    }
    return defaultPermissionDenial();
  }

  /** Resolves with the answer or rejects with a {@link JsonRpcError}. User input has no deadline. */
  async handleUserInputRequest(record: SessionRecord, params: UserInputParams): Promise<UserInputAnswer> {
    const handler = record.userInputHandler;
    if (!handler) {
      throw new JsonRpcError("HANDLER_FAILED", "User input requested but no handler registered");
    }
    const request: UserInputRequest = {
      question: params.question,
      ...(params.choices !== undefined ? { choices: params.choices } : {}),
      ...(params.allowFreeform !== undefined ? { allowFreeform: params.allowFreeform } : {}),
    };
    let value: unknown;
    try {
      value = await settleHandler(() => handler(request, this.contextFor(record)), null, "User input handler");
    } catch (error) {
      this.logger.error("user_input_handler_failed", { session_id: record.sessionId, error });
      throw new JsonRpcError("HANDLER_FAILED", "User input handler failed");
    }
    const answer = normalizeUserInputResponse(value);
    if (!answer) {
      throw new JsonRpcError("HANDLER_FAILED", "User input handler returned invalid answer");
    }
    return answer;
  }

  async handleHookInvoke(record: SessionRecord, params: HooksInvokeParams): Promise<HookInvokeResult> {
    const key = HOOK_HANDLER_KEYS.get(params.hookType);
    const handler = key && record.hooks ? record.hooks[key] : undefined;
    if (!handler) {
      return null;
    }
    try {
      const output = await settleHandler(
        () => handler(params.input, this.contextFor(record)),
        this.toolTimeoutMs,
        `Hook "${params.hookType}"`,
      );
      return { output: output ?? null };
    } catch (error) {
      this.logger.warn("hook_handler_failed", { session_id: record.sessionId, hook: params.hookType, error });
      return null;
    }
  }

  private contextFor(record: SessionRecord): CallbackContext {
    return { sessionId: record.sessionId };
  }
}
