import { z } from "zod";

import type { PermissionHandler, SessionHooks, Tool, UserInputHandler } from "../bridge/types.js";
import { InvalidOptionsError } from "../errors.js";

export interface SystemMessageConfig {
  /** `append` adds to the server's system message, `replace` substitutes it. */
  readonly mode?: "append" | "replace";
  readonly content: string;
}

/** Bring-your-own-key model provider. */
export interface ProviderConfig {
  readonly type?: "openai" | "azure" | "anthropic";
  readonly baseUrl: string;
  readonly apiKey?: string;
  readonly bearerToken?: string;
  readonly wireApi?: "completions" | "responses";
  readonly azure?: { readonly apiVersion?: string };
}

export interface McpServerConfig {
  readonly type?: "local" | "stdio" | "http" | "sse";
  readonly command?: string;
  readonly args?: readonly string[];
  readonly env?: Readonly<Record<string, string>>;
  readonly cwd?: string;
  readonly url?: string;
  readonly headers?: Readonly<Record<string, string>>;
  readonly tools: readonly string[];
  readonly timeout?: number;
}

export interface CustomAgentConfig {
  readonly name: string;
  readonly prompt: string;
  readonly displayName?: string;
  readonly description?: string;
  readonly tools?: readonly string[] | null;
  readonly mcpServers?: Readonly<Record<string, McpServerConfig>>;
  readonly infer?: boolean;
}

export interface InfiniteSessionConfig {
  readonly enabled?: boolean;
  readonly backgroundCompactionThreshold?: number;
  readonly bufferExhaustionThreshold?: number;
}

/** How the server handles tool output too large to inline. */
export interface LargeOutputConfig {
  readonly enabled?: boolean;
  readonly maxSizeBytes?: number;
  /** Directory receiving the spilled output. */
  readonly outputDir?: string;
}

export type ReasoningEffort = "low" | "medium" | "high" | "xhigh";

export interface ResumeSessionConfig {
  readonly clientName?: string;
  readonly model?: string;
  readonly tools?: readonly Tool[];
  readonly systemMessage?: SystemMessageConfig;
  readonly availableTools?: readonly string[];
  readonly excludedTools?: readonly string[];
  readonly provider?: ProviderConfig;
  readonly streaming?: boolean;
  readonly mcpServers?: Readonly<Record<string, McpServerConfig>>;
  readonly customAgents?: readonly CustomAgentConfig[];
  readonly configDir?: string;
  readonly skillDirectories?: readonly string[];
  readonly disabledSkills?: readonly string[];
  readonly workingDirectory?: string;
  readonly infiniteSessions?: InfiniteSessionConfig;
  readonly reasoningEffort?: ReasoningEffort;
  readonly onPermissionRequest?: PermissionHandler;
  readonly onUserInputRequest?: UserInputHandler;
  readonly hooks?: SessionHooks;
  /** Resume without replaying the `session.resume` event. */
  readonly disableResume?: boolean;
}

export interface SessionConfig extends Omit<ResumeSessionConfig, "disableResume"> {
  /** Custom id; the server issues one when omitted. */
  readonly sessionId?: string;
  readonly largeOutput?: LargeOutputConfig;
}

const callback = z.custom<(...args: never[]) => unknown>((value) => typeof value === "function", "expected a function");

const McpServerSchema = z
  .object({
    type: z.enum(["local", "stdio", "http", "sse"]).optional(),
    command: z.string().min(1).optional(),
    args: z.array(z.string()).optional(),
    env: z.record(z.string()).optional(),
    cwd: z.string().optional(),
    url: z.string().url().optional(),
    headers: z.record(z.string()).optional(),
    tools: z.array(z.string()),
    timeout: z.number().int().positive().optional(),
  })
  .strict()
  .refine((server) => server.command !== undefined || server.url !== undefined, {
    message: "an MCP server needs either command or url",
  });

const ResumeSessionConfigSchema = z
  .object({
    clientName: z.string().min(1).optional(),
    model: z.string().min(1).optional(),
    tools: z
      .array(
        z.object({
          name: z.string().min(1),
          description: z.string(),
          parameters: z.record(z.unknown()).optional(),
          handler: callback,
        }),
      )
      .optional(),
    systemMessage: z
      .object({ mode: z.enum(["append", "replace"]).optional(), content: z.string() })
      .strict()
      .optional(),
    availableTools: z.array(z.string()).optional(),
    excludedTools: z.array(z.string()).optional(),
    provider: z
      .object({
        type: z.enum(["openai", "azure", "anthropic"]).optional(),
        baseUrl: z.string().min(1),
        apiKey: z.string().optional(),
        bearerToken: z.string().optional(),
        wireApi: z.enum(["completions", "responses"]).optional(),
        azure: z.object({ apiVersion: z.string().optional() }).optional(),
      })
      .strict()
      .optional(),
    streaming: z.boolean().optional(),
    mcpServers: z.record(McpServerSchema).optional(),
    customAgents: z
      .array(
        z.object({
          name: z.string().min(1),
          prompt: z.string(),
          displayName: z.string().optional(),
          description: z.string().optional(),
          tools: z.array(z.string()).nullable().optional(),
          mcpServers: z.record(McpServerSchema).optional(),
          infer: z.boolean().optional(),
        }),
      )
      .optional(),
    configDir: z.string().min(1).optional(),
    skillDirectories: z.array(z.string()).optional(),
    disabledSkills: z.array(z.string()).optional(),
    workingDirectory: z.string().min(1).optional(),
    infiniteSessions: z
      .object({
        enabled: z.boolean().optional(),
        backgroundCompactionThreshold: z.number().min(0).max(1).optional(),
        bufferExhaustionThreshold: z.number().min(0).max(1).optional(),
      })
      .strict()
      .optional(),
    reasoningEffort: z.enum(["low", "medium", "high", "xhigh"]).optional(),
    onPermissionRequest: callback.optional(),
    onUserInputRequest: callback.optional(),
    hooks: z
      .object({
        onPreToolUse: callback.optional(),
        onPostToolUse: callback.optional(),
        onUserPromptSubmitted: callback.optional(),
        onSessionStart: callback.optional(),
        onSessionEnd: callback.optional(),
        onErrorOccurred: callback.optional(),
      })
      .strict()
      .optional(),
    disableResume: z.boolean().optional(),
  })
  .strict();

const SessionConfigSchema = ResumeSessionConfigSchema.omit({ disableResume: true }).extend({
  sessionId: z.string().min(1).optional(),
  largeOutput: z
    .object({
      enabled: z.boolean().optional(),
      maxSizeBytes: z.number().int().positive().optional(),
      outputDir: z.string().trim().min(1).optional(),
    })
    .strict()
    .optional(),
});

function rejectInvalid(subject: string, result: z.SafeParseReturnType<unknown, unknown>): void {
  if (!result.success) {
    throw new InvalidOptionsError(
      subject,
      result.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    );
  }
}

function requireModelForProvider(subject: string, config: { provider?: unknown; model?: string }): void {
  if (config.provider !== undefined && config.model === undefined) {
    throw new InvalidOptionsError(subject, [{ path: "model", message: "model is required when provider is set" }]);
  }
}

/** Throws {@link InvalidOptionsError} when `config` is not a valid session configuration. */
export function validateSessionConfig(config: SessionConfig): void {
  rejectInvalid("session config", SessionConfigSchema.safeParse(config));
  requireModelForProvider("session config", config);
}

export function validateResumeSessionConfig(config: ResumeSessionConfig): void {
  rejectInvalid("resume config", ResumeSessionConfigSchema.safeParse(config));
  requireModelForProvider("resume config", config);
}

/**
 * Wire parameters shared by `session.create` and `session.resume`. Optional
 * entries are only sent when configured; permission requests are always
 * enabled since the client answers them with a denial when no handler is set.
 */
export function buildSessionParams(config: ResumeSessionConfig): Record<string, unknown> {
  const params: Record<string, unknown> = {};
  if (config.clientName !== undefined) params.clientName = config.clientName;
  if (config.model !== undefined) params.model = config.model;
  if (config.tools !== undefined) {
    params.tools = config.tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      ...(tool.parameters !== undefined ? { parameters: tool.parameters } : {}),
    }));
  }
  if (config.systemMessage !== undefined) {
    params.systemMessage = { mode: config.systemMessage.mode ?? "append", content: config.systemMessage.content };
  }
  if (config.availableTools !== undefined) params.availableTools = config.availableTools;
  if (config.excludedTools !== undefined) params.excludedTools = config.excludedTools;
  if (config.provider !== undefined) params.provider = config.provider;
  params.requestPermission = true;
  if (config.streaming !== undefined) params.streaming = config.streaming;
  if (config.mcpServers !== undefined) params.mcpServers = config.mcpServers;
  if (config.customAgents !== undefined) params.customAgents = config.customAgents;
  if (config.configDir !== undefined) params.configDir = config.configDir;
  if (config.skillDirectories !== undefined) params.skillDirectories = config.skillDirectories;
  if (config.disabledSkills !== undefined) params.disabledSkills = config.disabledSkills;
  if (config.workingDirectory !== undefined) params.workingDirectory = config.workingDirectory;
  if (config.infiniteSessions !== undefined) params.infiniteSessions = config.infiniteSessions;
  if (config.reasoningEffort !== undefined) params.reasoningEffort = config.reasoningEffort;
  params.requestUserInput = config.onUserInputRequest !== undefined;
  params.hooks = config.hooks !== undefined;
  if (config.disableResume !== undefined) params.disableResume = config.disableResume;
  params.envValueMode = "direct";
  return params;
}

/** `session.create` parameters: the shared ones plus the create-only entries. */
export function buildCreateSessionParams(config: SessionConfig): Record<string, unknown> {
  const params = buildSessionParams(config);
  if (config.sessionId !== undefined) params.sessionId = config.sessionId;
  if (config.largeOutput !== undefined) params.largeOutput = config.largeOutput;
  return params;
}
