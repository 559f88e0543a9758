import { formatIssues } from "./rpc/messages.js";
import type {
  PermissionHandler,
  PlainToolConfig,
  SchemaToolConfig,
  Tool,
  ToolHandler,
  ToolResultObject,
} from "./bridge/types.js";

/**
 * Declares a tool. With an `argsSchema`, incoming arguments are parsed before
 * the handler runs and invalid arguments answer a failure naming the
 * offending fields.
 *
 * @example
 * const weather = defineTool("get_weather", {
 *   description: "Current weather for a city",
 *   parameters: { type: "object", properties: { city: { type: "string" } }, required: ["city"] },
 *   argsSchema: z.object({ city: z.string() }),
 *   handler: ({ city }) => `Sunny in ${city}`,
 * });
 */
export function defineTool<TArgs>(name: string, config: SchemaToolConfig<TArgs>): Tool;
export function defineTool(name: string, config: PlainToolConfig): Tool;
export function defineTool<TArgs>(name: string, config: SchemaToolConfig<TArgs> | PlainToolConfig): Tool {
  if (name.trim().length === 0) {
    throw new TypeError("tool name must not be empty");
  }
  return {
    name,
    description: config.description,
    ...(config.parameters !== undefined ? { parameters: config.parameters } : {}),
    handler: config.argsSchema === undefined ? config.handler : parsingHandler(name, config),
  };
}

function parsingHandler<TArgs>(name: string, config: SchemaToolConfig<TArgs>): ToolHandler {
  return (args, invocation) => {
    const parsed = config.argsSchema.safeParse(args ?? {});
    if (!parsed.success) {
      return toolFailure(`Invalid arguments for tool '${name}': ${formatIssues(parsed.error)}`, "invalid arguments");
    }
    return config.handler(parsed.data, invocation);
  };
}

/** Permission handler approving every request. */
export const approveAll: PermissionHandler = () => ({ kind: "approved" });

export function toolSuccess(text: string, telemetry: Record<string, unknown> = {}): ToolResultObject {
  return { textResultForLlm: text, resultType: "success", toolTelemetry: telemetry };
}

export function toolFailure(text: string, error?: string): ToolResultObject {
  return {
    textResultForLlm: text,
    resultType: "failure",
    ...(error !== undefined ? { error } : {}),
    toolTelemetry: {},
  };
}
