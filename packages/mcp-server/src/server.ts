import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { z, type ZodRawShape } from "zod";
import { logger } from "./utils/logger.js";
import { errorMessage } from "./fingerprints/errors.js";
import type { ToolAnnotations, ToolCallExtra, ToolResponse } from "./types.js";

const log = logger.child({ group: "Server" });

/**
 * Convert a zod shape to the JSON schema object MCP expects for tool input
 */
function toInputSchema(shape: ZodRawShape): Tool["inputSchema"] {
  const json = z.toJSONSchema(z.object(shape));

  const properties: Record<string, object> = {};
  for (const [key, value] of Object.entries(json.properties ?? {})) {
    if (typeof value === "object") properties[key] = value;
  }

  return {
    type: "object",
    properties,
    ...(json.required && { required: json.required }),
  };
}

/**
 * Wrapper around SDK Server that mimics McpServer.registerTool() API
 * Uses Zod v4 schemas instead of v3
 */
export class McpServer {
  public readonly server: Server;

  private tools: Tool[] = [];
  private handlers = new Map<string, (args: unknown, extra: ToolCallExtra) => Promise<ToolResponse>>();

  constructor(config: { name: string; version: string }) {
    this.server = new Server(
      { name: config.name, version: config.version },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupHandlers();
  }

  /**
   * Names of registered tools, in registration order
   */
  get toolNames(): string[] {
    return this.tools.map((tool) => tool.name);
  }

  /**
   * Run a registered tool the way a client call would
   *
   * Validation failures and thrown errors become `isError` responses.
   */
  async callTool(
    name: string,
    args: Record<string, unknown> = {},
    extra: ToolCallExtra = { signal: new AbortController().signal }
  ): Promise<ToolResponse> {
    try {
      const handler = this.handlers.get(name);
      if (!handler) throw new Error(`Tool not found: ${name}`);

      if (Object.keys(args).length > 0) {
        log.info({ tool: name, params: args }, "Tool called");
      } else {
        log.info({ tool: name }, "Tool called");
      }

      return await handler(args, extra);
    } catch (error) {
      log.warn({ tool: name, err: error }, "Tool failed");
      const message =
        error instanceof z.ZodError ? z.prettifyError(error) : errorMessage(error);
      return {
        content: [{ type: "text", text: `Error: ${message}` }],
        isError: true,
      };
    }
  }

  private setupHandlers() {
    // List available tools
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return { tools: this.tools };
    });

    // Handle tool calls
    this.server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      const { name, arguments: args = {} } = request.params;
      const result = await this.callTool(name, args, { signal: extra.signal });

      return {
        content: result.content,
        ...(result.structuredContent && { structuredContent: result.structuredContent }),
        ...(result.isError !== undefined && { isError: result.isError }),
      };
    });
  }

  registerTool<TInput extends ZodRawShape>(
    name: string,
    config: {
      title?: string;
      description: string;
      inputSchema: TInput;
      annotations?: ToolAnnotations;
    },
    handler: (args: z.infer<z.ZodObject<TInput>>, extra: ToolCallExtra) => Promise<ToolResponse>
  ) {
    const schema = z.object(config.inputSchema);

    // Store tool definition
    this.tools.push({
      name,
      ...(config.title !== undefined && { title: config.title }),
      description: config.description,
      inputSchema: toInputSchema(config.inputSchema),
      ...(config.annotations && { annotations: config.annotations }),
    });

    // Store handler with validation wrapper
    this.handlers.set(name, async (args, extra) => {
      const validated = schema.parse(args);
      return handler(validated, extra);
    });
  }
}
