import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListResourceTemplatesRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";

export const BACKEND_TOOLS: Tool[] = [
  {
    name: "read_file",
    description: "Read a file from disk",
    inputSchema: { type: "object", properties: { path: { type: "string" } } },
  },
  {
    name: "http_get",
    description: "Fetch a URL via HTTP",
    inputSchema: { type: "object", properties: { url: { type: "string" } } },
  },
  {
    name: "log_message",
    description: "Log a message to console",
    inputSchema: { type: "object", properties: { message: { type: "string" } } },
  },
];

/** Effects of BACKEND_TOOLS, for FixedEffectClassifier. */
export const BACKEND_TOOL_EFFECTS: Record<string, string[]> = {
  read_file: ["FS"],
  http_get: ["NET"],
  log_message: ["IO"],
};

export interface BackendDouble {
  server: Server;
  /** Names of every tools/call the backend received, in order. */
  toolCalls: string[];
  /** Number of tools/list requests received (one per page). */
  listRequests: () => number;
}

/**
 * In-process MCP server standing in for the wrapped backend. Serves BACKEND_TOOLS,
 * one resource and one prompt. With pageSize set, tools/list paginates.
 */
export function createBackendDouble(options: { pageSize?: number } = {}): BackendDouble {
  const server = new Server(
    { name: "mock-backend", version: "1.0.0" },
    {
      capabilities: {
        tools: { listChanged: true },
        resources: {},
        prompts: {},
      },
      instructions: "Mock backend for relay tests",
    },
  );
  const toolCalls: string[] = [];
  let listRequests = 0;

  server.setRequestHandler(ListToolsRequestSchema, async (request) => {
    listRequests += 1;
    const pageSize = options.pageSize ?? BACKEND_TOOLS.length;
    const offset = Number(request.params?.cursor ?? "0");
    const next = offset + pageSize;
    return {
      tools: BACKEND_TOOLS.slice(offset, next),
      ...(next < BACKEND_TOOLS.length && { nextCursor: String(next) }),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args = {} } = request.params;
    toolCalls.push(name);
    if (name === "read_file" && args.path === "/missing") {
      throw new McpError(ErrorCode.InvalidParams, "no such file: /missing");
    }
    return {
      content: [{ type: "text" as const, text: `${name} ok: ${JSON.stringify(args)}` }],
    };
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => ({
    resources: [{ uri: "file:///notes.txt", name: "notes" }],
  }));
  server.setRequestHandler(ListResourceTemplatesRequestSchema, async () => ({
    resourceTemplates: [{ uriTemplate: "file:///{name}", name: "any-file" }],
  }));
  server.setRequestHandler(ReadResourceRequestSchema, async (request) => ({
    contents: [{ uri: request.params.uri, text: "hello notes" }],
  }));

  server.setRequestHandler(ListPromptsRequestSchema, async () => ({
    prompts: [{ name: "greet", description: "Greets someone" }],
  }));
  server.setRequestHandler(GetPromptRequestSchema, async (request) => ({
    messages: [
      {
        role: "user" as const,
        content: {
          type: "text" as const,
          text: `Hello ${request.params.arguments?.name ?? "there"}`,
        },
      },
    ],
  }));

  return { server, toolCalls, listRequests: () => listRequests };
}
