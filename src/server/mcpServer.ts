import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { Logger } from "../observability";
import { QueryService } from "../query";
import { errorMessage } from "../types/errors";
import { handleToolCall, TOOLS } from "./tools";

export const SERVER_NAME = "docforge";
export const SERVER_VERSION = "0.1.0";

export function createMcpServer(service: QueryService, logger: Logger): Server {
  const server = new Server({ name: SERVER_NAME, version: SERVER_VERSION }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: TOOLS.map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const start = Date.now();

    try {
      const response = await handleToolCall(service, name, args);
      logger.info("tool_call_complete", { tool: name, isError: response.isError, ms: Date.now() - start });
      return {
        content: [{ type: "text" as const, text: response.text }],
        isError: response.isError,
      };
    } catch (error) {
      logger.error("tool_call_failed", { tool: name, error: errorMessage(error), ms: Date.now() - start });
      return {
        content: [{ type: "text" as const, text: `unavailable: ${errorMessage(error)}` }],
        isError: true,
      };
    }
  });

  return server;
}

export async function serveStdio(service: QueryService, logger: Logger): Promise<void> {
  const server = createMcpServer(service, logger);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("mcp_server_connected", { name: SERVER_NAME, version: SERVER_VERSION });
}
