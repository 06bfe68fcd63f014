export { createMcpServer, serveStdio, SERVER_NAME, SERVER_VERSION } from "./mcpServer";
export { handleToolCall, TOOLS } from "./tools";
export type { ToolResponse } from "./tools";
