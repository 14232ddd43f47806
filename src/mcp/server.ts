import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { LifecycleController } from "../lifecycle";
import { MCP_SERVER_NAME, MCP_SERVER_VERSION } from "./config/server";
import { registerCheckStatusTool } from "./tools/check-status";
import { registerGetOutputTool } from "./tools/get-output";

// Build and configure MCP server instance. Tools only read fleet state.
export function createFlotillaMcpServer(controller: LifecycleController): McpServer {
  const server = new McpServer({
    name: MCP_SERVER_NAME,
    version: MCP_SERVER_VERSION,
  });

  registerCheckStatusTool(server, controller);
  registerGetOutputTool(server, controller);

  return server;
}
