import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { LifecycleController, TmuxClient, loadSettings } from "../lifecycle";
import { createFlotillaMcpServer } from "./server";

// Start MCP server on stdio transport for the fleet in the current directory.
export async function runMcpServer(): Promise<void> {
  const settings = loadSettings(process.env);
  if (!settings.ok) {
    throw new Error(settings.error.message);
  }

  const controller = new LifecycleController({
    session: settings.value.session,
    root: process.cwd(),
    artifactName: settings.value.artifactName,
    runtime: settings.value.runtime,
    multiplexer: new TmuxClient({ verbose: settings.value.verbose }),
  });

  const server = createFlotillaMcpServer(controller);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
