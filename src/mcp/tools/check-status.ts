import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { instanceState, type InstanceStatus, type LifecycleController } from "../../lifecycle";
import { CHECK_STATUS_LOG_TAIL_LINES } from "../config/tools";
import { CHECK_STATUS_TOOL_DESCRIPTION, NO_INSTANCES_MESSAGE } from "../config/messages";
import { matchInstances } from "../instances/match";
import { readLastLines, stripAnsi } from "../instances/output";
import { textResult, type ToolTextResult } from "../types";

function describeInstance(controller: LifecycleController, status: InstanceStatus): string[] {
  const lines: string[] = [];
  const size = status.logBytes === null ? "no log yet" : `log ${status.logBytes} bytes`;
  lines.push(`${status.name} — ${instanceState(status)} (${size})`);

  if (!status.directory) {
    lines.push(`  ⚠ window has no directory ${controller.dirs.instancePath(status.name)}`);
  } else if (!status.window) {
    lines.push(`  ⚠ no window in tmux session '${controller.session}'; the process is not running`);
  }

  const tail = stripAnsi(readLastLines(controller.dirs.logPath(status.name), CHECK_STATUS_LOG_TAIL_LINES));
  for (const line of tail ? tail.split("\n") : []) {
    lines.push(`  ${line}`);
  }

  return lines;
}

export function checkStatus(controller: LifecycleController, name?: string): ToolTextResult {
  const statuses = controller.status();
  if (!statuses.ok) {
    return textResult(`Error: ${statuses.error.message}`, true);
  }

  if (statuses.value.length === 0) {
    return textResult(NO_INSTANCES_MESSAGE);
  }

  let selected = statuses.value;
  if (name) {
    selected = matchInstances(statuses.value, name);
    if (selected.length === 0) {
      const available = statuses.value.map((status) => status.name).join(", ");
      return textResult(`Instance '${name}' not found. Available instances: ${available}`);
    }
  }

  const output: string[] = [];
  for (const status of selected) {
    output.push(...describeInstance(controller, status));
    output.push("");
  }

  const running = statuses.value.filter((status) => instanceState(status) === "running").length;
  output.push(`${running} of ${statuses.value.length} instance(s) running in tmux session '${controller.session}'.`);

  return textResult(output.join("\n"));
}

// Register `check_status` tool on the provided MCP server.
export function registerCheckStatusTool(server: McpServer, controller: LifecycleController): void {
  server.tool(
    "check_status",
    CHECK_STATUS_TOOL_DESCRIPTION,
    {
      name: z.string().optional().describe("Filter to one instance name. If omitted, shows all instances."),
    },
    async ({ name }) => checkStatus(controller, name)
  );
}
