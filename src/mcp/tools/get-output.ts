import { existsSync } from "fs";
import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { LifecycleController } from "../../lifecycle";
import { GET_OUTPUT_DEFAULT_LINES } from "../config/tools";
import { GET_OUTPUT_TOOL_DESCRIPTION, NO_INSTANCES_MESSAGE } from "../config/messages";
import { matchInstances } from "../instances/match";
import { filterLines, readLastLines, stripAnsi } from "../instances/output";
import { textResult, type ToolTextResult } from "../types";

export interface GetOutputArgs {
  name: string;
  lines: number;
  grep?: string;
}

export function getOutput(controller: LifecycleController, { name, lines, grep }: GetOutputArgs): ToolTextResult {
  const statuses = controller.status();
  if (!statuses.ok) {
    return textResult(`Error: ${statuses.error.message}`, true);
  }

  if (statuses.value.length === 0) {
    return textResult(NO_INSTANCES_MESSAGE);
  }

  const matched = matchInstances(statuses.value, name);
  if (matched.length === 0) {
    const available = statuses.value.map((status) => status.name).join("\n  ");
    return textResult(`Instance '${name}' not found.\n\nAvailable instances:\n  ${available}`);
  }

  if (matched.length > 1) {
    const matches = matched.map((status) => status.name).join("\n  ");
    return textResult(`Multiple instances match '${name}'. Please be more specific:\n  ${matches}`);
  }

  const instance = matched[0].name;
  const logPath = controller.dirs.logPath(instance);
  if (!existsSync(logPath)) {
    return textResult(`Log file not found for instance '${instance}' (${logPath})`);
  }

  let output = stripAnsi(readLastLines(logPath, lines));

  if (grep) {
    const filtered = filterLines(output, grep);
    if (filtered.length === 0) {
      return textResult(`No lines matching '${grep}' in the last ${lines} lines of ${instance}`);
    }

    output = filtered.join("\n");
  }

  return textResult(
    `=== ${instance} (last ${lines} lines${grep ? `, filtered for '${grep}'` : ""}) ===\n\n${output}`
  );
}

// Register `get_output` tool for raw per-instance log access.
export function registerGetOutputTool(server: McpServer, controller: LifecycleController): void {
  server.tool(
    "get_output",
    GET_OUTPUT_TOOL_DESCRIPTION,
    {
      name: z.string().describe("Instance name (e.g. 'web')"),
      lines: z.number().int().positive().default(GET_OUTPUT_DEFAULT_LINES).describe("Number of lines to retrieve"),
      grep: z
        .string()
        .optional()
        .describe("Filter output to lines containing this string (case-insensitive)"),
    },
    async (args) => getOutput(controller, args)
  );
}
