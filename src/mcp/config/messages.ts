// Centralized MCP tool descriptions and reusable user-facing text.

export const CHECK_STATUS_TOOL_DESCRIPTION = `Overview of the flotilla instances in this directory.
Lists every instance with its state and the last lines of its log.

States:
- running: the tmux window and the instance directory both exist
- window only: a window is left without its directory
- directory only: the window is gone (the process exited or was killed);
  'flotilla stop' refuses such an instance, 'flotilla stop_all' cleans it up

CALL THIS TOOL:
- Before investigating a misbehaving instance
- After starting or stopping instances to confirm the result`;

export const GET_OUTPUT_TOOL_DESCRIPTION = `Get the captured output (out.log) of one flotilla instance.
Use when check_status doesn't show enough, for example to see the full
sequence of requests leading to an error or to search for specific output.`;

export const NO_INSTANCES_MESSAGE =
  "No flotilla instances found.\n\n" +
  "Start one from this directory with:\n" +
  "  flotilla start --name <name> --port <port>";
