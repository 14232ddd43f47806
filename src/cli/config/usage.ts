// Keep CLI usage text in one editable module.
export const CLI_USAGE_TEXT = `flotilla - Run named server instances inside one tmux session

Usage:
  flotilla start --name <name> --port <port>   Start a new instance
  flotilla stop --name <name>                  Stop one instance and archive its log
  flotilla stop_all                            Stop every instance and archive their logs
  flotilla collect_all                         Print the logs of all running instances
  flotilla list                                Show instances and their state

Names are 1..32 lowercase Latin letters [a-z].
Each instance runs ./server.ts from its own directory ./<name>/ and writes
./<name>/out.log; stopped logs are kept in ./.backup/.

Environment:
  FLOTILLA_SESSION    tmux session name (default: flotilla)
  FLOTILLA_ARTIFACT   server file staged per instance (default: server.ts)
  FLOTILLA_RUNTIME    command that runs the artifact (default: node + tsx)
  FLOTILLA_VERBOSE    set to 1 to echo tmux invocations

Examples:
  flotilla start --name web --port 8080
  flotilla stop --name web
  flotilla collect_all
`;
