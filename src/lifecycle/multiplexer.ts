import { spawnSync } from "child_process";
import { LOG_PREFIX } from "./config";
import { describeError, err, ok, type Result } from "./result";

/**
 * Everything the lifecycle controller needs from the terminal multiplexer.
 * Liveness is always read back from the multiplexer, never cached.
 */
export interface MultiplexerClient {
  sessionExists(session: string): Result<boolean>;
  windowExists(session: string, window: string): Result<boolean>;
  listWindows(session: string): Result<string[]>;
  run(args: string[]): Result<void>;
}

export interface CommandOutput {
  status: number | null;
  stdout: string;
  stderr: string;
  error?: Error;
}

export type CommandRunner = (command: string, args: string[]) => CommandOutput;

export function spawnCommand(command: string, args: string[]): CommandOutput {
  const proc = spawnSync(command, args, { encoding: "utf-8" });
  return {
    status: proc.status,
    stdout: proc.stdout ?? "",
    stderr: proc.stderr ?? "",
    error: proc.error,
  };
}

// Argument lists for the management commands issued through `run`.
export const tmuxCommands = {
  newSession(session: string, window: string, cwd: string, command: string): string[] {
    return ["new-session", "-d", "-s", session, "-n", window, "-c", cwd, command];
  },

  newWindow(session: string, window: string, cwd: string, command: string): string[] {
    return ["new-window", "-t", session, "-n", window, "-c", cwd, command];
  },

  killWindow(session: string, window: string): string[] {
    return ["kill-window", "-t", `${session}:${window}`];
  },

  killSession(session: string): string[] {
    return ["kill-session", "-t", session];
  },
};

export interface TmuxClientOptions {
  binary?: string;
  runner?: CommandRunner;
  verbose?: boolean;
}

export class TmuxClient implements MultiplexerClient {
  private readonly binary: string;
  private readonly runner: CommandRunner;
  private readonly verbose: boolean;

  constructor(options: TmuxClientOptions = {}) {
    this.binary = options.binary ?? "tmux";
    this.runner = options.runner ?? spawnCommand;
    this.verbose = options.verbose ?? false;
  }

  sessionExists(session: string): Result<boolean> {
    const proc = this.invoke(["has-session", "-t", session]);
    if (!proc.ok) {
      return proc;
    }

    const { status, stderr } = proc.value;
    if (status === 0) {
      return ok(true);
    }
    if (status === 1) {
      return ok(false);
    }

    return err("ExternalToolError", stderr.trim() || `${this.binary} has-session exited with code ${status}`);
  }

  listWindows(session: string): Result<string[]> {
    const proc = this.invoke(["list-windows", "-t", session, "-F", "#{window_name}"]);
    if (!proc.ok) {
      return proc;
    }

    const { status, stdout, stderr } = proc.value;
    if (status === 1) {
      return ok([]);
    }
    if (status !== 0) {
      return err("ExternalToolError", stderr.trim() || `${this.binary} list-windows exited with code ${status}`);
    }

    return ok(
      stdout
        .split("\n")
        .map((line) => line.trim())
        .filter((line) => line.length > 0)
    );
  }

  windowExists(session: string, window: string): Result<boolean> {
    const windows = this.listWindows(session);
    return windows.ok ? ok(windows.value.includes(window)) : windows;
  }

  run(args: string[]): Result<void> {
    const proc = this.invoke(args);
    if (!proc.ok) {
      return proc;
    }

    const { status, stderr } = proc.value;
    if (status !== 0) {
      const commandText = [this.binary, ...args].join(" ");
      const detail = stderr.trim() || `exit code ${status}`;
      return err("ExternalToolError", `${this.binary} command failed (${commandText}): ${detail}`);
    }

    return ok(undefined);
  }

  private invoke(args: string[]): Result<CommandOutput> {
    if (this.verbose) {
      console.error(`${LOG_PREFIX} ${this.binary} ${args.join(" ")}`);
    }

    const proc = this.runner(this.binary, args);
    if (proc.error) {
      return err("ExternalToolError", `failed to run ${this.binary}: ${describeError(proc.error)}`);
    }

    return ok(proc);
  }
}
