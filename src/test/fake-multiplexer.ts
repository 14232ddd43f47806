import { err, ok, type MultiplexerClient, type Result } from "../lifecycle";

interface FakeWindow {
  name: string;
  cwd: string;
  command: string;
}

/**
 * In-memory stand-in for tmux. Understands the management commands the
 * controller issues and records every `run` call.
 */
export class FakeMultiplexer implements MultiplexerClient {
  readonly sessions = new Map<string, FakeWindow[]>();
  readonly commands: string[][] = [];
  // Next `run` whose first argument matches fails with this diagnostic.
  private failures = new Map<string, string>();

  failNext(subcommand: string, diagnostic: string): void {
    this.failures.set(subcommand, diagnostic);
  }

  addWindow(session: string, name: string, cwd = "/tmp", command = "true"): void {
    const windows = this.sessions.get(session) ?? [];
    windows.push({ name, cwd, command });
    this.sessions.set(session, windows);
  }

  windowNames(session: string): string[] {
    return (this.sessions.get(session) ?? []).map((window) => window.name);
  }

  sessionExists(session: string): Result<boolean> {
    return ok(this.sessions.has(session));
  }

  listWindows(session: string): Result<string[]> {
    return ok(this.windowNames(session));
  }

  windowExists(session: string, window: string): Result<boolean> {
    return ok(this.windowNames(session).includes(window));
  }

  run(args: string[]): Result<void> {
    this.commands.push(args);

    const [subcommand] = args;
    const failure = this.failures.get(subcommand);
    if (failure !== undefined) {
      this.failures.delete(subcommand);
      return err("ExternalToolError", `tmux command failed (tmux ${args.join(" ")}): ${failure}`);
    }

    switch (subcommand) {
      case "new-session": {
        const [, , , session, , name, , cwd, command] = args;
        this.sessions.set(session, [{ name, cwd, command }]);
        return ok(undefined);
      }

      case "new-window": {
        const [, , session, , name, , cwd, command] = args;
        this.addWindow(session, name, cwd, command);
        return ok(undefined);
      }

      case "kill-window": {
        const [session, name] = args[2].split(":");
        const windows = (this.sessions.get(session) ?? []).filter((window) => window.name !== name);
        if (windows.length === 0) {
          this.sessions.delete(session);
        } else {
          this.sessions.set(session, windows);
        }
        return ok(undefined);
      }

      case "kill-session": {
        this.sessions.delete(args[2]);
        return ok(undefined);
      }

      default:
        return err("ExternalToolError", `unsupported command: ${args.join(" ")}`);
    }
  }
}
