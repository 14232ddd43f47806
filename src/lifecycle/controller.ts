import { existsSync, readFileSync } from "fs";
import { INSTANCE_LOG_FILE, INSTANCE_NAME_ENV, SESSION_GONE_PATTERNS } from "./config";
import { BackupLogStore, systemClock, type Clock } from "./backup-store";
import { InstanceDirectories } from "./instance-dirs";
import { tmuxCommands, type MultiplexerClient } from "./multiplexer";
import { describeError, err, ok, type Result } from "./result";
import { joinShellArgs } from "./shell";
import type { InstanceStatus } from "./types";
import type { InstanceName, Port } from "./validate";

export interface LifecycleOptions {
  // tmux session hosting one window per instance.
  session: string;
  // Directory holding the artifact, the instance directories and `.backup`.
  root: string;
  artifactName: string;
  // Launcher words placed before the artifact, e.g. [node, tsx-cli].
  runtime: string[];
  multiplexer: MultiplexerClient;
  clock?: Clock;
}

export class LifecycleController {
  readonly session: string;
  readonly dirs: InstanceDirectories;
  readonly backups: BackupLogStore;
  private readonly runtime: string[];
  private readonly mux: MultiplexerClient;

  constructor(options: LifecycleOptions) {
    this.session = options.session;
    this.runtime = options.runtime;
    this.mux = options.multiplexer;
    this.dirs = new InstanceDirectories(options.root, options.artifactName);
    this.backups = new BackupLogStore(options.root, options.clock ?? systemClock);
  }

  // Shell line tmux runs inside the instance directory.
  launchCommand(name: InstanceName, port: Port): string {
    const program = joinShellArgs([...this.runtime, this.dirs.artifactName]);
    return `${INSTANCE_NAME_ENV}=${name} ${program} --name ${name} --port ${port} > ${INSTANCE_LOG_FILE} 2>&1`;
  }

  start(name: InstanceName, port: Port): Result<string> {
    if (!this.dirs.hasArtifact()) {
      return err("NotFound", `${this.dirs.artifactName} not found in ${this.dirs.root}`);
    }

    const targetDir = this.dirs.instancePath(name);
    if (this.dirs.exists(name)) {
      return err("PreconditionFailed", `directory ${targetDir} already exists`);
    }

    const sessionExists = this.mux.sessionExists(this.session);
    if (!sessionExists.ok) {
      return sessionExists;
    }

    if (sessionExists.value) {
      const windowExists = this.mux.windowExists(this.session, name);
      if (!windowExists.ok) {
        return windowExists;
      }
      if (windowExists.value) {
        return err("PreconditionFailed", `tmux window '${name}' already exists in session '${this.session}'`);
      }
    }

    const created = this.dirs.create(name);
    if (!created.ok) {
      return created;
    }

    const staged = this.dirs.stageArtifact(name);
    if (!staged.ok) {
      return staged;
    }

    const command = this.launchCommand(name, port);
    const tmuxArgs = sessionExists.value
      ? tmuxCommands.newWindow(this.session, name, targetDir, command)
      : tmuxCommands.newSession(this.session, name, targetDir, command);

    const launched = this.mux.run(tmuxArgs);
    if (!launched.ok) {
      this.dirs.discard(name);
      return launched;
    }

    return ok(`Started '${name}' on port ${port} in tmux session '${this.session}'.`);
  }

  stop(name: InstanceName): Result<string> {
    const targetDir = this.dirs.instancePath(name);
    if (!this.dirs.exists(name)) {
      return err("NotFound", `directory ${targetDir} does not exist`);
    }

    const sessionExists = this.mux.sessionExists(this.session);
    if (!sessionExists.ok) {
      return sessionExists;
    }
    if (!sessionExists.value) {
      return err("NotFound", `tmux session '${this.session}' not found`);
    }

    const windowExists = this.mux.windowExists(this.session, name);
    if (!windowExists.ok) {
      return windowExists;
    }
    if (!windowExists.value) {
      return err("NotFound", `tmux window '${name}' not found in session '${this.session}'`);
    }

    const killed = this.mux.run(tmuxCommands.killWindow(this.session, name));
    if (!killed.ok) {
      return killed;
    }

    const archived = this.archiveAndRemove(name);
    if (!archived.ok) {
      return archived;
    }

    return ok(`Stopped '${name}'. Logs moved to ${archived.value}.`);
  }

  stopAll(): Result<string> {
    const killed = this.killSessionIfPresent();
    if (!killed.ok) {
      return killed;
    }

    const names = this.dirs.list();
    if (!names.ok) {
      return names;
    }

    for (const name of names.value) {
      const archived = this.archiveAndRemove(name);
      if (!archived.ok) {
        return archived;
      }
    }

    // A window may have been respawned while directories were processed.
    const finalKill = this.killSessionIfPresent();
    if (!finalKill.ok) {
      return finalKill;
    }

    return ok("Stopped all instances.");
  }

  collectAll(): Result<string> {
    const sessionExists = this.mux.sessionExists(this.session);
    if (!sessionExists.ok) {
      return sessionExists;
    }
    if (!sessionExists.value) {
      return ok("");
    }

    const windows = this.mux.listWindows(this.session);
    if (!windows.ok) {
      return windows;
    }

    const blocks: string[] = [];
    for (const name of [...windows.value].sort()) {
      let block = `=== server: ${name} ===\n`;

      const logPath = this.dirs.logPath(name);
      if (existsSync(logPath)) {
        let content: string;
        try {
          content = readFileSync(logPath, "utf-8");
        } catch (error) {
          return err("IOFailure", `failed to read ${logPath}: ${describeError(error)}`);
        }

        if (content) {
          block += content.endsWith("\n") ? content : `${content}\n`;
        }
      }

      blocks.push(block);
    }

    return ok(blocks.join("\n"));
  }

  // Windows and directories side by side; nothing is repaired.
  status(): Result<InstanceStatus[]> {
    const sessionExists = this.mux.sessionExists(this.session);
    if (!sessionExists.ok) {
      return sessionExists;
    }

    let windows: string[] = [];
    if (sessionExists.value) {
      const listed = this.mux.listWindows(this.session);
      if (!listed.ok) {
        return listed;
      }
      windows = listed.value;
    }

    const directories = this.dirs.list();
    if (!directories.ok) {
      return directories;
    }

    const names = [...new Set([...windows, ...directories.value])].sort();
    return ok(
      names.map((name) => ({
        name,
        window: windows.includes(name),
        directory: directories.value.includes(name),
        logBytes: this.dirs.logSize(name),
      }))
    );
  }

  private archiveAndRemove(name: string): Result<string> {
    const archived = this.backups.archive(name, this.dirs.logPath(name));
    if (!archived.ok) {
      return archived;
    }

    const removed = this.dirs.remove(name);
    if (!removed.ok) {
      return removed;
    }

    return archived;
  }

  private killSessionIfPresent(): Result<void> {
    const sessionExists = this.mux.sessionExists(this.session);
    if (!sessionExists.ok) {
      return sessionExists;
    }
    if (!sessionExists.value) {
      return ok(undefined);
    }

    const killed = this.mux.run(tmuxCommands.killSession(this.session));
    if (!killed.ok && SESSION_GONE_PATTERNS.some((pattern) => pattern.test(killed.error.message))) {
      return ok(undefined);
    }

    return killed;
  }
}
