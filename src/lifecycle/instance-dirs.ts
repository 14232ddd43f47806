import { copyFileSync, existsSync, mkdirSync, readdirSync, rmSync, statSync } from "fs";
import { join } from "path";
import { INSTANCE_LOG_FILE, LOG_PREFIX } from "./config";
import { describeError, err, ok, type Result } from "./result";
import { isInstanceName } from "./validate";

// Per-instance working directories under the fleet root.
export class InstanceDirectories {
  constructor(
    readonly root: string,
    readonly artifactName: string
  ) {}

  artifactPath(): string {
    return join(this.root, this.artifactName);
  }

  instancePath(name: string): string {
    return join(this.root, name);
  }

  logPath(name: string): string {
    return join(this.root, name, INSTANCE_LOG_FILE);
  }

  hasArtifact(): boolean {
    return existsSync(this.artifactPath());
  }

  exists(name: string): boolean {
    return existsSync(this.instancePath(name));
  }

  logSize(name: string): number | null {
    try {
      return statSync(this.logPath(name)).size;
    } catch {
      return null;
    }
  }

  create(name: string): Result<string> {
    const dir = this.instancePath(name);
    try {
      mkdirSync(dir);
      return ok(dir);
    } catch (error) {
      return err("IOFailure", `failed to create directory ${dir}: ${describeError(error)}`);
    }
  }

  // Copy the artifact in; a failed copy leaves no directory behind.
  stageArtifact(name: string): Result<string> {
    const dir = this.instancePath(name);
    const dest = join(dir, this.artifactName);

    try {
      copyFileSync(this.artifactPath(), dest);
      return ok(dest);
    } catch (error) {
      this.discard(name);
      return err("IOFailure", `failed to copy ${this.artifactName} into ${dir}: ${describeError(error)}`);
    }
  }

  remove(name: string): Result<void> {
    const dir = this.instancePath(name);
    try {
      rmSync(dir, { recursive: true });
      return ok(undefined);
    } catch (error) {
      return err("IOFailure", `failed to remove directory ${dir}: ${describeError(error)}`);
    }
  }

  // Rollback path: a leftover directory is reported, not fatal.
  discard(name: string): void {
    const removed = this.remove(name);
    if (!removed.ok) {
      console.error(`${LOG_PREFIX} warning: ${removed.error.message}`);
    }
  }

  list(): Result<string[]> {
    try {
      const names = readdirSync(this.root, { withFileTypes: true })
        .filter((entry) => entry.isDirectory() && isInstanceName(entry.name))
        .map((entry) => entry.name);

      return ok(names.sort());
    } catch (error) {
      return err("IOFailure", `failed to list ${this.root}: ${describeError(error)}`);
    }
  }
}
