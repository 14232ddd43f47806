import { copyFileSync, existsSync, mkdirSync, renameSync, unlinkSync, writeFileSync } from "fs";
import { join } from "path";
import { BACKUP_DIR_NAME } from "./config";
import { describeError, err, ok, type Result } from "./result";

// Unix seconds.
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export function backupFileName(name: string, timestamp: number): string {
  return `out_${name}_${timestamp}.log`;
}

/**
 * Append-only archive of instance output under `<root>/.backup`.
 *
 * File names are derived from the instance name and the clock; when a name is
 * taken the timestamp is bumped until a free one turns up, so an archived log
 * is never overwritten. A clock moving backwards is not detected.
 */
export class BackupLogStore {
  readonly dir: string;

  constructor(root: string, private readonly clock: Clock = systemClock) {
    this.dir = join(root, BACKUP_DIR_NAME);
  }

  ensureDir(): Result<void> {
    try {
      mkdirSync(this.dir, { recursive: true });
      return ok(undefined);
    } catch (error) {
      return err("IOFailure", `failed to create backup directory ${this.dir}: ${describeError(error)}`);
    }
  }

  reservePath(name: string): string {
    let timestamp = this.clock();
    let candidate = join(this.dir, backupFileName(name, timestamp));

    while (existsSync(candidate)) {
      timestamp += 1;
      candidate = join(this.dir, backupFileName(name, timestamp));
    }

    return candidate;
  }

  // Move `logPath` into the archive, or leave an empty placeholder when there is no log.
  archive(name: string, logPath: string): Result<string> {
    const dir = this.ensureDir();
    if (!dir.ok) {
      return dir;
    }

    const destPath = this.reservePath(name);

    if (!existsSync(logPath)) {
      try {
        writeFileSync(destPath, "", { flag: "wx" });
        return ok(destPath);
      } catch (error) {
        return err("IOFailure", `failed to create ${destPath}: ${describeError(error)}`);
      }
    }

    try {
      moveFile(logPath, destPath);
      return ok(destPath);
    } catch (error) {
      return err("IOFailure", `failed to move ${logPath} to ${destPath}: ${describeError(error)}`);
    }
  }
}

function moveFile(source: string, dest: string): void {
  try {
    renameSync(source, dest);
  } catch (error) {
    if (!(error instanceof Error && "code" in error && error.code === "EXDEV")) {
      throw error;
    }

    copyFileSync(source, dest);
    unlinkSync(source);
  }
}
