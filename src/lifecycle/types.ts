// One row of `flotilla list` / `check_status`.
export interface InstanceStatus {
  name: string;
  // A window with this name exists in the session.
  window: boolean;
  // A working directory with this name exists under the root.
  directory: boolean;
  // Size of the captured log, or null when there is none.
  logBytes: number | null;
}

export type InstanceState = "running" | "window only" | "directory only";

export function instanceState(status: InstanceStatus): InstanceState {
  if (status.window && status.directory) {
    return "running";
  }

  return status.window ? "window only" : "directory only";
}
