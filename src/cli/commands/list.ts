import { instanceState, type InstanceStatus } from "../../lifecycle";

function formatBytes(bytes: number | null): string {
  if (bytes === null) {
    return "no log";
  }
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

// Render a compact table of instances.
export function formatInstanceList(statuses: InstanceStatus[]): string {
  if (statuses.length === 0) {
    return "No flotilla instances found.\n";
  }

  const rows = statuses.map((status) =>
    [status.name.padEnd(16), instanceState(status).padEnd(14), formatBytes(status.logBytes)].join("  ")
  );

  return `${rows.join("\n")}\n`;
}
