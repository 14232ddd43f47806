import type { InstanceStatus } from "../../lifecycle";

// Match instance names by exact, prefix, then contains order.
export function matchInstances(statuses: InstanceStatus[], query: string): InstanceStatus[] {
  const exact = statuses.filter((status) => status.name === query);
  if (exact.length > 0) {
    return exact;
  }

  const prefix = statuses.filter((status) => status.name.startsWith(query));
  if (prefix.length > 0) {
    return prefix;
  }

  return statuses.filter((status) => status.name.includes(query));
}
