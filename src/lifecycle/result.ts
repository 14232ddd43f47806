export type FleetErrorKind =
  | "InvalidInput"
  | "PreconditionFailed"
  | "NotFound"
  | "ExternalToolError"
  | "IOFailure";

export interface FleetError {
  kind: FleetErrorKind;
  message: string;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: FleetError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(kind: FleetErrorKind, message: string): Result<T> {
  return { ok: false, error: { kind, message } };
}

// NotFound is the "missing" flavour of a failed precondition.
export function isPreconditionFailure(error: FleetError): boolean {
  return error.kind === "PreconditionFailed" || error.kind === "NotFound";
}

// Render a thrown value from fs/child_process as a one-line detail.
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
