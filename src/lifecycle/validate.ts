import { z } from "zod";
import { INSTANCE_NAME_PATTERN } from "./config";
import { err, ok, type Result } from "./result";

export const instanceNameSchema = z
  .string()
  .regex(INSTANCE_NAME_PATTERN, "--name must be 1..32 lowercase Latin letters [a-z]")
  .brand<"InstanceName">();

// Integers only, kept as canonical decimal text so no digit is lost;
// binding decides whether the number is a usable port.
export const portSchema = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, "--port must be an integer")
  .transform((value) => BigInt(value).toString())
  .brand<"Port">();

export type InstanceName = z.infer<typeof instanceNameSchema>;
export type Port = z.infer<typeof portSchema>;

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? "invalid value";
}

export function validateName(value: string): Result<InstanceName> {
  const parsed = instanceNameSchema.safeParse(value);
  return parsed.success ? ok(parsed.data) : err("InvalidInput", firstIssue(parsed.error));
}

export function validatePort(value: string): Result<Port> {
  const parsed = portSchema.safeParse(value);
  return parsed.success ? ok(parsed.data) : err("InvalidInput", firstIssue(parsed.error));
}

export function isInstanceName(value: string): boolean {
  return INSTANCE_NAME_PATTERN.test(value);
}
