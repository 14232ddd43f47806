import { createRequire } from "module";
import { z } from "zod";
import { DEFAULT_ARTIFACT_NAME, DEFAULT_SESSION_NAME } from "./config";
import { err, ok, type Result } from "./result";

export interface Settings {
  session: string;
  artifactName: string;
  runtime: string[];
  verbose: boolean;
}

const envSchema = z.object({
  FLOTILLA_SESSION: z
    .string()
    .regex(/^[A-Za-z0-9_-]{1,64}$/, "FLOTILLA_SESSION may only contain letters, digits, '_' and '-'")
    .default(DEFAULT_SESSION_NAME),
  FLOTILLA_ARTIFACT: z
    .string()
    .min(1)
    .refine((value) => !/[\\/]/.test(value), "FLOTILLA_ARTIFACT must be a file name, not a path")
    .default(DEFAULT_ARTIFACT_NAME),
  FLOTILLA_RUNTIME: z
    .string()
    .trim()
    .min(1, "FLOTILLA_RUNTIME must not be empty")
    .optional(),
  FLOTILLA_VERBOSE: z
    .enum(["0", "1", "true", "false"])
    .optional()
    .transform((value) => value === "1" || value === "true"),
});

// Node running tsx's CLI, so a staged `server.ts` runs without a build step.
export function defaultRuntime(): string[] {
  const require = createRequire(import.meta.url);
  return [process.execPath, require.resolve("tsx/cli")];
}

export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  resolveRuntime: () => string[] = defaultRuntime
): Result<Settings> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid environment";
    return err("InvalidInput", detail);
  }

  const { FLOTILLA_SESSION, FLOTILLA_ARTIFACT, FLOTILLA_RUNTIME, FLOTILLA_VERBOSE } = parsed.data;

  return ok({
    session: FLOTILLA_SESSION,
    artifactName: FLOTILLA_ARTIFACT,
    runtime: FLOTILLA_RUNTIME ? FLOTILLA_RUNTIME.split(/\s+/) : resolveRuntime(),
    verbose: FLOTILLA_VERBOSE,
  });
}
