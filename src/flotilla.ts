#!/usr/bin/env tsx
import { runCli } from "./cli/main";

try {
  process.exitCode = runCli(process.argv.slice(2));
} catch (error) {
  console.error("Error:", error instanceof Error ? error.message : error);
  process.exit(1);
}
