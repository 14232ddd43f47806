#!/usr/bin/env tsx
import { runMcpServer } from "./mcp/main";

runMcpServer().catch((err) => {
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
