import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LifecycleController } from "../lifecycle";
import { FakeMultiplexer } from "../test/fake-multiplexer";
import { cleanupRoot, makeRoot } from "../test/fs";
import { NO_INSTANCES_MESSAGE } from "./config/messages";
import { createFlotillaMcpServer } from "./server";

describe("flotilla MCP server", () => {
  let root: string;
  let mux: FakeMultiplexer;
  let client: Client;

  beforeEach(async () => {
    root = makeRoot();
    mux = new FakeMultiplexer();
    const controller = new LifecycleController({
      session: "mcptest",
      root,
      artifactName: "server.ts",
      runtime: ["node"],
      multiplexer: mux,
    });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await createFlotillaMcpServer(controller).connect(serverTransport);
    client = new Client({ name: "flotilla-test", version: "0.0.0" });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    cleanupRoot(root);
  });

  async function callText(name: string, args: Record<string, unknown> = {}): Promise<string> {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const [first] = result.content;
    if (first?.type !== "text") {
      throw new Error(`expected text content from ${name}`);
    }
    return first.text;
  }

  it("lists both tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name).sort()).toEqual(["check_status", "get_output"]);
  });

  it("explains how to start when nothing runs", async () => {
    expect(await callText("check_status")).toBe(NO_INSTANCES_MESSAGE);
  });

  it("summarises instances with their recent output", async () => {
    mux.addWindow("mcptest", "web");
    mkdirSync(join(root, "web"));
    writeFileSync(join(root, "web", "out.log"), "booting\nready\n");
    mkdirSync(join(root, "api"));

    expect(await callText("check_status")).toBe(
      [
        "api — directory only (no log yet)",
        "  ⚠ no window in tmux session 'mcptest'; the process is not running",
        "",
        "web — running (log 14 bytes)",
        "  booting",
        "  ready",
        "",
        "1 of 2 instance(s) running in tmux session 'mcptest'.",
      ].join("\n")
    );
  });

  it("returns filtered output for one instance", async () => {
    mux.addWindow("mcptest", "web");
    mkdirSync(join(root, "web"));
    writeFileSync(join(root, "web", "out.log"), "GET / -> 200\nGET /nope -> 404\nGET /health -> 200\n");

    expect(await callText("get_output", { name: "web", lines: 10, grep: "404" })).toBe(
      "=== web (last 10 lines, filtered for '404') ===\n\nGET /nope -> 404"
    );
  });

  it("asks for a more specific name when several match", async () => {
    mux.addWindow("mcptest", "web");
    mux.addWindow("mcptest", "webhook");

    expect(await callText("get_output", { name: "we" })).toBe(
      "Multiple instances match 'we'. Please be more specific:\n  web\n  webhook"
    );
  });
});
