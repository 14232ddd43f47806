import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { cleanupRoot, makeRoot } from "../test/fs";
import { InstanceDirectories } from "./instance-dirs";

describe("InstanceDirectories", () => {
  let root: string;
  let dirs: InstanceDirectories;

  beforeEach(() => {
    root = makeRoot();
    dirs = new InstanceDirectories(root, "server.ts");
  });

  afterEach(() => {
    cleanupRoot(root);
    vi.restoreAllMocks();
  });

  it("resolves paths under the root", () => {
    expect(dirs.artifactPath()).toBe(join(root, "server.ts"));
    expect(dirs.instancePath("web")).toBe(join(root, "web"));
    expect(dirs.logPath("web")).toBe(join(root, "web", "out.log"));
  });

  it("creates a directory and stages the artifact", () => {
    writeFileSync(join(root, "server.ts"), "console.log('hi');\n");

    expect(dirs.create("web")).toEqual({ ok: true, value: join(root, "web") });
    expect(dirs.stageArtifact("web")).toEqual({ ok: true, value: join(root, "web", "server.ts") });
    expect(readFileSync(join(root, "web", "server.ts"), "utf-8")).toBe("console.log('hi');\n");
  });

  it("refuses to create an existing directory", () => {
    mkdirSync(join(root, "web"));

    const result = dirs.create("web");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("IOFailure");
      expect(result.error.message).toContain(`failed to create directory ${join(root, "web")}`);
    }
  });

  it("removes the directory when staging fails", () => {
    dirs.create("web");

    const result = dirs.stageArtifact("web");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("IOFailure");
      expect(result.error.message).toContain(`failed to copy server.ts into ${join(root, "web")}`);
    }
    expect(existsSync(join(root, "web"))).toBe(false);
  });

  it("removes a directory with its contents", () => {
    mkdirSync(join(root, "web"));
    writeFileSync(join(root, "web", "out.log"), "x");

    expect(dirs.remove("web")).toEqual({ ok: true, value: undefined });
    expect(existsSync(join(root, "web"))).toBe(false);
  });

  it("reports a failed removal", () => {
    const result = dirs.remove("ghost");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toContain(`failed to remove directory ${join(root, "ghost")}`);
    }
  });

  it("warns instead of failing when a rollback removal fails", () => {
    const warn = vi.spyOn(console, "error").mockImplementation(() => undefined);

    dirs.discard("ghost");

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^\[flotilla\] warning: failed to remove directory /);
  });

  it("lists only instance-shaped directories in order", () => {
    for (const name of ["web", "api", "Docs", "node_modules", "v2", ".backup"]) {
      mkdirSync(join(root, name));
    }
    writeFileSync(join(root, "notes"), "file, not a directory");

    expect(dirs.list()).toEqual({ ok: true, value: ["api", "web"] });
  });

  it("reports log sizes", () => {
    mkdirSync(join(root, "web"));
    writeFileSync(join(root, "web", "out.log"), "hello");

    expect(dirs.logSize("web")).toBe(5);
    expect(dirs.logSize("api")).toBeNull();
  });
});
