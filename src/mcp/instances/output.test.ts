import { writeFileSync } from "fs";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { cleanupRoot, makeRoot } from "../../test/fs";
import { filterLines, readLastLines, stripAnsi } from "./output";

describe("readLastLines", () => {
  let root: string;

  beforeEach(() => {
    root = makeRoot();
  });

  afterEach(() => {
    cleanupRoot(root);
  });

  it("returns the tail without the final newline", () => {
    const logPath = join(root, "out.log");
    writeFileSync(logPath, "one\ntwo\nthree\n");

    expect(readLastLines(logPath, 2)).toBe("two\nthree");
    expect(readLastLines(logPath, 10)).toBe("one\ntwo\nthree");
  });

  it("handles logs without a trailing newline", () => {
    const logPath = join(root, "out.log");
    writeFileSync(logPath, "one\ntwo");

    expect(readLastLines(logPath, 1)).toBe("two");
  });

  it("returns an empty string for missing or empty logs", () => {
    writeFileSync(join(root, "empty.log"), "");

    expect(readLastLines(join(root, "missing.log"), 5)).toBe("");
    expect(readLastLines(join(root, "empty.log"), 5)).toBe("");
  });
});

describe("stripAnsi", () => {
  it("removes color codes", () => {
    expect(stripAnsi("\x1b[31mERROR\x1b[0m boom")).toBe("ERROR boom");
  });
});

describe("filterLines", () => {
  it("matches case-insensitively", () => {
    expect(filterLines("GET / -> 200\nget /missing -> 404\nready", "get")).toEqual([
      "GET / -> 200",
      "get /missing -> 404",
    ]);
  });
});
