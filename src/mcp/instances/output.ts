import { readFileSync } from "fs";

// Remove ANSI escape codes (colors, cursor movement, etc.).
export function stripAnsi(text: string): string {
  return text.replace(/\x1b\[[0-9;]*[a-zA-Z]/g, "");
}

// Last `lineCount` lines of a log, without its final newline; "" when unreadable.
export function readLastLines(logPath: string, lineCount: number): string {
  let content: string;
  try {
    content = readFileSync(logPath, "utf-8");
  } catch {
    return "";
  }

  if (content === "" || lineCount <= 0) {
    return "";
  }

  const lines = (content.endsWith("\n") ? content.slice(0, -1) : content).split("\n");
  return lines.slice(-lineCount).join("\n");
}

export function filterLines(text: string, needle: string): string[] {
  const lower = needle.toLowerCase();
  return text.split("\n").filter((line) => line.toLowerCase().includes(lower));
}
