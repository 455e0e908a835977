import fs from "node:fs";
import path from "node:path";

import { describe, expect, it } from "vitest";

const REPO_ROOT = process.cwd();
const CODE_ROOTS = ["app", "packages"];
const LOG_SINK = path.join("packages", "core", "src", "observability", "logger.ts");
const CONSOLE_CALL_PATTERN = /\bconsole\.(\w+)\s*\(/g;

type ConsoleCall = { file: string; line: number; method: string };

function findConsoleCalls(source: string, file: string): ConsoleCall[] {
  const calls: ConsoleCall[] = [];
  source.split("\n").forEach((text, index) => {
    for (const match of text.matchAll(CONSOLE_CALL_PATTERN)) {
      calls.push({ file, line: index + 1, method: match[1] ?? "" });
    }
  });
  return calls;
}

function listSourceFiles(dirPath: string): string[] {
  const files: string[] = [];
  for (const entry of fs.readdirSync(dirPath, { withFileTypes: true })) {
    if (entry.name === "node_modules") {
      continue;
    }
    const absolutePath = path.join(dirPath, entry.name);
    if (entry.isDirectory()) {
      files.push(...listSourceFiles(absolutePath));
    } else if (entry.isFile() && entry.name.endsWith(".ts") && !entry.name.endsWith(".test.ts")) {
      files.push(absolutePath);
    }
  }
  return files;
}

describe("console usage guardrail", () => {
  it("routes every production log line through the structured logger", () => {
    const calls = CODE_ROOTS.flatMap((root) => listSourceFiles(path.join(REPO_ROOT, root))).flatMap(
      (file) => findConsoleCalls(fs.readFileSync(file, "utf8"), path.relative(REPO_ROOT, file)),
    );

    expect(calls.map(({ file, method }) => ({ file, method }))).toEqual([
      { file: LOG_SINK, method: "info" },
    ]);
  });

  it("reports each console call with its line", () => {
    const source = [
      "export function handler() {",
      "  console.warn('slow');",
      "  return console.log('done'), logEvent(event);",
      "}",
    ].join("\n");

    expect(findConsoleCalls(source, "app/api/demo/route.ts")).toEqual([
      { file: "app/api/demo/route.ts", line: 2, method: "warn" },
      { file: "app/api/demo/route.ts", line: 3, method: "log" },
    ]);
  });
});
