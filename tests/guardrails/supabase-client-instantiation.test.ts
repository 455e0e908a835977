import fs from "node:fs";
import path from "node:path";

import { describe, expect, it } from "vitest";

const REPO_ROOT = process.cwd();
const CODE_ROOTS = ["app", "packages"];
const SKIP_DIRS = new Set(["node_modules", "dist"]);
const ALLOWED_SEGMENT = `${path.sep}packages${path.sep}db${path.sep}`;
const CREATE_CLIENT_CALL_PATTERN = "create" + "Client(";

function collectCreateClientHits(dirPath: string): string[] {
  const entries = fs.readdirSync(dirPath, { withFileTypes: true });
  const hits: string[] = [];

  for (const entry of entries) {
    if (SKIP_DIRS.has(entry.name)) {
      continue;
    }

    const absolutePath = path.join(dirPath, entry.name);

    if (entry.isDirectory()) {
      hits.push(...collectCreateClientHits(absolutePath));
      continue;
    }

    if (!entry.isFile() || !entry.name.endsWith(".ts")) {
      continue;
    }

    const content = fs.readFileSync(absolutePath, "utf8");
    if (content.includes(CREATE_CLIENT_CALL_PATTERN)) {
      hits.push(path.relative(REPO_ROOT, absolutePath));
    }
  }

  return hits;
}

describe("supabase client instantiation guardrail", () => {
  it("keeps Supabase client constructor usage scoped to packages/db", () => {
    const hits = CODE_ROOTS.flatMap((root) => collectCreateClientHits(path.join(REPO_ROOT, root)));

    expect(hits.length).toBeGreaterThan(0);
    expect(
      hits.filter((relativePath) => !path.join(REPO_ROOT, relativePath).includes(ALLOWED_SEGMENT)),
    ).toEqual([]);
  });
});
