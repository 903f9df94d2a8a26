import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

vi.mock("../util/logger.js", () => ({
  getLogger: () => ({
    info: () => {},
    warn: () => {},
    error: () => {},
    debug: () => {},
  }),
}));

import { gitignoreToGlobs, readGitignore } from "./gitignore.js";

describe("gitignoreToGlobs", () => {
  it("translates names, anchored paths and nested paths", () => {
    const contents = ["# comment", "", "node_modules/", "/build", "*.log", "!keep.log", "docs/tmp/", "   ", "/"].join(
      "\n",
    );
    expect(gitignoreToGlobs(contents)).toEqual([
      "**/node_modules",
      "**/node_modules/**",
      "build",
      "build/**",
      "**/*.log",
      "**/*.log/**",
      "docs/tmp",
      "docs/tmp/**",
    ]);
  });

  it("handles CRLF line endings", () => {
    expect(gitignoreToGlobs("out\r\n.env\r\n")).toEqual(["**/out", "**/out/**", "**/.env", "**/.env/**"]);
  });
});

describe("readGitignore", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "projreg-gitignore-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns no patterns without a .gitignore", () => {
    expect(readGitignore(dir)).toEqual([]);
  });

  it("reads the root .gitignore", () => {
    writeFileSync(join(dir, ".gitignore"), "coverage\n");
    expect(readGitignore(dir)).toEqual(["**/coverage", "**/coverage/**"]);
  });
});
