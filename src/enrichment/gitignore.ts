import { readFileSync } from "node:fs";
import { join } from "node:path";
import { getLogger } from "../util/logger.js";

const log = getLogger("gitignore");

/**
 * Translate .gitignore lines into fast-glob ignore patterns.
 *
 * Only the root ignore file is read. Negations ("!pattern") cannot be
 * expressed as ignore globs and are skipped, so a re-included file stays
 * excluded.
 */
export function gitignoreToGlobs(contents: string): string[] {
  const globs: string[] = [];
  for (const rawLine of contents.split(/\r?\n/)) {
    let line = rawLine.trim();
    if (!line || line.startsWith("#") || line.startsWith("!")) continue;

    line = line.replace(/\/+$/, "");
    if (!line) continue;

    let pattern: string;
    if (line.startsWith("/")) {
      pattern = line.slice(1);
    } else if (line.includes("/")) {
      pattern = line;
    } else {
      pattern = `**/${line}`;
    }
    if (!pattern) continue;

    globs.push(pattern, `${pattern}/**`);
  }
  return globs;
}

/** Ignore globs from `<root>/.gitignore`; none when the file is absent. */
export function readGitignore(root: string): string[] {
  let contents: string;
  try {
    contents = readFileSync(join(root, ".gitignore"), "utf-8");
  } catch (e) {
    if (!(e instanceof Error && "code" in e && e.code === "ENOENT")) {
      log.warn({ err: e, root }, "could not read .gitignore");
    }
    return [];
  }
  return gitignoreToGlobs(contents);
}
