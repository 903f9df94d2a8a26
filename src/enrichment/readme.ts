import { readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { getLogger } from "../util/logger.js";

const log = getLogger("readme");

export const MAX_SUMMARY_LENGTH = 200;

const README_NAME = /^readme(\.(md|markdown|txt|rst))?$/i;

/** Image or badge, optionally wrapped in a link: ![alt](src) or [![alt](src)](href) */
const BADGE = /\[?!\[[^\]]*\]\([^)]*\)\]?(\([^)]*\))?/g;

function stripInline(text: string): string {
  return (
    text
      .replace(BADGE, "")
      // Links [text](url) → text
      .replace(/\[([^\]]+)\]\([^)]+\)/g, "$1")
      .replace(/`([^`]+)`/g, "$1")
      .replace(/\*\*([^*\n]+)\*\*/g, "$1")
      .replace(/__([^_\n]+)__/g, "$1")
      .replace(/\*([^*\n]+)\*/g, "$1")
      .replace(/<[^>]+>/g, "")
      .replace(/\s+/g, " ")
      .trim()
  );
}

/**
 * First prose paragraph of a markdown document, with headings, badges and
 * inline markup removed and the result cut to MAX_SUMMARY_LENGTH.
 */
export function summarizeMarkdown(markdown: string): string | null {
  const text = markdown.replace(/<!--[\s\S]*?-->/g, "").replace(/```[\s\S]*?```/g, "");

  for (const block of text.split(/\r?\n\s*\r?\n/)) {
    const lines = block
      .split(/\r?\n/)
      .map((l) => l.trim())
      .filter((l) => l && !/^#{1,6}(\s|$)/.test(l) && !/^(=+|-+)$/.test(l));
    const paragraph = stripInline(lines.join(" "));
    if (!paragraph) continue;

    if (paragraph.length <= MAX_SUMMARY_LENGTH) return paragraph;
    return `${paragraph.slice(0, MAX_SUMMARY_LENGTH - 3).trimEnd()}...`;
  }
  return null;
}

/** Summary of the README at the project root, or null when there is none. */
export function readReadmeSummary(root: string): string | null {
  let name: string | undefined;
  try {
    name = readdirSync(root)
      .filter((f) => README_NAME.test(f))
      .sort()[0];
    if (!name) return null;
    return summarizeMarkdown(readFileSync(join(root, name), "utf-8"));
  } catch (e) {
    log.warn({ err: e, root, file: name }, "could not read README");
    return null;
  }
}
