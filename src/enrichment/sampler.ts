/**
 * File sampler -- picks the files whose contents describe a project.
 *
 * Selection is deterministic for a given tree: candidates are ranked by the
 * position of their extension in the configured list, then by depth, then by
 * path, and read in that order until enough samples are collected.
 */

import fg from "fast-glob";
import { readFile, stat } from "node:fs/promises";
import { extname, join } from "node:path";
import type { EnrichmentConfig } from "../config.js";
import { getLogger } from "../util/logger.js";
import { readGitignore } from "./gitignore.js";

const log = getLogger("sampler");

export type SampleOptions = Pick<
  EnrichmentConfig,
  "maxFiles" | "maxFileChars" | "maxFileBytes" | "importantExtensions" | "excludeDirs"
>;

export interface SampledFile {
  /** Path relative to the project root, `/`-separated */
  path: string;
  content: string;
  truncated: boolean;
}

function depth(path: string): number {
  return path.split("/").length - 1;
}

/**
 * Order eligible paths by sampling priority. Paths whose extension is not in
 * `importantExtensions` are dropped.
 */
export function rankCandidates(paths: readonly string[], importantExtensions: readonly string[]): string[] {
  const priority = new Map(importantExtensions.map((ext, i) => [ext.toLowerCase(), i] as const));
  const ranked: Array<{ path: string; rank: number; depth: number }> = [];
  for (const path of paths) {
    const rank = priority.get(extname(path).toLowerCase());
    if (rank === undefined) continue;
    ranked.push({ path, rank, depth: depth(path) });
  }
  ranked.sort((a, b) => a.rank - b.rank || a.depth - b.depth || (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  return ranked.map((c) => c.path);
}

/** Every file under `root` not excluded by directory name or the root .gitignore. */
export async function listCandidates(root: string, excludeDirs: readonly string[]): Promise<string[]> {
  const ignore = [...excludeDirs.map((dir) => `**/${dir}/**`), ...readGitignore(root)];
  return fg("**/*", {
    cwd: root,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    suppressErrors: true,
    ignore,
  });
}

export async function sampleFiles(root: string, options: SampleOptions): Promise<SampledFile[]> {
  const candidates = rankCandidates(await listCandidates(root, options.excludeDirs), options.importantExtensions);
  const samples: SampledFile[] = [];

  for (const path of candidates) {
    if (samples.length >= options.maxFiles) break;
    const full = join(root, path);
    try {
      const { size } = await stat(full);
      if (size > options.maxFileBytes) {
        log.debug({ path, size }, "skipping large file");
        continue;
      }
      const text = await readFile(full, "utf-8");
      const truncated = text.length > options.maxFileChars;
      samples.push({ path, content: truncated ? text.slice(0, options.maxFileChars) : text, truncated });
    } catch (e) {
      log.warn({ err: e, path }, "could not read file, skipping");
    }
  }

  log.debug({ root, candidates: candidates.length, sampled: samples.length }, "files sampled");
  return samples;
}

/**
 * Join excerpts into one request body no longer than `maxChars`. The excerpt
 * that crosses the limit is cut short and later ones are dropped.
 */
export function buildExcerptPayload(samples: readonly SampledFile[], maxChars: number): string {
  let payload = "";
  for (const sample of samples) {
    const section = `${payload ? "\n\n" : ""}Filename: ${sample.path}\n\n${sample.content}`;
    const room = maxChars - payload.length;
    if (section.length > room) {
      payload += section.slice(0, Math.max(0, room));
      break;
    }
    payload += section;
  }
  return payload;
}
