/**
 * ArtifactSynchronizer -- rebuilds the editor's project list from the store.
 *
 * Every regenerate() is a full rebuild written through a temp file and a
 * rename, so the consumer sees either the previous list or the new one.
 * A failed write leaves the store as it is; the next successful call brings
 * the file back in line.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { ArtifactWriteError, errorMessage } from "../errors.js";
import type { ProjectStore } from "../projects/store.js";
import type { Project } from "../projects/types.js";
import { writeFileAtomic } from "../util/atomic-write.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("artifact");

export interface ArtifactEntry {
  name: string;
  rootPath: string;
  /** Sub-bookmarks; not tracked by the registry */
  paths: string[];
}

export interface RegenerateResult {
  path: string;
  entries: number;
}

export interface DriftReport {
  path: string;
  exists: boolean;
  /** File contents equal a fresh rebuild */
  inSync: boolean;
  /** Live project paths absent from the file */
  missing: string[];
  /** Paths in the file with no live project */
  extra: string[];
  /** Set when the file exists but cannot be read as a project list */
  error?: string;
}

const artifactSchema = z.array(z.object({ name: z.string(), rootPath: z.string() }).passthrough());

/** Serialized artifact for the given live projects, in the order given. */
export function renderArtifact(projects: ReadonlyArray<Pick<Project, "name" | "rootPath">>): string {
  const entries: ArtifactEntry[] = projects.map((p) => ({ name: p.name, rootPath: p.rootPath, paths: [] }));
  return `${JSON.stringify(entries, null, 4)}\n`;
}

export class ArtifactSynchronizer {
  constructor(
    private projects: ProjectStore,
    private path: string,
  ) {}

  getPath(): string {
    return this.path;
  }

  /** @throws ArtifactWriteError */
  regenerate(): RegenerateResult {
    const live = this.projects.list({ sortBy: "name" });
    try {
      writeFileAtomic(this.path, renderArtifact(live));
    } catch (e) {
      log.warn({ err: e, path: this.path }, "artifact write failed");
      throw new ArtifactWriteError(this.path, e);
    }
    log.info({ path: this.path, entries: live.length }, "artifact regenerated");
    return { path: this.path, entries: live.length };
  }

  /** Compare the file on disk with what regenerate() would write now. */
  checkDrift(): DriftReport {
    const live = this.projects.list({ sortBy: "name" });
    const expected = renderArtifact(live);
    const livePaths = live.map((p) => p.rootPath);

    let contents: string;
    try {
      contents = readFileSync(this.path, "utf-8");
    } catch (e) {
      const exists = !(e instanceof Error && "code" in e && e.code === "ENOENT");
      return {
        path: this.path,
        exists,
        inSync: false,
        missing: livePaths,
        extra: [],
        ...(exists ? { error: errorMessage(e) } : {}),
      };
    }

    let entries: Array<{ rootPath: string }>;
    try {
      const parsed = artifactSchema.safeParse(JSON.parse(contents));
      if (!parsed.success) {
        return { path: this.path, exists: true, inSync: false, missing: livePaths, extra: [], error: "not a project list" };
      }
      entries = parsed.data;
    } catch (e) {
      return { path: this.path, exists: true, inSync: false, missing: livePaths, extra: [], error: errorMessage(e) };
    }

    const onDisk = new Set(entries.map((e) => e.rootPath));
    const wanted = new Set(livePaths);
    return {
      path: this.path,
      exists: true,
      inSync: contents === expected,
      missing: livePaths.filter((p) => !onDisk.has(p)),
      extra: [...onDisk].filter((p) => !wanted.has(p)),
    };
  }
}
