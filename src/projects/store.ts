/**
 * ProjectStore -- project rows in the schema store.
 *
 * Rows are keyed strictly by the UUID from the project's sentinel file. The
 * root path is unique only among live (enabled) rows, so an archived project
 * never blocks a new registration at its old path.
 */

import { basename } from "node:path";
import type { Connection, SchemaStore } from "../store/database.js";
import { isUniqueViolation } from "../store/database.js";
import { DuplicatePathError, ProjectNotFoundError } from "../errors.js";
import { ensureTags } from "../tags/registry.js";
import { mergeTags, normalizeTags } from "../tags/normalize.js";
import { getLogger } from "../util/logger.js";
import { nextState, statusOf } from "./lifecycle.js";
import type {
  EnrichmentPatch,
  Project,
  ProjectFields,
  ProjectFilter,
  ProjectRow,
  ProjectStats,
  SortField,
  TagCount,
} from "./types.js";

const log = getLogger("project-store");

const SORT_COLUMNS: Record<SortField, string> = {
  name: "name COLLATE NOCASE",
  lastOpened: "last_opened",
  openCount: "open_count",
  dateAdded: "date_added",
  lastUpdated: "last_updated",
};

export type NewProjectFields = ProjectFields & { rootPath: string };

export interface UpsertResult {
  project: Project;
  created: boolean;
}

export class ProjectStore {
  constructor(private store: SchemaStore) {}

  /**
   * Insert a project under `uuid`, or update the supplied fields of the
   * existing row. A new row gets favorite=false, open_count=0, enabled=true
   * and, unless given, the directory's base name as its name.
   *
   * With `restore`, an archived row is brought back in the same
   * transaction; the path guard runs before any field is touched.
   *
   * @throws DuplicatePathError when another live project holds the root path
   */
  upsert(uuid: string, fields: NewProjectFields, options: { restore?: boolean } = {}): UpsertResult {
    return this.store.write((db) => {
      const existing = getRow(db, uuid);
      if (existing) {
        const revive = options.restore === true && existing.enabled === 0;
        if (revive) assertPathFree(db, fields.rootPath, uuid);
        const project = applyUpdate(db, existing, fields);
        if (!revive) return { project, created: false };
        enable(db, uuid, fields.rootPath);
        return { project: requireProject(db, uuid), created: false };
      }

      assertPathFree(db, fields.rootPath, uuid);
      const tags = normalizeTags(fields.tags ?? []);
      ensureTags(db, tags);

      const now = timestamp();
      try {
        db.prepare(
          `INSERT INTO projects (
             uuid, name, root_path, tags, ai_app_name, ai_app_description,
             description, notes, favorite, open_count, date_added, last_updated,
             enabled, color_theme
           ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, 0, ?, ?, 1, ?)`,
        ).run(
          uuid,
          fields.name ?? basename(fields.rootPath),
          fields.rootPath,
          JSON.stringify(tags),
          fields.aiAppName ?? null,
          fields.aiAppDescription ?? null,
          fields.description ?? null,
          fields.notes ?? null,
          fields.favorite ? 1 : 0,
          now,
          now,
          fields.colorTheme ?? "blue",
        );
      } catch (e) {
        if (isUniqueViolation(e, "root_path")) throw new DuplicatePathError(fields.rootPath, e);
        throw e;
      }

      log.info({ uuid, rootPath: fields.rootPath }, "project inserted");
      return { project: requireProject(db, uuid), created: true };
    });
  }

  /** @throws ProjectNotFoundError */
  update(uuid: string, fields: ProjectFields): Project {
    return this.store.write((db) => applyUpdate(db, requireRow(db, uuid), fields));
  }

  get(uuid: string): Project | undefined {
    return this.store.read((db) => {
      const row = getRow(db, uuid);
      return row ? toProject(row) : undefined;
    });
  }

  /** The live project registered at exactly this path, if any. */
  getByPath(rootPath: string): Project | undefined {
    return this.store.read((db) => {
      const row = db
        .prepare<[string], ProjectRow>("SELECT * FROM projects WHERE root_path = ? AND enabled = 1")
        .get(rootPath);
      return row ? toProject(row) : undefined;
    });
  }

  list(filter: ProjectFilter = {}): Project[] {
    const wanted = normalizeTags(filter.tags ?? []);
    // Tags that normalize to nothing can match no project
    if (filter.tags && filter.tags.length > 0 && wanted.length === 0) return [];

    let sql = "SELECT * FROM projects WHERE 1=1";
    if (filter.enabledOnly ?? true) sql += " AND enabled = 1";
    if (filter.favoritesOnly) sql += " AND favorite = 1";

    const order = filter.sortOrder === "desc" ? "DESC" : "ASC";
    sql += ` ORDER BY ${SORT_COLUMNS[filter.sortBy ?? "name"]} ${order}, uuid ASC`;

    const rows = this.store.read((db) => db.prepare<[], ProjectRow>(sql).all());
    let projects = rows.map(toProject);

    if (wanted.length > 0) {
      const any = filter.tagMode === "or";
      projects = projects.filter((p) =>
        any ? wanted.some((t) => p.tags.includes(t)) : wanted.every((t) => p.tags.includes(t)),
      );
    }

    const text = filter.text?.trim().toLowerCase();
    if (text) {
      projects = projects.filter((p) =>
        [p.name, p.rootPath, p.notes ?? ""].some((field) => field.toLowerCase().includes(text)),
      );
    }

    return projects;
  }

  /** Flip the favorite flag and return its new value. */
  toggleFavorite(uuid: string): boolean {
    return this.store.write((db) => {
      const row = requireRow(db, uuid);
      const favorite = row.favorite ? 0 : 1;
      db.prepare<[number, string, string]>(
        "UPDATE projects SET favorite = ?, last_updated = ? WHERE uuid = ?",
      ).run(favorite, timestamp(), uuid);
      return favorite === 1;
    });
  }

  updateNotes(uuid: string, notes: string | null): Project {
    return this.update(uuid, { notes });
  }

  /** Count a confirmed launch of the project. */
  recordOpen(uuid: string): Project {
    return this.store.write((db) => {
      requireRow(db, uuid);
      const now = timestamp();
      db.prepare<[string, string, string]>(
        "UPDATE projects SET last_opened = ?, open_count = open_count + 1, last_updated = ? WHERE uuid = ?",
      ).run(now, now, uuid);
      return requireProject(db, uuid);
    });
  }

  /** Soft delete. Archiving an archived project is a no-op. */
  archive(uuid: string): Project {
    return this.store.write((db) => {
      const from = statusOf(requireRow(db, uuid).enabled === 1);
      if (nextState(from, "archive") !== from) {
        setEnabled(db, uuid, false);
        log.info({ uuid }, "project archived");
      }
      return requireProject(db, uuid);
    });
  }

  /**
   * Bring an archived project back. Restoring an active project is a no-op.
   *
   * @throws DuplicatePathError when another live project now holds its path
   */
  restore(uuid: string): Project {
    return this.store.write((db) => {
      const row = requireRow(db, uuid);
      const from = statusOf(row.enabled === 1);
      if (nextState(from, "restore") !== from) {
        assertPathFree(db, row.root_path, uuid);
        enable(db, uuid, row.root_path);
      }
      return requireProject(db, uuid);
    });
  }

  /** Hard delete: the row and its tool configs are gone for good. */
  purge(uuid: string): void {
    this.store.write((db) => {
      requireRow(db, uuid);
      const configs = db
        .prepare<[string]>("DELETE FROM tool_configs WHERE project_uuid = ?")
        .run(uuid).changes;
      db.prepare<[string]>("DELETE FROM projects WHERE uuid = ?").run(uuid);
      log.info({ uuid, toolConfigs: configs }, "project purged");
    });
  }

  /**
   * Fill AI-derived fields that are still unset and union in the derived
   * tags. Values a user or an earlier enrichment already set are kept.
   */
  applyEnrichment(uuid: string, patch: EnrichmentPatch): Project {
    return this.store.write((db) => {
      const row = requireRow(db, uuid);
      const tags = mergeTags(parseTags(row), patch.tags);
      ensureTags(db, tags);

      db.prepare<[string | null, string | null, string | null, string, string, string]>(
        `UPDATE projects SET
           ai_app_name = COALESCE(ai_app_name, ?),
           ai_app_description = COALESCE(ai_app_description, ?),
           description = COALESCE(description, ?),
           tags = ?,
           last_updated = ?
         WHERE uuid = ?`,
      ).run(
        patch.aiAppName ?? null,
        patch.aiAppDescription ?? null,
        patch.description ?? null,
        JSON.stringify(tags),
        timestamp(),
        uuid,
      );
      log.info({ uuid, tags }, "enrichment applied");
      return requireProject(db, uuid);
    });
  }

  stats(): ProjectStats {
    return this.store.read((db) => {
      const counts = db
        .prepare<[], { total: number | null; favorites: number | null; archived: number | null }>(
          `SELECT
             SUM(enabled = 1) AS total,
             SUM(enabled = 1 AND favorite = 1) AS favorites,
             SUM(enabled = 0) AS archived
           FROM projects`,
        )
        .get();

      const live = db.prepare<[], ProjectRow>("SELECT * FROM projects WHERE enabled = 1").all();
      const tally = new Map<string, number>();
      for (const row of live) {
        for (const tag of parseTags(row)) tally.set(tag, (tally.get(tag) ?? 0) + 1);
      }
      const topTags: TagCount[] = [...tally]
        .map(([tag, count]) => ({ tag, count }))
        .sort((a, b) => b.count - a.count || (a.tag < b.tag ? -1 : a.tag > b.tag ? 1 : 0))
        .slice(0, 10);

      const mostOpened = db
        .prepare<[], { uuid: string; name: string; open_count: number }>(
          `SELECT uuid, name, open_count FROM projects WHERE enabled = 1
           ORDER BY open_count DESC, name COLLATE NOCASE ASC, uuid ASC LIMIT 5`,
        )
        .all()
        .map((r) => ({ uuid: r.uuid, name: r.name, openCount: r.open_count }));

      return {
        totalProjects: counts?.total ?? 0,
        favorites: counts?.favorites ?? 0,
        archived: counts?.archived ?? 0,
        topTags,
        mostOpened,
      };
    });
  }
}

// ---- helpers (all run inside the caller's transaction) ----

function timestamp(): string {
  return new Date().toISOString();
}

function getRow(db: Connection, uuid: string): ProjectRow | undefined {
  return db.prepare<[string], ProjectRow>("SELECT * FROM projects WHERE uuid = ?").get(uuid);
}

function requireRow(db: Connection, uuid: string): ProjectRow {
  const row = getRow(db, uuid);
  if (!row) throw new ProjectNotFoundError(uuid);
  return row;
}

function requireProject(db: Connection, uuid: string): Project {
  return toProject(requireRow(db, uuid));
}

function assertPathFree(db: Connection, rootPath: string, uuid: string): void {
  const holder = db
    .prepare<[string, string], { uuid: string }>(
      "SELECT uuid FROM projects WHERE root_path = ? AND enabled = 1 AND uuid != ?",
    )
    .get(rootPath, uuid);
  if (holder) throw new DuplicatePathError(rootPath);
}

function setEnabled(db: Connection, uuid: string, enabled: boolean): void {
  db.prepare<[number, string, string]>("UPDATE projects SET enabled = ?, last_updated = ? WHERE uuid = ?").run(
    enabled ? 1 : 0,
    timestamp(),
    uuid,
  );
}

function enable(db: Connection, uuid: string, rootPath: string): void {
  try {
    setEnabled(db, uuid, true);
  } catch (e) {
    if (isUniqueViolation(e, "root_path")) throw new DuplicatePathError(rootPath, e);
    throw e;
  }
  log.info({ uuid }, "project restored");
}

function applyUpdate(db: Connection, existing: ProjectRow, input: ProjectFields): Project {
  const fields: string[] = [];
  const values: Array<string | number | null> = [];

  if (input.name !== undefined) {
    fields.push("name = ?");
    values.push(input.name);
  }
  if (input.rootPath !== undefined && input.rootPath !== existing.root_path) {
    if (existing.enabled === 1) assertPathFree(db, input.rootPath, existing.uuid);
    fields.push("root_path = ?");
    values.push(input.rootPath);
  }
  if (input.tags !== undefined) {
    const tags = normalizeTags(input.tags);
    ensureTags(db, tags);
    fields.push("tags = ?");
    values.push(JSON.stringify(tags));
  }
  if (input.aiAppName !== undefined) {
    fields.push("ai_app_name = ?");
    values.push(input.aiAppName);
  }
  if (input.aiAppDescription !== undefined) {
    fields.push("ai_app_description = ?");
    values.push(input.aiAppDescription);
  }
  if (input.description !== undefined) {
    fields.push("description = ?");
    values.push(input.description);
  }
  if (input.notes !== undefined) {
    fields.push("notes = ?");
    values.push(input.notes);
  }
  if (input.favorite !== undefined) {
    fields.push("favorite = ?");
    values.push(input.favorite ? 1 : 0);
  }
  if (input.colorTheme !== undefined) {
    fields.push("color_theme = ?");
    values.push(input.colorTheme);
  }

  fields.push("last_updated = ?");
  values.push(timestamp());
  values.push(existing.uuid);

  try {
    db.prepare(`UPDATE projects SET ${fields.join(", ")} WHERE uuid = ?`).run(...values);
  } catch (e) {
    if (isUniqueViolation(e, "root_path") && input.rootPath !== undefined) {
      throw new DuplicatePathError(input.rootPath, e);
    }
    throw e;
  }
  log.info({ uuid: existing.uuid }, "project updated");
  return requireProject(db, existing.uuid);
}

function parseTags(row: ProjectRow): string[] {
  if (!row.tags) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(row.tags);
  } catch (e) {
    log.warn({ uuid: row.uuid, err: e }, "unreadable tags column, treating as empty");
    return [];
  }
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((t): t is string => typeof t === "string");
}

function toProject(row: ProjectRow): Project {
  const enabled = row.enabled === 1;
  return {
    uuid: row.uuid,
    name: row.name,
    rootPath: row.root_path,
    tags: parseTags(row),
    aiAppName: row.ai_app_name,
    aiAppDescription: row.ai_app_description,
    description: row.description,
    notes: row.notes,
    favorite: row.favorite === 1,
    lastOpened: row.last_opened,
    openCount: row.open_count ?? 0,
    dateAdded: row.date_added,
    lastUpdated: row.last_updated,
    enabled,
    status: statusOf(enabled),
    colorTheme: row.color_theme ?? "blue",
  };
}
