/**
 * ToolConfigStore -- per-project, per-tool settings blobs.
 *
 * Rows belong to a project: purging the project removes them, archiving it
 * leaves them in place.
 */

import { z } from "zod";
import type { SchemaStore } from "../store/database.js";
import { ProjectNotFoundError } from "../errors.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("tool-config-store");

export type ToolSettings = Record<string, unknown>;

export interface ToolConfig {
  projectUuid: string;
  toolName: string;
  config: ToolSettings;
  updatedAt: string | null;
}

interface ToolConfigRow {
  project_uuid: string;
  tool_name: string;
  config: string | null;
  updated_at: string | null;
}

const settingsSchema = z.record(z.unknown());

export class ToolConfigStore {
  constructor(private store: SchemaStore) {}

  /** @throws ProjectNotFoundError when the project row does not exist */
  set(projectUuid: string, toolName: string, config: ToolSettings): ToolConfig {
    const updatedAt = new Date().toISOString();
    this.store.write((db) => {
      const project = db.prepare<[string], { uuid: string }>("SELECT uuid FROM projects WHERE uuid = ?").get(projectUuid);
      if (!project) throw new ProjectNotFoundError(projectUuid);
      db.prepare<[string, string, string, string]>(
        `INSERT INTO tool_configs (project_uuid, tool_name, config, updated_at) VALUES (?, ?, ?, ?)
         ON CONFLICT(project_uuid, tool_name) DO UPDATE SET config = excluded.config, updated_at = excluded.updated_at`,
      ).run(projectUuid, toolName, JSON.stringify(config), updatedAt);
    });
    log.debug({ projectUuid, toolName }, "tool config saved");
    return { projectUuid, toolName, config, updatedAt };
  }

  get(projectUuid: string, toolName: string): ToolConfig | undefined {
    const row = this.store.read((db) =>
      db
        .prepare<[string, string], ToolConfigRow>(
          "SELECT project_uuid, tool_name, config, updated_at FROM tool_configs WHERE project_uuid = ? AND tool_name = ?",
        )
        .get(projectUuid, toolName),
    );
    return row ? toToolConfig(row) : undefined;
  }

  list(projectUuid: string): ToolConfig[] {
    const rows = this.store.read((db) =>
      db
        .prepare<[string], ToolConfigRow>(
          "SELECT project_uuid, tool_name, config, updated_at FROM tool_configs WHERE project_uuid = ? ORDER BY tool_name ASC",
        )
        .all(projectUuid),
    );
    return rows.map(toToolConfig);
  }

  delete(projectUuid: string, toolName: string): boolean {
    const changes = this.store.write(
      (db) =>
        db
          .prepare<[string, string]>("DELETE FROM tool_configs WHERE project_uuid = ? AND tool_name = ?")
          .run(projectUuid, toolName).changes,
    );
    return changes > 0;
  }
}

function toToolConfig(row: ToolConfigRow): ToolConfig {
  return {
    projectUuid: row.project_uuid,
    toolName: row.tool_name,
    config: parseSettings(row),
    updatedAt: row.updated_at,
  };
}

function parseSettings(row: ToolConfigRow): ToolSettings {
  if (!row.config) return {};
  let raw: unknown;
  try {
    raw = JSON.parse(row.config);
  } catch (e) {
    log.warn({ err: e, projectUuid: row.project_uuid, toolName: row.tool_name }, "unreadable tool config");
    return {};
  }
  const parsed = settingsSchema.safeParse(raw);
  return parsed.success ? parsed.data : {};
}
