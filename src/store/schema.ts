/**
 * Target schema. Migration only ever adds what is listed here and missing
 * from the live database; nothing is dropped, renamed or retyped.
 *
 * Rules for entries:
 * - `key` columns can only be created with their table (SQLite cannot ALTER
 *   them in), so a live table missing one cannot be migrated.
 * - every other column definition must be valid for ALTER TABLE ADD COLUMN:
 *   nullable, or NOT NULL with a constant default.
 */

export interface ColumnSpec {
  name: string;
  definition: string;
  key?: boolean;
}

export interface TableSpec {
  name: string;
  columns: ColumnSpec[];
  /** Table constraints, applied only when the table is created */
  constraints?: string[];
  /** Idempotent statements run on every migration */
  indexes?: string[];
}

export const TARGET_SCHEMA: readonly TableSpec[] = [
  {
    name: "projects",
    columns: [
      { name: "uuid", definition: "TEXT PRIMARY KEY", key: true },
      { name: "name", definition: "TEXT NOT NULL DEFAULT ''" },
      { name: "root_path", definition: "TEXT NOT NULL DEFAULT ''" },
      { name: "tags", definition: "TEXT DEFAULT '[]'" },
      { name: "ai_app_name", definition: "TEXT" },
      { name: "ai_app_description", definition: "TEXT" },
      { name: "description", definition: "TEXT" },
      { name: "notes", definition: "TEXT" },
      { name: "favorite", definition: "INTEGER NOT NULL DEFAULT 0" },
      { name: "last_opened", definition: "TEXT" },
      { name: "open_count", definition: "INTEGER NOT NULL DEFAULT 0" },
      { name: "date_added", definition: "TEXT" },
      { name: "last_updated", definition: "TEXT" },
      { name: "enabled", definition: "INTEGER NOT NULL DEFAULT 1" },
      { name: "color_theme", definition: "TEXT DEFAULT 'blue'" },
    ],
    indexes: [
      // one live project per directory; archived rows do not count
      "CREATE UNIQUE INDEX IF NOT EXISTS projects_live_root_path ON projects(root_path) WHERE enabled = 1",
    ],
  },
  {
    name: "tags",
    columns: [
      { name: "id", definition: "INTEGER PRIMARY KEY AUTOINCREMENT", key: true },
      { name: "name", definition: "TEXT NOT NULL UNIQUE", key: true },
      { name: "color", definition: "TEXT DEFAULT '#3b82f6'" },
      { name: "icon", definition: "TEXT DEFAULT '🏷️'" },
    ],
  },
  {
    name: "tool_configs",
    columns: [
      { name: "id", definition: "INTEGER PRIMARY KEY AUTOINCREMENT", key: true },
      { name: "project_uuid", definition: "TEXT NOT NULL", key: true },
      { name: "tool_name", definition: "TEXT NOT NULL", key: true },
      { name: "config", definition: "TEXT" },
      { name: "updated_at", definition: "TEXT" },
    ],
    constraints: [
      "UNIQUE(project_uuid, tool_name)",
      "FOREIGN KEY (project_uuid) REFERENCES projects(uuid) ON DELETE CASCADE",
    ],
    indexes: [
      "CREATE INDEX IF NOT EXISTS tool_configs_project ON tool_configs(project_uuid)",
    ],
  },
];

export function createTableSql(table: TableSpec): string {
  const parts = [
    ...table.columns.map((c) => `${c.name} ${c.definition}`),
    ...(table.constraints ?? []),
  ];
  return `CREATE TABLE IF NOT EXISTS ${table.name} (\n  ${parts.join(",\n  ")}\n)`;
}
