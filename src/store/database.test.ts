import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, existsSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import Database from "better-sqlite3";

vi.mock("../util/logger.js", () => ({
  getLogger: () => ({
    info: () => {},
    warn: () => {},
    error: () => {},
    debug: () => {},
  }),
}));

import { SchemaStore, isUniqueViolation } from "./database.js";
import { SchemaMigrationError, StoreBusyError } from "../errors.js";

function tableNames(path: string): string[] {
  const db = new Database(path);
  try {
    return db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      )
      .all()
      .map((r) => r.name);
  } finally {
    db.close();
  }
}

describe("SchemaStore", () => {
  let dir: string;
  let dbPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "projreg-store-"));
    dbPath = join(dir, "nested", "registry.db");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  // ---- open ----

  it("creates parent directories, the file and every table", () => {
    const store = new SchemaStore({ path: dbPath, busyTimeoutMs: 100 });
    const report = store.open();

    expect(existsSync(dbPath)).toBe(true);
    expect(report).toEqual({ createdTables: ["projects", "tags", "tool_configs"], addedColumns: [] });
    expect(tableNames(dbPath)).toEqual(["projects", "tags", "tool_configs"]);
  });

  it("runs seed hooks after migration", () => {
    const store = new SchemaStore({ path: dbPath, busyTimeoutMs: 100 });
    store.open([(db) => db.prepare("INSERT INTO tags (name) VALUES ('seeded')").run()]);

    const names = store.read((db) => db.prepare<[], { name: string }>("SELECT name FROM tags").all());
    expect(names).toEqual([{ name: "seeded" }]);
  });

  // ---- migrate ----

  it("is a no-op on a current schema and leaves rows untouched", () => {
    const store = new SchemaStore({ path: dbPath, busyTimeoutMs: 100 });
    store.open();
    store.write((db) =>
      db
        .prepare("INSERT INTO projects (uuid, name, root_path, notes, date_added) VALUES (?, ?, ?, ?, ?)")
        .run("11111111-1111-4111-8111-111111111111", "alpha", "/work/alpha", "keep me", "2024-01-01T00:00:00.000Z"),
    );
    const before = store.read((db) => db.prepare("SELECT * FROM projects").all());
    const schemaBefore = store.read((db) => db.prepare("SELECT sql FROM sqlite_master ORDER BY name").all());

    expect(store.migrate()).toEqual({ createdTables: [], addedColumns: [] });
    expect(store.migrate()).toEqual({ createdTables: [], addedColumns: [] });

    expect(store.read((db) => db.prepare("SELECT * FROM projects").all())).toEqual(before);
    expect(store.read((db) => db.prepare("SELECT sql FROM sqlite_master ORDER BY name").all())).toEqual(schemaBefore);
  });

  it("adds missing columns to a legacy table and keeps its rows", () => {
    const legacy = new Database(join(dir, "legacy.db"));
    legacy.exec(`
      CREATE TABLE projects (
        uuid TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        root_path TEXT NOT NULL,
        tags TEXT,
        date_added TEXT,
        last_updated TEXT,
        enabled INTEGER DEFAULT 1
      );
      INSERT INTO projects VALUES ('22222222-2222-4222-8222-222222222222', 'legacy', '/old', '["cli"]', 'a', 'b', 1);
    `);
    legacy.close();

    const store = new SchemaStore({ path: join(dir, "legacy.db"), busyTimeoutMs: 100 });
    const report = store.open();

    expect(report.createdTables).toEqual(["tags", "tool_configs"]);
    expect(report.addedColumns).toEqual([
      "projects.ai_app_name",
      "projects.ai_app_description",
      "projects.description",
      "projects.notes",
      "projects.favorite",
      "projects.last_opened",
      "projects.open_count",
      "projects.color_theme",
    ]);

    const row = store.read((db) =>
      db
        .prepare<[], Record<string, unknown>>(
          "SELECT uuid, name, root_path, tags, date_added, last_updated, enabled, favorite, open_count, color_theme, notes FROM projects",
        )
        .get(),
    );
    expect(row).toEqual({
      uuid: "22222222-2222-4222-8222-222222222222",
      name: "legacy",
      root_path: "/old",
      tags: '["cli"]',
      date_added: "a",
      last_updated: "b",
      enabled: 1,
      favorite: 0,
      open_count: 0,
      color_theme: "blue",
      notes: null,
    });
  });

  it("fails without partial changes when a key column is missing", () => {
    const legacy = new Database(join(dir, "broken.db"));
    legacy.exec("CREATE TABLE tags (name TEXT, color TEXT)");
    legacy.close();

    const store = new SchemaStore({ path: join(dir, "broken.db"), busyTimeoutMs: 100 });
    expect(() => store.open()).toThrow(SchemaMigrationError);
    // projects was created earlier in the same transaction and rolled back with it
    expect(tableNames(join(dir, "broken.db"))).toEqual(["tags"]);
  });

  // ---- errors ----

  it("reports a held write lock as StoreBusyError", () => {
    const store = new SchemaStore({ path: dbPath, busyTimeoutMs: 10 });
    store.open();

    const holder = new Database(dbPath);
    holder.exec("BEGIN EXCLUSIVE");
    try {
      expect(() => store.write((db) => db.prepare("INSERT INTO tags (name) VALUES ('x')").run())).toThrow(
        StoreBusyError,
      );
    } finally {
      holder.exec("ROLLBACK");
      holder.close();
    }
  });

  it("isUniqueViolation matches only the named column", () => {
    const store = new SchemaStore({ path: dbPath, busyTimeoutMs: 100 });
    store.open();
    store.write((db) => db.prepare("INSERT INTO tags (name) VALUES ('dup')").run());

    let caught: unknown;
    try {
      store.write((db) => db.prepare("INSERT INTO tags (name) VALUES ('dup')").run());
    } catch (e) {
      caught = e;
    }
    expect(isUniqueViolation(caught, "tags.name")).toBe(true);
    expect(isUniqueViolation(caught, "root_path")).toBe(false);
    expect(isUniqueViolation(new Error("root_path"), "root_path")).toBe(false);
  });
});
