/**
 * SchemaStore -- the SQLite file behind the registry.
 *
 * No connection outlives an operation: every read or write opens the file,
 * runs inside a single transaction and closes again, so several front ends
 * can share one database with SQLite's own file locking as the only
 * coordination between them.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { StoreConfig } from "../config.js";
import { RegistryError, SchemaMigrationError, StoreBusyError, errorMessage } from "../errors.js";
import { getLogger } from "../util/logger.js";
import { TARGET_SCHEMA, createTableSql, type TableSpec } from "./schema.js";

const log = getLogger("schema-store");

export type Connection = Database.Database;

export interface MigrationReport {
  createdTables: string[];
  addedColumns: string[];
}

export class SchemaStore {
  private readonly path: string;
  private readonly busyTimeoutMs: number;

  constructor(
    config: StoreConfig,
    private readonly schema: readonly TableSpec[] = TARGET_SCHEMA,
  ) {
    this.path = config.path;
    this.busyTimeoutMs = config.busyTimeoutMs;
  }

  getPath(): string {
    return this.path;
  }

  /**
   * Create the database file and its directory if needed, then bring the
   * schema up to date. Hooks in `seed` run in their own write transaction
   * after migration.
   *
   * @throws SchemaMigrationError when the schema cannot be brought current
   */
  open(seed: Array<(db: Connection) => void> = []): MigrationReport {
    mkdirSync(dirname(this.path), { recursive: true });

    let db: Connection;
    try {
      db = new Database(this.path, { timeout: this.busyTimeoutMs });
    } catch (e) {
      throw translateError(e);
    }
    try {
      db.pragma("journal_mode = WAL");
    } catch (e) {
      throw translateError(e);
    } finally {
      db.close();
    }

    const report = this.migrate();
    for (const hook of seed) {
      this.write(hook);
    }
    log.info({ path: this.path, ...report }, "store opened");
    return report;
  }

  /**
   * Add every table and column of the target schema missing from the live
   * database, all inside one transaction. Re-running on a current schema
   * changes nothing.
   */
  migrate(): MigrationReport {
    try {
      return this.write((db) => {
        const report: MigrationReport = { createdTables: [], addedColumns: [] };

        for (const table of this.schema) {
          const live = liveColumns(db, table.name);

          if (live.size === 0) {
            db.exec(createTableSql(table));
            report.createdTables.push(table.name);
          } else {
            for (const column of table.columns) {
              if (live.has(column.name)) continue;
              if (column.key) {
                throw new SchemaMigrationError(
                  `Table '${table.name}' lacks key column '${column.name}', which cannot be added in place`,
                );
              }
              db.exec(`ALTER TABLE ${table.name} ADD COLUMN ${column.name} ${column.definition}`);
              report.addedColumns.push(`${table.name}.${column.name}`);
            }
          }

          for (const statement of table.indexes ?? []) {
            db.exec(statement);
          }
        }

        return report;
      });
    } catch (e) {
      if (e instanceof SchemaMigrationError || e instanceof StoreBusyError) throw e;
      log.error({ err: e, path: this.path }, "schema migration failed");
      throw new SchemaMigrationError(`Schema migration failed for ${this.path}: ${errorMessage(e)}`, e);
    }
  }

  /** Run a read-only operation in a deferred transaction on a fresh connection. */
  read<T>(operation: (db: Connection) => T): T {
    return this.withConnection((db) => db.transaction(() => operation(db)).deferred());
  }

  /** Run a mutation in an immediate (write-locked) transaction on a fresh connection. */
  write<T>(operation: (db: Connection) => T): T {
    return this.withConnection((db) => db.transaction(() => operation(db)).immediate());
  }

  private withConnection<T>(operation: (db: Connection) => T): T {
    let db: Connection | undefined;
    try {
      db = new Database(this.path, { timeout: this.busyTimeoutMs, fileMustExist: true });
      db.pragma("foreign_keys = ON");
      return operation(db);
    } catch (e) {
      throw translateError(e);
    } finally {
      db?.close();
    }
  }
}

function liveColumns(db: Connection, table: string): Set<string> {
  const rows = db
    .prepare<[string], { name: string }>("SELECT name FROM pragma_table_info(?)")
    .all(table);
  return new Set(rows.map((r) => r.name));
}

function sqliteCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/** True for SQLite unique-constraint failures that name the given column. */
export function isUniqueViolation(err: unknown, column: string): boolean {
  const code = sqliteCode(err);
  return (
    (code === "SQLITE_CONSTRAINT_UNIQUE" || code === "SQLITE_CONSTRAINT_PRIMARYKEY") &&
    err instanceof Error &&
    err.message.includes(column)
  );
}

function translateError(err: unknown): unknown {
  if (err instanceof RegistryError) return err;
  const code = sqliteCode(err);
  if (code?.startsWith("SQLITE_BUSY") || code?.startsWith("SQLITE_LOCKED")) {
    return new StoreBusyError(`Database is busy: ${errorMessage(err)}`, err);
  }
  return err;
}
