/**
 * TagRegistry -- catalog of known tags with their display color and icon.
 *
 * Tags are never deleted. Any tag a project references gets a catalog entry
 * on the same write, colored by a hash of its name.
 */

import { createHash } from "node:crypto";
import type { Connection, SchemaStore } from "../store/database.js";
import { InvalidTagError } from "../errors.js";
import { getLogger } from "../util/logger.js";
import { normalizeTag } from "./normalize.js";
import { DEFAULT_TAG_ICON, STARTER_TAGS, TAG_PALETTE } from "./starter-tags.js";
import type { Tag, UpsertTagInput } from "./types.js";

const log = getLogger("tag-registry");

/** Same normalized name, same color, on every machine. */
export function defaultTagColor(name: string): string {
  const digest = createHash("sha256").update(normalizeTag(name)).digest();
  return TAG_PALETTE[digest.readUInt32BE(0) % TAG_PALETTE.length];
}

/** Insert catalog entries for any of the given (normalized) tags that lack one. */
export function ensureTags(db: Connection, names: readonly string[]): number {
  const insert = db.prepare<[string, string, string]>(
    "INSERT OR IGNORE INTO tags (name, color, icon) VALUES (?, ?, ?)",
  );
  let created = 0;
  for (const name of names) {
    const r = insert.run(name, defaultTagColor(name), DEFAULT_TAG_ICON);
    if (r.changes > 0) created++;
  }
  if (created > 0) log.info({ created }, "auto-created tags");
  return created;
}

export function seedStarterTags(db: Connection): void {
  const insert = db.prepare<[string, string, string]>(
    "INSERT OR IGNORE INTO tags (name, color, icon) VALUES (?, ?, ?)",
  );
  for (const tag of STARTER_TAGS) {
    insert.run(tag.name, tag.color, tag.icon);
  }
}

export class TagRegistry {
  constructor(private store: SchemaStore) {}

  list(): Tag[] {
    return this.store.read((db) =>
      db
        .prepare<[], Tag>("SELECT name, color, icon FROM tags ORDER BY name ASC")
        .all(),
    );
  }

  get(name: string): Tag | undefined {
    const normalized = normalizeTag(name);
    return this.store.read((db) => getTag(db, normalized));
  }

  /**
   * Create a catalog entry, or update the color and/or icon of an existing
   * one. Omitted properties keep their current value (or the default on
   * creation).
   *
   * @throws InvalidTagError when the name normalizes to nothing
   */
  upsert(input: UpsertTagInput): Tag {
    const name = normalizeTag(input.name);
    if (!name) throw new InvalidTagError(input.name);

    return this.store.write((db) => {
      const existing = getTag(db, name);
      if (!existing) {
        const tag: Tag = {
          name,
          color: input.color ?? defaultTagColor(name),
          icon: input.icon ?? DEFAULT_TAG_ICON,
        };
        db.prepare<[string, string, string]>("INSERT INTO tags (name, color, icon) VALUES (?, ?, ?)").run(
          tag.name,
          tag.color,
          tag.icon,
        );
        log.info({ name }, "tag created");
        return tag;
      }

      const tag: Tag = {
        name,
        color: input.color ?? existing.color,
        icon: input.icon ?? existing.icon,
      };
      db.prepare<[string, string, string]>("UPDATE tags SET color = ?, icon = ? WHERE name = ?").run(
        tag.color,
        tag.icon,
        name,
      );
      log.info({ name }, "tag updated");
      return tag;
    });
  }
}

function getTag(db: Connection, name: string): Tag | undefined {
  return db
    .prepare<[string], Tag>("SELECT name, color, icon FROM tags WHERE name = ?")
    .get(name);
}
