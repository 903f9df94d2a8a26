import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

vi.mock("../util/logger.js", () => ({
  getLogger: () => ({
    info: () => {},
    warn: () => {},
    error: () => {},
    debug: () => {},
  }),
}));

import { SchemaStore } from "../store/database.js";
import { InvalidTagError } from "../errors.js";
import { TagRegistry, defaultTagColor, ensureTags, seedStarterTags } from "./registry.js";
import { DEFAULT_TAG_ICON, STARTER_TAGS, TAG_PALETTE } from "./starter-tags.js";

describe("TagRegistry", () => {
  let dir: string;
  let store: SchemaStore;
  let tags: TagRegistry;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "projreg-tags-"));
    store = new SchemaStore({ path: join(dir, "registry.db"), busyTimeoutMs: 100 });
    store.open();
    tags = new TagRegistry(store);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  // ---- default colors ----

  it("defaultTagColor is deterministic and drawn from the palette", () => {
    const color = defaultTagColor("rust");
    expect(TAG_PALETTE).toContain(color);
    expect(defaultTagColor("rust")).toBe(color);
    // normalization happens before hashing
    expect(defaultTagColor("  RUST! ")).toBe(color);
  });

  // ---- upsert ----

  it("creates a tag with default color and icon", () => {
    const tag = tags.upsert({ name: "Data Science" });
    expect(tag).toEqual({ name: "datascience", color: defaultTagColor("datascience"), icon: DEFAULT_TAG_ICON });
    expect(tags.get("datascience")).toEqual(tag);
  });

  it("updates only the supplied properties of an existing tag", () => {
    tags.upsert({ name: "rust", color: "#ff0000", icon: "🦀" });
    const updated = tags.upsert({ name: "Rust", icon: "⚙️" });
    expect(updated).toEqual({ name: "rust", color: "#ff0000", icon: "⚙️" });
    expect(tags.list().filter((t) => t.name === "rust")).toHaveLength(1);
  });

  it("rejects a name that normalizes to nothing", () => {
    expect(() => tags.upsert({ name: "::" })).toThrow(InvalidTagError);
  });

  it("get normalizes the lookup name", () => {
    tags.upsert({ name: "golang" });
    expect(tags.get("GoLang")?.name).toBe("golang");
    expect(tags.get("missing")).toBeUndefined();
  });

  // ---- auto-creation and seeding ----

  it("ensureTags creates only the missing entries", () => {
    tags.upsert({ name: "rust", color: "#ff0000" });
    const created = store.write((db) => ensureTags(db, ["rust", "wasm", "wasm"]));
    expect(created).toBe(1);
    expect(tags.get("rust")?.color).toBe("#ff0000");
    expect(tags.get("wasm")).toEqual({ name: "wasm", color: defaultTagColor("wasm"), icon: DEFAULT_TAG_ICON });
  });

  it("seedStarterTags is repeatable and keeps user edits", () => {
    store.write(seedStarterTags);
    tags.upsert({ name: "python", color: "#000000" });
    store.write(seedStarterTags);

    const list = tags.list();
    expect(list).toHaveLength(STARTER_TAGS.length);
    expect(tags.get("python")?.color).toBe("#000000");
    expect(list.map((t) => t.name)).toEqual([...STARTER_TAGS.map((t) => t.name)].sort());
  });
});
