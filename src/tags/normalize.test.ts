import { describe, it, expect } from "vitest";
import { normalizeTag, normalizeTags, mergeTags } from "./normalize.js";

describe("normalizeTag", () => {
  it("lower-cases and strips punctuation and whitespace", () => {
    expect(normalizeTag("Machine Learning")).toBe("machinelearning");
    expect(normalizeTag("lang:go")).toBe("langgo");
    expect(normalizeTag("  C++ ")).toBe("c");
    expect(normalizeTag("Node.js")).toBe("nodejs");
    expect(normalizeTag("web-3")).toBe("web3");
  });

  it("keeps non-ASCII letters", () => {
    expect(normalizeTag("Café")).toBe("café");
    expect(normalizeTag("ÜBER")).toBe("über");
  });

  it("returns empty string when nothing usable remains", () => {
    expect(normalizeTag("")).toBe("");
    expect(normalizeTag(" -_:! ")).toBe("");
    expect(normalizeTag("🏷️")).toBe("");
  });

  it("is idempotent", () => {
    const inputs = ["Machine Learning", "lang:go", "ÜBER cool", "a_b-c.d", "Ünïcödé 42", "   ", "MiXeD123"];
    for (const input of inputs) {
      const once = normalizeTag(input);
      expect(normalizeTag(once)).toBe(once);
    }
  });

  it("never emits whitespace, punctuation or uppercase", () => {
    const inputs = ["Hello, World!", "tab\there", "new\nline", "A.B/C\\D", "snake_case", "ÀÉÎ"];
    for (const input of inputs) {
      const out = normalizeTag(input);
      expect(out).not.toMatch(/\s/);
      expect(out).not.toMatch(/\p{P}/u);
      expect(out).toBe(out.toLowerCase());
    }
  });
});

describe("normalizeTags", () => {
  it("drops empties and duplicates, keeping first-seen order", () => {
    expect(normalizeTags(["Web", "API", "web", "---", "Api", "cli"])).toEqual(["web", "api", "cli"]);
  });
});

describe("mergeTags", () => {
  it("unions by normalized name with base tags first", () => {
    expect(mergeTags(["python", "cli"], ["CLI", "Data Science"])).toEqual(["python", "cli", "datascience"]);
  });
});
