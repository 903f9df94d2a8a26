/**
 * Reduce a tag to its canonical single-token form: lower-cased, with every
 * character that is not a lowercase letter or digit removed. "Machine
 * Learning" becomes "machinelearning" and "lang:go" becomes "langgo"; there
 * is no multi-word or namespaced tag. An empty result means the input has
 * no usable tag in it.
 */
export function normalizeTag(name: string): string {
  return name.toLowerCase().replace(/[^\p{Ll}\p{Lm}\p{Lo}\p{N}]/gu, "");
}

/** Normalize, drop empties and de-duplicate, keeping first-seen order. */
export function normalizeTags(names: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const name of names) {
    const tag = normalizeTag(name);
    if (tag) seen.add(tag);
  }
  return [...seen];
}

/** Union by normalized name; tags from `base` keep their position. */
export function mergeTags(base: Iterable<string>, extra: Iterable<string>): string[] {
  return normalizeTags([...base, ...extra]);
}
