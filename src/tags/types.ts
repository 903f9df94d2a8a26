/** Catalog entry for a tag. `name` is always normalized. */
export interface Tag {
  name: string;
  color: string;
  icon: string;
}

export interface UpsertTagInput {
  name: string;
  color?: string;
  icon?: string;
}
