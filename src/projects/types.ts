export type ProjectStatus = "active" | "archived";

/** A registered project directory, keyed by the UUID from its sentinel file. */
export interface Project {
  uuid: string;
  name: string;
  rootPath: string;
  tags: string[];
  aiAppName: string | null;
  aiAppDescription: string | null;
  description: string | null;
  notes: string | null;
  favorite: boolean;
  lastOpened: string | null;
  openCount: number;
  dateAdded: string | null;
  lastUpdated: string | null;
  enabled: boolean;
  status: ProjectStatus;
  colorTheme: string;
}

/** Row shape as stored in SQLite. */
export interface ProjectRow {
  uuid: string;
  name: string;
  root_path: string;
  tags: string | null; // JSON array
  ai_app_name: string | null;
  ai_app_description: string | null;
  description: string | null;
  notes: string | null;
  favorite: number;
  last_opened: string | null;
  open_count: number;
  date_added: string | null;
  last_updated: string | null;
  enabled: number;
  color_theme: string | null;
}

/** Fields a caller may supply on upsert or edit. Omitted fields are left alone. */
export interface ProjectFields {
  name?: string;
  rootPath?: string;
  tags?: string[];
  aiAppName?: string | null;
  aiAppDescription?: string | null;
  description?: string | null;
  notes?: string | null;
  favorite?: boolean;
  colorTheme?: string;
}

export type SortField = "name" | "lastOpened" | "openCount" | "dateAdded" | "lastUpdated";

export interface ProjectFilter {
  favoritesOnly?: boolean;
  /** Projects must carry these tags: all of them ("and", default) or any ("or") */
  tags?: string[];
  tagMode?: "and" | "or";
  /** Case-insensitive substring over name, root path and notes */
  text?: string;
  /** Defaults to true; pass false to include archived projects */
  enabledOnly?: boolean;
  sortBy?: SortField;
  sortOrder?: "asc" | "desc";
}

/** Metadata derived by the enrichment pipeline. */
export interface EnrichmentPatch {
  aiAppName?: string;
  aiAppDescription?: string;
  description?: string;
  tags: string[];
}

export interface TagCount {
  tag: string;
  count: number;
}

export interface ProjectStats {
  totalProjects: number;
  favorites: number;
  archived: number;
  /** Ten most used tags among live projects */
  topTags: TagCount[];
  /** Five most opened live projects */
  mostOpened: Array<Pick<Project, "uuid" | "name" | "openCount">>;
}
