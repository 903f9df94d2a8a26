import type { Tag } from "./types.js";

export const DEFAULT_TAG_ICON = "🏷️";

export const STARTER_TAGS: readonly Tag[] = [
  { name: "python", color: "#3776ab", icon: "🐍" },
  { name: "javascript", color: "#f7df1e", icon: "⚡" },
  { name: "typescript", color: "#3178c6", icon: "📘" },
  { name: "web", color: "#e34c26", icon: "🌐" },
  { name: "api", color: "#009688", icon: "🔌" },
  { name: "frontend", color: "#61dafb", icon: "🎨" },
  { name: "backend", color: "#43853d", icon: "⚙️" },
  { name: "mobile", color: "#3ddc84", icon: "📱" },
  { name: "cli", color: "#4d4d4d", icon: "⌨️" },
  { name: "library", color: "#563d7c", icon: "📚" },
];

/** Colors handed out to auto-created tags, picked by hash of the tag name. */
export const TAG_PALETTE: readonly string[] = [
  "#3b82f6", "#10b981", "#f59e0b", "#ef4444",
  "#8b5cf6", "#ec4899", "#14b8a6", "#f97316",
  "#6366f1", "#84cc16", "#06b6d4", "#a855f7",
];
