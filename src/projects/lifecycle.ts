/**
 * Project lifecycle: active -> archived -> purged.
 *
 * "purged" is the absence of a row, so it never appears as a stored status.
 * The table is total over stored states; any action against a missing row
 * is a ProjectNotFoundError raised by the store.
 */

import type { ProjectStatus } from "./types.js";

export type LifecycleAction = "archive" | "restore" | "purge";
export type LifecycleState = ProjectStatus | "purged";

const TRANSITIONS: Record<ProjectStatus, Record<LifecycleAction, LifecycleState>> = {
  active: { archive: "archived", restore: "active", purge: "purged" },
  archived: { archive: "archived", restore: "active", purge: "purged" },
};

export function nextState(current: ProjectStatus, action: LifecycleAction): LifecycleState {
  return TRANSITIONS[current][action];
}

export function statusOf(enabled: boolean): ProjectStatus {
  return enabled ? "active" : "archived";
}
