/**
 * IdentityResolver -- maps a project directory to its durable UUID.
 *
 * The UUID lives in a sentinel file at the directory root. The file, not the
 * database, is the source of truth; store rows are keyed by whatever it holds.
 */

import { readFileSync } from "node:fs";
import { join } from "node:path";
import { randomUUID } from "node:crypto";
import { IdentityPersistError } from "../errors.js";
import { writeFileAtomic } from "../util/atomic-write.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("identity");

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isValidUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

export interface ResolvedIdentity {
  uuid: string;
  /** True when the UUID was generated by this call rather than read back */
  minted: boolean;
  /** False when the UUID exists only in memory for the current operation */
  persisted: boolean;
}

export class IdentityResolver {
  constructor(private sentinelName: string = ".projectid") {}

  sentinelPath(directory: string): string {
    return join(directory, this.sentinelName);
  }

  /** Read a valid UUID from the sentinel, or null if there is none. Never writes. */
  peek(directory: string): string | null {
    let raw: string;
    try {
      raw = readFileSync(this.sentinelPath(directory), "utf-8");
    } catch (e) {
      if (!isMissingFile(e)) log.warn({ err: e, directory }, "could not read sentinel file");
      return null;
    }
    const line = raw.split(/\r?\n/).find((l) => l.trim().length > 0)?.trim();
    if (!line || !isValidUuid(line)) {
      log.warn({ directory }, "sentinel file holds no valid UUID");
      return null;
    }
    return line;
  }

  /**
   * Return the directory's UUID, minting and persisting a new v4 UUID when
   * the sentinel is missing or invalid. Only the given directory is consulted.
   *
   * @throws IdentityPersistError when a new sentinel cannot be written; the
   * error carries the minted UUID.
   */
  resolve(directory: string): string {
    const existing = this.peek(directory);
    if (existing) return existing;

    const uuid = randomUUID();
    try {
      writeFileAtomic(this.sentinelPath(directory), uuid);
    } catch (e) {
      throw new IdentityPersistError(directory, uuid, e);
    }
    log.info({ directory, uuid }, "minted project identity");
    return uuid;
  }

  /**
   * Like resolve(), but degrades to an in-memory UUID instead of throwing.
   * With persist=false nothing is written even when the sentinel is absent.
   */
  resolveForOperation(directory: string, persist = true): ResolvedIdentity {
    const existing = this.peek(directory);
    if (existing) return { uuid: existing, minted: false, persisted: true };

    if (!persist) {
      return { uuid: randomUUID(), minted: true, persisted: false };
    }

    try {
      return { uuid: this.resolve(directory), minted: true, persisted: true };
    } catch (e) {
      if (!(e instanceof IdentityPersistError)) throw e;
      log.warn({ err: e, directory }, "continuing with an in-memory identity");
      return { uuid: e.uuid, minted: true, persisted: false };
    }
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
