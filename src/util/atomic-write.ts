import { writeFileSync, renameSync, unlinkSync, existsSync } from "node:fs";
import { dirname, basename, join } from "node:path";
import { randomBytes } from "node:crypto";
import { getLogger } from "./logger.js";

const log = getLogger("atomic-write");

/**
 * Write a file so readers only ever see the old or the new contents: the data
 * goes to a temp file in the destination directory, which is then renamed
 * over the target. The destination directory must already exist.
 */
export function writeFileAtomic(target: string, contents: string): void {
  const temp = join(
    dirname(target),
    `.${basename(target)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`,
  );
  try {
    writeFileSync(temp, contents, "utf-8");
    renameSync(temp, target);
  } catch (e) {
    if (existsSync(temp)) {
      try {
        unlinkSync(temp);
      } catch (cleanupErr) {
        log.warn({ err: cleanupErr, temp }, "failed to remove temp file");
      }
    }
    throw e;
  }
}
