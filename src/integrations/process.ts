import { spawn } from "node:child_process";
import { statSync, type Stats } from "node:fs";
import { delimiter, join } from "node:path";
import { getLogger } from "../util/logger.js";

const log = getLogger("launcher");

/** Look a command up on PATH the way a shell would. */
export function commandExists(
  command: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): boolean {
  const dirs = (env.PATH ?? "").split(delimiter).filter(Boolean);
  const suffixes = platform === "win32" ? ["", ...(env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";")] : [""];

  for (const dir of dirs) {
    for (const suffix of suffixes) {
      const stats = statCandidate(join(dir, command + suffix));
      if (!stats?.isFile()) continue;
      // any execute bit; Windows has none and goes by extension
      if (platform === "win32" || (stats.mode & 0o111) !== 0) return true;
    }
  }
  return false;
}

function statCandidate(path: string): Stats | undefined {
  try {
    return statSync(path, { throwIfNoEntry: false });
  } catch (e) {
    log.debug({ err: e, path }, "cannot inspect PATH entry");
    return undefined;
  }
}

/**
 * Start a program detached from this process with its output discarded.
 * Resolves false when it could not be started at all.
 */
export function launchDetached(command: string, args: string[], cwd?: string): Promise<boolean> {
  return new Promise((resolve) => {
    const child = spawn(command, args, { cwd, detached: true, stdio: "ignore" });
    child.once("error", (err) => {
      log.warn({ err, command }, "launch failed");
      resolve(false);
    });
    child.once("spawn", () => {
      child.unref();
      log.info({ command, args }, "launched");
      resolve(true);
    });
  });
}
