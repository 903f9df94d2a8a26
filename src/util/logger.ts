import pino from "pino";

// stdout belongs to CLI output; logs go to stderr
const logger: pino.Logger = pino(
  { level: process.env.PROJREG_LOG_LEVEL ?? "warn" },
  pino.destination(2),
);

const children = new Map<string, pino.Logger>();

/** Set the level on the root logger and every component logger handed out so far. */
export function initLogger(level: string): void {
  logger.level = level;
  for (const child of children.values()) {
    child.level = level;
  }
}

export function getLogger(name?: string): pino.Logger {
  if (!name) return logger;
  let child = children.get(name);
  if (!child) {
    child = logger.child({ component: name });
    children.set(name, child);
  }
  return child;
}

export default logger;
