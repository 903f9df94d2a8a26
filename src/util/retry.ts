import { StoreBusyError } from "../errors.js";
import { getLogger } from "./logger.js";

const log = getLogger("retry");

/** Delays before each retry of a busy store operation: 50ms, 150ms, 450ms. */
export const BUSY_BACKOFF_MS = [50, 150, 450] as const;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Run a store operation, retrying on StoreBusyError with exponential backoff.
 * Any other error propagates immediately; the last busy error propagates once
 * the backoff schedule is exhausted.
 */
export async function withBusyRetry<T>(
  operation: () => T | Promise<T>,
  backoffMs: readonly number[] = BUSY_BACKOFF_MS,
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (e) {
      if (!(e instanceof StoreBusyError) || attempt >= backoffMs.length) throw e;
      const delay = backoffMs[attempt];
      log.warn({ attempt: attempt + 1, delayMs: delay }, "store busy, retrying");
      await sleep(delay);
    }
  }
}
