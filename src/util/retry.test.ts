import { describe, it, expect, vi } from "vitest";

vi.mock("./logger.js", () => ({
  getLogger: () => ({
    info: () => {},
    warn: () => {},
    error: () => {},
    debug: () => {},
  }),
}));

import { withBusyRetry } from "./retry.js";
import { StoreBusyError, ProjectNotFoundError } from "../errors.js";

describe("withBusyRetry", () => {
  it("returns the first successful result", async () => {
    const op = vi.fn(() => 42);
    await expect(withBusyRetry(op, [0, 0, 0])).resolves.toBe(42);
    expect(op).toHaveBeenCalledTimes(1);
  });

  it("retries busy errors until the operation succeeds", async () => {
    let calls = 0;
    const op = vi.fn(() => {
      calls++;
      if (calls < 3) throw new StoreBusyError("busy");
      return "done";
    });
    await expect(withBusyRetry(op, [0, 0, 0])).resolves.toBe("done");
    expect(op).toHaveBeenCalledTimes(3);
  });

  it("gives up after the backoff schedule with the last busy error", async () => {
    const op = vi.fn(() => {
      throw new StoreBusyError("still busy");
    });
    await expect(withBusyRetry(op, [0, 0, 0])).rejects.toThrow("still busy");
    // one attempt plus three retries
    expect(op).toHaveBeenCalledTimes(4);
  });

  it("does not retry other errors", async () => {
    const op = vi.fn(() => {
      throw new ProjectNotFoundError("abc");
    });
    await expect(withBusyRetry(op, [0, 0, 0])).rejects.toBeInstanceOf(ProjectNotFoundError);
    expect(op).toHaveBeenCalledTimes(1);
  });

  it("waits 50, 150 and 450 ms by default", async () => {
    vi.useFakeTimers();
    try {
      const op = vi.fn(() => {
        throw new StoreBusyError("busy");
      });
      const settled = withBusyRetry(op).catch((e: unknown) => e);

      await vi.advanceTimersByTimeAsync(49);
      expect(op).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(op).toHaveBeenCalledTimes(2);
      await vi.advanceTimersByTimeAsync(150);
      expect(op).toHaveBeenCalledTimes(3);
      await vi.advanceTimersByTimeAsync(450);
      expect(op).toHaveBeenCalledTimes(4);

      expect(await settled).toBeInstanceOf(StoreBusyError);
    } finally {
      vi.useRealTimers();
    }
  });
});
