import { describe, it, expect, vi } from "vitest";

vi.mock("../util/logger.js", () => ({
  getLogger: () => ({
    info: () => {},
    warn: () => {},
    error: () => {},
    debug: () => {},
  }),
}));

import { EnrichmentQueue, type EnrichmentJob } from "./queue.js";
import type { EnrichmentResult } from "./pipeline.js";

const NONE: EnrichmentResult = { kind: "none", reason: "no-files" };

describe("EnrichmentQueue", () => {
  it("runs jobs one at a time and delivers every result in order", async () => {
    let running = 0;
    let maxRunning = 0;
    const worker = vi.fn(async (_job: EnrichmentJob) => {
      running++;
      maxRunning = Math.max(maxRunning, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
      return NONE;
    });
    const delivered: string[] = [];
    const queue = new EnrichmentQueue(worker, (job) => {
      delivered.push(job.uuid);
    });

    queue.enqueue({ uuid: "a", directory: "/work/a" });
    queue.enqueue({ uuid: "b", directory: "/work/b" });
    queue.enqueue({ uuid: "c", directory: "/work/c" });
    await queue.onIdle();

    expect(delivered).toEqual(["a", "b", "c"]);
    expect(maxRunning).toBe(1);
    expect(worker).toHaveBeenCalledTimes(3);
  });

  it("does not queue a project that is already waiting", async () => {
    const worker = vi.fn(async (_job: EnrichmentJob) => NONE);
    const queue = new EnrichmentQueue(worker, () => {});

    expect(queue.enqueue({ uuid: "a", directory: "/work/a" })).toBe(true);
    expect(queue.enqueue({ uuid: "b", directory: "/work/b" })).toBe(true);
    expect(queue.enqueue({ uuid: "b", directory: "/work/b" })).toBe(false);
    await queue.onIdle();

    expect(worker).toHaveBeenCalledTimes(2);
  });

  it("keeps going after a failing delivery", async () => {
    const delivered: string[] = [];
    const queue = new EnrichmentQueue(
      async () => NONE,
      (job) => {
        if (job.uuid === "a") throw new Error("listener failed");
        delivered.push(job.uuid);
      },
    );

    queue.enqueue({ uuid: "a", directory: "/work/a" });
    queue.enqueue({ uuid: "b", directory: "/work/b" });
    await queue.onIdle();

    expect(delivered).toEqual(["b"]);
  });
});
