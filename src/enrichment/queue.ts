/**
 * EnrichmentQueue -- runs enrichment off the caller's flow.
 *
 * Interactive front ends hand projects to the queue and keep serving input;
 * results come back through the delivery callback. Jobs run one at a time
 * and a project already waiting in the queue is not queued twice.
 */

import PQueue from "p-queue";
import { getLogger } from "../util/logger.js";
import type { EnrichmentResult } from "./pipeline.js";

const log = getLogger("enrichment-queue");

export interface EnrichmentJob {
  uuid: string;
  directory: string;
}

export type EnrichmentWorker = (job: EnrichmentJob) => Promise<EnrichmentResult>;
export type EnrichmentDelivery = (job: EnrichmentJob, result: EnrichmentResult) => void | Promise<void>;

export class EnrichmentQueue {
  private queue = new PQueue({ concurrency: 1 });
  private queued = new Set<string>();

  constructor(
    private worker: EnrichmentWorker,
    private deliver: EnrichmentDelivery,
  ) {}

  /** Queue a project. Returns false when it is already waiting. */
  enqueue(job: EnrichmentJob): boolean {
    if (this.queued.has(job.uuid)) return false;
    this.queued.add(job.uuid);

    this.queue
      .add(async () => {
        this.queued.delete(job.uuid);
        const result = await this.worker(job);
        await this.deliver(job, result);
      })
      .catch((e: unknown) => {
        log.error({ err: e, uuid: job.uuid }, "background enrichment job failed");
      });

    log.debug({ uuid: job.uuid, waiting: this.queue.size }, "enrichment queued");
    return true;
  }

  /** Jobs waiting to start. */
  get waiting(): number {
    return this.queue.size;
  }

  /** Resolves once every queued job has finished. */
  onIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  /** Drop jobs that have not started yet. */
  clear(): void {
    this.queue.clear();
    this.queued.clear();
  }
}
