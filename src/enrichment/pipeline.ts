/**
 * EnrichmentPipeline -- best-effort name, description and tags for a project.
 *
 * run() never throws. Every failure, from a missing credential to an
 * unreadable reply, comes back as a `none` result the caller can ignore.
 */

import type { EnrichmentConfig } from "../config.js";
import { EnrichmentError, errorMessage } from "../errors.js";
import { mergeTags, normalizeTags } from "../tags/normalize.js";
import { getLogger } from "../util/logger.js";
import { EnrichmentClient } from "./client.js";
import { buildExcerptPayload, sampleFiles } from "./sampler.js";

const log = getLogger("enrichment");

/** At most this many derived tags are kept. */
export const MAX_DERIVED_TAGS = 3;

/** Fewer surviving tags than this marks the result low-confidence. */
export const MIN_CONFIDENT_TAGS = 2;

export type NoEnrichmentReason = "disabled" | "skipped" | "missing-credential" | "no-files" | "failed";

export type EnrichmentResult =
  | {
      kind: "enriched";
      name?: string;
      description?: string;
      /** Normalized, de-duplicated, at most MAX_DERIVED_TAGS */
      tags: string[];
      lowConfidence: boolean;
      /** Files the suggestion was derived from */
      sampled: string[];
    }
  | {
      kind: "none";
      reason: NoEnrichmentReason;
      error?: EnrichmentError;
    };

export interface SuggestionSource {
  suggest(excerpts: string): Promise<{ tags: string[]; name?: string; description?: string }>;
}

export class EnrichmentPipeline {
  private client: SuggestionSource;

  constructor(
    private config: EnrichmentConfig,
    client?: SuggestionSource,
  ) {
    this.client = client ?? new EnrichmentClient(config);
  }

  async run(directory: string): Promise<EnrichmentResult> {
    if (!this.config.enabled) return { kind: "none", reason: "disabled" };
    if (!this.config.apiKey) {
      log.info({ directory }, "no API key, skipping enrichment");
      return { kind: "none", reason: "missing-credential" };
    }

    try {
      const samples = await sampleFiles(directory, this.config);
      if (samples.length === 0) {
        log.info({ directory }, "no files eligible for sampling");
        return { kind: "none", reason: "no-files" };
      }

      const suggestion = await this.client.suggest(buildExcerptPayload(samples, this.config.maxPayloadChars));
      const tags = normalizeTags(suggestion.tags).slice(0, MAX_DERIVED_TAGS);
      const result: EnrichmentResult = {
        kind: "enriched",
        name: suggestion.name,
        description: suggestion.description,
        tags,
        lowConfidence: tags.length < MIN_CONFIDENT_TAGS,
        sampled: samples.map((s) => s.path),
      };
      log.info({ directory, tags, lowConfidence: result.lowConfidence }, "enrichment complete");
      return result;
    } catch (e) {
      const error = e instanceof EnrichmentError ? e : new EnrichmentError(errorMessage(e), e);
      log.warn({ err: error, directory }, "enrichment failed, continuing without it");
      return { kind: "none", reason: "failed", error };
    }
  }
}

/**
 * Combine the tags a user supplied with derived ones. User tags always
 * survive. A confident result tops them up to MAX_DERIVED_TAGS; a
 * low-confidence one is only ever added alongside them.
 */
export function mergeEnrichedTags(userTags: readonly string[], result: EnrichmentResult): string[] {
  const base = normalizeTags(userTags);
  if (result.kind !== "enriched") return base;

  const merged = mergeTags(base, result.tags);
  if (result.lowConfidence) return merged;
  return merged.slice(0, Math.max(MAX_DERIVED_TAGS, base.length));
}
