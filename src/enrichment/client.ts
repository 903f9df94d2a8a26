/**
 * Chat-completions client for project metadata suggestions.
 *
 * One request per call, bounded by the configured timeout. Transport errors,
 * HTTP failures and responses that do not hold the expected JSON object all
 * surface as EnrichmentError.
 */

import { z } from "zod";
import type { EnrichmentConfig } from "../config.js";
import { EnrichmentError, errorMessage } from "../errors.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("enrichment-client");

const SYSTEM_PROMPT =
  "You analyze code repositories and output concise metadata. " +
  "Tag rules: one-word lowercase alphanumeric only (no spaces, hyphens, or punctuation), " +
  "no colon subcategories, keep tags minimal. Include up to one high-level category tag if appropriate " +
  "from this minimal set: app, cli, web, api, library, script, tool, data, ml, devops.";

function userPrompt(excerpts: string): string {
  return (
    "Analyze these files and return ONLY a JSON object with:\n" +
    "1. tags: 2-3 tags (each one word, lowercase alphanumeric), minimal and specific. " +
    "Optionally include at most one category tag from: app, cli, web, api, library, script, tool, data, ml, devops.\n" +
    "2. app_name: A suitable application name.\n" +
    "3. app_description: One short sentence describing what it does.\n\n" +
    excerpts
  );
}

export interface Suggestion {
  /** As returned; not yet normalized */
  tags: string[];
  name?: string;
  description?: string;
}

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

const optionalText = z
  .string()
  .nullish()
  .transform((s) => (s && s.trim() ? s.trim() : undefined));

const suggestionSchema = z.object({
  tags: z
    .union([z.array(z.string()), z.string()])
    .optional()
    .transform((t) => (typeof t === "string" ? t.split(",") : t ?? [])),
  name: optionalText,
  app_name: optionalText,
  description: optionalText,
  app_description: optionalText,
});

/**
 * Parse the model's reply. A ```json fenced block is preferred; otherwise the
 * whole reply must be the JSON object.
 *
 * @throws EnrichmentError when no suggestion object can be read
 */
export function parseSuggestion(reply: string): Suggestion {
  const fenced = /```(?:json)?\s*([\s\S]*?)\s*```/i.exec(reply);
  const body = fenced ? fenced[1] : reply.trim();

  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (e) {
    throw new EnrichmentError(`Response is not JSON: ${errorMessage(e)}`, e);
  }

  const parsed = suggestionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new EnrichmentError(`Response has an unexpected shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }

  const data = parsed.data;
  return {
    tags: data.tags,
    name: data.app_name ?? data.name,
    description: data.app_description ?? data.description,
  };
}

export class EnrichmentClient {
  constructor(private config: EnrichmentConfig) {}

  async suggest(excerpts: string): Promise<Suggestion> {
    const apiKey = this.config.apiKey;
    if (!apiKey) throw new EnrichmentError("No API key configured");

    log.info({ model: this.config.model, chars: excerpts.length }, "requesting project metadata");

    let response: Response;
    try {
      response = await fetch(this.config.apiUrl, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: this.config.model,
          messages: [
            { role: "system", content: SYSTEM_PROMPT },
            { role: "user", content: userPrompt(excerpts) },
          ],
          temperature: this.config.temperature,
        }),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (e) {
      throw new EnrichmentError(`Request failed: ${errorMessage(e)}`, e);
    }

    if (!response.ok) {
      const errText = await response.text();
      throw new EnrichmentError(`API error ${response.status}: ${errText.slice(0, 500)}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (e) {
      throw new EnrichmentError(`API response is not JSON: ${errorMessage(e)}`, e);
    }

    const completion = completionSchema.safeParse(body);
    if (!completion.success) {
      throw new EnrichmentError("API response has no completion choices");
    }
    const content = completion.data.choices[0].message.content;
    if (!content) throw new EnrichmentError("API response has empty content");

    log.debug({ content }, "raw completion");
    return parseSuggestion(content);
  }
}
