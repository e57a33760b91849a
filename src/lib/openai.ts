import OpenAI from "openai";
import type { ResponseCreateParamsNonStreaming } from "openai/resources/responses/responses";

import { getEnv } from "@/lib/env";
import { logger } from "@/lib/logger";
import type { Enricher, RawRecord } from "@/types/pricelist";
import {
  DEFAULT_MODEL,
  EnrichmentResponseSchema,
  MAX_RETRIES,
  OpenAIEnrichmentError,
  RETRY_DELAY_MS,
  type EnrichedItem,
} from "@/types/openai";

let openaiClient: OpenAI | null = null;

export function getOpenAIClient(): OpenAI {
  if (!openaiClient) {
    const { OPENAI_API_KEY } = getEnv();
    if (!OPENAI_API_KEY) {
      throw new OpenAIEnrichmentError("OpenAI API key not configured", "MISSING_API_KEY");
    }
    openaiClient = new OpenAI({ apiKey: OPENAI_API_KEY });
  }
  return openaiClient;
}

// Strict JSON Schema mirrored by EnrichmentResponseSchema
const schema = {
  type: "object",
  additionalProperties: false,
  properties: {
    items: {
      type: "array",
      items: {
        type: "object",
        additionalProperties: false,
        properties: {
          index: { type: "integer", minimum: 0 },
          description: { type: "string" },
          unit: { type: "string" },
          subcategory: { type: ["string", "null"] },
          keywords: { type: "array", items: { type: "string" } },
        },
        required: ["index", "description", "unit", "subcategory", "keywords"],
      },
    },
  },
  required: ["items"],
};

/** Sends a request and resolves with the model's text output. */
export type ResponseFetcher = (request: ResponseCreateParamsNonStreaming) => Promise<string>;

export interface OpenAIEnricherOptions {
  model?: string;
  fetchResponse?: ResponseFetcher;
  maxRetries?: number;
  retryDelayMs?: number;
}

export function buildEnrichmentRequest(
  records: readonly RawRecord[],
  sheetName: string,
  model: string
): ResponseCreateParamsNonStreaming {
  const payload = records.map((record, index) => ({
    index,
    description: record.description,
    unit: record.unit,
    category: record.category,
    subcategory: record.subcategory,
    keywords: record.keywords,
  }));

  return {
    model,
    input: [
      {
        role: "user",
        content: [
          {
            type: "input_text",
            text: `You are a quantity surveyor tidying a construction pricing schedule.

The records below come from the "${sheetName}" worksheet. For EACH record:
1. Rewrite the description as clear, complete prose. Expand abbreviations; keep every dimension, grade and depth.
2. Give the unit in canonical form: m, m², m³, nr, tonnes, sum, hour, or item when none applies.
3. Give the work subcategory, or null when none is evident.
4. Give up to 6 short lowercase search keywords.

Return exactly one item per record with the same index. Do not merge, split, drop or reorder records.

Return ONLY JSON matching the exact schema provided.

${JSON.stringify(payload)}`,
          },
        ],
      },
    ],
    text: {
      format: {
        type: "json_schema",
        name: "PricelistEnrichment",
        strict: true,
        schema,
      },
    },
  };
}

async function fetchWithClient(request: ResponseCreateParamsNonStreaming): Promise<string> {
  const response = await getOpenAIClient().responses.create(request);
  return response.output_text;
}

export function extractJsonFromMarkdown(text: string): string {
  if (!text) return text;

  const fenceStart = text.indexOf("```");
  if (fenceStart !== -1) {
    const afterFence = text.slice(fenceStart + 3);
    const firstNewline = afterFence.indexOf("\n");
    const withoutLang = firstNewline !== -1 ? afterFence.slice(firstNewline + 1) : afterFence;
    const fenceEnd = withoutLang.indexOf("```");
    if (fenceEnd !== -1) {
      return withoutLang.slice(0, fenceEnd).trim();
    }
  }

  const firstBrace = text.indexOf("{");
  const lastBrace = text.lastIndexOf("}");
  if (firstBrace !== -1 && lastBrace !== -1 && lastBrace > firstBrace) {
    return text.slice(firstBrace, lastBrace + 1);
  }

  return text.trim();
}

/**
 * Parses and validates the model output for a batch of `expected` records,
 * returning the items ordered by index.
 */
export function parseEnrichmentResponse(out: string, expected: number): EnrichedItem[] {
  if (!out.trim()) {
    throw new OpenAIEnrichmentError("No output returned from OpenAI", "NO_OUTPUT");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJsonFromMarkdown(out));
  } catch (error) {
    throw new OpenAIEnrichmentError("Failed to parse JSON from OpenAI response", "INVALID_JSON", {
      rawTextPreview: out.slice(0, 500),
      error: error instanceof Error ? error.message : String(error),
    });
  }

  const result = EnrichmentResponseSchema.safeParse(parsed);
  if (!result.success) {
    throw new OpenAIEnrichmentError("OpenAI response schema validation failed", "INVALID_RESPONSE_SCHEMA", {
      issues: result.error.issues,
    });
  }

  const items = [...result.data.items].sort((a, b) => a.index - b.index);
  const indexesMatch = items.every((item, position) => item.index === position);
  if (items.length !== expected || !indexesMatch) {
    throw new OpenAIEnrichmentError("OpenAI returned a different set of records", "ITEM_COUNT_MISMATCH", {
      expected,
      received: items.length,
    });
  }

  return items;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Enrichment hook backed by the OpenAI Responses API. Each call is retried up
 * to `maxRetries` times before failing with MAX_RETRIES_EXCEEDED.
 */
export function createOpenAIEnricher(options: OpenAIEnricherOptions = {}): Enricher {
  const model = options.model ?? getEnv().OPENAI_MODEL ?? DEFAULT_MODEL;
  const fetchResponse = options.fetchResponse ?? fetchWithClient;
  const maxRetries = Math.max(1, options.maxRetries ?? MAX_RETRIES);
  const retryDelayMs = options.retryDelayMs ?? RETRY_DELAY_MS;

  return async (records, sheetName) => {
    if (records.length === 0) {
      return [];
    }

    const request = buildEnrichmentRequest(records, sheetName, model);
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        const startTime = Date.now();
        const out = await fetchResponse(request);
        const items = parseEnrichmentResponse(out, records.length);

        logger.info("OpenAI enrichment successful", {
          sheetName,
          model,
          records: records.length,
          durationMs: Date.now() - startTime,
        });

        return records.map((record, index) => {
          const item = items[index];
          return item
            ? {
                ...record,
                description: item.description,
                unit: item.unit,
                subcategory: item.subcategory,
                keywords: item.keywords,
              }
            : record;
        });
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        logger.warn(`OpenAI attempt ${attempt} failed`, {
          sheetName,
          error: lastError.message,
          attempt,
          willRetry: attempt < maxRetries,
        });

        if (attempt < maxRetries) {
          await sleep(retryDelayMs * attempt);
        }
      }
    }

    throw new OpenAIEnrichmentError(
      `Failed after ${maxRetries} attempts: ${lastError?.message}`,
      "MAX_RETRIES_EXCEEDED",
      { sheetName }
    );
  };
}
