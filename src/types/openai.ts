import { z } from "zod";

// Zod schema for a single enriched record returned by OpenAI
export const EnrichedItemSchema = z.object({
  index: z.number().int().nonnegative().describe("Position of the record in the submitted batch"),
  description: z.string().describe("Cleaned, fully expanded description"),
  unit: z.string().describe("Canonical unit of measurement (e.g., 'm²', 'nr', 'item')"),
  subcategory: z.string().nullable().describe("Work subcategory, or null when none applies"),
  keywords: z.array(z.string()).describe("Short search tags for the record"),
});

export const EnrichmentResponseSchema = z.object({
  items: z.array(EnrichedItemSchema).describe("One entry per submitted record, in order"),
});

export type EnrichedItem = z.infer<typeof EnrichedItemSchema>;
export type EnrichmentResponse = z.infer<typeof EnrichmentResponseSchema>;

export type OpenAIEnrichmentErrorCode =
  | "MISSING_API_KEY"
  | "NO_OUTPUT"
  | "INVALID_JSON"
  | "INVALID_RESPONSE_SCHEMA"
  | "ITEM_COUNT_MISMATCH"
  | "MAX_RETRIES_EXCEEDED";

// Error types for OpenAI operations
export class OpenAIEnrichmentError extends Error {
  constructor(
    message: string,
    public readonly code: OpenAIEnrichmentErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "OpenAIEnrichmentError";
  }
}

export const DEFAULT_MODEL = "gpt-4.1" as const;
export const MAX_RETRIES = 2;
export const RETRY_DELAY_MS = 1000;
