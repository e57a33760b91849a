import { z } from "zod";

import expansionConfig from "@/config/description-expansions.json";
import { ExtractionError, type RawRecord } from "@/types/pricelist";

const SHORT_DESCRIPTION_LENGTH = 10;
const SINGLE_WORD_LENGTH = 20;
const MIN_PARTIAL_TERM_LENGTH = 3;

const ContextRuleSchema = z.object({
  /** Matched as substrings of the lower-cased category. */
  categoryTerms: z.array(z.string().min(1)).default([]),
  /** Matched against the normalised unit. */
  units: z.array(z.string().min(1)).default([]),
  suffix: z.string().min(1),
});

const DescriptionExpansionsSchema = z.object({
  entries: z.array(
    z.object({
      term: z.string().min(1),
      expansion: z.string().min(1),
    })
  ),
  contextRules: z.array(ContextRuleSchema).default([]),
  fallbackSuffix: z.string().min(1),
  emptyDescription: z.string().min(1),
});

export type DescriptionExpansions = z.infer<typeof DescriptionExpansionsSchema>;

export function parseDescriptionExpansions(config: unknown): DescriptionExpansions {
  const parsed = DescriptionExpansionsSchema.safeParse(config);
  if (!parsed.success) {
    throw new ExtractionError("Invalid description expansion table", "INVALID_EXPANSIONS", {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

let cached: DescriptionExpansions | null = null;

export function loadDescriptionExpansions(): DescriptionExpansions {
  if (!cached) {
    cached = parseDescriptionExpansions(expansionConfig);
  }
  return cached;
}

/** Under ten characters, or a single word under twenty. */
export function isShortDescription(description: string): boolean {
  const words = description.split(/\s+/).filter(Boolean);
  return description.length < SHORT_DESCRIPTION_LENGTH || (words.length === 1 && description.length < SINGLE_WORD_LENGTH);
}

function lookup(expansions: DescriptionExpansions, term: string): string | null {
  return expansions.entries.find((entry) => entry.term === term)?.expansion ?? null;
}

/**
 * Dictionary lookup in order: exact term, singular form, then the first entry
 * of three or more characters contained in (or containing) the description.
 * Descriptions still under ten characters fall back to a suffix chosen from
 * the category and unit.
 */
export function expandShortDescription(
  description: string,
  category: string,
  unit: string,
  expansions: DescriptionExpansions = loadDescriptionExpansions()
): string {
  const trimmed = description.trim();
  if (!trimmed) {
    return expansions.emptyDescription;
  }

  const term = trimmed.toLowerCase();
  const direct = lookup(expansions, term);
  if (direct) {
    return direct;
  }
  if (term.endsWith("s")) {
    const singular = lookup(expansions, term.slice(0, -1));
    if (singular) {
      return singular;
    }
  }

  const partial = expansions.entries.find(
    (entry) =>
      entry.term.length >= MIN_PARTIAL_TERM_LENGTH && (term.includes(entry.term) || entry.term.includes(term))
  );
  if (partial) {
    return partial.expansion;
  }

  if (trimmed.length >= SHORT_DESCRIPTION_LENGTH) {
    return trimmed;
  }

  const categoryText = category.toLowerCase();
  const rule = expansions.contextRules.find(
    (candidate) =>
      candidate.categoryTerms.some((categoryTerm) => categoryText.includes(categoryTerm)) ||
      candidate.units.includes(unit)
  );
  return `${trimmed} ${rule?.suffix ?? expansions.fallbackSuffix}`;
}

export function expandShortDescriptions(
  records: readonly RawRecord[],
  expansions: DescriptionExpansions = loadDescriptionExpansions()
): RawRecord[] {
  return records.map((record) => {
    if (!isShortDescription(record.description)) {
      return record;
    }
    const description = expandShortDescription(record.description, record.category, record.unit, expansions);
    return description === record.description ? record : Object.freeze({ ...record, description });
  });
}
