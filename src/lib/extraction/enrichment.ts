import { collapseWhitespace } from "@/lib/extraction/text";
import { normalizeUnit } from "@/lib/extraction/units";
import { logger } from "@/lib/logger";
import type { Enricher, RawRecord } from "@/types/pricelist";

export const DEFAULT_ENRICHMENT_BATCH_SIZE = 5;

export interface EnrichmentOptions {
  batchSize?: number;
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    batches.push(items.slice(index, index + size));
  }
  return batches;
}

// Only presentation fields are taken from the enricher; rates, references,
// category and code always come from the sheet.
function mergeEnriched(original: RawRecord, enriched: RawRecord): RawRecord {
  const description = collapseWhitespace(enriched.description);
  if (!description) {
    return original;
  }
  return Object.freeze({
    ...original,
    description,
    unit: normalizeUnit(enriched.unit || original.unit),
    subcategory: enriched.subcategory ?? original.subcategory,
    keywords: enriched.keywords.length > 0 ? [...enriched.keywords] : original.keywords,
  });
}

/**
 * Runs the enricher over the records in batches. A batch that fails, or comes
 * back with a different number of records, keeps its original records.
 */
export async function applyEnrichment(
  records: readonly RawRecord[],
  sheetName: string,
  enricher: Enricher,
  options: EnrichmentOptions = {}
): Promise<RawRecord[]> {
  const batchSize = Math.max(1, options.batchSize ?? DEFAULT_ENRICHMENT_BATCH_SIZE);
  const output: RawRecord[] = [];
  let enrichedBatches = 0;
  let failedBatches = 0;

  for (const [batchIndex, batch] of chunk(records, batchSize).entries()) {
    try {
      const enriched = await enricher(batch, sheetName);
      if (enriched.length !== batch.length) {
        logger.warn("Enrichment returned a different number of records; keeping originals", {
          sheetName,
          batchIndex,
          expected: batch.length,
          received: enriched.length,
        });
        failedBatches++;
        output.push(...batch);
        continue;
      }
      output.push(...batch.map((record, index) => {
        const candidate = enriched[index];
        return candidate ? mergeEnriched(record, candidate) : record;
      }));
      enrichedBatches++;
    } catch (error) {
      logger.warn("Enrichment batch failed; keeping originals", {
        sheetName,
        batchIndex,
        error: error instanceof Error ? error.message : String(error),
      });
      failedBatches++;
      output.push(...batch);
    }
  }

  logger.info("Enrichment completed", { sheetName, records: records.length, enrichedBatches, failedBatches });

  return output;
}
