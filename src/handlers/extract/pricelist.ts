import type { S3Event, SQSEvent } from "aws-lambda";

import { getEnv } from "@/lib/env";
import { toPricelistCsv, toPricelistJson } from "@/lib/export";
import { loadWorkbook } from "@/lib/extraction/workbook";
import { logger } from "@/lib/logger";
import { toPricelistRows } from "@/lib/mappers";
import { createOpenAIEnricher } from "@/lib/openai";
import { getObjectBuffer, putObject } from "@/lib/s3";
import { buildPricelist } from "@/lib/services/pricelist";
import type { Enricher } from "@/types/pricelist";

const WORKBOOK_EXTENSIONS = [".xlsx", ".xlsm"];

export function artifactPrefix(key: string): string {
  return key.replace(/\.[^./]+$/, "");
}

function resolveEnricher(): Enricher | undefined {
  const { ENRICHMENT_ENABLED, OPENAI_API_KEY } = getEnv();
  if (!ENRICHMENT_ENABLED) {
    return undefined;
  }
  if (!OPENAI_API_KEY) {
    logger.warn("Enrichment enabled without an OpenAI API key; continuing without it");
    return undefined;
  }
  return createOpenAIEnricher();
}

async function processObject(bucket: string, key: string, artifactsBucket: string): Promise<void> {
  const { ENRICHMENT_BATCH_SIZE, DESCRIPTION_EXPANSION_ENABLED } = getEnv();

  const buffer = await getObjectBuffer(bucket, key);
  const workbook = await loadWorkbook(buffer);
  const { records, sheets, skippedSheets, reconciliation } = await buildPricelist(workbook, {
    enrich: resolveEnricher(),
    batchSize: ENRICHMENT_BATCH_SIZE,
    expandDescriptions: DESCRIPTION_EXPANSION_ENABLED,
  });

  const rows = toPricelistRows(records);
  const prefix = artifactPrefix(key);

  await putObject({
    bucket: artifactsBucket,
    key: `${prefix}/pricelist.json`,
    body: toPricelistJson(rows),
    contentType: "application/json",
  });
  await putObject({
    bucket: artifactsBucket,
    key: `${prefix}/pricelist.csv`,
    body: toPricelistCsv(rows),
    contentType: "text/csv",
  });

  logger.info("Pricelist extraction stored", {
    bucket,
    key,
    artifactsBucket,
    prefix,
    sheets: sheets.length,
    skippedSheets,
    ...reconciliation,
  });
}

export async function handler(event: SQSEvent) {
  const { ARTIFACTS_BUCKET } = getEnv();
  if (!ARTIFACTS_BUCKET) {
    throw new Error("ARTIFACTS_BUCKET is not configured");
  }

  for (const sqsRecord of event.Records) {
    try {
      // Parse S3 event from SQS message body
      const s3Event: S3Event = JSON.parse(sqsRecord.body);

      for (const record of s3Event.Records ?? []) {
        const bucket = record.s3.bucket.name;
        const key = decodeURIComponent(record.s3.object.key.replace(/\+/g, " "));

        if (!WORKBOOK_EXTENSIONS.some((extension) => key.toLowerCase().endsWith(extension))) {
          logger.info("Skipping non-workbook object", { bucket, key });
          continue;
        }

        try {
          await processObject(bucket, key, ARTIFACTS_BUCKET);
        } catch (error) {
          logger.error("Pricelist extraction failed", {
            bucket,
            key,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
    } catch (error) {
      logger.error("Failed to parse SQS message", {
        messageId: sqsRecord.messageId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
