import ExcelJS from "exceljs";
import type { SQSEvent, SQSRecord } from "aws-lambda";

import { defineSheetProfile, type SheetProfileInput } from "@/lib/extraction/profiles";
import type { RawRecord } from "@/types/pricelist";

export function testProfile(overrides: Partial<SheetProfileInput> = {}) {
  return defineSheetProfile({
    sheetName: "Groundworks",
    category: "Groundworks",
    ...overrides,
  });
}

export function rawRecord(overrides: Partial<RawRecord> = {}): RawRecord {
  return {
    code: null,
    description: "Excavate trench",
    unit: "m",
    rate: null,
    rateProvenance: null,
    rateTarget: null,
    category: "Groundworks",
    subcategory: "Excavation",
    sourceCell: { sheetName: "Groundworks", row: 0, col: 0 },
    keywords: [],
    ...overrides,
  };
}

/**
 * Groundworks sheet with two rows sharing a composite key (the first priced)
 * and one distinct priced row, plus a sheet no profile reads.
 */
export function buildGroundworksWorkbook(): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet("Groundworks");
  sheet.addRow(["1.1", "Excavate trench for foundations", "m3", 45.5]);
  sheet.addRow(["1.2", "Excavate trench for foundations", "m3", null]);
  sheet.addRow(["1.3", "Disposal of surplus spoil off site", "m3", 18]);

  const notes = workbook.addWorksheet("Notes");
  notes.addRow(["Prices exclude VAT"]);

  return workbook;
}

export async function workbookBytes(workbook: ExcelJS.Workbook): Promise<Uint8Array> {
  const buffer = await workbook.xlsx.writeBuffer();
  return new Uint8Array(buffer);
}

function sqsRecord(messageId: string, body: string): SQSRecord {
  return {
    messageId,
    receiptHandle: `receipt-${messageId}`,
    body,
    attributes: {
      ApproximateReceiveCount: "1",
      SentTimestamp: "1704067200000",
      SenderId: "sender",
      ApproximateFirstReceiveTimestamp: "1704067200000",
    },
    messageAttributes: {},
    md5OfBody: "",
    eventSource: "aws:sqs",
    eventSourceARN: "arn:aws:sqs:eu-west-2:000000000000:uploads",
    awsRegion: "eu-west-2",
  };
}

export function s3UploadEvent(bucket: string, keys: string[]): SQSEvent {
  const body = JSON.stringify({
    Records: keys.map((key) => ({ s3: { bucket: { name: bucket }, object: { key } } })),
  });
  return { Records: [sqsRecord("msg-1", body)] };
}
