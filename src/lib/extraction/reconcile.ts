import { createHash } from "node:crypto";

import type { CanonicalRecord, RawRecord, ReconcileSummary } from "@/types/pricelist";

const DEFAULT_PREFIX = "XX";
const ID_HASH_LENGTH = 8;
const CODE_DIGITS = 4;

export interface ReconcileOptions {
  /** Overrides the derived code prefix per category name. */
  categoryPrefixes?: Record<string, string>;
}

export interface ReconcileResult {
  records: CanonicalRecord[];
  summary: ReconcileSummary;
}

export function compositeKey(record: RawRecord): string {
  return JSON.stringify([record.description, record.category, record.unit, record.subcategory]);
}

function isPopulated(value: unknown): boolean {
  if (value === null || value === undefined) {
    return false;
  }
  if (typeof value === "string") {
    return value.length > 0;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  return true;
}

export function informationScore(record: RawRecord): number {
  const fields: unknown[] = [
    record.code,
    record.description,
    record.unit,
    record.rate,
    record.rateProvenance,
    record.rateTarget,
    record.category,
    record.subcategory,
    record.sourceCell,
    record.keywords,
  ];
  return fields.filter(isPopulated).length;
}

export function categoryPrefix(category: string, overrides: Record<string, string> = {}): string {
  const override = overrides[category];
  if (override) {
    return override;
  }
  const letters = category.replace(/[^A-Za-z]/g, "").slice(0, 2).toUpperCase();
  return letters || DEFAULT_PREFIX;
}

export function contentHash(record: Pick<RawRecord, "description" | "category" | "unit">): string {
  return createHash("md5")
    .update(`${record.description}_${record.category}_${record.unit}`)
    .digest("hex")
    .slice(0, ID_HASH_LENGTH);
}

function uniqueId(base: string, assigned: Set<string>): string {
  if (!assigned.has(base)) {
    return base;
  }
  let suffix = 1;
  while (assigned.has(`${base}_${String(suffix).padStart(2, "0")}`)) {
    suffix++;
  }
  return `${base}_${String(suffix).padStart(2, "0")}`;
}

/**
 * Merges extraction passes into one duplicate-free set. Records sharing a
 * composite key collapse onto the most complete one (first seen wins ties)
 * and survivors get fresh codes and content-derived ids.
 */
export function reconcile(
  recordSets: readonly (readonly RawRecord[])[],
  options: ReconcileOptions = {}
): ReconcileResult {
  const survivors = new Map<string, { record: RawRecord; score: number }>();
  let inputRecords = 0;

  for (const records of recordSets) {
    for (const record of records) {
      inputRecords++;
      const key = compositeKey(record);
      const score = informationScore(record);
      const existing = survivors.get(key);
      if (!existing || score > existing.score) {
        survivors.set(key, { record, score });
      }
    }
  }

  const assignedIds = new Set<string>();
  const counters = new Map<string, number>();
  const byCategory: Record<string, number> = {};
  const canonical: CanonicalRecord[] = [];

  for (const { record } of survivors.values()) {
    const prefix = categoryPrefix(record.category, options.categoryPrefixes);
    const sequence = (counters.get(record.category) ?? 0) + 1;
    counters.set(record.category, sequence);

    const id = uniqueId(`${prefix}_${contentHash(record)}`, assignedIds);
    assignedIds.add(id);

    byCategory[record.category] = sequence;
    canonical.push(
      Object.freeze({
        ...record,
        id,
        code: `${prefix}${String(sequence).padStart(CODE_DIGITS, "0")}`,
      })
    );
  }

  return {
    records: canonical,
    summary: {
      inputRecords,
      outputRecords: canonical.length,
      duplicatesRemoved: inputRecords - canonical.length,
      byCategory,
    },
  };
}
