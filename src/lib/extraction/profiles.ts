import { z } from "zod";

import profileConfig from "@/config/sheet-profiles.json";
import { compileAbbreviations, type CompiledAbbreviation } from "@/lib/extraction/text";
import { ExtractionError } from "@/types/pricelist";

const columnIndex = z.number().int().min(0);

function isValidPattern(pattern: string, flags?: string): boolean {
  try {
    new RegExp(pattern, flags ?? "g");
    return true;
  } catch {
    return false;
  }
}

const AbbreviationRuleSchema = z
  .object({
    pattern: z.string().min(1),
    replacement: z.string(),
    flags: z.string().optional(),
  })
  .refine((rule) => isValidPattern(rule.pattern, rule.flags), {
    message: "Abbreviation pattern is not a valid regular expression",
  });

const KeywordRuleSchema = z.object({
  all: z.array(z.string()).optional(),
  any: z.array(z.string()).optional(),
  value: z.string().min(1),
});

const RangeWindowSchema = z
  .object({
    startRow: columnIndex,
    endRow: columnIndex,
    rangeColumns: z.tuple([columnIndex, columnIndex, columnIndex]).default([2, 3, 4]),
    headerColumns: z.array(columnIndex).default([0, 1]),
    headerKeywords: z.array(z.string()).default(["excavat", "trench"]),
    minHeaderLength: z.number().int().min(1).default(50),
    label: z.string().default("depth to invert"),
  })
  .refine((window) => window.endRow > window.startRow, {
    message: "Range window endRow must be greater than startRow",
  });

const SheetProfileSchema = z.object({
  sheetName: z.string().min(1),
  category: z.string().min(1),
  codePrefix: z.string().min(1).optional(),
  startRow: columnIndex.default(0),
  minNonEmptyCells: z.number().int().min(1).default(1),
  boldHeaders: z.boolean().default(true),
  headerScanColumns: z.number().int().min(1).default(5),
  codeColumn: columnIndex.default(0),
  anchorDescriptionColumns: z.array(columnIndex).default([1, 2]),
  minAnchorLength: z.number().int().min(1).default(5),
  keywords: z.array(z.string()).default([]),
  keywordScanColumns: z.number().int().min(1).default(5),
  descriptionColumns: z
    .object({
      start: columnIndex.default(1),
      count: z.number().int().min(1).default(3),
    })
    .default({}),
  minDescriptionLength: z.number().int().min(1).default(5),
  descriptionNumberThreshold: z.number().default(10),
  unitColumns: z.array(columnIndex).default([2, 3, 4, 5]),
  unitMatch: z.enum(["exact", "contains"]).default("exact"),
  unitRules: z.array(KeywordRuleSchema).default([]),
  rateColumns: z
    .object({
      start: columnIndex.default(3),
      end: columnIndex.default(20),
    })
    .default({}),
  allowZeroRate: z.boolean().default(false),
  defaultRateColumn: columnIndex.default(5),
  abbreviations: z.array(AbbreviationRuleSchema).default([]),
  defaultSubcategory: z.string().optional(),
  subcategoryRules: z.array(KeywordRuleSchema).default([]),
  keywordTerms: z.array(z.string()).default([]),
  rangeWindows: z.array(RangeWindowSchema).default([]),
});

const ProfileConfigSchema = z.object({
  commonAbbreviations: z.array(AbbreviationRuleSchema).default([]),
  profiles: z.array(SheetProfileSchema),
});

export type SheetProfileInput = z.input<typeof SheetProfileSchema>;
export type AbbreviationRuleInput = z.input<typeof AbbreviationRuleSchema>;
export type RangeWindow = z.infer<typeof RangeWindowSchema>;

export type SheetProfile = z.infer<typeof SheetProfileSchema> & {
  /** Common abbreviations followed by the sheet's own, compiled once. */
  abbreviationTable: CompiledAbbreviation[];
};

function invalidProfile(issues: z.ZodIssue[]): ExtractionError {
  return new ExtractionError("Invalid sheet profile configuration", "INVALID_PROFILE", { issues });
}

export function defineSheetProfile(
  input: SheetProfileInput,
  commonAbbreviations: readonly AbbreviationRuleInput[] = []
): SheetProfile {
  const profile = SheetProfileSchema.safeParse(input);
  if (!profile.success) {
    throw invalidProfile(profile.error.issues);
  }
  const common = z.array(AbbreviationRuleSchema).safeParse(commonAbbreviations);
  if (!common.success) {
    throw invalidProfile(common.error.issues);
  }

  return {
    ...profile.data,
    abbreviationTable: compileAbbreviations([...common.data, ...profile.data.abbreviations]),
  };
}

export function parseSheetProfiles(config: unknown): SheetProfile[] {
  const parsed = ProfileConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw invalidProfile(parsed.error.issues);
  }

  const { commonAbbreviations, profiles } = parsed.data;
  return profiles.map((profile) => ({
    ...profile,
    abbreviationTable: compileAbbreviations([...commonAbbreviations, ...profile.abbreviations]),
  }));
}

let cached: SheetProfile[] | null = null;

export function loadSheetProfiles(): SheetProfile[] {
  if (!cached) {
    cached = parseSheetProfiles(profileConfig);
  }
  return cached;
}

export function findProfile(profiles: readonly SheetProfile[], sheetName: string): SheetProfile | null {
  const wanted = sheetName.trim().toLowerCase();
  return profiles.find((profile) => profile.sheetName.trim().toLowerCase() === wanted) ?? null;
}
