import type { CellValue } from "@/types/pricelist";

export interface AbbreviationRule {
  pattern: string;
  replacement: string;
  flags?: string;
}

/** All `all` terms must appear; when `any` is given, at least one of those must too. */
export interface KeywordRule {
  all?: string[];
  any?: string[];
  value: string;
}

export interface CompiledAbbreviation {
  regex: RegExp;
  replacement: string;
}

const EMPTY_MARKERS = new Set(["", "nan", "none", "-"]);

export function cellText(value: CellValue): string {
  if (value === null) {
    return "";
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? String(value) : "";
  }
  return value.trim();
}

export function collapseWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(" ");
}

export function isEmptyMarker(text: string): boolean {
  return EMPTY_MARKERS.has(text.trim().toLowerCase());
}

/**
 * Parses a numeric cell, tolerating thousands separators, currency symbols and
 * surrounding whitespace. Returns null for anything else.
 */
export function parseNumericCell(value: CellValue): number | null {
  if (value === null) {
    return null;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }

  const cleaned = value.replace(/[,\s£$€]/g, "");
  if (!cleaned || !/^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i.test(cleaned)) {
    return null;
  }

  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

/** Shortest numeric rendering for numeric text ("0.50" → "0.5"), raw text otherwise. */
export function formatBound(value: CellValue): string {
  const parsed = parseNumericCell(value);
  return parsed === null ? cellText(value) : String(parsed);
}

export function compileAbbreviations(rules: readonly AbbreviationRule[]): CompiledAbbreviation[] {
  return rules.map((rule) => ({
    regex: new RegExp(rule.pattern, rule.flags ?? "g"),
    replacement: rule.replacement,
  }));
}

export function expandAbbreviations(text: string, rules: readonly CompiledAbbreviation[]): string {
  let expanded = text;
  for (const rule of rules) {
    expanded = expanded.replace(rule.regex, rule.replacement);
  }
  return collapseWhitespace(expanded);
}

export function matchesKeywordRule(text: string, rule: KeywordRule): boolean {
  const lowered = text.toLowerCase();
  const all = rule.all ?? [];
  const any = rule.any ?? [];

  if (!all.every((term) => lowered.includes(term))) {
    return false;
  }
  return any.length === 0 || any.some((term) => lowered.includes(term));
}

export function firstMatchingRule(text: string, rules: readonly KeywordRule[]): string | null {
  for (const rule of rules) {
    if (matchesKeywordRule(text, rule)) {
      return rule.value;
    }
  }
  return null;
}
