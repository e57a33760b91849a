export const DEFAULT_UNIT = "item";

export type UnitMatchMode = "exact" | "contains";

const UNIT_ALIASES: Record<string, string[]> = {
  "m²": ["m2", "sqm", "sq.m", "sq m", "m²"],
  "m³": ["m3", "cum", "cu.m", "cu m", "m³"],
  nr: ["nr", "no", "no.", "each", "number", "ea"],
  tonnes: ["tonnes", "tonne", "ton", "t"],
  m: ["m", "lm", "lin.m", "l.m", "lin m"],
  sum: ["sum", "l.s.", "ls", "lump sum"],
  hour: ["hour", "hours", "hr", "hrs"],
};

const ALIAS_LOOKUP = new Map<string, string>(
  Object.entries(UNIT_ALIASES).flatMap(([canonical, aliases]) =>
    aliases.map((alias): [string, string] => [alias, canonical])
  )
);

const UNIT_TOKENS = new Set<string>([
  ...ALIAS_LOOKUP.keys(),
  "mm",
  "kg",
  "item",
  "set",
  "day",
  "week",
  "month",
]);

/**
 * Maps a raw unit token onto the canonical vocabulary. Unknown tokens pass
 * through lower-cased; empty input yields the default unit.
 */
export function normalizeUnit(token: string | null | undefined): string {
  const lowered = (token ?? "").toLowerCase().trim();
  if (!lowered) {
    return DEFAULT_UNIT;
  }
  return ALIAS_LOOKUP.get(lowered) ?? lowered;
}

export function looksLikeUnit(token: string | number | null | undefined, mode: UnitMatchMode = "exact"): boolean {
  if (token === null || token === undefined || typeof token === "number") {
    return false;
  }

  const value = token.trim().toLowerCase();
  if (!value || isPlainNumber(value)) {
    return false;
  }

  if (UNIT_TOKENS.has(value)) {
    return true;
  }

  if (mode === "contains") {
    for (const unit of UNIT_TOKENS) {
      if (value.includes(unit)) {
        return true;
      }
    }
  }

  return false;
}

function isPlainNumber(value: string): boolean {
  const cleaned = value.replace(/,/g, "");
  return cleaned.length > 0 && Number.isFinite(Number(cleaned));
}
