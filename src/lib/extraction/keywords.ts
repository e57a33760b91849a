const MAX_KEYWORDS = 6;
const MAX_MEASUREMENTS = 2;

const MEASUREMENT_PATTERN = /\d+(?:mm|m|kg|tonnes?)\b/g;
const DEPTH_PATTERN = /(?:\bne|not exceeding)\s*(\d+(?:\.\d+)?)\s*m?\b/;

export function slugify(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, "_");
}

/**
 * Search tags for a record: leading measurements, a depth band, the profile
 * terms found in the description and the subcategory slug.
 */
export function generateKeywords(
  description: string,
  subcategory: string | null,
  terms: readonly string[]
): string[] {
  const lowered = description.toLowerCase();
  const keywords: string[] = [];

  keywords.push(...(lowered.match(MEASUREMENT_PATTERN) ?? []).slice(0, MAX_MEASUREMENTS));

  const depth = DEPTH_PATTERN.exec(lowered);
  if (depth) {
    keywords.push(`depth_${depth[1]}m`);
  }

  for (const term of terms) {
    if (lowered.includes(term)) {
      keywords.push(term);
    }
  }

  if (subcategory) {
    keywords.push(slugify(subcategory));
  }

  return [...new Set(keywords)].slice(0, MAX_KEYWORDS);
}
