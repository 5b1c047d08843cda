import type { PhoneRecord } from './phoneTypes.js';

const BRAND_TOKEN_PATTERN = /\b(?:samsung|galaxy)\b/g;

/**
 * Lower-cases a name and removes the "samsung" and "galaxy" words,
 * so "Samsung Galaxy S24" and "s24" compare equal.
 */
export function stripBrandTokens(name: string): string {
  return name
    .toLowerCase()
    .replace(BRAND_TOKEN_PATTERN, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Lookup passes shared by every store. Each pass scans the catalog in order
 * and the first pass with a hit wins.
 */
export function findByExactOrSubstringName(
  records: readonly PhoneRecord[],
  name: string
): PhoneRecord | null {
  const needle = name.trim().toLowerCase();
  if (needle.length === 0) {
    return null;
  }

  const exact = records.find(record => record.modelName.toLowerCase() === needle);
  if (exact) {
    return exact;
  }

  const contains = records.find(record => record.modelName.toLowerCase().includes(needle));
  if (contains) {
    return contains;
  }

  const stripped = stripBrandTokens(needle);
  if (stripped.length === 0) {
    return null;
  }

  return records.find(record => record.modelName.toLowerCase().includes(stripped)) ?? null;
}
