/**
 * Attribute-level comparison of two phone records.
 */

import type { PhoneRecord } from '../../catalog/index.js';
import { COMPARED_ATTRIBUTES, type AttributeDifference, type ComparisonResult } from '../advisorTypes.js';

/**
 * Builds the comparison between two records.
 *
 * Attributes are visited in canonical order and reported only when their
 * text differs; values are compared verbatim, without normalization.
 */
export function diffPhones(recordA: PhoneRecord, recordB: PhoneRecord): ComparisonResult {
  const differences: AttributeDifference[] = [];

  for (const attribute of COMPARED_ATTRIBUTES) {
    const valueA = recordA[attribute];
    const valueB = recordB[attribute];
    if (valueA !== valueB) {
      differences.push({ attribute, valueA, valueB });
    }
  }

  return { recordA, recordB, differences };
}

/**
 * Comparison of the first two records, or null when fewer than two exist.
 */
export function compareFirstTwo(records: readonly PhoneRecord[]): ComparisonResult | null {
  const [recordA, recordB] = records;
  if (recordA === undefined || recordB === undefined) {
    return null;
  }
  return diffPhones(recordA, recordB);
}
