/**
 * Candidate scoring and ranking for recommendations.
 */

import {
  hasAmoledPanel,
  hasHighRefreshRate,
  parseBatteryMah,
  parseMainCameraMp,
  parsePrice,
  parseRamGb,
  type PhoneRecord,
} from '../../catalog/index.js';
import type { CriteriaSet, Focus, ScoredCandidate } from '../advisorTypes.js';

/** Maximum number of records a ranking returns. */
export const TOP_PICKS = 3;

/**
 * Divisors that bring each magnitude onto a comparable scale.
 */
export const SCORE_WEIGHTS = {
  batteryMah: 1000,
  cameraMp: 50,
  ramGb: 4,
  focusBatteryMah: 500,
  focusCameraMp: 25,
  highRefreshBonus: 2,
  amoledBonus: 1,
  withinBudgetBonus: 3,
  overBudgetPenalty: 5,
} as const;

function focusBonus(record: PhoneRecord, focus: Focus | undefined, batteryMah: number | null, cameraMp: number | null): number {
  switch (focus) {
    case 'battery':
      return batteryMah === null ? 0 : batteryMah / SCORE_WEIGHTS.focusBatteryMah;
    case 'camera':
      return cameraMp === null ? 0 : cameraMp / SCORE_WEIGHTS.focusCameraMp;
    case 'display':
      return (hasHighRefreshRate(record.display) ? SCORE_WEIGHTS.highRefreshBonus : 0)
        + (hasAmoledPanel(record.display) ? SCORE_WEIGHTS.amoledBonus : 0);
    default:
      return 0;
  }
}

function budgetAdjustment(record: PhoneRecord, priceMax: number | undefined): number {
  if (priceMax === undefined) {
    return 0;
  }
  const price = parsePrice(record.price);
  if (price === null) {
    return 0;
  }
  return price <= priceMax ? SCORE_WEIGHTS.withinBudgetBonus : -SCORE_WEIGHTS.overBudgetPenalty;
}

/**
 * Additive score over the parseable spec fields. Pure; a field that cannot
 * be parsed adds nothing.
 */
export function scorePhone(record: PhoneRecord, focus: Focus | undefined, criteria: CriteriaSet): number {
  const batteryMah = parseBatteryMah(record.battery);
  const cameraMp = parseMainCameraMp(record.camera);
  const ramGb = parseRamGb(record.ram);

  let score = 0;
  if (batteryMah !== null) score += batteryMah / SCORE_WEIGHTS.batteryMah;
  if (cameraMp !== null) score += cameraMp / SCORE_WEIGHTS.cameraMp;
  if (ramGb !== null) score += ramGb / SCORE_WEIGHTS.ramGb;

  score += focusBonus(record, focus, batteryMah, cameraMp);
  score += budgetAdjustment(record, criteria.priceMax);

  return score;
}

export function scorePhones(records: readonly PhoneRecord[], focus: Focus | undefined, criteria: CriteriaSet): ScoredCandidate[] {
  return records.map(record => ({ record, score: scorePhone(record, focus, criteria) }));
}

/**
 * Top picks by descending score. Array.prototype.sort is stable, so equal
 * scores keep their input order.
 */
export function rankPhones(records: readonly PhoneRecord[], focus: Focus | undefined, criteria: CriteriaSet): PhoneRecord[] {
  return scorePhones(records, focus, criteria)
    .sort((a, b) => b.score - a.score)
    .slice(0, TOP_PICKS)
    .map(candidate => candidate.record);
}
