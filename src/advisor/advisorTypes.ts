/**
 * Types shared by the advisor pipeline. Every value here is built per query
 * and discarded once the answer is produced.
 */

import type { PhoneRecord } from '../catalog/index.js';

export type Intent = 'comparison' | 'recommendation' | 'specs' | 'general';

export type Focus = 'battery' | 'camera' | 'display' | 'overall';

/**
 * Soft constraints read from a question. An unset field means the
 * question carried no signal for it.
 */
export interface CriteriaSet {
  priceMax?: number;
  focus?: Focus;
}

export interface ClassifiedQuery {
  intent: Intent;
  criteria: CriteriaSet;
}

export interface MatchCandidate {
  modelName: string;
  /** Integer match strength, 100 is a verbatim full-name hit */
  confidence: number;
}

export interface ScoredCandidate {
  record: PhoneRecord;
  score: number;
}

/**
 * Attributes compared between two phones, in rendering order.
 */
export const COMPARED_ATTRIBUTES = [
  'display',
  'battery',
  'camera',
  'ram',
  'storage',
  'chipset',
  'price',
] as const;

export type ComparedAttribute = (typeof COMPARED_ATTRIBUTES)[number];

export interface AttributeDifference {
  attribute: ComparedAttribute;
  valueA: string;
  valueB: string;
}

export interface ComparisonResult {
  recordA: PhoneRecord;
  recordB: PhoneRecord;
  differences: AttributeDifference[];
}

export interface RecommendationResult {
  criteria: CriteriaSet;
  candidates: PhoneRecord[];
  /** At most three, best first */
  topPicks: PhoneRecord[];
}

export interface RetrievalResult {
  question: string;
  intent: Intent;
  criteria: CriteriaSet;
  /** Names the resolver recognized, best first */
  resolvedNames: string[];
  records: PhoneRecord[];
  comparison?: ComparisonResult;
  recommendation?: RecommendationResult;
}
