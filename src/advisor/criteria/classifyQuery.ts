/**
 * Intent and criteria extraction.
 *
 * Keyword rules only: intent categories are checked in a fixed order and the
 * first category with a hit wins; there is no scoring across categories.
 */

import type { ClassifiedQuery, CriteriaSet, Focus, Intent } from '../advisorTypes.js';

interface IntentRule {
  intent: Exclude<Intent, 'general'>;
  keywords: readonly string[];
}

/**
 * Checked in order. Keywords are plain substrings of the lower-cased text,
 * so "s24vs s23" counts as a comparison and "laptop" contains "top".
 */
export const INTENT_RULES: readonly IntentRule[] = [
  { intent: 'comparison', keywords: ['compare', 'versus', 'vs', 'difference', 'better'] },
  { intent: 'recommendation', keywords: ['best', 'recommend', 'which', 'should i', 'top'] },
  { intent: 'specs', keywords: ['spec', 'feature', 'detail', 'what is', 'what are', 'tell me about'] },
];

interface FocusRule {
  focus: Exclude<Focus, 'overall'>;
  terms: readonly string[];
}

/**
 * Every group is evaluated and a later hit overwrites an earlier one,
 * so display beats camera and camera beats battery.
 */
export const FOCUS_RULES: readonly FocusRule[] = [
  { focus: 'battery', terms: ['battery', 'long lasting'] },
  { focus: 'camera', terms: ['camera', 'photo', 'photography'] },
  { focus: 'display', terms: ['display', 'screen'] },
];

/**
 * Price ceiling phrasings, evaluated in order; a later match overwrites an
 * earlier one ("below" wins when both appear).
 */
export const PRICE_CEILING_PATTERNS: readonly RegExp[] = [
  /\bunder\s*\$?\s*(\d[\d,]*)/,
  /\bbelow\s*\$?\s*(\d[\d,]*)/,
];

export function detectIntent(text: string): Intent {
  const lower = text.toLowerCase();
  const rule = INTENT_RULES.find(candidate =>
    candidate.keywords.some(keyword => lower.includes(keyword))
  );
  return rule?.intent ?? 'general';
}

export function extractPriceMax(text: string): number | undefined {
  const lower = text.toLowerCase();
  let priceMax: number | undefined;

  for (const pattern of PRICE_CEILING_PATTERNS) {
    const match = lower.match(pattern);
    if (match) {
      const amount = parseFloat(match[1].replace(/,/g, ''));
      if (Number.isFinite(amount)) {
        priceMax = amount;
      }
    }
  }

  return priceMax;
}

export function extractFocus(text: string): Focus | undefined {
  const lower = text.toLowerCase();
  let focus: Focus | undefined;

  for (const rule of FOCUS_RULES) {
    if (rule.terms.some(term => lower.includes(term))) {
      focus = rule.focus;
    }
  }

  return focus;
}

/**
 * Classifies a question into an intent plus soft criteria. Pure; absent
 * signals leave criteria fields unset.
 */
export function classifyQuery(text: string): ClassifiedQuery {
  const criteria: CriteriaSet = {};

  const priceMax = extractPriceMax(text);
  if (priceMax !== undefined) {
    criteria.priceMax = priceMax;
  }

  const focus = extractFocus(text);
  if (focus !== undefined) {
    criteria.focus = focus;
  }

  return { intent: detectIntent(text), criteria };
}
