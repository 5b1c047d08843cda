/**
 * Entity resolver: maps free text to catalog model names.
 */

import type { MatchCandidate } from '../advisorTypes.js';
import { NAME_RULES, toNameForms, toQueryTokens, type NameRule } from './nameRules.js';

/** Candidates at or above this confidence are kept when any exist. */
export const HIGH_CONFIDENCE = 80;

/** Floor applied when no candidate reaches HIGH_CONFIDENCE. */
export const WEAK_CONFIDENCE = 30;

/**
 * Scores every known name against the question. Names no rule matches are
 * omitted; the result keeps the order of knownNames.
 */
export function scoreNameMatches(
  text: string,
  knownNames: Iterable<string>,
  rules: readonly NameRule[] = NAME_RULES
): MatchCandidate[] {
  const query = toQueryTokens(text);
  const seen = new Set<string>();
  const candidates: MatchCandidate[] = [];

  for (const modelName of knownNames) {
    if (seen.has(modelName)) {
      continue;
    }
    seen.add(modelName);

    const forms = toNameForms(modelName);
    for (const rule of rules) {
      const confidence = rule.match(query, forms);
      if (confidence !== null) {
        candidates.push({ modelName, confidence });
        break;
      }
    }
  }

  return candidates;
}

/**
 * Selects the names a question refers to, best match first.
 *
 * When at least one candidate reaches HIGH_CONFIDENCE only those are
 * returned; otherwise candidates at or above WEAK_CONFIDENCE. Ties keep
 * catalog order. Each name appears at most once.
 */
export function resolveNames(text: string, knownNames: Iterable<string>): string[] {
  const ranked = [...scoreNameMatches(text, knownNames)].sort((a, b) => b.confidence - a.confidence);

  const strong = ranked.filter(candidate => candidate.confidence >= HIGH_CONFIDENCE);
  const selected = strong.length > 0
    ? strong
    : ranked.filter(candidate => candidate.confidence >= WEAK_CONFIDENCE);

  return selected.map(candidate => candidate.modelName);
}
