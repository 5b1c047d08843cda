/**
 * Matching rules between a question and one catalog name.
 *
 * Each rule is independent and returns a confidence or null. For a given
 * name the first rule that yields a confidence decides it.
 */

import {
  SERIES_PREFIX_TOKEN,
  SUFFIX_TOKENS,
  fineTokens,
  normalizeSuffix,
  normalizedTokens,
} from './tokenizer.js';

export const CONFIDENCE = {
  FULL_NAME: 100,
  CORE_NAME: 95,
  SERIES_EXACT: 90,
  SERIES_WEAK: 30,
  FOLDABLE_EXACT: 90,
  FOLDABLE_WEAK: 40,
} as const;

export interface QueryTokens {
  tokens: string[];
  fine: string[];
}

export interface NameForms {
  modelName: string;
  /** Name tokens without the brand word */
  full: string[];
  /** Full tokens without the series prefix */
  core: string[];
}

export interface NameRule {
  name: string;
  match(query: QueryTokens, candidate: NameForms): number | null;
}

export function toQueryTokens(text: string): QueryTokens {
  const tokens = normalizedTokens(text);
  return { tokens, fine: fineTokens(tokens) };
}

export function toNameForms(modelName: string): NameForms {
  const full = normalizedTokens(modelName);
  return {
    modelName,
    full,
    core: full.filter(token => token !== SERIES_PREFIX_TOKEN),
  };
}

/**
 * True when the phrase occurs as a whole token sequence and the occurrence
 * is not followed by a variant suffix the phrase itself lacks. That keeps
 * "s24" from matching a question about the "s24 ultra".
 */
export function containsPhrase(tokens: readonly string[], phrase: readonly string[]): boolean {
  if (phrase.length === 0 || phrase.length > tokens.length) {
    return false;
  }

  for (let start = 0; start + phrase.length <= tokens.length; start++) {
    const matches = phrase.every((token, offset) => tokens[start + offset] === token);
    if (!matches) {
      continue;
    }

    const next = tokens[start + phrase.length];
    const foreignSuffix = next !== undefined && SUFFIX_TOKENS.has(next) && !phrase.includes(next);
    if (!foreignSuffix) {
      return true;
    }
  }

  return false;
}

export interface SeriesModel {
  /** Letter plus number, e.g. "s24" */
  modelNumber: string;
  /** Normalized variant suffix, "" for the base model */
  suffix: string;
}

const MODEL_NUMBER_PATTERN = /^[a-z]\d+$/;
const CONNECTIVITY_TAG = '5g';

/**
 * Parses core names shaped like "s24", "s24 ultra", "s24 +" or "a54 5g".
 */
export function parseSeriesModel(core: readonly string[]): SeriesModel | null {
  const tokens = core[core.length - 1] === CONNECTIVITY_TAG ? core.slice(0, -1) : [...core];

  if (tokens.length === 0 || tokens.length > 2 || !MODEL_NUMBER_PATTERN.test(tokens[0])) {
    return null;
  }

  if (tokens.length === 2 && !SUFFIX_TOKENS.has(tokens[1])) {
    return null;
  }

  return {
    modelNumber: tokens[0],
    suffix: tokens.length === 2 ? normalizeSuffix(tokens[1]) : '',
  };
}

/**
 * Suffix following each mention of the model number in the question, in order.
 * A suffix may stand alone ("s24 ultra") or be glued on ("s24ultra").
 */
export function seriesMentions(tokens: readonly string[], modelNumber: string): string[] {
  const mentions: string[] = [];
  tokens.forEach((token, index) => {
    if (token === modelNumber) {
      const next = tokens[index + 1];
      mentions.push(next !== undefined && SUFFIX_TOKENS.has(next) ? normalizeSuffix(next) : '');
      return;
    }
    if (token.startsWith(modelNumber)) {
      const gluedSuffix = token.slice(modelNumber.length);
      if (SUFFIX_TOKENS.has(gluedSuffix)) {
        mentions.push(normalizeSuffix(gluedSuffix));
      }
    }
  });
  return mentions;
}

export type FoldableSeries = 'fold' | 'flip';

export interface FoldableModel {
  series: FoldableSeries;
  /** Generation number as written, "" when absent */
  generation: string;
  /** "fe" or "special", "" when absent */
  variant: string;
}

const FOLDABLE_VARIANTS: ReadonlySet<string> = new Set(['fe', 'special']);

function isFoldableSeries(token: string | undefined): token is FoldableSeries {
  return token === 'fold' || token === 'flip';
}

function isDigits(token: string | undefined): token is string {
  return token !== undefined && /^\d+$/.test(token);
}

/**
 * Reads "z <fold|flip> [generation] [fe|special]" starting at index.
 * Returns the model and the number of tokens consumed.
 */
function readFoldable(fine: readonly string[], index: number): { model: FoldableModel; length: number } | null {
  const series = fine[index + 1];
  if (fine[index] !== 'z' || !isFoldableSeries(series)) {
    return null;
  }

  let cursor = index + 2;
  let generation = '';
  const maybeGeneration = fine[cursor];
  if (isDigits(maybeGeneration)) {
    generation = maybeGeneration;
    cursor++;
  }

  let variant = '';
  const maybeVariant = fine[cursor];
  if (maybeVariant !== undefined && FOLDABLE_VARIANTS.has(maybeVariant)) {
    variant = maybeVariant;
    cursor++;
  }

  return { model: { series, generation, variant }, length: cursor - index };
}

/**
 * Parses a core name that is entirely a foldable model name.
 */
export function parseFoldableModel(core: readonly string[]): FoldableModel | null {
  const fine = fineTokens(core);
  const read = readFoldable(fine, 0);
  return read && read.length === fine.length ? read.model : null;
}

/**
 * First foldable mention of the given series in the question.
 */
export function firstFoldableMention(fine: readonly string[], series: FoldableSeries): FoldableModel | null {
  for (let index = 0; index < fine.length; index++) {
    const read = readFoldable(fine, index);
    if (read && read.model.series === series) {
      return read.model;
    }
  }
  return null;
}

export const fullNameRule: NameRule = {
  name: 'full-name',
  match: (query, candidate) =>
    containsPhrase(query.tokens, candidate.full) ? CONFIDENCE.FULL_NAME : null,
};

export const coreNameRule: NameRule = {
  name: 'core-name',
  match: (query, candidate) =>
    containsPhrase(query.tokens, candidate.core) ? CONFIDENCE.CORE_NAME : null,
};

/**
 * Number and suffix are compared separately. A suffix in the question that
 * the candidate lacks never matches; a candidate suffix the question omits
 * is only a weak match.
 */
export const seriesRule: NameRule = {
  name: 'series-suffix',
  match: (query, candidate) => {
    const model = parseSeriesModel(candidate.core);
    if (!model) {
      return null;
    }

    for (const mentionSuffix of seriesMentions(query.tokens, model.modelNumber)) {
      if (mentionSuffix === model.suffix) {
        return CONFIDENCE.SERIES_EXACT;
      }
      if (mentionSuffix === '' && model.suffix !== '') {
        return CONFIDENCE.SERIES_WEAK;
      }
    }
    return null;
  },
};

export const foldableRule: NameRule = {
  name: 'foldable',
  match: (query, candidate) => {
    const model = parseFoldableModel(candidate.core);
    if (!model) {
      return null;
    }

    const mention = firstFoldableMention(query.fine, model.series);
    if (!mention || mention.generation !== model.generation) {
      return null;
    }

    if (mention.variant === model.variant) {
      return CONFIDENCE.FOLDABLE_EXACT;
    }
    return mention.variant === '' ? CONFIDENCE.FOLDABLE_WEAK : null;
  },
};

export const NAME_RULES: readonly NameRule[] = [fullNameRule, coreNameRule, seriesRule, foldableRule];
