/**
 * Tokenizer for model-name resolution.
 *
 * Text is lower-cased and cut into alphanumeric runs; "+" is kept as a token
 * of its own because it names the Plus variant ("S24+").
 */

const TOKEN_PATTERN = /[a-z0-9]+|\+/g;
const FINE_TOKEN_PATTERN = /[a-z]+|\d+/g;
const GLUED_FOLDABLE_PATTERN = /^z(fold|flip)$/;

/** Tokens that name a variant of a base model. */
export const SUFFIX_TOKENS: ReadonlySet<string> = new Set(['ultra', 'plus', '+', 'fe']);

/** Brand word dropped from both questions and catalog names. */
export const BRAND_TOKEN = 'samsung';

/** Series prefix dropped to form a model's core name. */
export const SERIES_PREFIX_TOKEN = 'galaxy';

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

/**
 * Tokens with the brand word removed.
 */
export function normalizedTokens(text: string): string[] {
  return tokenize(text).filter(token => token !== BRAND_TOKEN);
}

/**
 * Splits tokens further at letter/digit boundaries, so "fold6" and
 * "fold 6" read the same. A glued "zfold"/"zflip" becomes two tokens.
 */
export function fineTokens(tokens: readonly string[]): string[] {
  const result: string[] = [];
  for (const token of tokens) {
    for (const part of token.match(FINE_TOKEN_PATTERN) ?? []) {
      const glued = part.match(GLUED_FOLDABLE_PATTERN);
      if (glued) {
        result.push('z', glued[1]);
      } else {
        result.push(part);
      }
    }
  }
  return result;
}

/**
 * "+" and "plus" name the same variant.
 */
export function normalizeSuffix(token: string): string {
  return token === '+' ? 'plus' : token;
}
