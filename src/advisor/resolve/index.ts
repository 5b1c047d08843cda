export { resolveNames, scoreNameMatches, HIGH_CONFIDENCE, WEAK_CONFIDENCE } from './resolveNames.js';
export { NAME_RULES, CONFIDENCE, type NameRule } from './nameRules.js';
export { tokenize, normalizedTokens } from './tokenizer.js';
