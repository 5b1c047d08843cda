export { PhoneAdvisor, MAX_PRICE_FILTER_RECORDS, type PhoneAdvisorOptions, type AnswerResult } from './PhoneAdvisor.js';
export { classifyQuery } from './criteria/classifyQuery.js';
export { resolveNames, scoreNameMatches } from './resolve/index.js';
export { scorePhone, rankPhones } from './rank/scorePhone.js';
export { diffPhones } from './compare/diffPhones.js';
export { renderFallback, NO_PHONES_MESSAGE } from './render/fallbackTemplates.js';
export { createGenerationChain, GenerationChain } from './generation/index.js';
export type * from './advisorTypes.js';
