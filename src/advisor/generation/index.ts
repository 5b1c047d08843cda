export { GenerationChain, createGenerationChain, generationFailureReason, type GenerationChainOptions } from './GenerationChain.js';
export { OpenAiGenerationStrategy, type OpenAiGenerationStrategyOptions } from './OpenAiGenerationStrategy.js';
export { buildPromptMessages, buildUserPrompt, MAX_PROMPT_RECORDS, SYSTEM_PROMPT } from './prompts.js';
export type {
  GenerationAttempt,
  GenerationContext,
  GenerationFailureReason,
  GenerationOutcome,
  GenerationStrategy,
} from './generationTypes.js';
