import type { PhoneRecord } from '../../catalog/index.js';
import type { CriteriaSet, Intent } from '../advisorTypes.js';

/**
 * Everything a generator sees about one question.
 */
export interface GenerationContext {
  question: string;
  intent: Intent;
  criteria: CriteriaSet;
  records: readonly PhoneRecord[];
}

/**
 * One way of producing answer text, e.g. one hosted model.
 * Implementations should pass the signal on to their transport.
 */
export interface GenerationStrategy {
  readonly name: string;
  generate(context: GenerationContext, signal: AbortSignal): Promise<string>;
}

export type GenerationFailureReason =
  | 'unavailable'
  | 'timeout'
  | 'rate_limited'
  | 'upstream_error'
  | 'empty_response';

export interface GenerationAttempt {
  strategy: string;
  ok: boolean;
  reason?: GenerationFailureReason;
  elapsedMs: number;
}

export type GenerationOutcome =
  | { ok: true; text: string; attempts: GenerationAttempt[] }
  | { ok: false; attempts: GenerationAttempt[] };
