import pino from 'pino';
import { config, type Config } from '../../config.js';
import { mapError, sanitizeForLogging } from '../../errors/index.js';
import { withTimeout } from '../../http/timeout.js';
import { OpenAiClient } from '../../openai/OpenAiClient.js';
import { OpenAiGenerationStrategy } from './OpenAiGenerationStrategy.js';
import type {
  GenerationAttempt,
  GenerationContext,
  GenerationFailureReason,
  GenerationOutcome,
  GenerationStrategy,
} from './generationTypes.js';

const logger = pino({ name: 'GenerationChain' });

/** Errors meaning the backend cannot be used at all right now. */
const UNAVAILABLE_ERROR_NAMES = new Set([
  'APIConnectionError',
  'AuthenticationError',
  'PermissionDeniedError',
]);

/**
 * Classifies a failed attempt.
 */
export function generationFailureReason(error: unknown): GenerationFailureReason {
  const appError = mapError(error);

  switch (appError.code) {
    case 'OPENAI_RATE_LIMIT':
      return 'rate_limited';
    case 'OPENAI_TIMEOUT':
    case 'TIMEOUT_OPERATION':
      return 'timeout';
    case 'OPENAI_EMPTY_RESPONSE':
      return 'empty_response';
    default:
      return error instanceof Error && UNAVAILABLE_ERROR_NAMES.has(error.name)
        ? 'unavailable'
        : 'upstream_error';
  }
}

export interface GenerationChainOptions {
  strategies: GenerationStrategy[];
  /** Bound on each strategy call */
  timeoutMs: number;
}

/**
 * Tries generation strategies in order until one produces text.
 *
 * Never rejects: every failure is recorded as an attempt and the caller
 * decides what to do with an unsuccessful outcome.
 */
export class GenerationChain {
  private readonly strategies: GenerationStrategy[];
  private readonly timeoutMs: number;

  constructor(options: GenerationChainOptions) {
    this.strategies = [...options.strategies];
    this.timeoutMs = options.timeoutMs;
  }

  get enabled(): boolean {
    return this.strategies.length > 0;
  }

  get strategyNames(): string[] {
    return this.strategies.map(strategy => strategy.name);
  }

  async generate(context: GenerationContext): Promise<GenerationOutcome> {
    const attempts: GenerationAttempt[] = [];

    for (const strategy of this.strategies) {
      const startTime = Date.now();

      try {
        const text = await withTimeout(
          signal => strategy.generate(context, signal),
          this.timeoutMs,
          `generate:${strategy.name}`
        );
        const elapsedMs = Date.now() - startTime;

        if (text.trim().length === 0) {
          attempts.push({ strategy: strategy.name, ok: false, reason: 'empty_response', elapsedMs });
          logger.warn({ strategy: strategy.name, reason: 'empty_response', elapsedMs }, 'Generation attempt failed');
          continue;
        }

        attempts.push({ strategy: strategy.name, ok: true, elapsedMs });
        return { ok: true, text: text.trim(), attempts };
      } catch (error) {
        const elapsedMs = Date.now() - startTime;
        const reason = generationFailureReason(error);
        attempts.push({ strategy: strategy.name, ok: false, reason, elapsedMs });

        const appError = mapError(error);
        logger.warn({
          strategy: strategy.name,
          reason,
          elapsedMs,
          code: appError.code,
          details: sanitizeForLogging(appError.details),
        }, 'Generation attempt failed');
      }
    }

    return { ok: false, attempts };
  }
}

/**
 * Chain over the configured OpenAI models: the primary model, then the
 * fallback model when one is set. Without an API key the chain is empty.
 */
export function createGenerationChain(cfg: Pick<Config, 'openai' | 'generator'> = config): GenerationChain {
  const { apiKey, model, fallbackModel, maxRetries } = cfg.openai;

  if (!apiKey) {
    return new GenerationChain({ strategies: [], timeoutMs: cfg.generator.timeoutMs });
  }

  const client = new OpenAiClient({
    apiKey,
    defaultModel: model,
    timeoutMs: cfg.generator.timeoutMs,
    maxRetries,
  });

  const models = fallbackModel && fallbackModel !== model ? [model, fallbackModel] : [model];
  const strategies = models.map(name => new OpenAiGenerationStrategy({
    client,
    model: name,
    maxTokens: cfg.generator.maxTokens,
  }));

  return new GenerationChain({ strategies, timeoutMs: cfg.generator.timeoutMs });
}
