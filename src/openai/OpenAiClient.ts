import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { config } from '../config.js';
import pino from 'pino';

const logger = pino({ name: 'OpenAiClient' });

export interface CompleteInput {
  messages: ChatCompletionMessageParam[];
  model?: string;
  maxTokens?: number;
  /** Aborts the request; the SDK rejects with APIUserAbortError */
  signal?: AbortSignal;
}

export interface CompletionResult {
  content: string | null;
  model: string;
  finishReason: string | null;
}

export interface OpenAiClientOptions {
  apiKey: string;
  defaultModel?: string;
  /** Per-request timeout passed to the SDK */
  timeoutMs?: number;
  maxRetries?: number;
}

/**
 * Thin wrapper around the OpenAI chat completions API.
 *
 * Keeps SDK usage in one place so the generation strategies can be tested
 * against a mocked client. Retries default to the configured count (0),
 * because the generation chain already falls through to the next model.
 */
export class OpenAiClient {
  private readonly client: OpenAI;
  private readonly defaultModel: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;

  constructor(options: OpenAiClientOptions) {
    this.timeoutMs = options.timeoutMs ?? config.generator.timeoutMs;
    this.maxRetries = options.maxRetries ?? config.openai.maxRetries;

    this.client = new OpenAI({
      apiKey: options.apiKey,
      timeout: this.timeoutMs,
      maxRetries: this.maxRetries,
    });
    this.defaultModel = options.defaultModel ?? 'gpt-4o-mini';

    if (config.debug) {
      logger.debug({
        defaultModel: this.defaultModel,
        timeoutMs: this.timeoutMs,
        maxRetries: this.maxRetries,
      }, 'OpenAI client initialized');
    }
  }

  /**
   * Run a single chat completion and return the first choice.
   */
  async complete(input: CompleteInput): Promise<CompletionResult> {
    const model = input.model ?? this.defaultModel;
    const startTime = Date.now();

    if (config.debug) {
      logger.debug({ model, messageCount: input.messages.length }, 'OpenAI request starting');
    }

    try {
      const response = await this.client.chat.completions.create(
        {
          model,
          messages: input.messages,
          max_tokens: input.maxTokens,
        },
        {
          timeout: this.timeoutMs,
          maxRetries: this.maxRetries,
          signal: input.signal,
        }
      );

      const choice = response.choices[0];

      if (config.debug) {
        logger.debug({
          model,
          elapsedMs: Date.now() - startTime,
          finishReason: choice?.finish_reason,
        }, 'OpenAI request completed');
      }

      return {
        content: choice?.message.content ?? null,
        model,
        finishReason: choice?.finish_reason ?? null,
      };
    } catch (error) {
      const errorInfo = error instanceof Error ? {
        name: error.name,
        message: error.message,
        status: readStatus(error),
      } : { message: String(error) };

      logger.error({
        model,
        elapsedMs: Date.now() - startTime,
        configuredTimeoutMs: this.timeoutMs,
        error: errorInfo,
      }, 'OpenAI request failed');

      throw error;
    }
  }
}

function readStatus(error: Error): number | undefined {
  return 'status' in error && typeof error.status === 'number' ? error.status : undefined;
}
