import { AppError } from '../../errors/index.js';
import type { OpenAiClient } from '../../openai/OpenAiClient.js';
import { buildPromptMessages } from './prompts.js';
import type { GenerationContext, GenerationStrategy } from './generationTypes.js';

export interface OpenAiGenerationStrategyOptions {
  client: OpenAiClient;
  model: string;
  maxTokens: number;
}

/**
 * Generates answers with one OpenAI chat model.
 */
export class OpenAiGenerationStrategy implements GenerationStrategy {
  readonly name: string;
  private readonly client: OpenAiClient;
  private readonly model: string;
  private readonly maxTokens: number;

  constructor(options: OpenAiGenerationStrategyOptions) {
    this.client = options.client;
    this.model = options.model;
    this.maxTokens = options.maxTokens;
    this.name = `openai:${options.model}`;
  }

  async generate(context: GenerationContext, signal: AbortSignal): Promise<string> {
    const result = await this.client.complete({
      messages: buildPromptMessages(context),
      model: this.model,
      maxTokens: this.maxTokens,
      signal,
    });

    const text = result.content?.trim() ?? '';
    if (text.length === 0) {
      throw AppError.openaiEmptyResponse(this.model);
    }
    return text;
  }
}
