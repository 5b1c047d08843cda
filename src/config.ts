import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenvConfig();

/**
 * Schema for validating environment variables.
 * Every variable has a default, so the service starts with an empty environment
 * (no generator, in-memory catalog from the bundled seed file).
 */
const configSchema = z.object({
  // Server
  PORT: z.string().default('3000'),

  // OpenAI (optional - without a key every answer is rendered from templates)
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  // Secondary model tried when the primary model fails
  OPENAI_FALLBACK_MODEL: z.string().optional(),
  OPENAI_MAX_RETRIES: z.string().default('0'),

  // Generator bounds
  GENERATOR_TIMEOUT_MS: z.string().default('15000'),
  ANSWER_MAX_TOKENS: z.string().default('400'),

  // Catalog
  CATALOG_STORE: z.enum(['memory', 'sqlite']).default('memory'),
  CATALOG_SEED_PATH: z.string().default('data/phones.json'),
  CATALOG_SQLITE_PATH: z.string().default('data/catalog.db'),

  // CORS configuration ("*" allows every origin)
  CORS_ORIGINS: z.string().default('*'),

  // Request limits
  BODY_LIMIT_BYTES: z.string().default('16384'),
  MIN_QUESTION_CHARS: z.string().default('3'),
  MAX_QUESTION_CHARS: z.string().default('2000'),

  DEBUG: z.string().default('0'),
});

/**
 * Parse and validate environment variables.
 * Throws a descriptive error if validation fails.
 */
function parseConfig() {
  try {
    return configSchema.parse({
      PORT: process.env.PORT,
      OPENAI_API_KEY: process.env.OPENAI_API_KEY,
      OPENAI_MODEL: process.env.OPENAI_MODEL,
      OPENAI_FALLBACK_MODEL: process.env.OPENAI_FALLBACK_MODEL,
      OPENAI_MAX_RETRIES: process.env.OPENAI_MAX_RETRIES,
      GENERATOR_TIMEOUT_MS: process.env.GENERATOR_TIMEOUT_MS,
      ANSWER_MAX_TOKENS: process.env.ANSWER_MAX_TOKENS,
      CATALOG_STORE: process.env.CATALOG_STORE,
      CATALOG_SEED_PATH: process.env.CATALOG_SEED_PATH,
      CATALOG_SQLITE_PATH: process.env.CATALOG_SQLITE_PATH,
      CORS_ORIGINS: process.env.CORS_ORIGINS,
      BODY_LIMIT_BYTES: process.env.BODY_LIMIT_BYTES,
      MIN_QUESTION_CHARS: process.env.MIN_QUESTION_CHARS,
      MAX_QUESTION_CHARS: process.env.MAX_QUESTION_CHARS,
      DEBUG: process.env.DEBUG,
    });
  } catch (error) {
    if (error instanceof z.ZodError) {
      const messages = error.issues.map((err) => `  - ${err.path.join('.')}: ${err.message}`);
      throw new Error(`Configuration validation failed:\n${messages.join('\n')}`);
    }
    throw error;
  }
}

const env = parseConfig();

const apiKey = (env.OPENAI_API_KEY ?? '').trim();
const fallbackModel = (env.OPENAI_FALLBACK_MODEL ?? '').trim();

/**
 * Typed configuration object exported for use throughout the application.
 */
export const config = {
  port: parseInt(env.PORT, 10),

  openai: {
    // Empty key means the generator is disabled
    apiKey: apiKey.length > 0 ? apiKey : undefined,
    model: env.OPENAI_MODEL,
    fallbackModel: fallbackModel.length > 0 ? fallbackModel : undefined,
    maxRetries: parseInt(env.OPENAI_MAX_RETRIES, 10),
  },

  generator: {
    enabled: apiKey.length > 0,
    timeoutMs: parseInt(env.GENERATOR_TIMEOUT_MS, 10),
    maxTokens: parseInt(env.ANSWER_MAX_TOKENS, 10),
  },

  catalog: {
    store: env.CATALOG_STORE,
    seedPath: env.CATALOG_SEED_PATH,
    sqlitePath: env.CATALOG_SQLITE_PATH,
  },

  cors: {
    origins: env.CORS_ORIGINS.split(',').map(origin => origin.trim()).filter(origin => origin.length > 0),
  },

  limits: {
    bodyLimitBytes: parseInt(env.BODY_LIMIT_BYTES, 10),
    minQuestionChars: parseInt(env.MIN_QUESTION_CHARS, 10),
    maxQuestionChars: parseInt(env.MAX_QUESTION_CHARS, 10),
  },

  debug: env.DEBUG === '1' || env.DEBUG === 'true',
} as const;

export type Config = typeof config;
