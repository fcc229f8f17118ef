/**
 * Application Configuration
 *
 * Parses process.env once into a typed AppConfig. The entry point loads
 * .env with dotenv before calling loadConfig(); nothing else in the
 * service reads process.env directly, except the logger's level check.
 */

import { z } from 'zod';

const envBool = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const optionalString = z
  .string()
  .transform((value) => value.trim())
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  CORS_ORIGINS: z.string().default('*'),

  DATABASE_URL: optionalString,
  DB_POOL_SIZE: z.coerce.number().int().positive().max(100).default(10),

  JWT_SECRET: optionalString,

  USE_STAND_INS: envBool.default('false'),
  CALL_FALLBACK_ENABLED: envBool.default('true'),
  DEMOTE_AFTER_FAILURES: z.coerce.number().int().min(0).default(0),

  SEARCH_ENDPOINT: optionalString,
  SEARCH_API_KEY: optionalString,
  SEARCH_INDEX: optionalString,
  SEARCH_API_VERSION: z.string().default('2023-11-01'),
  SEARCH_CONTENT_FIELD: z.string().default('content'),
  SEARCH_SOURCE_FIELD: z.string().default('sourcepage'),
  SEARCH_TITLE_FIELD: z.string().default('title'),
  SEARCH_TOP_K: z.coerce.number().int().min(1).max(50).default(5),
  SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),

  GENERATION_BASE_URL: z.string().url().default('https://api.openai.com'),
  GENERATION_API_KEY: optionalString,
  GENERATION_MODEL: optionalString,
  GENERATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  GENERATION_MAX_TOKENS: z.coerce.number().int().positive().default(1_024),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  RATE_LIMIT_CHAT_PER_MINUTE: z.coerce.number().int().positive().default(30),
});

export interface SearchBackendConfig {
  endpoint?: string;
  apiKey?: string;
  index?: string;
  apiVersion: string;
  contentField: string;
  sourceField: string;
  titleField: string;
}

export interface GenerationBackendConfig {
  baseUrl: string;
  apiKey?: string;
  model?: string;
  maxTokens: number;
}

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  corsOrigins: string[];
  databaseUrl?: string;
  dbPoolSize: number;
  jwtSecret?: string;
  useStandIns: boolean;
  resilience: {
    callFallback: boolean;
    demoteAfterFailures: number;
    searchTimeoutMs: number;
    generationTimeoutMs: number;
  };
  search: SearchBackendConfig & { topK: number };
  generation: GenerationBackendConfig & { temperature: number };
  rateLimit: {
    chatPerMinute: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    corsOrigins: parsed.CORS_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean),
    databaseUrl: parsed.DATABASE_URL,
    dbPoolSize: parsed.DB_POOL_SIZE,
    jwtSecret: parsed.JWT_SECRET,
    useStandIns: parsed.USE_STAND_INS,
    resilience: {
      callFallback: parsed.CALL_FALLBACK_ENABLED,
      demoteAfterFailures: parsed.DEMOTE_AFTER_FAILURES,
      searchTimeoutMs: parsed.SEARCH_TIMEOUT_MS,
      generationTimeoutMs: parsed.GENERATION_TIMEOUT_MS,
    },
    search: {
      endpoint: parsed.SEARCH_ENDPOINT,
      apiKey: parsed.SEARCH_API_KEY,
      index: parsed.SEARCH_INDEX,
      apiVersion: parsed.SEARCH_API_VERSION,
      contentField: parsed.SEARCH_CONTENT_FIELD,
      sourceField: parsed.SEARCH_SOURCE_FIELD,
      titleField: parsed.SEARCH_TITLE_FIELD,
      topK: parsed.SEARCH_TOP_K,
    },
    generation: {
      baseUrl: parsed.GENERATION_BASE_URL,
      apiKey: parsed.GENERATION_API_KEY,
      model: parsed.GENERATION_MODEL,
      maxTokens: parsed.GENERATION_MAX_TOKENS,
      temperature: parsed.GENERATION_TEMPERATURE,
    },
    rateLimit: {
      chatPerMinute: parsed.RATE_LIMIT_CHAT_PER_MINUTE,
    },
  };
}
