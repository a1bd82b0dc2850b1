import { z } from 'zod';
import { config as loadEnv } from 'dotenv';

loadEnv();

const envSchema = z.object({
  PROJECT_NAME: z.string().default('appliance-parts-agent'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(8787),

  // Model provider. "openai" covers any OpenAI-compatible endpoint (e.g. DeepSeek).
  MODEL_PROVIDER: z.enum(['openai', 'azure']).default('openai'),
  OPENAI_BASE_URL: z.string().url().default('https://api.deepseek.com'),
  OPENAI_API_KEY: z.string().optional(),
  AZURE_OPENAI_ENDPOINT: z.string().url().optional(),
  AZURE_OPENAI_API_KEY: z.string().optional(),
  AZURE_OPENAI_API_VERSION: z.string().default('2024-10-21'),
  MODEL_STRUCTURED_OUTPUT: z.enum(['json_object', 'json_schema']).default('json_object'),

  MODEL_ANALYZER: z.string().default('deepseek-chat'),
  MODEL_DRAFTER: z.string().default('deepseek-chat'),
  MODEL_JUDGE: z.string().default('deepseek-chat'),
  MODEL_GRADER: z.string().default('deepseek-chat'),
  DRAFTER_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.4),
  DRAFTER_MAX_TOKENS: z.coerce.number().int().positive().default(1500),
  ANALYZER_MAX_HINTS: z.coerce.number().int().min(1).max(8).default(4),

  MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  MODEL_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(1),
  TOOL_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  TURN_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
  VALIDATION_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),

  AZURE_SEARCH_ENDPOINT: z.string().url().optional(),
  AZURE_SEARCH_API_KEY: z.string().optional(),
  AZURE_SEARCH_REPAIRS_INDEX: z.string().default('repairs'),
  AZURE_SEARCH_BLOGS_INDEX: z.string().default('blogs'),
  SEARCH_TOP_K: z.coerce.number().int().positive().default(5),
  RELEVANCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),
  RELEVANCE_GRADE_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  CATALOG_DB_PATH: z.string().default('./data/catalog.db'),
  CATALOG_MAX_ROWS: z.coerce.number().int().positive().default(5),
  SESSION_DB_PATH: z.string().default('./data/session-store.db'),
  SESSION_MAX_LIVE: z.coerce.number().int().positive().default(1000),
  SESSION_IDLE_TTL_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),

  RATE_LIMIT_WINDOW_MS: z.coerce.number().default(60000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().default(20),
  CORS_ORIGIN: z.string().default('http://localhost:5173'),
  OTEL_EXPORTER_OTLP_ENDPOINT: z.string().url().optional(),
  OTEL_SERVICE_NAME: z.string().default('appliance-parts-agent'),
  ENABLE_CONSOLE_TRACING: z
    .string()
    .optional()
    .transform((value) => value?.toLowerCase() === 'true'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
});

export const config = envSchema.parse(process.env);
export const isDevelopment = config.NODE_ENV === 'development';
export const isTest = config.NODE_ENV === 'test' || process.env.VITEST === 'true';
