import dotenv from 'dotenv';
import { z } from 'zod';

const isTestRuntime =
  process.env.NODE_ENV === 'test' ||
  process.env.VITEST === 'true' ||
  process.env.VITEST_WORKER_ID !== undefined;

if (!isTestRuntime) {
  dotenv.config();
}

const httpsUrlSchema = z.string().trim().url().refine((value) => {
  try {
    return new URL(value).protocol === 'https:';
  } catch {
    return false;
  }
}, 'Must be an HTTPS URL.');

const booleanFlag = (fallback: 'true' | 'false') =>
  z.enum(['true', 'false']).default(fallback).transform((v) => v === 'true');

const testDefaults: Record<string, string> = {
  NODE_ENV: 'test',
  LOG_LEVEL: 'info',
  LLM_BASE_URL: 'https://llm.test.invalid/v1',
  LLM_API_KEY: 'test-secret',
  CHAT_MODEL: 'test-chat-model',
  SUMMARIZER_MODEL: 'test-summarizer-model',
  TAVILY_API_KEY: '',
  NCBI_API_KEY: '',
  LAB_HISTORY_PATH: 'data/lab-history.json',
  RUN_ARCHIVE_PATH: '',
  TOOL_CACHE_TTL_SEC: '60',
  PRIORITIZE_TIMEOUT_MS: '30000',
  CORS_ALLOWED_ORIGINS: 'http://localhost:3000',
};

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Reasoning model (OpenAI-compatible chat completions)
  LLM_BASE_URL: httpsUrlSchema.default('https://generativelanguage.googleapis.com/v1beta/openai'),
  LLM_API_KEY: z.string().optional(),
  CHAT_MODEL: z.string().min(1).default('gemini-2.5-flash'),
  SUMMARIZER_MODEL: z.string().min(1).default('gemini-2.5-flash-lite'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.5),
  LLM_TIMEOUT_MS: z.coerce.number().int().min(1000).max(600000).default(120000),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),

  // Tool gateway
  TOOL_CACHE_TTL_SEC: z.coerce.number().int().min(1).max(604800).default(86400),
  TOOL_CACHE_MAX_ENTRIES: z.coerce.number().int().min(1).max(100000).default(5000),
  RATE_LIMIT_MAX_WAIT_MS: z.coerce.number().int().min(0).max(600000).default(30000),
  PROVIDER_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(8).default(3),
  PROVIDER_BASE_DELAY_MS: z.coerce.number().int().min(1).max(60000).default(500),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().min(1000).max(180000).default(30000),
  CHEMBL_RATE_LIMIT_MAX: z.coerce.number().int().min(1).max(1000).default(2),
  CHEMBL_RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1).max(3600000).default(1000),
  PUBCHEM_RATE_LIMIT_MAX: z.coerce.number().int().min(1).max(1000).default(2),
  PUBCHEM_RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1).max(3600000).default(1000),
  PUBMED_RATE_LIMIT_MAX: z.coerce.number().int().min(1).max(1000).default(1),
  PUBMED_RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1).max(3600000).default(1000),
  WEB_RATE_LIMIT_MAX: z.coerce.number().int().min(1).max(1000).default(5),
  WEB_RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1).max(3600000).default(1000),
  LAB_RATE_LIMIT_MAX: z.coerce.number().int().min(1).max(10000).default(100),
  LAB_RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1).max(3600000).default(1000),

  // Agents
  AGENT_MAX_STEPS: z.coerce.number().int().min(1).max(20).default(5),
  AGENT_MAX_RECOVERIES: z.coerce.number().int().min(0).max(5).default(2),
  AGENT_DEGRADED_CONFIDENCE_FACTOR: z.coerce.number().min(0).max(1).default(0.5),
  AGENT_OBSERVATION_MAX_CHARS: z.coerce.number().int().min(500).max(50000).default(6000),
  SUMMARIZER_ENABLED: booleanFlag('true'),
  SUMMARIZER_MIN_CHARS: z.coerce.number().int().min(0).max(100000).default(1500),
  PRIORITIZE_TIMEOUT_MS: z.coerce.number().int().min(1000).max(3600000).default(600000),
  BATCH_MAX_PARALLEL: z.coerce.number().int().min(1).max(16).default(2),

  // Providers
  CHEMBL_BASE_URL: httpsUrlSchema.default('https://www.ebi.ac.uk/chembl/api/data'),
  PUBCHEM_BASE_URL: httpsUrlSchema.default('https://pubchem.ncbi.nlm.nih.gov/rest/pug'),
  PUBMED_BASE_URL: httpsUrlSchema.default('https://eutils.ncbi.nlm.nih.gov/entrez/eutils'),
  TAVILY_SEARCH_URL: httpsUrlSchema.default('https://api.tavily.com/search'),
  TAVILY_API_KEY: z.string().optional(),
  NCBI_API_KEY: z.string().optional(),
  LAB_HISTORY_PATH: z.string().default('data/lab-history.json'),
  RUN_ARCHIVE_PATH: z.string().default('data/run-archive.jsonl'),

  // Inbound HTTP
  HTTP_HOST: z.string().default('127.0.0.1'),
  HTTP_PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  // Comma-separated browser origins allowed to call the API; "*" allows any
  CORS_ALLOWED_ORIGINS: z
    .string()
    .default('http://localhost:3000')
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
    ),
});

const mergedEnv = {
  ...(isTestRuntime ? testDefaults : {}),
  ...process.env,
};

const parsed = envSchema.safeParse(mergedEnv);

if (!parsed.success) {
  console.error('Invalid environment configuration:', parsed.error.format());
  process.exit(1);
}

export const config = {
  ...parsed.data,
  isDev: parsed.data.NODE_ENV === 'development',
  isProd: parsed.data.NODE_ENV === 'production',
};

export type AppConfig = typeof config;
