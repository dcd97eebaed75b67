import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// Defaults to the repository-level data folder, next to the uploads
const defaultDbPath = path.join(__dirname, '../../../data/statements.db');

const numberFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: numberFromEnv(3001),
  FRONTEND_URL: z.string().url().optional(),
  DATABASE_PATH: z.string().min(1).default(defaultDbPath),
  ANTHROPIC_API_KEY: z.string().optional(),
  LLM_MODEL: z.string().min(1).default('claude-sonnet-4-20250514'),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  LLM_TIMEOUT_MS: numberFromEnv(30_000),
  ENRICHMENT_WATCHDOG_MS: numberFromEnv(120_000),
  ENRICHMENT_JOB_RETENTION_MS: numberFromEnv(300_000),
  PROGRESS_TTL_MS: numberFromEnv(900_000),
});

export interface AppConfig {
  server: {
    port: number;
    isProduction: boolean;
    frontendUrl?: string;
  };
  database: {
    path: string;
  };
  llm: {
    apiKey?: string;
    model: string;
    maxRetries: number;
    timeoutMs: number;
  };
  enrichment: {
    watchdogMs: number;
    jobRetentionMs: number;
  };
  progress: {
    ttlMs: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const values = parsed.data;

  return {
    server: {
      port: values.PORT,
      isProduction: values.NODE_ENV === 'production',
      frontendUrl: values.FRONTEND_URL,
    },
    database: {
      path: values.DATABASE_PATH,
    },
    llm: {
      // An empty string in .env means "not configured"
      apiKey: values.ANTHROPIC_API_KEY?.trim() || undefined,
      model: values.LLM_MODEL,
      maxRetries: values.LLM_MAX_RETRIES,
      timeoutMs: values.LLM_TIMEOUT_MS,
    },
    enrichment: {
      watchdogMs: values.ENRICHMENT_WATCHDOG_MS,
      jobRetentionMs: values.ENRICHMENT_JOB_RETENTION_MS,
    },
    progress: {
      ttlMs: values.PROGRESS_TTL_MS,
    },
  };
}
