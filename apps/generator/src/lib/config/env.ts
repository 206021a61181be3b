import { z } from 'zod';
import { parseLogLevel, type LogLevel } from '../observability/logger';

const integerString = (fallback: string) => z
  .string()
  .regex(/^\d+$/)
  .default(fallback)
  .transform((v) => Number(v));

const optionalSecret = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : null));

const generatorEnvSchema = z.object({
  AI_PROVIDER: z
    .string()
    .default('gemini')
    .transform((v) => v.trim().toLowerCase())
    .pipe(z.enum(['gemini', 'openai', 'none'])),
  GEMINI_API_KEY: optionalSecret,
  GEMINI_MODEL: z.string().min(1).default('gemini-2.0-flash'),
  OPENAI_API_KEY: optionalSecret,
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  MODEL_TIMEOUT_MS: integerString('45000'),
  MODEL_MAX_RETRIES: integerString('1'),
  MODEL_RETRY_BASE_MS: integerString('250'),
  QUESTION_BATCH_SIZE: integerString('3'),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: optionalSecret,
  APP_LOG_LEVEL: z
    .string()
    .optional()
    .refine((v) => v === undefined || parseLogLevel(v) !== null, 'must be debug, info, warn or error')
    .transform((v) => parseLogLevel(v)),
});

export type GeneratorEnv = z.output<typeof generatorEnvSchema>;
export type ProviderName = GeneratorEnv['AI_PROVIDER'];

export interface GeneratorConfig {
  provider: ProviderName;
  gemini: { apiKey: string | null; model: string };
  openai: { apiKey: string | null; model: string };
  timeoutMs: number;
  maxRetries: number;
  retryBaseMs: number;
  questionBatchSize: number;
  supabase: { url: string; serviceRoleKey: string } | null;
  logLevel: LogLevel | null;
}

export function loadGeneratorConfig(env: NodeJS.ProcessEnv = process.env): GeneratorConfig {
  const parsed = generatorEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid generator env: ${parsed.error.message}`);
  }
  const data = parsed.data;
  if (data.QUESTION_BATCH_SIZE < 1 || data.QUESTION_BATCH_SIZE > 10) {
    throw new Error('Invalid generator env: QUESTION_BATCH_SIZE must be between 1 and 10');
  }
  return {
    provider: data.AI_PROVIDER,
    gemini: { apiKey: data.GEMINI_API_KEY, model: data.GEMINI_MODEL },
    openai: { apiKey: data.OPENAI_API_KEY, model: data.OPENAI_MODEL },
    timeoutMs: data.MODEL_TIMEOUT_MS,
    maxRetries: data.MODEL_MAX_RETRIES,
    retryBaseMs: data.MODEL_RETRY_BASE_MS,
    questionBatchSize: data.QUESTION_BATCH_SIZE,
    supabase: data.SUPABASE_URL && data.SUPABASE_SERVICE_ROLE_KEY
      ? { url: data.SUPABASE_URL, serviceRoleKey: data.SUPABASE_SERVICE_ROLE_KEY }
      : null,
    logLevel: data.APP_LOG_LEVEL,
  };
}
