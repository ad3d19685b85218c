import { z } from 'zod';
import { ConfigurationError } from '@/lib/utils/errors';
import { logger } from '@/lib/utils/logger';

const optionalString = z.string().trim().min(1).optional().catch(undefined);

// Environment variables validation
export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).optional(),
  SERPAPI_API_KEY: z.string({ required_error: 'SERPAPI_API_KEY is required' }).trim().min(1, 'SERPAPI_API_KEY is required'),
  LLM_PROVIDER: z.enum(['gemini', 'openai']).default('gemini'),
  GOOGLE_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  LLM_MODEL: optionalString,
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  HTTP_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(1),
}).superRefine((env, ctx) => {
  if (env.LLM_PROVIDER === 'gemini' && !env.GOOGLE_API_KEY) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['GOOGLE_API_KEY'], message: 'GOOGLE_API_KEY is required when LLM_PROVIDER is gemini' });
  }
  if (env.LLM_PROVIDER === 'openai' && !env.OPENAI_API_KEY) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['OPENAI_API_KEY'], message: 'OPENAI_API_KEY is required when LLM_PROVIDER is openai' });
  }
});

export type LLMConfig =
  | { provider: 'gemini'; apiKey: string; model: string }
  | { provider: 'openai'; apiKey: string; model: string; baseUrl: string };

export type AppConfig = {
  serpApiKey: string;
  llm: LLMConfig;
  fetchTimeoutMs: number;
  httpMaxAttempts: number;
};

export const DEFAULT_MODELS = {
  gemini: 'gemini-2.0-flash',
  openai: 'gpt-4o-mini',
} as const;

export function loadConfig(env: Partial<NodeJS.ProcessEnv> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => issue.message);
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, {
      variables: parsed.error.issues.map((issue) => issue.path.join('.')),
    });
  }

  const data = parsed.data;
  const llm: LLMConfig = data.LLM_PROVIDER === 'openai'
    ? {
        provider: 'openai',
        apiKey: data.OPENAI_API_KEY ?? '',
        model: data.LLM_MODEL ?? DEFAULT_MODELS.openai,
        baseUrl: data.OPENAI_BASE_URL.replace(/\/+$/, ''),
      }
    : {
        provider: 'gemini',
        apiKey: data.GOOGLE_API_KEY ?? '',
        model: data.LLM_MODEL ?? DEFAULT_MODELS.gemini,
      };

  return {
    serpApiKey: data.SERPAPI_API_KEY,
    llm,
    fetchTimeoutMs: data.FETCH_TIMEOUT_MS,
    httpMaxAttempts: data.HTTP_MAX_ATTEMPTS,
  };
}

let cached: AppConfig | undefined;

export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
    logger.info('Configuration loaded', {
      component: 'config',
      provider: cached.llm.provider,
      model: cached.llm.model,
      fetchTimeoutMs: cached.fetchTimeoutMs,
      httpMaxAttempts: cached.httpMaxAttempts,
    });
  }
  return cached;
}
