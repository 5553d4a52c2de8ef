import { z } from 'zod';
import { ConfigError } from './errors/index.js';

const numberFromEnv = (fallback: number) =>
  z.preprocess((value) => (value === undefined || value === '' ? undefined : Number(value)), z.number().finite().default(fallback));

export const ConfigSchema = z.object({
  LLM_PROVIDER: z.enum(['openai', 'claude', 'ollama', 'keyword', 'none']).default('none'),
  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  LLM_MODEL: z.string().optional(),
  LLM_BASE_URL: z.string().url().optional(),
  LLM_TEMPERATURE: numberFromEnv(0.1).pipe(z.number().min(0).max(2)),
  LLM_TIMEOUT_MS: numberFromEnv(30000).pipe(z.number().int().positive()),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  DEFAULT_LANGUAGE: z.enum(['en', 'ar']).default('en'),
  HISTORY_LIMIT: numberFromEnv(20).pipe(z.number().int().positive()),
  PROMPT_HISTORY_MESSAGES: numberFromEnv(10).pipe(z.number().int().nonnegative()),
  MAX_RECOMMENDATIONS: numberFromEnv(2).pipe(z.number().int().nonnegative()),
  MAX_CLARIFICATION_ATTEMPTS: numberFromEnv(3).pipe(z.number().int().positive()),
});

export type OrderflowConfig = z.infer<typeof ConfigSchema>;

/**
 * Parse configuration from environment-style key/value pairs
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): OrderflowConfig {
  const parsed = ConfigSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  const config = parsed.data;
  if (config.LLM_PROVIDER === 'openai' && !config.OPENAI_API_KEY) {
    throw new ConfigError('OPENAI_API_KEY is required when LLM_PROVIDER is "openai"');
  }
  if (config.LLM_PROVIDER === 'claude' && !config.ANTHROPIC_API_KEY) {
    throw new ConfigError('ANTHROPIC_API_KEY is required when LLM_PROVIDER is "claude"');
  }

  return config;
}
