import type { FallbackProvider, Logger, OrderflowConfig } from '@orderflow/core';
import { ConfigError, silentLogger } from '@orderflow/core';
import type { LLMProvider } from './base/LLMProvider.js';
import { ClaudeProvider } from './claude/ClaudeProvider.js';
import { OllamaProvider } from './ollama/OllamaProvider.js';
import { OpenAIProvider } from './openai/OpenAIProvider.js';
import { LLMFallbackProvider } from './fallback/LLMFallbackProvider.js';
import { KeywordFallbackProvider } from './keyword/KeywordFallbackProvider.js';

/**
 * LLM client for the configured provider, or null for 'keyword' and 'none'
 */
export function createLLMProvider(config: OrderflowConfig): LLMProvider | null {
  switch (config.LLM_PROVIDER) {
    case 'openai':
      if (!config.OPENAI_API_KEY) throw new ConfigError('OPENAI_API_KEY is required for the openai provider');
      return new OpenAIProvider({
        apiKey: config.OPENAI_API_KEY,
        model: config.LLM_MODEL,
        baseURL: config.LLM_BASE_URL,
        timeout: config.LLM_TIMEOUT_MS,
      });
    case 'claude':
      if (!config.ANTHROPIC_API_KEY) throw new ConfigError('ANTHROPIC_API_KEY is required for the claude provider');
      return new ClaudeProvider({
        apiKey: config.ANTHROPIC_API_KEY,
        model: config.LLM_MODEL,
        timeout: config.LLM_TIMEOUT_MS,
      });
    case 'ollama':
      return new OllamaProvider({
        model: config.LLM_MODEL ?? 'llama3.1:8b',
        baseURL: config.LLM_BASE_URL,
        timeout: config.LLM_TIMEOUT_MS,
      });
    case 'keyword':
    case 'none':
      return null;
  }
}

/**
 * Fallback provider for the configured LLM_PROVIDER; null disables the fallback
 */
export function createFallbackProvider(
  config: OrderflowConfig,
  logger: Logger = silentLogger
): FallbackProvider | null {
  if (config.LLM_PROVIDER === 'none') return null;
  if (config.LLM_PROVIDER === 'keyword') return new KeywordFallbackProvider();

  const llm = createLLMProvider(config);
  if (!llm) return null;

  logger.info('Using LLM fallback provider', { provider: llm.name, model: config.LLM_MODEL ?? 'default' });
  return new LLMFallbackProvider(llm, { temperature: config.LLM_TEMPERATURE, logger: logger.child(llm.name) });
}
