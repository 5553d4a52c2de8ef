// Base provider interface
export * from './base/LLMProvider.js';

// Claude provider
export { ClaudeProvider, type ClaudeProviderConfig } from './claude/ClaudeProvider.js';

// OpenAI provider
export { OpenAIProvider, type OpenAIProviderConfig } from './openai/OpenAIProvider.js';

// Ollama provider
export { OllamaProvider, type OllamaProviderConfig } from './ollama/OllamaProvider.js';

// Fallback providers for the dialogue engine
export {
  LLMFallbackProvider,
  IntentArgumentsSchema,
  buildIntentTools,
  type LLMFallbackProviderConfig,
} from './fallback/LLMFallbackProvider.js';
export { buildExtractionPrompt, buildReplyPrompt, INTENT_DESCRIPTIONS } from './fallback/prompts.js';
export {
  KeywordFallbackProvider,
  loadDefaultCorpus,
  type IntentCorpus,
  type KeywordFallbackProviderConfig,
} from './keyword/KeywordFallbackProvider.js';

// Factory
export { createFallbackProvider, createLLMProvider } from './factory.js';
