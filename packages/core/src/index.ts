// Core types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Configuration and logging
export { ConfigSchema, loadConfig } from './config.js';
export type { OrderflowConfig } from './config.js';
export { createLogger, silentLogger } from './logging/logger.js';
export type { Logger, LoggerOptions, LogLevel } from './logging/logger.js';

// Text normalization
export {
  FILLER_WORDS,
  SIZE_WORDS,
  WORD_NUMBERS,
  cleanItemName,
  collapseSpaces,
  extractSize,
  sizeFromToken,
  sizeLabel,
  takeLeadingQuantity,
} from './domain/normalize.js';

// Validation
export { ItemValidator } from './validation/ItemValidator.js';
export type { ItemValidation, ItemValidationFailure, ItemValidatorConfig } from './validation/ItemValidator.js';
export {
  EntitiesSchema,
  FallbackExtractionSchema,
  IntentSchema,
  MenuItemSchema,
  MenuSizeSchema,
  parseMenu,
  sanitizeExtraction,
} from './validation/schemas.js';

// Dialogue context
export {
  EMPTY_CART,
  createContext,
  historyText,
  updateContext,
  withExtraction,
  withHandlerResult,
} from './context/DialogueContext.js';

// Messages
export { CURRENCY, messagesFor } from './i18n/messages.js';
export type { MessageCatalog } from './i18n/messages.js';

// Clarification and suggestions
export { ClarificationEngine, SINGLE_SIZE_KEYWORDS } from './clarification/ClarificationEngine.js';
export type {
  Clarification,
  ClarificationCheck,
  ClarificationEngineConfig,
  PendingResolution,
} from './clarification/ClarificationEngine.js';
export { SuggestionProtocol, SUGGESTION_TTL_MS } from './suggestions/SuggestionProtocol.js';
export type { SuggestionOutcome, SuggestionProtocolConfig } from './suggestions/SuggestionProtocol.js';

// Handlers and routing
export * from './handlers/index.js';
export { IntentRouter } from './router/IntentRouter.js';

// Pipeline
export { Orchestrator, buildReplyContext } from './pipeline/Orchestrator.js';
export type { OrchestratorConfig } from './pipeline/Orchestrator.js';
export { REPLY_POLICY, replyModeFor } from './pipeline/ReplyPolicy.js';
export type { ReplyMode } from './pipeline/ReplyPolicy.js';

// Stores and recommendations
export { InMemoryOrderingStore } from './store/InMemoryOrderingStore.js';
export type { InMemoryOrderingStoreConfig } from './store/InMemoryOrderingStore.js';
export { MenuRecommender } from './recommendations/MenuRecommender.js';

// Factory
export { createOrderAssistant } from './factory.js';
export type { AssistantSettings, OrderAssistantConfig } from './factory.js';
