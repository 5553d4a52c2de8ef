import type {
  Extractor,
  FallbackProvider,
  IntentHandler,
  OrderingStore,
  RecommendationProvider,
} from './types/index.js';
import type { OrderflowConfig } from './config.js';
import type { Logger } from './logging/logger.js';
import { silentLogger } from './logging/logger.js';
import { ItemValidator } from './validation/ItemValidator.js';
import { SuggestionProtocol } from './suggestions/SuggestionProtocol.js';
import { ClarificationEngine } from './clarification/ClarificationEngine.js';
import { IntentRouter } from './router/IntentRouter.js';
import { createDefaultHandlers } from './handlers/index.js';
import { MenuRecommender } from './recommendations/MenuRecommender.js';
import { Orchestrator } from './pipeline/Orchestrator.js';

export type AssistantSettings = Pick<
  OrderflowConfig,
  | 'DEFAULT_LANGUAGE'
  | 'HISTORY_LIMIT'
  | 'PROMPT_HISTORY_MESSAGES'
  | 'MAX_RECOMMENDATIONS'
  | 'MAX_CLARIFICATION_ATTEMPTS'
>;

export interface OrderAssistantConfig {
  store: OrderingStore;
  extractor: Extractor;
  fallbackProvider?: FallbackProvider | null;
  /** Defaults to a MenuRecommender over the store; pass null to disable */
  recommender?: RecommendationProvider | null;
  /** Registered after the built-in handlers */
  handlers?: IntentHandler[];
  settings?: Partial<AssistantSettings>;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Create a fully wired ordering assistant
 */
export function createOrderAssistant(config: OrderAssistantConfig): Orchestrator {
  const logger = config.logger ?? silentLogger;
  const settings = config.settings ?? {};
  const now = config.now ?? (() => new Date());

  const validator = new ItemValidator(config.store);
  const suggestions = new SuggestionProtocol(config.store, validator, { now });
  const router = new IntentRouter(
    [...createDefaultHandlers({ store: config.store, validator, suggestions }), ...(config.handlers ?? [])],
    logger.child('router')
  );
  router.lock();

  return new Orchestrator({
    store: config.store,
    extractor: config.extractor,
    router,
    clarification: new ClarificationEngine(config.store, { maxAttempts: settings.MAX_CLARIFICATION_ATTEMPTS }),
    recommender: config.recommender === undefined ? new MenuRecommender(config.store) : config.recommender,
    fallbackProvider: config.fallbackProvider ?? null,
    logger: logger.child('orchestrator'),
    defaultLanguage: settings.DEFAULT_LANGUAGE,
    historyLimit: settings.HISTORY_LIMIT,
    promptHistoryMessages: settings.PROMPT_HISTORY_MESSAGES,
    maxRecommendations: settings.MAX_RECOMMENDATIONS,
    now,
  });
}
