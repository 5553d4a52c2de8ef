import type {
  DialogueContext,
  Extractor,
  FallbackProvider,
  Intent,
  Language,
  OrderingStore,
  RecommendationProvider,
  ResponseEnvelope,
  TraceEvent,
} from '../types/index.js';
import {
  createContext,
  historyText,
  updateContext,
  withExtraction,
} from '../context/DialogueContext.js';
import type { ClarificationEngine } from '../clarification/ClarificationEngine.js';
import type { IntentRouter } from '../router/IntentRouter.js';
import { messagesFor } from '../i18n/messages.js';
import type { MessageCatalog } from '../i18n/messages.js';
import { errorMessage } from '../errors/index.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { replyModeFor } from './ReplyPolicy.js';

/**
 * Intents whose handlers change cart contents; the cart is re-read after they run
 */
const ITEM_MUTATING_INTENTS: ReadonlySet<Intent> = new Set(['add_item', 'remove_item', 'confirmation']);

export interface OrchestratorConfig {
  store: OrderingStore;
  extractor: Extractor;
  router: IntentRouter;
  clarification: ClarificationEngine;
  recommender?: RecommendationProvider | null;
  fallbackProvider?: FallbackProvider | null;
  logger?: Logger;
  defaultLanguage?: Language;
  /** History entries loaded per turn. Defaults to 20. */
  historyLimit?: number;
  /** History entries included in generative reply context. Defaults to 10. */
  promptHistoryMessages?: number;
  /** Defaults to 2 */
  maxRecommendations?: number;
  now?: () => Date;
}

/**
 * Runs one user message through extract → load state → resolve pending →
 * clarify or dispatch → respond → persist, and returns a response envelope.
 * Never rejects.
 */
export class Orchestrator {
  private readonly store: OrderingStore;
  private readonly extractor: Extractor;
  private readonly router: IntentRouter;
  private readonly clarification: ClarificationEngine;
  private readonly recommender: RecommendationProvider | null;
  private readonly fallbackProvider: FallbackProvider | null;
  private readonly logger: Logger;
  private readonly defaultLanguage: Language;
  private readonly historyLimit: number;
  private readonly promptHistoryMessages: number;
  private readonly maxRecommendations: number;
  private readonly now: () => Date;

  constructor(config: OrchestratorConfig) {
    this.store = config.store;
    this.extractor = config.extractor;
    this.router = config.router;
    this.clarification = config.clarification;
    this.recommender = config.recommender ?? null;
    this.fallbackProvider = config.fallbackProvider ?? null;
    this.logger = config.logger ?? silentLogger;
    this.defaultLanguage = config.defaultLanguage ?? 'en';
    this.historyLimit = config.historyLimit ?? 20;
    this.promptHistoryMessages = config.promptHistoryMessages ?? 10;
    this.maxRecommendations = config.maxRecommendations ?? 2;
    this.now = config.now ?? (() => new Date());
  }

  async processMessage(userId: string, text: string): Promise<ResponseEnvelope> {
    const startTime = Date.now();
    const trace: TraceEvent[] = [];
    let context = createContext(userId, text, this.defaultLanguage, this.now());

    try {
      context = await this.runStage(trace, 'extract', () => this.extract(context));
      context = await this.runStage(trace, 'load_state', () => this.loadState(context));
      if (context.session.pendingAction) {
        context = await this.runStage(trace, 'resolve_pending', () => this.resolvePending(context));
      } else {
        trace.push({ stage: 'resolve_pending', status: 'skipped', timestamp: Date.now() });
      }
      context = await this.runStage(trace, 'dispatch', () => this.clarifyOrDispatch(context));
      context = await this.runStage(trace, 'respond', () => this.respond(context));
      context = await this.runStage(trace, 'persist', () => this.persist(context));

      this.logger.info('Message processed', {
        userId,
        intent: context.intent,
        source: context.source,
        handler: context.handler.name,
        duration: Date.now() - startTime,
      });

      return this.toEnvelope(context, true, trace, startTime);
    } catch (error) {
      this.logger.error('Message processing failed', { userId, error });
      const failed = updateContext(context, { reply: messagesFor(context.language).apology });
      return this.toEnvelope(failed, false, trace, startTime, errorMessage(error));
    }
  }

  private async extract(context: DialogueContext): Promise<DialogueContext> {
    const extraction = await this.extractor.extract(context.message);
    return withExtraction(context, extraction);
  }

  private async loadState(context: DialogueContext): Promise<DialogueContext> {
    const [history, user, cart, session] = await Promise.all([
      this.store.getHistory(context.userId, this.historyLimit),
      this.store.getUser(context.userId),
      this.store.getCart(context.userId),
      this.store.getSession(context.userId),
    ]);
    return updateContext(context, { history, user, cart, session });
  }

  /**
   * Fold the message into an open pending action, or drop the pending action
   * when the message starts something new
   */
  private async resolvePending(context: DialogueContext): Promise<DialogueContext> {
    const pending = context.session.pendingAction;
    if (!pending) return context;

    const resolution = this.clarification.resolvePendingAction(
      pending,
      context.message,
      context.intent,
      context.language,
      context.entities
    );

    switch (resolution.status) {
      case 'superseded':
      case 'abandoned':
        this.logger.debug('Pending action dropped', { userId: context.userId, status: resolution.status });
        return updateContext(context, {
          session: { ...context.session, pendingAction: null, dialogueState: 'idle' },
        });
      case 'resolved':
        return updateContext(context, {
          intent: resolution.intent,
          entities: resolution.entities,
          batchItems: [],
          session: { ...context.session, pendingAction: null, dialogueState: 'idle' },
        });
      case 'incomplete':
        return updateContext(context, {
          intent: resolution.intent,
          entities: resolution.entities,
          batchItems: [],
          session: { ...context.session, pendingAction: resolution.pendingAction },
        });
    }
  }

  private async clarifyOrDispatch(context: DialogueContext): Promise<DialogueContext> {
    if (context.intent && context.batchItems.length < 2) {
      const check = this.clarification.needsClarification(context.intent, context.entities);
      if (check.needed) {
        const clarification = await this.clarification.clarify(
          context.intent,
          context.entities,
          check.missingFields,
          context.language,
          context.cart,
          context.session.pendingAction,
          this.now()
        );
        return updateContext(context, {
          reply: clarification.question,
          clarification: { needed: true, question: clarification.question },
          suggestedActions: clarification.suggestedActions,
          session: {
            ...context.session,
            pendingAction: clarification.pendingAction,
            dialogueState: clarification.dialogueState,
          },
          handler: {
            executed: false,
            name: null,
            result: { success: false, clarificationNeeded: true, missingFields: check.missingFields },
          },
        });
      }
    }

    const dispatched = await this.router.dispatch(context);
    if (!dispatched.handler.executed) {
      this.logger.warn('No handler for intent', { userId: context.userId, intent: context.intent });
    }

    if (dispatched.handler.executed && dispatched.intent && ITEM_MUTATING_INTENTS.has(dispatched.intent)) {
      const cart = await this.store.getCart(dispatched.userId);
      return updateContext(dispatched, { cart });
    }
    return dispatched;
  }

  private async respond(context: DialogueContext): Promise<DialogueContext> {
    // Clarification questions and suggestion prompts arrive already worded
    if (context.reply !== null) {
      if (context.clarification.needed || context.suggestedActions.length > 0) return context;
      return updateContext(context, { suggestedActions: suggestedActionsFor(context) });
    }

    const messages = messagesFor(context.language);
    const { executed, result } = context.handler;
    const mode = replyModeFor(context.intent, executed, result);
    const handlerText = executed ? (result?.message ?? result?.error ?? null) : null;

    let reply: string;
    if (mode === 'structured' && result?.order) {
      reply = messages.orderPlaced(result.order);
    } else if (mode === 'deterministic') {
      reply = handlerText ?? unhandledReply(context.intent, messages);
    } else {
      reply = (await this.generateReply(context)) ?? handlerText ?? messages.commandHint;
    }

    let recommendations = context.recommendations;
    if (context.intent === 'add_item' && executed && result?.success) {
      recommendations = await this.recommend(context);
      if (recommendations.length > 0 && this.recommender) {
        reply += `\n\n${this.recommender.formatRecommendationsText(recommendations, context.language)}`;
      }
    }

    return updateContext(context, {
      reply,
      recommendations,
      suggestedActions: context.suggestedActions.length > 0 ? context.suggestedActions : suggestedActionsFor(context),
    });
  }

  private async persist(context: DialogueContext): Promise<DialogueContext> {
    try {
      await this.store.appendHistory(context.userId, 'user', context.message, {
        intent: context.intent,
        source: context.source,
        confidence: context.confidence,
      });
      await this.store.appendHistory(context.userId, 'bot', context.reply ?? '', {
        intent: context.intent,
        handler: context.handler.name,
        handlerExecuted: context.handler.executed,
      });
      await this.store.saveSession(context.userId, context.session);
    } catch (error) {
      // The reply and any cart change already happened; report it and keep the turn
      this.logger.error('Failed to persist turn', { userId: context.userId, error });
    }
    return context;
  }

  /**
   * Provider-worded reply, or null when there is no provider or no usable output
   */
  private async generateReply(context: DialogueContext): Promise<string | null> {
    if (!this.fallbackProvider) return null;

    try {
      const reply = await this.fallbackProvider.generateReply(
        context.message,
        buildReplyContext(context, this.promptHistoryMessages),
        context.language
      );
      return reply?.trim() || null;
    } catch (error) {
      this.logger.warn('Generative reply failed', { provider: this.fallbackProvider.name, error });
      return null;
    }
  }

  private async recommend(context: DialogueContext): Promise<DialogueContext['recommendations']> {
    if (!this.recommender || this.maxRecommendations <= 0) return [];

    try {
      return await this.recommender.getRecommendations(context.userId, context.cart, this.maxRecommendations);
    } catch (error) {
      this.logger.warn('Recommendations unavailable', { userId: context.userId, error });
      return [];
    }
  }

  private async runStage(
    trace: TraceEvent[],
    stage: string,
    run: () => Promise<DialogueContext>
  ): Promise<DialogueContext> {
    const started = Date.now();
    trace.push({ stage, status: 'start', timestamp: started });
    try {
      const result = await run();
      const duration = Date.now() - started;
      trace.push({ stage, status: 'complete', timestamp: Date.now(), duration });
      this.logger.debug(`Stage ${stage} complete`, { duration });
      return result;
    } catch (error) {
      trace.push({
        stage,
        status: 'failed',
        timestamp: Date.now(),
        duration: Date.now() - started,
        error: error instanceof Error ? error : new Error(String(error)),
      });
      throw error;
    }
  }

  private toEnvelope(
    context: DialogueContext,
    success: boolean,
    trace: TraceEvent[],
    startTime: number,
    error?: string
  ): ResponseEnvelope {
    return {
      success,
      message: context.message,
      reply: context.reply ?? messagesFor(context.language).apology,
      intent: context.intent,
      entities: context.entities,
      language: context.language,
      source: context.source,
      confidence: context.confidence,
      handlerExecuted: context.handler.executed,
      handlerName: context.handler.name,
      handlerResult: context.handler.result,
      cart: context.cart,
      dialogueState: context.session.dialogueState,
      clarificationNeeded: context.clarification.needed,
      clarificationQuestion: context.clarification.question,
      recommendations: context.recommendations,
      suggestedActions: context.suggestedActions,
      data: { ...context.responseData },
      trace,
      duration: Date.now() - startTime,
      ...(error ? { error } : {}),
    };
  }
}

/**
 * Context handed to the generative provider: recent history, the handler's
 * result verbatim, and the cart
 */
export function buildReplyContext(context: DialogueContext, maxHistory: number): string {
  const messages = messagesFor(context.language);
  const sections: string[] = [];

  const history = historyText(context, maxHistory);
  if (history) sections.push(`Conversation history:\n${history}`);

  if (context.intent) sections.push(`Detected intent: ${context.intent}`);

  if (context.handler.result) {
    sections.push(
      `CRITICAL - ACTUAL DATA (do not modify or guess):\n${JSON.stringify(context.handler.result, null, 2)}`
    );
  }

  sections.push(`Current cart:\n${messages.cartSummary(context.cart)}`);
  return sections.join('\n\n');
}

// Deterministic intents no handler accepted; checkout only declines an empty cart
function unhandledReply(intent: Intent | null, messages: MessageCatalog): string {
  return intent === 'checkout' ? messages.emptyCart : messages.commandHint;
}

function suggestedActionsFor(context: DialogueContext): string[] {
  const { result } = context.handler;
  if (context.session.pendingSuggestion) return ['yes', 'no'];
  if (context.intent === 'checkout' && result?.order) return ['track my order', 'new order'];
  if (context.cart.items.length > 0) return ['view cart', 'checkout'];
  return ['show menu'];
}
