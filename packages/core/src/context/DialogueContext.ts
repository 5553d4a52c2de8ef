import type {
  CartSnapshot,
  DialogueContext,
  ExtractionResult,
  HandlerResult,
  Language,
} from '../types/index.js';
import { emptySession } from '../types/index.js';

export const EMPTY_CART: CartSnapshot = Object.freeze({ items: [], totalPrice: 0, itemCount: 0 });

/**
 * Fresh context for an incoming message
 */
export function createContext(
  userId: string,
  message: string,
  language: Language = 'en',
  now: Date = new Date()
): DialogueContext {
  return {
    userId,
    message,
    language,
    intent: null,
    entities: {},
    batchItems: [],
    source: 'none',
    confidence: 0,
    history: [],
    user: null,
    cart: EMPTY_CART,
    session: emptySession(),
    handler: { executed: false, name: null, result: null },
    clarification: { needed: false, question: null },
    reply: null,
    recommendations: [],
    suggestedActions: [],
    responseData: {},
    createdAt: now,
  };
}

export function updateContext(context: DialogueContext, patch: Partial<DialogueContext>): DialogueContext {
  return { ...context, ...patch };
}

/**
 * Replace the extraction fields wholesale
 */
export function withExtraction(context: DialogueContext, extraction: ExtractionResult): DialogueContext {
  return {
    ...context,
    intent: extraction.intent,
    entities: { ...extraction.entities },
    batchItems: extraction.batchItems ?? [],
    language: extraction.language,
    source: extraction.source,
    confidence: extraction.confidence,
  };
}

export function withHandlerResult(
  context: DialogueContext,
  name: string,
  result: HandlerResult,
  patch: Partial<DialogueContext> = {}
): DialogueContext {
  return {
    ...context,
    ...patch,
    handler: { executed: true, name, result },
  };
}

/**
 * Last `max` history messages as "role: content" lines
 */
export function historyText(context: DialogueContext, max: number): string {
  if (max <= 0) return '';
  return context.history
    .slice(-max)
    .map((entry) => `${entry.role === 'user' ? 'User' : 'Assistant'}: ${entry.content}`)
    .join('\n');
}
