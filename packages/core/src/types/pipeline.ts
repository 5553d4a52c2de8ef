import type { Entities, ExtractionSource, Intent, Language } from './base.js';
import type { CartSnapshot } from './domain.js';
import type { HandlerResult } from './handlers.js';
import type { Recommendation } from './providers.js';
import type { DialogueState } from './session.js';

/**
 * Trace event for observability
 */
export interface TraceEvent {
  stage: string;
  status: 'start' | 'complete' | 'failed' | 'skipped';
  timestamp: number;
  duration?: number;
  data?: Record<string, unknown>;
  error?: Error;
}

/**
 * Response envelope returned for every processed message
 */
export interface ResponseEnvelope {
  success: boolean;
  /** The user's message, echoed */
  message: string;
  reply: string;
  intent: Intent | null;
  entities: Entities;
  language: Language;
  source: ExtractionSource;
  confidence: number;
  handlerExecuted: boolean;
  handlerName: string | null;
  handlerResult: HandlerResult | null;
  cart: CartSnapshot;
  dialogueState: DialogueState;
  clarificationNeeded: boolean;
  clarificationQuestion: string | null;
  recommendations: Recommendation[];
  suggestedActions: string[];
  data: Record<string, unknown>;
  trace: TraceEvent[];
  duration: number;
  error?: string;
}
