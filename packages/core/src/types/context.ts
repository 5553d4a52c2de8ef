import type {
  BatchItem,
  Entities,
  ExtractionSource,
  HistoryEntry,
  Intent,
  Language,
} from './base.js';
import type { CartSnapshot, UserProfile } from './domain.js';
import type { HandlerResult } from './handlers.js';
import type { Recommendation } from './providers.js';
import type { SessionState } from './session.js';

export interface HandlerState {
  executed: boolean;
  name: string | null;
  result: HandlerResult | null;
}

export interface ClarificationState {
  needed: boolean;
  question: string | null;
}

/**
 * Per-message state threaded through the pipeline. Stages never mutate it;
 * each returns an updated copy.
 */
export interface DialogueContext {
  readonly userId: string;
  readonly message: string;
  readonly language: Language;
  readonly intent: Intent | null;
  readonly entities: Entities;
  readonly batchItems: BatchItem[];
  readonly source: ExtractionSource;
  readonly confidence: number;
  readonly history: HistoryEntry[];
  readonly user: UserProfile | null;
  readonly cart: CartSnapshot;
  readonly session: SessionState;
  readonly handler: HandlerState;
  readonly clarification: ClarificationState;
  readonly reply: string | null;
  readonly recommendations: Recommendation[];
  readonly suggestedActions: string[];
  readonly responseData: Record<string, unknown>;
  readonly createdAt: Date;
}
