import type { BatchItem, EntityKey, SizeCode } from './base.js';
import type { OrderReceipt } from './domain.js';
import type { DialogueContext } from './context.js';

/**
 * Outcome of one batch entry
 */
export interface BatchItemOutcome {
  item: BatchItem;
  success: boolean;
  name?: string;
  size?: SizeCode;
  error?: string;
}

/**
 * Result map written by a handler (or by the router when nothing handled the turn)
 */
export interface HandlerResult {
  success: boolean;
  message?: string;
  error?: string;
  /** Formatted cart summary (view_cart) */
  summary?: string;
  itemAdded?: { name: string; size: SizeCode; quantity: number };
  /** Per-item outcomes (batch add) */
  results?: BatchItemOutcome[];
  /** Authoritative checkout data */
  order?: OrderReceipt;
  clarificationNeeded?: boolean;
  missingFields?: EntityKey[];
  suggestionCreated?: boolean;
  /** No handler matched; the reply should come from the generative provider */
  fallbackToGenerative?: boolean;
}

/**
 * One variant of the intent handler set. Handlers are tried in priority order
 * and the first whose predicate accepts the context executes.
 */
export interface IntentHandler {
  readonly name: string;
  /** Higher runs first; ties keep registration order. Defaults to 0. */
  readonly priority?: number;
  canHandle(context: DialogueContext): boolean;
  execute(context: DialogueContext): Promise<DialogueContext>;
}
