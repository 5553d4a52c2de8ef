/**
 * Closed intent vocabulary, in rule-table order.
 */
export const INTENTS = [
  'welcome',
  'track_order',
  'add_item',
  'remove_item',
  'view_cart',
  'clear_cart',
  'checkout',
  'browse_menu',
  'new_order',
  'confirmation',
  'rejection',
] as const;

export type Intent = (typeof INTENTS)[number];

export function isIntent(value: unknown): value is Intent {
  return typeof value === 'string' && (INTENTS as readonly string[]).includes(value);
}

export const LANGUAGES = ['en', 'ar'] as const;

export type Language = (typeof LANGUAGES)[number];

export const SIZE_CODES = ['S', 'M', 'L', 'REG'] as const;

export type SizeCode = (typeof SIZE_CODES)[number];

export function isSizeCode(value: unknown): value is SizeCode {
  return typeof value === 'string' && (SIZE_CODES as readonly string[]).includes(value);
}

/**
 * Entity slots a message can fill
 */
export const ENTITY_KEYS = ['item', 'size', 'quantity', 'order_id', 'address', 'phone'] as const;

export type EntityKey = (typeof ENTITY_KEYS)[number];

/**
 * Entity map extracted from one message. Keys that were not found are absent.
 */
export interface Entities {
  item?: string | null;
  size?: SizeCode | null;
  quantity?: number | null;
  order_id?: string | null;
  address?: string | null;
  phone?: string | null;
}

/**
 * Where an extraction came from
 */
export type ExtractionSource = 'pattern' | 'fallback' | 'none' | 'error';

/**
 * One entry of a multi-item add request
 */
export interface BatchItem {
  item: string;
  quantity: number;
  size: SizeCode | null;
}

/**
 * Standardized output of intent/entity extraction
 */
export interface ExtractionResult {
  intent: Intent | null;
  entities: Entities;
  language: Language;
  source: ExtractionSource;
  /** 0-1; pattern matches always report 1 */
  confidence: number;
  batchItems?: BatchItem[];
}

export type HistoryRole = 'user' | 'bot';

/**
 * Message in conversation history
 */
export interface HistoryEntry {
  role: HistoryRole;
  content: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}
