import type { EntityKey, Entities, Intent, SizeCode } from './base.js';

export const DIALOGUE_STATES = [
  'idle',
  'awaiting_size',
  'awaiting_quantity',
  'awaiting_confirmation',
  'awaiting_address',
  'awaiting_payment',
  'clarifying_item',
] as const;

/**
 * Multi-turn phase of the conversation. `idle` is both the initial state and the
 * state a completed turn returns to.
 */
export type DialogueState = (typeof DIALOGUE_STATES)[number];

/**
 * Incomplete command waiting for the user to supply missing fields.
 * At most one per user; recording a new one replaces the old.
 */
export interface PendingAction {
  actionType: Intent;
  missingFields: EntityKey[];
  partialData: Entities;
  createdAt: Date;
  attempts: number;
}

/**
 * Proposed action waiting for yes/no. Expires five minutes after creation,
 * checked only when the user answers.
 */
export interface PendingSuggestion {
  type: 'add_item';
  item: string;
  size: SizeCode | null;
  quantity: number;
  createdAt: Date;
}

/**
 * Per-user dialogue state owned by the session store
 */
export interface SessionState {
  dialogueState: DialogueState;
  pendingAction: PendingAction | null;
  pendingSuggestion: PendingSuggestion | null;
}

export function emptySession(): SessionState {
  return {
    dialogueState: 'idle',
    pendingAction: null,
    pendingSuggestion: null,
  };
}
