import type { HandlerResult, Intent } from '../types/index.js';

export type ReplyMode = 'structured' | 'deterministic' | 'generative';

/**
 * Reply mode per intent when a handler ran. Checkout is always rendered from
 * the handler's own data; a provider never gets to word it.
 */
export const REPLY_POLICY: Record<Intent, ReplyMode> = {
  welcome: 'generative',
  track_order: 'generative',
  add_item: 'generative',
  remove_item: 'generative',
  view_cart: 'deterministic',
  clear_cart: 'deterministic',
  checkout: 'structured',
  browse_menu: 'deterministic',
  new_order: 'generative',
  confirmation: 'deterministic',
  rejection: 'deterministic',
};

/**
 * How to phrase the reply for this turn. The intent's table entry wins over
 * whether a handler ran: a deterministic intent nobody handled still never
 * reaches the provider.
 */
export function replyModeFor(intent: Intent | null, handlerExecuted: boolean, result: HandlerResult | null): ReplyMode {
  if (!intent) return 'generative';

  const mode = REPLY_POLICY[intent];
  // Only a placed order has a receipt to render
  if (mode === 'structured' && !(handlerExecuted && result?.order)) return 'deterministic';
  return mode;
}
