import type { Intent, Language } from '@orderflow/core';

export const INTENT_DESCRIPTIONS: Record<Intent, string> = {
  welcome: 'The customer greets the assistant',
  track_order: 'The customer asks about the status of an existing order',
  add_item: 'The customer wants to add a menu item to the cart',
  remove_item: 'The customer wants to remove an item from the cart',
  view_cart: 'The customer wants to see the cart or its total',
  clear_cart: 'The customer wants to empty the cart',
  checkout: 'The customer wants to place the order and pay',
  browse_menu: 'The customer asks what is on the menu',
  new_order: 'The customer wants to start a new order',
  confirmation: 'The customer agrees to the last suggestion (yes)',
  rejection: 'The customer declines the last suggestion (no)',
};

const LANGUAGE_NAMES: Record<Language, string> = {
  en: 'English',
  ar: 'Egyptian Arabic',
};

export function buildExtractionPrompt(language: Language): string {
  return `You classify messages sent to a pizza restaurant's ordering assistant.

Call exactly one tool, named after the customer's intent. Fill in only the details the customer actually stated:
- item: the menu item name, without size or quantity words
- size: S, M, L or REG
- quantity: a positive whole number
- order_id: digits only
- confidence: how sure you are, from 0 to 1

If the message matches no intent, answer with a short text instead of calling a tool.
The customer writes in ${LANGUAGE_NAMES[language]}.`;
}

export function buildReplyPrompt(language: Language): string {
  return `You are the friendly ordering assistant of a pizza restaurant.

Reply in ${LANGUAGE_NAMES[language]} in one to three short sentences.
Use only facts found in the "ACTUAL DATA" and "Current cart" sections. Never invent prices, items, totals or order numbers.
If an operation failed, say so plainly and suggest what the customer can try next.`;
}

export function buildReplyMessage(text: string, contextBlob: string): string {
  return `${contextBlob}\n\nCustomer message: ${text}`;
}
