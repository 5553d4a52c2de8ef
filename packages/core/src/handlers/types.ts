import type { OrderingStore } from '../types/index.js';
import type { ItemValidator } from '../validation/ItemValidator.js';
import type { SuggestionProtocol } from '../suggestions/SuggestionProtocol.js';

/**
 * Collaborators shared by the built-in handlers
 */
export interface HandlerDependencies {
  store: OrderingStore;
  validator: ItemValidator;
  suggestions: SuggestionProtocol;
}
