import type { IntentHandler } from '../types/index.js';
import type { HandlerDependencies } from './types.js';
import { AddItemHandler } from './AddItemHandler.js';
import { BatchAddItemHandler } from './BatchAddItemHandler.js';
import { BrowseMenuHandler } from './BrowseMenuHandler.js';
import { CheckoutHandler } from './CheckoutHandler.js';
import { ClearCartHandler } from './ClearCartHandler.js';
import { ConfirmationHandler } from './ConfirmationHandler.js';
import { RejectionHandler } from './RejectionHandler.js';
import { RemoveItemHandler } from './RemoveItemHandler.js';
import { TrackOrderHandler } from './TrackOrderHandler.js';
import { ViewCartHandler } from './ViewCartHandler.js';

export type { HandlerDependencies } from './types.js';
export {
  AddItemHandler,
  BatchAddItemHandler,
  BrowseMenuHandler,
  CheckoutHandler,
  ClearCartHandler,
  ConfirmationHandler,
  RejectionHandler,
  RemoveItemHandler,
  TrackOrderHandler,
  ViewCartHandler,
};
export { formatMenu, formatMenuItem } from './BrowseMenuHandler.js';

/**
 * Built-in handlers in registration order. `welcome` and `new_order` have no
 * handler and are answered generatively.
 */
export function createDefaultHandlers(deps: HandlerDependencies): IntentHandler[] {
  return [
    new BatchAddItemHandler(deps),
    new AddItemHandler(deps),
    new RemoveItemHandler(deps),
    new ViewCartHandler(deps),
    new CheckoutHandler(deps),
    new BrowseMenuHandler(deps),
    new ClearCartHandler(deps),
    new TrackOrderHandler(deps),
    new ConfirmationHandler(deps),
    new RejectionHandler(deps),
  ];
}
