import type { DialogueContext, IntentHandler } from '../types/index.js';
import { EMPTY_CART, withHandlerResult } from '../context/DialogueContext.js';
import type { HandlerDependencies } from './types.js';

/**
 * Places the order. Only runs with a non-empty cart; the receipt in the result
 * is the single source for the confirmation reply.
 */
export class CheckoutHandler implements IntentHandler {
  readonly name = 'checkout';

  constructor(private readonly deps: HandlerDependencies) {}

  canHandle(context: DialogueContext): boolean {
    return context.intent === 'checkout' && context.cart.items.length > 0;
  }

  async execute(context: DialogueContext): Promise<DialogueContext> {
    const outcome = await this.deps.store.checkout(context.userId);

    if (!outcome.success) {
      return withHandlerResult(context, this.name, { success: false, error: outcome.error });
    }

    const order = { orderId: outcome.orderId, totalPrice: outcome.totalPrice, items: outcome.items };
    return withHandlerResult(
      context,
      this.name,
      { success: true, message: 'Order placed successfully', order },
      {
        cart: EMPTY_CART,
        responseData: { ...context.responseData, orderId: order.orderId, totalPrice: order.totalPrice },
      }
    );
  }
}
