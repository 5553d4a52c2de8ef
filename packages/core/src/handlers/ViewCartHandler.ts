import type { DialogueContext, IntentHandler } from '../types/index.js';
import { withHandlerResult } from '../context/DialogueContext.js';
import { messagesFor } from '../i18n/messages.js';
import type { HandlerDependencies } from './types.js';

export class ViewCartHandler implements IntentHandler {
  readonly name = 'view_cart';

  constructor(private readonly deps: HandlerDependencies) {}

  canHandle(context: DialogueContext): boolean {
    return context.intent === 'view_cart';
  }

  async execute(context: DialogueContext): Promise<DialogueContext> {
    const cart = await this.deps.store.getCart(context.userId);
    const summary = messagesFor(context.language).cartSummary(cart);

    return withHandlerResult(
      context,
      this.name,
      { success: true, message: summary, summary },
      { cart, responseData: { ...context.responseData, cartSummary: summary } }
    );
  }
}
