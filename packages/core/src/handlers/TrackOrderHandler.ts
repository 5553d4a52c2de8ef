import type { DialogueContext, IntentHandler } from '../types/index.js';
import { withHandlerResult } from '../context/DialogueContext.js';
import { messagesFor } from '../i18n/messages.js';
import type { HandlerDependencies } from './types.js';

export class TrackOrderHandler implements IntentHandler {
  readonly name = 'track_order';

  constructor(private readonly deps: HandlerDependencies) {}

  canHandle(context: DialogueContext): boolean {
    return context.intent === 'track_order' && Boolean(context.entities.order_id);
  }

  async execute(context: DialogueContext): Promise<DialogueContext> {
    const messages = messagesFor(context.language);
    const orderId = context.entities.order_id?.trim() ?? '';
    const numericId = Number.parseInt(orderId, 10);

    const order = Number.isNaN(numericId) ? null : await this.deps.store.getOrder(numericId);
    // Other users' orders are reported as missing
    if (!order || order.userId !== context.userId) {
      return withHandlerResult(context, this.name, { success: false, error: messages.orderNotFound(orderId) });
    }

    return withHandlerResult(context, this.name, {
      success: true,
      message: messages.orderStatus(order.orderId, order.status, order.totalPrice),
    });
  }
}
