import type { DialogueContext, IntentHandler } from '../types/index.js';
import { withHandlerResult } from '../context/DialogueContext.js';
import type { HandlerDependencies } from './types.js';

/**
 * Adds one validated item to the cart. A near-miss name turns into a
 * pending suggestion instead of an error.
 */
export class AddItemHandler implements IntentHandler {
  readonly name = 'add_item';

  constructor(private readonly deps: HandlerDependencies) {}

  canHandle(context: DialogueContext): boolean {
    return context.intent === 'add_item' && Boolean(context.entities.item?.trim());
  }

  async execute(context: DialogueContext): Promise<DialogueContext> {
    const itemName = context.entities.item?.trim() ?? '';
    const size = context.entities.size ?? null;
    const quantity = context.entities.quantity ?? 1;

    const validation = await this.deps.validator.validate(itemName, size, context.language);

    if (!validation.ok) {
      if (validation.reason === 'similar_found') {
        const [best] = validation.suggestions;
        if (best) {
          const outcome = this.deps.suggestions.propose(
            context.session,
            itemName,
            best,
            size,
            quantity,
            context.language
          );
          // The yes/no question is the reply; no provider rewords it
          return withHandlerResult(context, this.name, outcome.result, {
            session: outcome.session,
            reply: outcome.result.message ?? null,
          });
        }
      }
      return withHandlerResult(context, this.name, { success: false, error: validation.message });
    }

    const added = await this.deps.store.addToCart(context.userId, validation.size.id, quantity);
    if (!added.success) {
      return withHandlerResult(context, this.name, { success: false, error: added.message });
    }

    return withHandlerResult(context, this.name, {
      success: true,
      message: added.message,
      itemAdded: { name: validation.item.name, size: validation.size.size, quantity },
    });
  }
}
