import type { BatchItemOutcome, DialogueContext, IntentHandler } from '../types/index.js';
import { withHandlerResult } from '../context/DialogueContext.js';
import { messagesFor } from '../i18n/messages.js';
import type { HandlerDependencies } from './types.js';

/**
 * Adds every parsed item of a multi-item request, reporting per-item failures.
 * Runs ahead of the single-item handler whenever two or more items were parsed.
 */
export class BatchAddItemHandler implements IntentHandler {
  readonly name = 'batch_add_item';
  readonly priority = 100;

  constructor(private readonly deps: HandlerDependencies) {}

  canHandle(context: DialogueContext): boolean {
    return context.intent === 'add_item' && context.batchItems.length >= 2;
  }

  async execute(context: DialogueContext): Promise<DialogueContext> {
    const results: BatchItemOutcome[] = [];

    for (const item of context.batchItems) {
      const validation = await this.deps.validator.validate(item.item, item.size, context.language);
      if (!validation.ok) {
        results.push({ item, success: false, error: validation.message });
        continue;
      }

      const added = await this.deps.store.addToCart(context.userId, validation.size.id, item.quantity);
      results.push(
        added.success
          ? { item, success: true, name: validation.item.name, size: validation.size.size }
          : { item, success: false, error: added.message }
      );
    }

    const messages = messagesFor(context.language);
    const added = results.filter((outcome) => outcome.success);
    const failed = results.filter((outcome) => !outcome.success);

    if (added.length === 0) {
      const message = messages.batchAllFailed(failed.map((outcome) => `${outcome.item.item}: ${outcome.error}`));
      return withHandlerResult(context, this.name, { success: false, error: message, message, results });
    }

    const lines = added.map(
      (outcome) =>
        `${outcome.name} (${outcome.size})${outcome.item.quantity > 1 ? ` x${outcome.item.quantity}` : ''}`
    );
    let message = messages.batchAdded(added.length, lines);
    if (failed.length > 0) {
      message += `\n\n${messages.batchPartialFailure(failed.map((outcome) => `${outcome.item.item} (${outcome.error})`))}`;
    }

    return withHandlerResult(context, this.name, { success: true, message, results });
  }
}
