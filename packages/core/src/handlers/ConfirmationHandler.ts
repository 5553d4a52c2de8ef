import type { DialogueContext, IntentHandler } from '../types/index.js';
import { withHandlerResult } from '../context/DialogueContext.js';
import type { HandlerDependencies } from './types.js';

/**
 * "yes" resolves the pending suggestion, if there is one and it hasn't expired
 */
export class ConfirmationHandler implements IntentHandler {
  readonly name = 'confirmation';

  constructor(private readonly deps: HandlerDependencies) {}

  canHandle(context: DialogueContext): boolean {
    return context.intent === 'confirmation';
  }

  async execute(context: DialogueContext): Promise<DialogueContext> {
    const outcome = await this.deps.suggestions.confirm(context.userId, context.session, context.language);
    return withHandlerResult(context, this.name, outcome.result, { session: outcome.session });
  }
}
