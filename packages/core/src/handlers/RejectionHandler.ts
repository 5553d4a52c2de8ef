import type { DialogueContext, IntentHandler } from '../types/index.js';
import { withHandlerResult } from '../context/DialogueContext.js';
import type { HandlerDependencies } from './types.js';

export class RejectionHandler implements IntentHandler {
  readonly name = 'rejection';

  constructor(private readonly deps: HandlerDependencies) {}

  canHandle(context: DialogueContext): boolean {
    return context.intent === 'rejection';
  }

  async execute(context: DialogueContext): Promise<DialogueContext> {
    const outcome = this.deps.suggestions.reject(context.session, context.language);
    return withHandlerResult(context, this.name, outcome.result, { session: outcome.session });
  }
}
