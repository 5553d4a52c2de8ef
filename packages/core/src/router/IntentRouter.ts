import type { DialogueContext, IntentHandler } from '../types/index.js';
import { DuplicateHandlerError, HandlerError } from '../errors/index.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { updateContext, withHandlerResult } from '../context/DialogueContext.js';

/**
 * Ordered handler list with first-match dispatch.
 *
 * Handlers are tried by descending priority, ties in registration order.
 */
export class IntentRouter {
  private handlers: IntentHandler[] = [];
  private locked = false;

  constructor(
    handlers: IntentHandler[] = [],
    private readonly logger: Logger = silentLogger
  ) {
    for (const handler of handlers) {
      this.register(handler);
    }
  }

  register(handler: IntentHandler): this {
    if (this.locked) {
      throw new Error('Router is locked; cannot register new handlers');
    }
    if (!handler.name) {
      throw new Error('Handler must have a name');
    }
    if (this.handlers.some((existing) => existing.name === handler.name)) {
      throw new DuplicateHandlerError(handler.name);
    }

    // Stable insert: after every handler with priority >= this one
    const priority = handler.priority ?? 0;
    const index = this.handlers.findIndex((existing) => (existing.priority ?? 0) < priority);
    if (index === -1) {
      this.handlers.push(handler);
    } else {
      this.handlers.splice(index, 0, handler);
    }

    return this;
  }

  list(): IntentHandler[] {
    return [...this.handlers];
  }

  /**
   * Prevent further registration
   */
  lock(): void {
    this.locked = true;
  }

  isLocked(): boolean {
    return this.locked;
  }

  /**
   * First handler whose predicate accepts the context
   */
  route(context: DialogueContext): IntentHandler | null {
    if (!context.intent) return null;
    return this.handlers.find((handler) => handler.canHandle(context)) ?? null;
  }

  /**
   * Run the selected handler. Never rejects: a throwing handler becomes a
   * failed result, no handler becomes a generative-fallback marker.
   */
  async dispatch(context: DialogueContext): Promise<DialogueContext> {
    const handler = this.route(context);

    if (!handler) {
      this.logger.debug('No handler found', { intent: context.intent });
      return updateContext(context, {
        handler: {
          executed: false,
          name: null,
          result: {
            success: false,
            error: `No handler found for intent: ${context.intent ?? 'unknown'}`,
            fallbackToGenerative: true,
          },
        },
      });
    }

    try {
      const result = await handler.execute(context);
      this.logger.debug('Handler executed', {
        handler: handler.name,
        success: result.handler.result?.success ?? false,
      });
      return result;
    } catch (error) {
      const failure = new HandlerError(handler.name, error);
      this.logger.error(failure.message, { handler: handler.name, error });
      return withHandlerResult(context, handler.name, {
        success: false,
        error: `Something went wrong while processing your ${handler.name.replace(/_/g, ' ')} request`,
      });
    }
  }
}
