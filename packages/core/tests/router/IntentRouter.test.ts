import { describe, it, expect, vi } from 'vitest';
import { IntentRouter } from '../../src/router/IntentRouter.js';
import { createContext, updateContext, withHandlerResult } from '../../src/context/DialogueContext.js';
import { createLogger } from '../../src/logging/logger.js';
import { DuplicateHandlerError } from '../../src/errors/index.js';
import type { DialogueContext, Intent, IntentHandler } from '../../src/types/index.js';

function handlerFor(name: string, intent: Intent, priority?: number): IntentHandler {
  return {
    name,
    priority,
    canHandle: (context) => context.intent === intent,
    execute: async (context) => withHandlerResult(context, name, { success: true, message: `handled by ${name}` }),
  };
}

function contextFor(intent: Intent | null): DialogueContext {
  return updateContext(createContext('u1', 'hello'), { intent });
}

describe('IntentRouter', () => {
  describe('register', () => {
    it('should order handlers by priority, keeping registration order for ties', () => {
      const router = new IntentRouter([
        handlerFor('first', 'add_item'),
        handlerFor('urgent', 'add_item', 100),
        handlerFor('second', 'add_item'),
        handlerFor('middle', 'add_item', 10),
      ]);

      expect(router.list().map((handler) => handler.name)).toEqual(['urgent', 'middle', 'first', 'second']);
    });

    it('should reject duplicate names', () => {
      const router = new IntentRouter([handlerFor('add_item', 'add_item')]);

      expect(() => router.register(handlerFor('add_item', 'remove_item'))).toThrow(DuplicateHandlerError);
    });

    it('should reject handlers without a name', () => {
      expect(() => new IntentRouter([handlerFor('', 'add_item')])).toThrow('Handler must have a name');
    });

    it('should refuse registration once locked', () => {
      const router = new IntentRouter();
      router.lock();

      expect(router.isLocked()).toBe(true);
      expect(() => router.register(handlerFor('late', 'add_item'))).toThrow(
        'Router is locked; cannot register new handlers'
      );
    });
  });

  describe('route', () => {
    it('should pick the first handler whose predicate accepts', () => {
      const router = new IntentRouter([
        handlerFor('view_cart', 'view_cart'),
        handlerFor('catch_all', 'view_cart', -1),
      ]);

      expect(router.route(contextFor('view_cart'))?.name).toBe('view_cart');
      expect(router.route(contextFor('checkout'))).toBeNull();
    });

    it('should route nothing without an intent', () => {
      const handler: IntentHandler = { ...handlerFor('any', 'view_cart'), canHandle: () => true };

      expect(new IntentRouter([handler]).route(contextFor(null))).toBeNull();
    });
  });

  describe('dispatch', () => {
    it('should run the selected handler', async () => {
      const router = new IntentRouter([handlerFor('view_cart', 'view_cart')]);

      const result = await router.dispatch(contextFor('view_cart'));

      expect(result.handler).toEqual({
        executed: true,
        name: 'view_cart',
        result: { success: true, message: 'handled by view_cart' },
      });
    });

    it('should mark unhandled intents for the generative fallback', async () => {
      const result = await new IntentRouter().dispatch(contextFor('welcome'));

      expect(result.handler).toEqual({
        executed: false,
        name: null,
        result: { success: false, error: 'No handler found for intent: welcome', fallbackToGenerative: true },
      });
    });

    it('should turn a throwing handler into a failed result', async () => {
      const write = vi.fn();
      const failing: IntentHandler = {
        ...handlerFor('add_item', 'add_item'),
        execute: async () => {
          throw new Error('boom');
        },
      };
      const router = new IntentRouter([failing], createLogger({ write }));

      const result = await router.dispatch(contextFor('add_item'));

      expect(result.handler).toEqual({
        executed: true,
        name: 'add_item',
        result: { success: false, error: 'Something went wrong while processing your add item request' },
      });
      expect(write).toHaveBeenCalledWith(
        'error',
        '[ERROR] Handler "add_item" failed: boom {"handler":"add_item","error":{"name":"Error","message":"boom"}}'
      );
    });
  });
});
