/**
 * Base error with structured code and details
 */
export class OrderflowError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Invalid or missing configuration
 */
export class ConfigError extends OrderflowError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
  }
}

/**
 * Generative provider API error
 */
export class ProviderError extends OrderflowError {
  constructor(
    provider: string,
    message: string,
    public originalError?: unknown
  ) {
    super(`Provider error (${provider}): ${message}`, 'PROVIDER_ERROR', { provider });
  }
}

/**
 * Store read or write failed
 */
export class StoreError extends OrderflowError {
  constructor(operation: string, message: string, details?: Record<string, unknown>) {
    super(`Store error (${operation}): ${message}`, 'STORE_ERROR', { operation, ...details });
  }
}

/**
 * Intent handler threw while executing
 */
export class HandlerError extends OrderflowError {
  constructor(
    handlerName: string,
    public originalError: unknown
  ) {
    super(
      `Handler "${handlerName}" failed: ${errorMessage(originalError)}`,
      'HANDLER_ERROR',
      { handlerName }
    );
  }
}

/**
 * Handler name registered twice
 */
export class DuplicateHandlerError extends OrderflowError {
  constructor(handlerName: string) {
    super(`Handler "${handlerName}" already registered`, 'DUPLICATE_HANDLER', { handlerName });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
