/**
 * Error Classes
 * Structured error types with registry-based error codes
 */

import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface ConfErrorData {
  readonly errorId: string;
  readonly category: ErrorCategory;
  readonly message: string;
  readonly context: Record<string, unknown>;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all compiler errors.
 * The message is rendered from the registry template for errorId.
 */
export class ConfError extends Error {
  readonly errorId: string;
  readonly category: ErrorCategory;
  readonly context: Record<string, unknown>;

  constructor(
    errorId: string,
    context: Record<string, unknown>,
    expectedCategory?: ErrorCategory
  ) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }
    if (
      expectedCategory !== undefined &&
      definition.category !== expectedCategory
    ) {
      throw new TypeError(
        `Expected ${expectedCategory} error ID, got: ${errorId}`
      );
    }

    super(renderMessage(definition.messageTemplate, context));
    this.name = 'ConfError';
    this.errorId = errorId;
    this.category = definition.category;
    this.context = context;
  }

  /** Get structured error data for custom formatting */
  toData(): ConfErrorData {
    return {
      errorId: this.errorId,
      category: this.category,
      message: this.message,
      context: this.context,
    };
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Script failed to compile */
export class LoadError extends ConfError {
  constructor(errorId: string, context: Record<string, unknown>) {
    super(errorId, context, 'load');
    this.name = 'LoadError';
  }
}

/** Script raised an error while running */
export class RuntimeError extends ConfError {
  constructor(errorId: string, context: Record<string, unknown>) {
    super(errorId, context, 'runtime');
    this.name = 'RuntimeError';
  }
}

/** Script value has no document representation */
export class ConversionError extends ConfError {
  constructor(errorId: string, context: Record<string, unknown>) {
    super(errorId, context, 'conversion');
    this.name = 'ConversionError';
  }
}

/** File open, read, write or listing failure */
export class IOError extends ConfError {
  constructor(errorId: string, context: Record<string, unknown>) {
    super(errorId, context, 'io');
    this.name = 'IOError';
  }
}

/**
 * Describe a caught value for an error's {detail} placeholder.
 * Node system errors carry their code in the message already.
 */
export function describeCause(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
