/**
 * Error Handling Utilities
 *
 * Typed application errors and helpers for logging them without letting
 * background work crash the process.
 */

import { logger } from './logger.js';

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, isOperational: boolean = true) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error (bad input from a command or a snapshot file)
 */
export class ValidationError extends AppError {
  public readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(message, 'VALIDATION_ERROR');
    this.field = field;
  }
}

/**
 * Not found error
 */
export class NotFoundError extends AppError {
  public readonly resource: string;

  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} not found: ${identifier}`
      : `${resource} not found`;
    super(message, 'NOT_FOUND');
    this.resource = resource;
  }
}

/**
 * Forbidden error (caller is not the administrator)
 */
export class ForbiddenError extends AppError {
  constructor(message: string = 'Forbidden') {
    super(message, 'FORBIDDEN');
  }
}

/**
 * Snapshot read/write failure
 */
export class PersistenceError extends AppError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly originalError?: unknown
  ) {
    super(message, 'PERSISTENCE_ERROR');
  }
}

/**
 * A state mutation started while another one was still running.
 * Not operational: it means the single-writer contract was broken by the code.
 */
export class ConcurrencyViolationError extends AppError {
  constructor(operation: string, activeOperation: string) {
    super(
      `Mutation "${operation}" started while "${activeOperation}" was in progress`,
      'CONCURRENCY_VIOLATION',
      false
    );
  }
}

/**
 * Extract a loggable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Format error for a user-facing reply (no internal details)
 */
export function formatUserError(error: unknown): string {
  if (error instanceof AppError && error.isOperational) {
    return error.message;
  }

  return 'An error occurred while executing the command.';
}

/**
 * Log an error with structured context
 */
export function logError(error: unknown, context: Record<string, unknown> = {}): void {
  if (error instanceof AppError) {
    logger.error(
      {
        ...context,
        errorCode: error.code,
        isOperational: error.isOperational,
        message: error.message,
      },
      'Application error'
    );
  } else if (error instanceof Error) {
    logger.error(
      {
        ...context,
        message: error.message,
        name: error.name,
      },
      'Unexpected error'
    );
  } else {
    logger.error(
      {
        ...context,
        error: String(error),
      },
      'Unknown error'
    );
  }
}
