import Joi from 'joi';

/**
 * Error taxonomy shared by the classification core and its callers.
 * Controllers and the CLI translate these; the core never swallows them.
 */

export class NotFoundError extends Error {
  constructor(
    public readonly entity: 'message' | 'category',
    public readonly entityId: string | number
  ) {
    super(`${entity === 'message' ? 'Message' : 'Category'} with ID ${entityId} not found`);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConflictError';
  }
}

export class ProviderError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ProviderError';
  }
}

export class DataIntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DataIntegrityError';
  }
}

export class ValidationError extends Error {
  public details: Joi.ValidationErrorItem[];

  constructor(message: string, details: Joi.ValidationErrorItem[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Structured model output that still failed validation after the retry
 */
export class GenerationError extends ValidationError {
  constructor(message: string, details: Joi.ValidationErrorItem[] = []) {
    super(message, details);
    this.name = 'GenerationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
