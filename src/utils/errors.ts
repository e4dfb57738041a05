import type { PartialGeneratedContent } from '../services/generation/types.js';

/**
 * Input rejected before any model call was made.
 */
export class ValidationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues.length > 0 ? issues : [message];
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A model call that failed for good: either every attempt failed or the
 * client could not be configured (attempts is 0 in that case).
 */
export class ModelCallError extends Error {
  readonly attempts: number;

  constructor(message: string, attempts: number, cause?: unknown) {
    super(message, { cause });
    this.name = 'ModelCallError';
    this.attempts = attempts;
  }
}

export class TimeoutError extends Error {
  constructor(message = 'Operation timed out') {
    super(message);
    this.name = 'TimeoutError';
  }
}

export class GenerationCancelledError extends Error {
  readonly partial: PartialGeneratedContent;

  constructor(partial: PartialGeneratedContent) {
    super('Generation was cancelled');
    this.name = 'GenerationCancelledError';
    this.partial = partial;
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'APIUserAbortError');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
