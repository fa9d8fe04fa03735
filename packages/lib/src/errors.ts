/**
 * Error Taxonomy
 *
 * Three failure families cross the engine:
 * - ValidationError: malformed or out-of-range request input
 * - ModelUnavailableError: model backend timed out, was unreachable, or
 *   returned output that could not be used (always handled by fallback)
 * - ConfigurationError: invalid weights, thresholds, or stage graph (fatal at load)
 *
 * @module errors
 */

import type { ZodError } from 'zod';

// ===========================================
// Validation
// ===========================================

export class ValidationError extends Error {
  readonly code = 'INVALID_INPUT' as const;
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
  }

  /**
   * Build from a zod error, keeping one `path: message` line per issue
   */
  static fromZod(error: ZodError, subject: string): ValidationError {
    const issues = formatZodIssues(error);
    return new ValidationError(`Invalid ${subject}: ${issues.join('; ')}`, issues);
  }
}

// ===========================================
// Model Availability
// ===========================================

export type ModelFailureKind = 'timeout' | 'unreachable' | 'malformed_response';

export interface ModelFailure {
  kind: ModelFailureKind;
  message: string;
}

export class ModelUnavailableError extends Error {
  readonly kind: ModelFailureKind;

  constructor(failure: ModelFailure) {
    super(failure.message);
    this.name = 'ModelUnavailableError';
    this.kind = failure.kind;
  }

  toFailure(): ModelFailure {
    return { kind: this.kind, message: this.message };
  }
}

// ===========================================
// Configuration
// ===========================================

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }

  static fromZod(error: ZodError): ConfigurationError {
    const issues = formatZodIssues(error);
    return new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
}

// ===========================================
// Helpers
// ===========================================

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
