// src/errors.ts
// Workflow error classes

import type { ValidationError } from './types.js';

export class WorkflowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WorkflowError';
  }
}

/**
 * Raised while a field, option, control or conditional is being constructed.
 * Carries every problem found, not just the first.
 */
export class FieldConfigurationError extends WorkflowError {
  readonly errors: ValidationError[];

  constructor(subject: string, errors: ValidationError[]) {
    const detail = errors
      .map((e) => (e.path ? `${e.path}: ${e.message}` : e.message))
      .join('; ');
    super(`Invalid ${subject}: ${detail}`);
    this.name = 'FieldConfigurationError';
    this.errors = errors;
  }
}

export class SchemaExtractionError extends WorkflowError {
  constructor(message: string) {
    super(message);
    this.name = 'SchemaExtractionError';
  }
}

export interface ArgumentIssue {
  path: string;
  message: string;
}

export class ArgumentValidationError extends WorkflowError {
  readonly issues: ArgumentIssue[];

  constructor(issues: ArgumentIssue[]) {
    const detail = issues
      .map((i) => (i.path ? `${i.path}: ${i.message}` : i.message))
      .join('; ');
    super(`Invalid arguments: ${detail}`);
    this.name = 'ArgumentValidationError';
    this.issues = issues;
  }
}

export class ControlNotFoundError extends WorkflowError {
  constructor(message: string) {
    super(message);
    this.name = 'ControlNotFoundError';
  }
}
