// src/conditionals.ts
// Visibility / enablement rules that reference other fields by name.
// Rules are carried into the schema as-is; the renderer evaluates them.

import { FieldConfigurationError } from './errors.js';
import { validationResult, type ValidationError, type ValidationResult } from './types.js';

export type ConditionalValue = string | number | boolean;

export interface IfValue {
  readonly type: 'if_value';
  readonly field: string;
  readonly value: ConditionalValue;
}

export interface IfNotValue {
  readonly type: 'if_not_value';
  readonly field: string;
  readonly value: ConditionalValue;
}

export interface IfMinLength {
  readonly type: 'if_min_length';
  readonly field: string;
  readonly min_length: number;
}

export interface IfMaxLength {
  readonly type: 'if_max_length';
  readonly field: string;
  readonly max_length: number;
}

export type Conditional = IfValue | IfNotValue | IfMinLength | IfMaxLength;

/**
 * One rule, or an ordered list of rules that must ALL hold.
 */
export type Conditionals = Conditional | readonly Conditional[];

export const CONDITIONAL_TYPES = ['if_value', 'if_not_value', 'if_min_length', 'if_max_length'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLength(value: unknown): boolean {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function isConditionalValue(value: unknown): boolean {
  return typeof value === 'string' || typeof value === 'boolean' || (typeof value === 'number' && Number.isFinite(value));
}

export function validateConditional(rule: unknown, path = ''): ValidationResult {
  const errors: ValidationError[] = [];
  const at = (key: string) => (path ? `${path}.${key}` : key);

  if (!isRecord(rule)) {
    return validationResult([{ path, code: 'invalid_conditional', message: 'conditional must be an object' }]);
  }
  if (typeof rule.field !== 'string' || rule.field.length === 0) {
    errors.push({ path: at('field'), code: 'invalid_conditional', message: 'field must be a non-empty string' });
  }

  switch (rule.type) {
    case 'if_value':
    case 'if_not_value':
      if (!isConditionalValue(rule.value)) {
        errors.push({ path: at('value'), code: 'invalid_conditional', message: 'value must be a string, number or boolean' });
      }
      break;
    case 'if_min_length':
      if (!isLength(rule.min_length)) {
        errors.push({ path: at('min_length'), code: 'invalid_conditional', message: 'min_length must be a non-negative integer' });
      }
      break;
    case 'if_max_length':
      if (!isLength(rule.max_length)) {
        errors.push({ path: at('max_length'), code: 'invalid_conditional', message: 'max_length must be a non-negative integer' });
      }
      break;
    default:
      errors.push({
        path: at('type'),
        code: 'invalid_conditional',
        message: `type must be one of ${CONDITIONAL_TYPES.join(', ')}`,
      });
  }

  return validationResult(errors);
}

/**
 * Validate a single rule or a list of rules, reporting every bad entry.
 */
export function validateConditionals(rules: unknown, path: string): ValidationError[] {
  if (Array.isArray(rules)) {
    return rules.flatMap((rule, i) => validateConditional(rule, `${path}[${i}]`).errors);
  }
  return validateConditional(rules, path).errors;
}

function checked<T extends Conditional>(rule: T): T {
  const result = validateConditional(rule);
  if (!result.valid) {
    throw new FieldConfigurationError('conditional', result.errors);
  }
  Object.freeze(rule);
  return rule;
}

export function ifValue(field: string, value: ConditionalValue): IfValue {
  return checked({ type: 'if_value', field, value });
}

export function ifNotValue(field: string, value: ConditionalValue): IfNotValue {
  return checked({ type: 'if_not_value', field, value });
}

export function ifMinLength(field: string, minLength: number): IfMinLength {
  return checked({ type: 'if_min_length', field, min_length: minLength });
}

export function ifMaxLength(field: string, maxLength: number): IfMaxLength {
  return checked({ type: 'if_max_length', field, max_length: maxLength });
}

/** Frozen copy of a rule set, so descriptors never share a caller's array. */
export function freezeConditionals(rules: Conditionals | undefined): Conditionals | undefined {
  if (rules === undefined) return undefined;
  if (isConditionalList(rules)) {
    return Object.freeze(rules.map((rule) => Object.freeze({ ...rule })));
  }
  return Object.freeze({ ...rules });
}

function isConditionalList(rules: Conditionals): rules is readonly Conditional[] {
  return Array.isArray(rules);
}
