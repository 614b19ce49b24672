// src/field-slots.ts
// Symbol-keyed slots on field descriptors. Object.entries skips symbol keys,
// so the schema walk never sees them.

import type { FieldDescriptor } from './fields.js';

/** Marks an object as built by one of the field constructors. */
export const FIELD_BRAND: unique symbol = Symbol('workflow-fields.field');

/** Holds the field's declared default; surfaced as `default` in the schema. */
export const DEFAULT_SLOT: unique symbol = Symbol('workflow-fields.default');

export type FieldDefault = string | number | boolean | readonly string[];

export function isFieldDescriptor(value: unknown): value is FieldDescriptor {
  return typeof value === 'object' && value !== null && FIELD_BRAND in value && value[FIELD_BRAND] === true;
}

export function getFieldDefault(field: FieldDescriptor): FieldDefault | undefined {
  return field[DEFAULT_SLOT];
}
