// src/schema.ts
// Schema extraction: walks a workflow's declared parameters and serializes
// every field descriptor, to any nesting depth, into plain JSON

import type { WorkflowParameter } from './binder.js';
import { SchemaExtractionError } from './errors.js';
import { getFieldDefault, isFieldDescriptor } from './field-slots.js';
import type { FieldDescriptor } from './fields.js';
import { generate } from './generators.js';
import { createLogger } from './logger.js';
import type { FieldType } from './types.js';

const logger = createLogger('schema');

// ============ Output Types ============

export type SchemaValue = string | number | boolean | null | SchemaValue[] | SchemaObject;

export interface SchemaObject {
  [key: string]: SchemaValue;
}

export interface SchemaField extends SchemaObject {
  name: string;
  title: string;
  type: FieldType;
  description: string;
  options: SchemaValue[];
}

export interface WorkflowSchema {
  title: string;
  version: string;
  description: string;
  examples: unknown[];
  fields: SchemaField[];
}

/** Anything that looks like a workflow: metadata plus a bound run function. */
export interface SchemaSource {
  readonly title: unknown;
  readonly version: unknown;
  readonly description: unknown;
  readonly examples?: unknown;
  readonly run: unknown;
}

// ============ Normalization ============

const LEADING_KEYS = new Set(['name', 'title', 'type', 'description', 'options']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeEntries(source: object, skip?: ReadonlySet<string>): SchemaObject {
  const result: SchemaObject = {};
  for (const [key, value] of Object.entries(source)) {
    if (skip?.has(key)) continue;
    const normalized = normalizeValue(value);
    if (normalized !== null && normalized !== undefined) {
      result[key] = normalized;
    }
  }
  return result;
}

function resolveDefault(field: FieldDescriptor): SchemaValue | undefined {
  if ('default_generator_type' in field && field.default_generator_type !== undefined) {
    return generate(field.default_generator_type, field.min, field.max);
  }
  const fallback = getFieldDefault(field);
  if (fallback === undefined) return undefined;
  return typeof fallback === 'object' ? [...fallback] : fallback;
}

/**
 * Serialize one field. Top-level fields are named after their parameter,
 * nested ones after their alias.
 */
export function serializeField(field: FieldDescriptor, name: string): SchemaField {
  const declared: readonly unknown[] = 'options' in field ? field.options : [];
  const options = declared.map((option) => normalizeValue(option) ?? null);

  const entry: SchemaField = {
    name,
    title: field.title,
    type: field.type,
    description: field.description,
    options,
    ...normalizeEntries(field, LEADING_KEYS),
  };

  const fallback = resolveDefault(field);
  if (fallback !== undefined && fallback !== null) {
    entry.default = fallback;
  }
  return entry;
}

/**
 * Recursively convert a descriptor value to JSON. The walk follows the
 * value's shape, so options, controls, contents and their nested fields
 * serialize however deep they go. Absent values come back as `undefined`.
 */
export function normalizeValue(value: unknown): SchemaValue | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (isFieldDescriptor(value)) {
    if (!value.alias) {
      throw new SchemaExtractionError(`Nested ${value.type} field "${value.title}" has no alias`);
    }
    return serializeField(value, value.alias);
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => normalizeValue(item) ?? null);
  }
  if (isRecord(value)) {
    return normalizeEntries(value);
  }
  return undefined;
}

// ============ Extraction ============

function isWorkflowParameter(value: unknown): value is WorkflowParameter {
  return isRecord(value) && typeof value.name === 'string' && 'spec' in value;
}

function readSignature(run: unknown): readonly WorkflowParameter[] {
  if (typeof run === 'function' && 'signature' in run && Array.isArray(run.signature)) {
    return run.signature.filter(isWorkflowParameter);
  }
  logger.warn('run has no declared signature; schema will list no fields');
  return [];
}

function requireString(value: unknown, key: string): string {
  if (typeof value !== 'string') {
    throw new SchemaExtractionError(`${key} must be a string`);
  }
  return value;
}

/**
 * Build the renderer-facing schema of a workflow.
 *
 * @throws SchemaExtractionError when title, version or description is not a
 *   string; nothing is returned in that case
 */
export function extractSchema(source: SchemaSource): WorkflowSchema {
  const title = requireString(source.title, 'title');
  const version = requireString(source.version, 'version');
  const description = requireString(source.description, 'description');

  const fields: SchemaField[] = [];
  for (const { name, spec } of readSignature(source.run)) {
    if (!isFieldDescriptor(spec)) {
      logger.debug({ parameter: name }, 'Skipping parameter without a field descriptor');
      continue;
    }
    fields.push(serializeField(spec, name));
  }

  return {
    title,
    version,
    description,
    examples: Array.isArray(source.examples) ? structuredClone(source.examples) : [],
    fields,
  };
}
