// src/binder.ts
// Argument binding: filters caller kwargs against the declared parameters and
// validates them with a zod schema compiled once per workflow

import { z } from 'zod';

import { COLOR_PATTERN } from './constants.js';
import { ArgumentValidationError, type ArgumentIssue } from './errors.js';
import { getFieldDefault, isFieldDescriptor } from './field-slots.js';
import type {
  ChoiceFieldDescriptor,
  ControlsFieldDescriptor,
  DynamicFormFieldDescriptor,
  FieldDescriptor,
  FieldValueMap,
  NumericFieldDescriptor,
  TextualFieldDescriptor,
} from './fields.js';
import { generate } from './generators.js';
import { createLogger } from './logger.js';
import type { Control, Option } from './options.js';
import { ContentType, FieldType } from './types.js';
import { ControlValue, OptionValue } from './values.js';

const logger = createLogger('binder');

// ============ Signature Types ============

/** One declared workflow parameter: a field descriptor or a plain default. */
export interface WorkflowParameter {
  readonly name: string;
  readonly spec: unknown;
}

export type ParamSpecs = Readonly<Record<string, unknown>>;

export type Kwargs = Record<string, unknown>;

/** What the run handler receives for a given parameter declaration. */
export type WorkflowArgs<P extends ParamSpecs> = {
  -readonly [K in keyof P]: P[K] extends FieldDescriptor
    ? P[K] extends { type: infer T extends FieldType }
      ? FieldValueMap[T]
      : never
    : P[K];
};

export type RunHandler<P extends ParamSpecs, R> = (args: WorkflowArgs<P>) => R;

export interface BoundRun<P extends ParamSpecs, R> {
  (kwargs?: Kwargs): R;
  /** The declared parameters, in declaration order. */
  readonly signature: readonly WorkflowParameter[];
  /** The handler as written, before binding. */
  readonly original: RunHandler<P, R>;
}

// ============ Coercion ============

function coerceNumber(value: unknown): unknown {
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? value : parsed;
  }
  return value;
}

function coerceBoolean(value: unknown): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

function wrapSingle(value: unknown): unknown {
  return typeof value === 'string' ? [value] : value;
}

// ============ Field Schemas ============

const ContentValueSchema = z.object({
  type: z.nativeEnum(ContentType),
  content: z.union([z.string(), z.instanceof(Uint8Array)]),
});

const SubmittedOptionSchema = z.object({
  type: z.string(),
  settings: z.record(z.unknown()).default({}),
});

const SubmittedControlSchema = SubmittedOptionSchema.extend({
  contents: z.array(ContentValueSchema).default([]),
});

function textualSchema(field: TextualFieldDescriptor): z.ZodTypeAny {
  let schema = z.string();
  if (field.min_length !== undefined) schema = schema.min(field.min_length);
  if (field.max_length !== undefined) schema = schema.max(field.max_length);
  return schema;
}

function numericSchema(field: NumericFieldDescriptor): z.ZodTypeAny {
  let schema = z.number().finite();
  if (field.type === FieldType.INTEGER) schema = schema.int();
  if (field.min !== undefined) schema = schema.gte(field.min);
  if (field.max !== undefined) schema = schema.lte(field.max);
  return z.preprocess(coerceNumber, schema);
}

function choiceSchema(field: ChoiceFieldDescriptor): z.ZodTypeAny {
  const values = field.options.map((option) => option.value);
  const member = z.string().refine((value) => values.includes(value), {
    message: `Expected one of ${values.join(', ')}`,
  });
  if (field.type === FieldType.SELECT && field.multiple) {
    return z.preprocess(wrapSingle, z.array(member));
  }
  return member;
}

function countAgainstMax(
  ctx: z.RefinementCtx,
  counts: Map<string, number>,
  option: Option,
  index: number,
): boolean {
  const count = (counts.get(option.value) ?? 0) + 1;
  counts.set(option.value, count);
  if (option.max !== undefined && count > option.max) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [index, 'type'],
      message: `"${option.value}" may be submitted at most ${option.max} time(s)`,
    });
    return false;
  }
  return true;
}

function copyIssues(ctx: z.RefinementCtx, error: z.ZodError, prefix: (string | number)[]): void {
  for (const issue of error.issues) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: [...prefix, ...issue.path], message: issue.message });
  }
}

function unknownChoice(ctx: z.RefinementCtx, index: number, value: string, options: readonly Option[]): void {
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    path: [index, 'type'],
    message: `Unknown option "${value}"; expected one of ${options.map((option) => option.value).join(', ')}`,
  });
}

/**
 * Settings of a picked option or control, keyed by nested field alias.
 * Unknown keys are dropped, declared ones validated and defaulted.
 */
export function createSettingsSchema(fields: readonly FieldDescriptor[]): z.ZodTypeAny {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const field of fields) {
    if (field.alias === undefined) continue;
    const schema = createFieldSchema(field);
    shape[field.alias] = hasDefault(field) ? schema : schema.optional();
  }
  return z.object(shape);
}

function optionSettingsFields(option: Option): FieldDescriptor[] {
  return [...(option.fields ?? []), ...(option.advanced_fields ?? [])];
}

function controlSettingsFields(control: Control): FieldDescriptor[] {
  return [
    ...optionSettingsFields(control),
    ...control.supported_contents.flatMap((content) => content.fields ?? []),
  ];
}

function controlsSchema(field: ControlsFieldDescriptor): z.ZodTypeAny {
  const declared = new Map(
    field.options.map((control) => [control.value, { control, settings: createSettingsSchema(controlSettingsFields(control)) }]),
  );

  return z.array(SubmittedControlSchema).transform((entries, ctx) => {
    const values: ControlValue[] = [];
    const counts = new Map<string, number>();
    let failed = false;

    entries.forEach((entry, i) => {
      const known = declared.get(entry.type);
      if (!known) {
        unknownChoice(ctx, i, entry.type, field.options);
        failed = true;
        return;
      }
      const { control, settings } = known;
      if (!countAgainstMax(ctx, counts, control, i)) failed = true;

      entry.contents.forEach((content, j) => {
        if (!control.supports(content.type)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [i, 'contents', j, 'type'],
            message: `Control "${control.value}" does not accept ${content.type} content`,
          });
          failed = true;
        }
      });
      for (const required of control.requiredContents()) {
        if (!entry.contents.some((content) => content.type === required.type)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [i, 'contents'],
            message: `Control "${control.value}" requires ${required.type} content`,
          });
          failed = true;
        }
      }

      const parsed = settings.safeParse(entry.settings);
      if (!parsed.success) {
        copyIssues(ctx, parsed.error, [i, 'settings']);
        failed = true;
        return;
      }
      values.push(new ControlValue({ type: entry.type, contents: entry.contents, settings: parsed.data }));
    });

    for (const control of field.options) {
      if (control.required && !counts.has(control.value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Control "${control.value}" is required` });
        failed = true;
      }
    }

    return failed ? z.NEVER : values;
  });
}

function dynamicFormSchema(field: DynamicFormFieldDescriptor): z.ZodTypeAny {
  const declared = new Map(
    field.options.map((option) => [option.value, { option, settings: createSettingsSchema(optionSettingsFields(option)) }]),
  );

  return z.array(SubmittedOptionSchema).transform((entries, ctx) => {
    const values: OptionValue[] = [];
    const counts = new Map<string, number>();
    let failed = false;

    entries.forEach((entry, i) => {
      const known = declared.get(entry.type);
      if (!known) {
        unknownChoice(ctx, i, entry.type, field.options);
        failed = true;
        return;
      }
      if (!countAgainstMax(ctx, counts, known.option, i)) failed = true;

      const parsed = known.settings.safeParse(entry.settings);
      if (!parsed.success) {
        copyIssues(ctx, parsed.error, [i, 'settings']);
        failed = true;
        return;
      }
      values.push(new OptionValue({ type: entry.type, settings: parsed.data }));
    });

    return failed ? z.NEVER : values;
  });
}

function hasDefault(field: FieldDescriptor): boolean {
  return getFieldDefault(field) !== undefined || ('default_generator_type' in field && field.default_generator_type !== undefined);
}

function valueSchema(field: FieldDescriptor): z.ZodTypeAny {
  switch (field.type) {
    case FieldType.TEXT:
    case FieldType.TEXTAREA:
    case FieldType.PROMPT:
    case FieldType.NEGATIVE_PROMPT:
      return textualSchema(field);
    case FieldType.NUMBER:
    case FieldType.INTEGER:
    case FieldType.SLIDER:
      return numericSchema(field);
    case FieldType.CHECKBOX:
      return z.preprocess(coerceBoolean, z.boolean());
    case FieldType.SELECT:
    case FieldType.RADIO:
      return choiceSchema(field);
    case FieldType.COLOR:
      return z.string().regex(COLOR_PATTERN, 'Expected a #rgb or #rrggbb color');
    case FieldType.CONTROLS:
      return controlsSchema(field);
    case FieldType.DYNAMIC_FORM:
      return dynamicFormSchema(field);
  }
}

/**
 * zod schema for one field's submitted value, with its default applied when
 * the value is missing. Generated defaults are drawn on every parse.
 */
export function createFieldSchema(field: FieldDescriptor): z.ZodTypeAny {
  const schema = valueSchema(field);

  if ('default_generator_type' in field && field.default_generator_type !== undefined) {
    const { default_generator_type: generator, min, max } = field;
    return schema.default(() => generate(generator, min, max));
  }

  const fallback = getFieldDefault(field);
  if (fallback === undefined) {
    return schema;
  }
  return schema.default(() => (Array.isArray(fallback) ? [...fallback] : fallback));
}

// ============ Binder ============

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ArgumentBinder<P extends ParamSpecs> {
  readonly signature: readonly WorkflowParameter[];
  private readonly known: ReadonlySet<string>;
  private readonly schema: z.ZodTypeAny;

  constructor(params: P) {
    this.signature = Object.freeze(Object.entries(params).map(([name, spec]) => Object.freeze({ name, spec })));
    this.known = new Set(this.signature.map((param) => param.name));

    const shape: Record<string, z.ZodTypeAny> = {};
    for (const { name, spec } of this.signature) {
      if (isFieldDescriptor(spec)) {
        shape[name] = createFieldSchema(spec);
      } else {
        shape[name] = spec === undefined ? z.unknown() : z.unknown().default(() => spec);
      }
    }
    this.schema = z.object(shape);
  }

  /**
   * Validate `kwargs` and return handler arguments.
   *
   * @throws ArgumentValidationError listing every failed constraint
   */
  bind(kwargs: Kwargs = {}): WorkflowArgs<P> {
    const accepted: Kwargs = {};
    const dropped: string[] = [];
    for (const [key, value] of Object.entries(kwargs)) {
      if (this.known.has(key)) {
        accepted[key] = value;
      } else {
        dropped.push(key);
      }
    }
    if (dropped.length > 0) {
      logger.debug({ dropped }, 'Dropping unexpected arguments');
    }

    const parsed = this.schema.safeParse(accepted);
    if (!parsed.success) {
      const issues: ArgumentIssue[] = parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      throw new ArgumentValidationError(issues);
    }

    const args = parsed.data;
    if (!this.isArgs(args)) {
      throw new ArgumentValidationError([{ path: '', message: 'Arguments did not bind to the declared parameters' }]);
    }
    return args;
  }

  private isArgs(value: unknown): value is WorkflowArgs<P> {
    return isRecord(value) && this.signature.every((param) => !isFieldDescriptor(param.spec) || param.name in value);
  }
}

/**
 * Wrap a run handler so it accepts loose kwargs. The wrapper keeps the
 * declared parameter list on `signature` for schema extraction.
 */
export function bindArguments<P extends ParamSpecs, R>(params: P, handler: RunHandler<P, R>): BoundRun<P, R> {
  const binder = new ArgumentBinder(params);
  const bound = (kwargs: Kwargs = {}): R => handler(binder.bind(kwargs));
  return Object.assign(bound, { signature: binder.signature, original: handler });
}
