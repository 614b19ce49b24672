// src/options.ts
// Option, Control and ControlContent descriptor records

import { FieldConfigurationError } from './errors.js';
import { isFieldDescriptor } from './field-slots.js';
import type { FieldDescriptor } from './fields.js';
import {
  ContentType,
  MASK_CONTENT_TYPES,
  isContentType,
  validationResult,
  type ValidationError,
  type ValidationResult,
} from './types.js';

// ============ Init Shapes ============

export interface OptionInit {
  value: string;
  title: string;
  description?: string;
  tooltip?: string;
  group?: string;
  /** Preselected in the renderer. */
  default?: boolean;
  fields?: readonly FieldDescriptor[];
  advanced_fields?: readonly FieldDescriptor[];
  /** How many times the option may be picked. */
  max?: number;
}

export interface ControlContentInit {
  type: ContentType;
  required?: boolean;
  title?: string;
  description?: string;
  fields?: readonly FieldDescriptor[];
}

export interface ControlInit extends OptionInit {
  supported_contents: readonly ControlContent[];
  /** The caller must submit a value for this control. */
  required?: boolean;
}

// ============ Validation ============

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Nested field lists are keyed by alias once submitted, so each entry needs a
 * unique, non-empty alias.
 */
export function validateNestedFields(fields: unknown, path: string): ValidationError[] {
  if (fields === undefined) return [];
  if (!Array.isArray(fields)) {
    return [{ path, code: 'invalid_field', message: 'must be a list of fields' }];
  }

  const errors: ValidationError[] = [];
  const seen = new Set<string>();

  fields.forEach((field: unknown, i) => {
    if (!isFieldDescriptor(field)) {
      errors.push({ path: `${path}[${i}]`, code: 'invalid_field', message: 'must be a field descriptor' });
      return;
    }
    if (typeof field.alias !== 'string' || field.alias.length === 0) {
      errors.push({ path: `${path}[${i}].alias`, code: 'missing_alias', message: 'nested fields must declare an alias' });
      return;
    }
    if (seen.has(field.alias)) {
      errors.push({ path: `${path}[${i}].alias`, code: 'duplicate_alias', message: `duplicate alias "${field.alias}"` });
    }
    seen.add(field.alias);
  });

  return errors;
}

function optionErrors(init: unknown, path: string): ValidationError[] {
  const at = (key: string) => (path ? `${path}.${key}` : key);

  if (!isRecord(init)) {
    return [{ path, code: 'invalid_option', message: 'option must be an object' }];
  }

  const errors: ValidationError[] = [];

  if (typeof init.value !== 'string' || init.value.length === 0) {
    errors.push({ path: at('value'), code: 'invalid_value', message: 'value must be a non-empty string' });
  }
  if (typeof init.title !== 'string') {
    errors.push({ path: at('title'), code: 'invalid_value', message: 'title must be a string' });
  }
  for (const key of ['description', 'tooltip', 'group'] as const) {
    if (init[key] !== undefined && typeof init[key] !== 'string') {
      errors.push({ path: at(key), code: 'invalid_value', message: `${key} must be a string` });
    }
  }
  if (init.default !== undefined && typeof init.default !== 'boolean') {
    errors.push({ path: at('default'), code: 'invalid_value', message: 'default must be a boolean' });
  }
  if (init.max !== undefined && !(typeof init.max === 'number' && Number.isInteger(init.max) && init.max > 0)) {
    errors.push({ path: at('max'), code: 'invalid_value', message: 'max must be a positive integer' });
  }

  errors.push(...validateNestedFields(init.fields, at('fields')));
  errors.push(...validateNestedFields(init.advanced_fields, at('advanced_fields')));

  return errors;
}

export function validateOptionInit(init: unknown, path = ''): ValidationResult {
  return validationResult(optionErrors(init, path));
}

export function validateControlContentInit(init: unknown, path = ''): ValidationResult {
  const at = (key: string) => (path ? `${path}.${key}` : key);

  if (!isRecord(init)) {
    return validationResult([{ path, code: 'invalid_content', message: 'content must be an object' }]);
  }

  const errors: ValidationError[] = [];

  if (!isContentType(init.type)) {
    errors.push({
      path: at('type'),
      code: 'invalid_content',
      message: `type must be one of ${Object.values(ContentType).join(', ')}`,
    });
  }
  if (init.required !== undefined && typeof init.required !== 'boolean') {
    errors.push({ path: at('required'), code: 'invalid_value', message: 'required must be a boolean' });
  }
  for (const key of ['title', 'description'] as const) {
    if (init[key] !== undefined && typeof init[key] !== 'string') {
      errors.push({ path: at(key), code: 'invalid_value', message: `${key} must be a string` });
    }
  }
  errors.push(...validateNestedFields(init.fields, at('fields')));

  return validationResult(errors);
}

export function validateControlInit(init: unknown, path = ''): ValidationResult {
  const at = (key: string) => (path ? `${path}.${key}` : key);
  const errors = optionErrors(init, path);

  if (!isRecord(init)) {
    return validationResult(errors);
  }

  if (init.required !== undefined && typeof init.required !== 'boolean') {
    errors.push({ path: at('required'), code: 'invalid_value', message: 'required must be a boolean' });
  }

  const contents = init.supported_contents;
  if (!Array.isArray(contents) || contents.length === 0) {
    errors.push({
      path: at('supported_contents'),
      code: 'empty_supported_contents',
      message: 'a control must support at least one content kind',
    });
    return validationResult(errors);
  }

  const seen = new Set<ContentType>();
  contents.forEach((content: unknown, i) => {
    const entryPath = `${at('supported_contents')}[${i}]`;
    if (!(content instanceof ControlContent)) {
      errors.push({ path: entryPath, code: 'invalid_content', message: 'must be a ControlContent' });
      return;
    }
    if (seen.has(content.type)) {
      errors.push({ path: entryPath, code: 'duplicate_content', message: `content kind "${content.type}" listed twice` });
    }
    seen.add(content.type);
  });

  return validationResult(errors);
}

function freezeList<T>(items: readonly T[] | undefined): readonly T[] | undefined {
  return items === undefined ? undefined : Object.freeze([...items]);
}

// ============ Records ============

/**
 * A selectable choice. Values are unique within one option list, not globally.
 */
export class Option {
  readonly value: string;
  readonly title: string;
  readonly description?: string;
  readonly tooltip?: string;
  readonly group?: string;
  readonly default?: boolean;
  readonly fields?: readonly FieldDescriptor[];
  readonly advanced_fields?: readonly FieldDescriptor[];
  readonly max?: number;

  constructor(init: OptionInit) {
    if (new.target === Option) {
      const result = validateOptionInit(init);
      if (!result.valid) {
        throw new FieldConfigurationError(`option "${String(init.value)}"`, result.errors);
      }
    }

    this.value = init.value;
    this.title = init.title;
    this.description = init.description;
    this.tooltip = init.tooltip;
    this.group = init.group;
    this.default = init.default;
    this.fields = freezeList(init.fields);
    this.advanced_fields = freezeList(init.advanced_fields);
    this.max = init.max;

    if (new.target === Option) {
      Object.freeze(this);
    }
  }
}

/**
 * One content kind a control accepts, optionally with its own nested fields.
 */
export class ControlContent {
  readonly type: ContentType;
  readonly required: boolean;
  readonly title?: string;
  readonly description?: string;
  readonly fields?: readonly FieldDescriptor[];

  constructor(init: ControlContentInit) {
    const result = validateControlContentInit(init);
    if (!result.valid) {
      throw new FieldConfigurationError('control content', result.errors);
    }

    this.type = init.type;
    this.required = init.required ?? false;
    this.title = init.title;
    this.description = init.description;
    this.fields = freezeList(init.fields);
    Object.freeze(this);
  }
}

/**
 * An input slot: an option that declares which content kinds it takes.
 * Its advanced fields may themselves be controls fields, to any depth.
 */
export class Control extends Option {
  readonly supported_contents: readonly ControlContent[];
  readonly required: boolean;

  constructor(init: ControlInit) {
    const result = validateControlInit(init);
    if (!result.valid) {
      throw new FieldConfigurationError(`control "${String(init.value)}"`, result.errors);
    }

    super(init);
    this.supported_contents = Object.freeze([...init.supported_contents]);
    this.required = init.required ?? false;
    Object.freeze(this);
  }

  supports(kind: ContentType): boolean {
    return this.supported_contents.some((content) => content.type === kind);
  }

  supportsImage(): boolean {
    return this.supports(ContentType.IMAGE);
  }

  supportsVideo(): boolean {
    return this.supports(ContentType.VIDEO);
  }

  supportsAudio(): boolean {
    return this.supports(ContentType.AUDIO);
  }

  supportsText(): boolean {
    return this.supports(ContentType.TEXT);
  }

  supportsThreeD(): boolean {
    return this.supports(ContentType.THREE_D);
  }

  /** Any of the mask kinds. */
  supportsMask(): boolean {
    return this.supported_contents.some((content) => MASK_CONTENT_TYPES.has(content.type));
  }

  requiredContents(): ControlContent[] {
    return this.supported_contents.filter((content) => content.required);
  }
}

// ============ Content Factories ============

type ContentOptions = Omit<ControlContentInit, 'type'>;

export function imageContent(options: ContentOptions = {}): ControlContent {
  return new ControlContent({ ...options, type: ContentType.IMAGE });
}

export function videoContent(options: ContentOptions = {}): ControlContent {
  return new ControlContent({ ...options, type: ContentType.VIDEO });
}

export function audioContent(options: ContentOptions = {}): ControlContent {
  return new ControlContent({ ...options, type: ContentType.AUDIO });
}

export function textContent(options: ContentOptions = {}): ControlContent {
  return new ControlContent({ ...options, type: ContentType.TEXT });
}

export function threeDContent(options: ContentOptions = {}): ControlContent {
  return new ControlContent({ ...options, type: ContentType.THREE_D });
}

export function maskContent(options: ContentOptions = {}): ControlContent {
  return new ControlContent({ ...options, type: ContentType.MASK });
}

export function maskFromPromptContent(options: ContentOptions = {}): ControlContent {
  return new ControlContent({ ...options, type: ContentType.MASK_FROM_PROMPT });
}

export function maskFromColorContent(options: ContentOptions = {}): ControlContent {
  return new ControlContent({ ...options, type: ContentType.MASK_FROM_COLOR });
}
