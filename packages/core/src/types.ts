// src/types.ts
// Shared enums and value types: field vocabulary, content kinds, generators, results

// ============ Field Vocabulary ============

export enum FieldType {
  TEXT = 'text',
  TEXTAREA = 'textarea',
  NUMBER = 'number',
  SLIDER = 'slider',
  INTEGER = 'integer',
  CHECKBOX = 'checkbox',
  SELECT = 'select',
  RADIO = 'radio',
  COLOR = 'color',
  PROMPT = 'prompt',
  NEGATIVE_PROMPT = 'negative_prompt',
  CONTROLS = 'controls',
  DYNAMIC_FORM = 'dynamic_form',
}

/** Closed set of field type tags. */
export const FIELD_TYPES: readonly FieldType[] = Object.values(FieldType);

const _fieldTypes: ReadonlySet<string> = new Set<string>(FIELD_TYPES);

export function isFieldType(value: unknown): value is FieldType {
  return typeof value === 'string' && _fieldTypes.has(value);
}

/** Field kinds whose `options` list is mandatory. */
export const ENUMERATED_FIELD_TYPES: ReadonlySet<FieldType> = new Set([
  FieldType.SELECT,
  FieldType.RADIO,
  FieldType.CONTROLS,
  FieldType.DYNAMIC_FORM,
]);

export const NUMERIC_FIELD_TYPES: ReadonlySet<FieldType> = new Set([
  FieldType.NUMBER,
  FieldType.INTEGER,
  FieldType.SLIDER,
]);

export const TEXTUAL_FIELD_TYPES: ReadonlySet<FieldType> = new Set([
  FieldType.TEXT,
  FieldType.TEXTAREA,
  FieldType.PROMPT,
  FieldType.NEGATIVE_PROMPT,
]);

export enum FormatType {
  PERCENTAGE = 'percentage',
}

// ============ Content Kinds ============

export enum ContentType {
  IMAGE = 'image',
  VIDEO = 'video',
  AUDIO = 'audio',
  TEXT = 'text',
  THREE_D = 'threed',
  MASK = 'mask',
  MASK_FROM_PROMPT = 'mask_from_prompt',
  MASK_FROM_COLOR = 'mask_from_color',
}

const _contentTypes: ReadonlySet<string> = new Set<string>(Object.values(ContentType));

export function isContentType(value: unknown): value is ContentType {
  return typeof value === 'string' && _contentTypes.has(value);
}

export const MASK_CONTENT_TYPES: ReadonlySet<ContentType> = new Set([
  ContentType.MASK,
  ContentType.MASK_FROM_PROMPT,
  ContentType.MASK_FROM_COLOR,
]);

/** Control identifiers used by the preset controls. */
export enum ControlType {
  INPUT = 'input',
  MASK = 'mask',
  CONTROL_CANNY = 'control-canny',
  CONTROL_POSE = 'control-pose',
  CONTROL_STYLE_TRANSFER = 'control-style-transfer',
  CONTROL_FACE_REPLACEMENT = 'control-face-replacement',
}

// ============ Default Generators ============

export enum GeneratorType {
  RANDOM_INTEGER = 'random_integer',
  RANDOM_DECIMAL = 'random_decimal',
}

const _generatorTypes: ReadonlySet<string> = new Set<string>(Object.values(GeneratorType));

export function isGeneratorType(value: unknown): value is GeneratorType {
  return typeof value === 'string' && _generatorTypes.has(value);
}

// ============ Content Payloads ============

/**
 * Raw content as submitted by a caller: a URL, a `data:` URL, a filesystem
 * path, plain text, or bytes.
 */
export type ContentPayload = string | Uint8Array;

/**
 * Decoded content, provided by the content layer. Nothing in this package
 * calls these methods; workflow handlers pass submitted payloads to a
 * {@link ContentResolver} and use the handle it returns.
 */
export interface ContentHandle {
  toResponse(): Promise<{ body: Uint8Array; mediaType: string }>;
  save(path: string): Promise<void>;
  toImageHandle(): Promise<unknown>;
}

export interface ContentResolver {
  resolve(payload: ContentPayload, contentType: ContentType): ContentHandle;
}

// ============ Validation Results ============

export type ConfigErrorCode =
  | 'invalid_type'
  | 'invalid_value'
  | 'invalid_bounds'
  | 'invalid_step'
  | 'missing_bounds'
  | 'invalid_default'
  | 'default_conflict'
  | 'invalid_generator'
  | 'empty_options'
  | 'invalid_option'
  | 'duplicate_option'
  | 'missing_alias'
  | 'duplicate_alias'
  | 'invalid_field'
  | 'empty_supported_contents'
  | 'invalid_content'
  | 'duplicate_content'
  | 'invalid_conditional';

export interface ValidationError {
  path: string;
  code: ConfigErrorCode;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export function validationResult(errors: ValidationError[]): ValidationResult {
  return { valid: errors.length === 0, errors };
}
