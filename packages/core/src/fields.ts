// src/fields.ts
// Field descriptors: one tagged variant per field kind, validated at construction

import { COLOR_PATTERN, CONTROLS_FIELD_ALIAS, INTENSITY_FIELD_ALIAS, INTENSITY_FIELD_DEFAULT, NEGATIVE_PROMPT_FIELD_ALIAS, PROMPT_FIELD_ALIAS } from './constants.js';
import { freezeConditionals, validateConditionals, type Conditionals } from './conditionals.js';
import { FieldConfigurationError } from './errors.js';
import { DEFAULT_SLOT, FIELD_BRAND, type FieldDefault } from './field-slots.js';
import { generatorRange } from './generators.js';
import { Control, Option } from './options.js';
import {
  ENUMERATED_FIELD_TYPES,
  FIELD_TYPES,
  FieldType,
  FormatType,
  GeneratorType,
  NUMERIC_FIELD_TYPES,
  TEXTUAL_FIELD_TYPES,
  isFieldType,
  isGeneratorType,
  validationResult,
  type ValidationError,
  type ValidationResult,
} from './types.js';
import type { ControlValue, OptionValue } from './values.js';

// ============ Descriptors ============

interface FieldCommon<T extends FieldType> {
  readonly [FIELD_BRAND]: true;
  readonly [DEFAULT_SLOT]?: FieldDefault;
  readonly type: T;
  readonly title: string;
  readonly description: string;
  readonly alias?: string;
  readonly placeholder?: string;
  readonly tooltip?: string;
  readonly show_if?: Conditionals;
  readonly disable_if?: Conditionals;
}

export type TextualFieldType = FieldType.TEXT | FieldType.TEXTAREA | FieldType.PROMPT | FieldType.NEGATIVE_PROMPT;
export type NumericFieldType = FieldType.NUMBER | FieldType.INTEGER | FieldType.SLIDER;
export type ChoiceFieldType = FieldType.SELECT | FieldType.RADIO;

export interface TextualFieldDescriptor extends FieldCommon<TextualFieldType> {
  readonly min_length?: number;
  readonly max_length?: number;
}

export interface NumericFieldDescriptor extends FieldCommon<NumericFieldType> {
  readonly min?: number;
  readonly max?: number;
  readonly step?: number;
  readonly format?: FormatType;
  readonly default_generator_type?: GeneratorType;
}

export interface CheckboxFieldDescriptor extends FieldCommon<FieldType.CHECKBOX> {}

export interface ChoiceFieldDescriptor extends FieldCommon<ChoiceFieldType> {
  readonly options: readonly Option[];
  readonly multiple?: boolean;
}

export interface ColorFieldDescriptor extends FieldCommon<FieldType.COLOR> {}

export interface ControlsFieldDescriptor extends FieldCommon<FieldType.CONTROLS> {
  readonly options: readonly Control[];
}

export interface DynamicFormFieldDescriptor extends FieldCommon<FieldType.DYNAMIC_FORM> {
  readonly options: readonly Option[];
}

export type FieldDescriptor =
  | TextualFieldDescriptor
  | NumericFieldDescriptor
  | CheckboxFieldDescriptor
  | ChoiceFieldDescriptor
  | ColorFieldDescriptor
  | ControlsFieldDescriptor
  | DynamicFormFieldDescriptor;

/** Value a bound run handler receives for each field kind. */
export interface FieldValueMap {
  [FieldType.TEXT]: string;
  [FieldType.TEXTAREA]: string;
  [FieldType.NUMBER]: number;
  [FieldType.SLIDER]: number;
  [FieldType.INTEGER]: number;
  [FieldType.CHECKBOX]: boolean;
  [FieldType.SELECT]: string | string[];
  [FieldType.RADIO]: string;
  [FieldType.COLOR]: string;
  [FieldType.PROMPT]: string;
  [FieldType.NEGATIVE_PROMPT]: string;
  [FieldType.CONTROLS]: ControlValue[];
  [FieldType.DYNAMIC_FORM]: OptionValue[];
}

// ============ Init Shapes ============

export interface FieldInitCommon {
  title: string;
  description: string;
  alias?: string;
  placeholder?: string;
  tooltip?: string;
  show_if?: Conditionals;
  disable_if?: Conditionals;
}

/**
 * Loosely typed declaration accepted by {@link createField}, e.g. parsed from
 * JSON. Everything is checked by {@link validateFieldInit}.
 */
export interface GenericFieldInit extends FieldInitCommon {
  type: string;
  default?: unknown;
  default_generator_type?: string;
  options?: readonly unknown[];
  min?: number;
  max?: number;
  step?: number;
  format?: string;
  min_length?: number;
  max_length?: number;
  multiple?: boolean;
}

export interface TextFieldInit extends FieldInitCommon {
  default?: string;
  min_length?: number;
  max_length?: number;
}

interface NumericInitBase extends FieldInitCommon {
  min?: number;
  max?: number;
  step?: number;
}

export type NumberFieldInit = NumericInitBase &
  ({ default?: number; default_generator_type?: undefined } | { default?: undefined; default_generator_type: GeneratorType });

export type SliderFieldInit = NumberFieldInit & { min: number; max: number };

export type PercentageSliderFieldInit = Omit<FieldInitCommon, 'title' | 'description'> & {
  title?: string;
  description?: string;
  default?: number;
};

export interface CheckboxFieldInit extends FieldInitCommon {
  default?: boolean;
}

export interface SelectFieldInit extends FieldInitCommon {
  options: readonly Option[];
  multiple?: boolean;
  default?: string | readonly string[];
}

export interface RadioFieldInit extends FieldInitCommon {
  options: readonly Option[];
  default?: string;
}

export interface ColorFieldInit extends FieldInitCommon {
  default?: string;
}

export interface ControlsFieldInit extends Partial<FieldInitCommon> {
  options: readonly Control[];
}

export interface DynamicFormFieldInit extends FieldInitCommon {
  options: readonly Option[];
}

export type ReservedTextFieldInit = Partial<FieldInitCommon> & Pick<TextFieldInit, 'default' | 'min_length' | 'max_length'>;

// ============ Validation ============

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function checkOptional(
  errors: ValidationError[],
  init: GenericFieldInit,
  key: 'alias' | 'placeholder' | 'tooltip',
): void {
  if (init[key] !== undefined && typeof init[key] !== 'string') {
    errors.push({ path: key, code: 'invalid_value', message: `${key} must be a string` });
  }
}

function numericErrors(init: GenericFieldInit, type: FieldType): ValidationError[] {
  const errors: ValidationError[] = [];
  const integral = type === FieldType.INTEGER;
  const { min, max, step } = init;

  for (const [key, value] of [['min', min], ['max', max], ['step', step]] as const) {
    if (value === undefined) continue;
    if (!isFiniteNumber(value)) {
      errors.push({ path: key, code: 'invalid_value', message: `${key} must be a finite number` });
    } else if (integral && !Number.isInteger(value)) {
      errors.push({ path: key, code: 'invalid_value', message: `${key} must be an integer` });
    }
  }

  if (type === FieldType.SLIDER && (min === undefined || max === undefined)) {
    errors.push({ path: 'min', code: 'missing_bounds', message: 'slider fields require both min and max' });
  }
  if (isFiniteNumber(min) && isFiniteNumber(max) && min > max) {
    errors.push({ path: 'min', code: 'invalid_bounds', message: `min (${min}) must not exceed max (${max})` });
  }
  const generator = init.default_generator_type;
  const boundsUsable = (min === undefined || isFiniteNumber(min)) && (max === undefined || isFiniteNumber(max));
  const boundsOrdered = !(isFiniteNumber(min) && isFiniteNumber(max) && min > max);
  if (isGeneratorType(generator) && boundsUsable && boundsOrdered && !generatorRange(generator, min, max)) {
    errors.push({
      path: 'default_generator_type',
      code: 'invalid_generator',
      message: `${generator} has no value between ${min ?? 0} and ${max ?? 'the safe maximum'}`,
    });
  }
  if (isFiniteNumber(step) && step <= 0) {
    errors.push({ path: 'step', code: 'invalid_step', message: 'step must be greater than 0' });
  }
  if (init.format !== undefined && init.format !== FormatType.PERCENTAGE) {
    errors.push({ path: 'format', code: 'invalid_value', message: `unknown format "${init.format}"` });
  }

  if (init.default !== undefined) {
    const value = init.default;
    if (!isFiniteNumber(value) || (integral && !Number.isInteger(value))) {
      errors.push({ path: 'default', code: 'invalid_default', message: `default must be ${integral ? 'an integer' : 'a finite number'}` });
    } else if ((isFiniteNumber(min) && value < min) || (isFiniteNumber(max) && value > max)) {
      errors.push({ path: 'default', code: 'invalid_default', message: `default ${value} is outside [${min ?? '-∞'}, ${max ?? '∞'}]` });
    }
  }

  return errors;
}

function textualErrors(init: GenericFieldInit): ValidationError[] {
  const errors: ValidationError[] = [];
  const { min_length, max_length } = init;

  for (const [key, value] of [['min_length', min_length], ['max_length', max_length]] as const) {
    if (value !== undefined && !(Number.isInteger(value) && value >= 0)) {
      errors.push({ path: key, code: 'invalid_value', message: `${key} must be a non-negative integer` });
    }
  }
  if (min_length !== undefined && max_length !== undefined && min_length > max_length) {
    errors.push({ path: 'min_length', code: 'invalid_bounds', message: 'min_length must not exceed max_length' });
  }

  const value = init.default;
  if (value !== undefined) {
    if (typeof value !== 'string') {
      errors.push({ path: 'default', code: 'invalid_default', message: 'default must be a string' });
    } else if ((min_length !== undefined && value.length < min_length) || (max_length !== undefined && value.length > max_length)) {
      errors.push({ path: 'default', code: 'invalid_default', message: 'default length is outside the declared bounds' });
    }
  }

  return errors;
}

function optionListErrors(init: GenericFieldInit, type: FieldType): ValidationError[] {
  const errors: ValidationError[] = [];
  const options = init.options;

  if (options === undefined || options.length === 0) {
    return [{ path: 'options', code: 'empty_options', message: `${type} fields require a non-empty options list` }];
  }

  const expected = type === FieldType.CONTROLS ? 'Control' : 'Option';
  const seen = new Set<string>();

  options.forEach((option: unknown, i) => {
    const ok = type === FieldType.CONTROLS ? option instanceof Control : option instanceof Option;
    if (!ok || !(option instanceof Option)) {
      errors.push({ path: `options[${i}]`, code: 'invalid_option', message: `must be an ${expected}` });
      return;
    }
    if (seen.has(option.value)) {
      errors.push({ path: `options[${i}].value`, code: 'duplicate_option', message: `duplicate option value "${option.value}"` });
    }
    seen.add(option.value);
  });

  if (errors.length > 0 || init.default === undefined) {
    return errors;
  }

  const value = init.default;
  if (type === FieldType.SELECT || type === FieldType.RADIO) {
    const picks = Array.isArray(value) ? value : [value];
    if (Array.isArray(value) && !(type === FieldType.SELECT && init.multiple)) {
      errors.push({ path: 'default', code: 'invalid_default', message: 'a list default needs a multiple select' });
    } else if (!Array.isArray(value) && type === FieldType.SELECT && init.multiple) {
      errors.push({ path: 'default', code: 'invalid_default', message: 'a multiple select default must be a list' });
    }
    for (const pick of picks) {
      if (typeof pick !== 'string' || !seen.has(pick)) {
        errors.push({ path: 'default', code: 'invalid_default', message: `default "${String(pick)}" is not a declared option` });
      }
    }
  } else if (!(Array.isArray(value) && value.length === 0)) {
    errors.push({ path: 'default', code: 'invalid_default', message: `${type} fields only accept an empty default` });
  }

  return errors;
}

/**
 * Check a declaration against every field invariant.
 */
export function validateFieldInit(init: GenericFieldInit): ValidationResult {
  const errors: ValidationError[] = [];

  if (!isFieldType(init.type)) {
    return validationResult([
      { path: 'type', code: 'invalid_type', message: `type must be one of ${FIELD_TYPES.join(', ')}` },
    ]);
  }
  const type = init.type;

  if (typeof init.title !== 'string') {
    errors.push({ path: 'title', code: 'invalid_value', message: 'title must be a string' });
  }
  if (typeof init.description !== 'string') {
    errors.push({ path: 'description', code: 'invalid_value', message: 'description must be a string' });
  }
  checkOptional(errors, init, 'alias');
  checkOptional(errors, init, 'placeholder');
  checkOptional(errors, init, 'tooltip');

  if (init.default !== undefined && init.default_generator_type !== undefined) {
    errors.push({
      path: 'default_generator_type',
      code: 'default_conflict',
      message: 'default and default_generator_type are mutually exclusive',
    });
  }
  if (init.default_generator_type !== undefined) {
    if (!isGeneratorType(init.default_generator_type)) {
      errors.push({
        path: 'default_generator_type',
        code: 'invalid_generator',
        message: `default_generator_type must be one of ${Object.values(GeneratorType).join(', ')}`,
      });
    } else if (!NUMERIC_FIELD_TYPES.has(type)) {
      errors.push({ path: 'default_generator_type', code: 'invalid_generator', message: `${type} fields cannot use a default generator` });
    } else if (type === FieldType.INTEGER && init.default_generator_type === GeneratorType.RANDOM_DECIMAL) {
      errors.push({ path: 'default_generator_type', code: 'invalid_generator', message: 'integer fields need an integer generator' });
    }
  }

  if (init.show_if !== undefined) {
    errors.push(...validateConditionals(init.show_if, 'show_if'));
  }
  if (init.disable_if !== undefined) {
    errors.push(...validateConditionals(init.disable_if, 'disable_if'));
  }

  if (NUMERIC_FIELD_TYPES.has(type)) {
    errors.push(...numericErrors(init, type));
  } else if (TEXTUAL_FIELD_TYPES.has(type)) {
    errors.push(...textualErrors(init));
  } else if (ENUMERATED_FIELD_TYPES.has(type)) {
    errors.push(...optionListErrors(init, type));
  } else if (type === FieldType.CHECKBOX) {
    if (init.default !== undefined && typeof init.default !== 'boolean') {
      errors.push({ path: 'default', code: 'invalid_default', message: 'default must be a boolean' });
    }
  } else if (type === FieldType.COLOR) {
    if (init.default !== undefined && !(typeof init.default === 'string' && COLOR_PATTERN.test(init.default))) {
      errors.push({ path: 'default', code: 'invalid_default', message: 'default must be a #rgb or #rrggbb color' });
    }
  }

  if (init.options !== undefined && !ENUMERATED_FIELD_TYPES.has(type)) {
    errors.push({ path: 'options', code: 'invalid_option', message: `${type} fields do not take options` });
  }

  return validationResult(errors);
}

// ============ Construction ============

function assertValid(init: GenericFieldInit): FieldType {
  const result = validateFieldInit(init);
  if (!result.valid || !isFieldType(init.type)) {
    const label = typeof init.title === 'string' && init.title ? `${init.type} field "${init.title}"` : `${init.type} field`;
    throw new FieldConfigurationError(label, result.errors);
  }
  return init.type;
}

function common<T extends FieldType>(type: T, init: FieldInitCommon, fallback: FieldDefault | undefined) {
  return {
    [FIELD_BRAND]: true as const,
    [DEFAULT_SLOT]: fallback,
    type,
    title: init.title,
    description: init.description,
    alias: init.alias,
    placeholder: init.placeholder,
    tooltip: init.tooltip,
    show_if: freezeConditionals(init.show_if),
    disable_if: freezeConditionals(init.disable_if),
  };
}

function stringList(value: unknown): readonly string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return Object.freeze(value.filter((item): item is string => typeof item === 'string'));
}

function toDefault(value: unknown): FieldDefault | undefined {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return stringList(value);
}

function freezeOptions<O extends Option>(options: readonly unknown[] | undefined, guard: (o: unknown) => o is O): readonly O[] {
  return Object.freeze((options ?? []).filter(guard));
}

const isOption = (o: unknown): o is Option => o instanceof Option;
const isControl = (o: unknown): o is Control => o instanceof Control;

function buildField(init: GenericFieldInit): FieldDescriptor {
  const type = assertValid(init);
  const fallback = toDefault(init.default);

  switch (type) {
    case FieldType.TEXT:
    case FieldType.TEXTAREA:
    case FieldType.PROMPT:
    case FieldType.NEGATIVE_PROMPT: {
      const field: TextualFieldDescriptor = {
        ...common(type, init, fallback),
        min_length: init.min_length,
        max_length: init.max_length,
      };
      return Object.freeze(field);
    }
    case FieldType.NUMBER:
    case FieldType.INTEGER:
    case FieldType.SLIDER: {
      const field: NumericFieldDescriptor = {
        ...common(type, init, fallback),
        min: init.min,
        max: init.max,
        step: init.step,
        format: init.format === FormatType.PERCENTAGE ? FormatType.PERCENTAGE : undefined,
        default_generator_type: isGeneratorType(init.default_generator_type) ? init.default_generator_type : undefined,
      };
      return Object.freeze(field);
    }
    case FieldType.CHECKBOX: {
      const field: CheckboxFieldDescriptor = common(type, init, fallback);
      return Object.freeze(field);
    }
    case FieldType.COLOR: {
      const field: ColorFieldDescriptor = common(type, init, fallback);
      return Object.freeze(field);
    }
    case FieldType.SELECT:
    case FieldType.RADIO: {
      const field: ChoiceFieldDescriptor = {
        ...common(type, init, fallback),
        options: freezeOptions(init.options, isOption),
        multiple: type === FieldType.SELECT ? init.multiple : undefined,
      };
      return Object.freeze(field);
    }
    case FieldType.CONTROLS: {
      const field: ControlsFieldDescriptor = {
        ...common(type, init, fallback),
        options: freezeOptions(init.options, isControl),
      };
      return Object.freeze(field);
    }
    case FieldType.DYNAMIC_FORM: {
      const field: DynamicFormFieldDescriptor = {
        ...common(type, init, fallback),
        options: freezeOptions(init.options, isOption),
      };
      return Object.freeze(field);
    }
  }
}

/**
 * Build a field from a loosely typed declaration. The typed constructors
 * below are preferred in code.
 */
export function createField(init: GenericFieldInit): FieldDescriptor {
  return buildField(init);
}

function narrow<F extends FieldDescriptor>(field: FieldDescriptor, guard: (f: FieldDescriptor) => f is F): F {
  if (!guard(field)) {
    throw new FieldConfigurationError('field', [
      { path: 'type', code: 'invalid_type', message: `unexpected field type "${field.type}"` },
    ]);
  }
  return field;
}

const isTextual = (f: FieldDescriptor): f is TextualFieldDescriptor => TEXTUAL_FIELD_TYPES.has(f.type);
const isNumeric = (f: FieldDescriptor): f is NumericFieldDescriptor => NUMERIC_FIELD_TYPES.has(f.type);
const isChoice = (f: FieldDescriptor): f is ChoiceFieldDescriptor => f.type === FieldType.SELECT || f.type === FieldType.RADIO;
const isCheckbox = (f: FieldDescriptor): f is CheckboxFieldDescriptor => f.type === FieldType.CHECKBOX;
const isColor = (f: FieldDescriptor): f is ColorFieldDescriptor => f.type === FieldType.COLOR;
const isControls = (f: FieldDescriptor): f is ControlsFieldDescriptor => f.type === FieldType.CONTROLS;
const isDynamicForm = (f: FieldDescriptor): f is DynamicFormFieldDescriptor => f.type === FieldType.DYNAMIC_FORM;

// ============ Field Constructors ============

export function textField(init: TextFieldInit): TextualFieldDescriptor {
  return narrow(buildField({ ...init, type: FieldType.TEXT }), isTextual);
}

export function textAreaField(init: TextFieldInit): TextualFieldDescriptor {
  return narrow(buildField({ ...init, type: FieldType.TEXTAREA }), isTextual);
}

export function numberField(init: NumberFieldInit): NumericFieldDescriptor {
  return narrow(buildField({ ...init, type: FieldType.NUMBER }), isNumeric);
}

export function integerField(init: NumberFieldInit): NumericFieldDescriptor {
  return narrow(buildField({ ...init, type: FieldType.INTEGER }), isNumeric);
}

export function sliderField(init: SliderFieldInit): NumericFieldDescriptor {
  return narrow(buildField({ ...init, type: FieldType.SLIDER }), isNumeric);
}

/** A 0..1 slider the renderer shows as a percentage. */
export function percentageSliderField(init: PercentageSliderFieldInit = {}): NumericFieldDescriptor {
  return narrow(
    buildField({
      title: 'Percentage',
      description: '',
      ...init,
      type: FieldType.SLIDER,
      min: 0,
      max: 1,
      step: 0.01,
      format: FormatType.PERCENTAGE,
    }),
    isNumeric,
  );
}

export function checkboxField(init: CheckboxFieldInit): CheckboxFieldDescriptor {
  return narrow(buildField({ default: false, ...init, type: FieldType.CHECKBOX }), isCheckbox);
}

export function selectField(init: SelectFieldInit): ChoiceFieldDescriptor {
  return narrow(buildField({ ...init, type: FieldType.SELECT }), isChoice);
}

export function radioField(init: RadioFieldInit): ChoiceFieldDescriptor {
  return narrow(buildField({ ...init, type: FieldType.RADIO }), isChoice);
}

export function colorField(init: ColorFieldInit): ColorFieldDescriptor {
  return narrow(buildField({ ...init, type: FieldType.COLOR }), isColor);
}

export function dynamicFormField(init: DynamicFormFieldInit): DynamicFormFieldDescriptor {
  return narrow(buildField({ default: [], ...init, type: FieldType.DYNAMIC_FORM }), isDynamicForm);
}

// ============ Reserved Fields ============

export function promptField(init: ReservedTextFieldInit = {}): TextualFieldDescriptor {
  return narrow(
    buildField({
      title: 'Prompt',
      description: 'Prompt for the model.',
      placeholder: 'What do you want to create?',
      alias: PROMPT_FIELD_ALIAS,
      default: '',
      ...init,
      type: FieldType.PROMPT,
    }),
    isTextual,
  );
}

export function negativePromptField(init: ReservedTextFieldInit = {}): TextualFieldDescriptor {
  return narrow(
    buildField({
      title: 'Negative Prompt',
      description: 'Negative prompt for the model.',
      placeholder: 'What do you want to avoid?',
      alias: NEGATIVE_PROMPT_FIELD_ALIAS,
      default: '',
      ...init,
      type: FieldType.NEGATIVE_PROMPT,
    }),
    isTextual,
  );
}

export function controlsField(init: ControlsFieldInit): ControlsFieldDescriptor {
  return narrow(
    buildField({
      title: 'Controls',
      description: 'List of controls.',
      alias: CONTROLS_FIELD_ALIAS,
      ...init,
      default: [],
      type: FieldType.CONTROLS,
    }),
    isControls,
  );
}

/** Per-control strength, read back through `ControlValue.influence`. */
export function intensityField(init: PercentageSliderFieldInit = {}): NumericFieldDescriptor {
  return percentageSliderField({
    title: 'Intensity',
    description: 'How strongly the control guides generation.',
    alias: INTENSITY_FIELD_ALIAS,
    default: INTENSITY_FIELD_DEFAULT,
    ...init,
  });
}
