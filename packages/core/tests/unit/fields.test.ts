import { describe, expect, test } from 'vitest';
import {
    FieldConfigurationError,
    FieldType,
    FormatType,
    GeneratorType,
    Option,
    checkboxField,
    colorField,
    createField,
    getFieldDefault,
    integerField,
    isFieldDescriptor,
    negativePromptField,
    percentageSliderField,
    promptField,
    selectField,
    sliderField,
    textField,
    validateFieldInit,
} from '../../src/index.js';

function configErrors(build: () => unknown): string[] {
    try {
        build();
    } catch (e) {
        if (e instanceof FieldConfigurationError) {
            return e.errors.map((error) => error.code);
        }
        throw e;
    }
    return [];
}

const styles = [
    new Option({ value: 'photo', title: 'Photo' }),
    new Option({ value: 'sketch', title: 'Sketch' }),
];

describe('Slider bounds', () => {
    const cases: Array<[number, number, number | undefined]> = [
        [0, 10, 1],
        [5, 5, undefined],
        [-3, -1, 0.5],
        [10, 0, 1],
        [0, 1, 0],
        [0, 1, -0.5],
        [2, 1, undefined],
    ];

    test.each(cases)('min=%s max=%s step=%s', (min, max, step) => {
        const valid = min <= max && (step === undefined || step > 0);
        const build = () => sliderField({ title: 'Strength', description: '', min, max, step });
        if (valid) {
            expect(build).not.toThrow();
        } else {
            expect(build).toThrow(FieldConfigurationError);
        }
    });

    test('slider without max is rejected', () => {
        const result = validateFieldInit({ type: 'slider', title: 'S', description: '', min: 0 });
        expect(result.valid).toBe(false);
        expect(result.errors.map((e) => e.code)).toEqual(['missing_bounds']);
    });
});

describe('Field validation', () => {
    test('default and default generator are mutually exclusive', () => {
        const result = validateFieldInit({
            type: 'integer',
            title: 'Seed',
            description: '',
            default: 5,
            default_generator_type: 'random_integer',
        });
        expect(result.valid).toBe(false);
        expect(result.errors).toHaveLength(1);
        expect(result.errors[0]?.code).toBe('default_conflict');
        expect(result.errors[0]?.path).toBe('default_generator_type');
    });

    test('createField throws on a default/generator conflict', () => {
        const build = () =>
            createField({
                type: 'integer',
                title: 'Seed',
                description: '',
                default: 5,
                default_generator_type: GeneratorType.RANDOM_INTEGER,
            });
        expect(build).toThrow(FieldConfigurationError);
        expect(configErrors(build)).toEqual(['default_conflict']);
    });

    test('unknown field type is rejected', () => {
        const result = validateFieldInit({ type: 'rating', title: 'Rating', description: '' });
        expect(result.valid).toBe(false);
        expect(result.errors).toHaveLength(1);
        expect(result.errors[0]?.path).toBe('type');
        expect(result.errors[0]?.code).toBe('invalid_type');
    });

    test('createField rejects an unknown type before building', () => {
        expect(configErrors(() => createField({ type: 'rating', title: 'Rating', description: '' }))).toEqual(['invalid_type']);
    });

    test('unknown generator is rejected', () => {
        expect(configErrors(() =>
            createField({ type: 'number', title: 'N', description: '', default_generator_type: 'gaussian' }),
        )).toEqual(['invalid_generator']);
    });

    test('generators are limited to numeric kinds', () => {
        expect(configErrors(() =>
            createField({ type: 'text', title: 'T', description: '', default_generator_type: 'random_integer' }),
        )).toEqual(['invalid_generator']);
    });

    test('generators need a non-empty range', () => {
        expect(configErrors(() =>
            integerField({ title: 'Seed', description: '', max: -5, default_generator_type: GeneratorType.RANDOM_INTEGER }),
        )).toEqual(['invalid_generator']);
        expect(configErrors(() =>
            sliderField({
                title: 'Jitter',
                description: '',
                min: 0.1,
                max: 0.5,
                default_generator_type: GeneratorType.RANDOM_INTEGER,
            }),
        )).toEqual(['invalid_generator']);
        expect(configErrors(() =>
            sliderField({
                title: 'Jitter',
                description: '',
                min: 0.1,
                max: 0.5,
                default_generator_type: GeneratorType.RANDOM_DECIMAL,
            }),
        )).toEqual([]);
        expect(configErrors(() =>
            integerField({ title: 'Seed', description: '', min: -10, default_generator_type: GeneratorType.RANDOM_INTEGER }),
        )).toEqual([]);
    });

    test('integer fields reject the decimal generator', () => {
        const result = validateFieldInit({
            type: 'integer',
            title: 'Seed',
            description: '',
            min: 0,
            max: 10,
            default_generator_type: 'random_decimal',
        });
        expect(result.errors.map((error) => [error.path, error.code])).toEqual([
            ['default_generator_type', 'invalid_generator'],
        ]);
    });

    test('enumerated kinds require options', () => {
        expect(configErrors(() => selectField({ title: 'Style', description: '', options: [] }))).toEqual(['empty_options']);
        expect(configErrors(() => createField({ type: 'radio', title: 'Style', description: '' }))).toEqual(['empty_options']);
        expect(configErrors(() => createField({ type: 'dynamic_form', title: 'Layers', description: '', options: [] }))).toEqual([
            'empty_options',
        ]);
    });

    test('options must be Option instances', () => {
        expect(configErrors(() =>
            createField({ type: 'select', title: 'Style', description: '', options: [{ value: 'photo', title: 'Photo' }] }),
        )).toEqual(['invalid_option']);
    });

    test('controls options must be Control instances', () => {
        expect(configErrors(() =>
            createField({ type: 'controls', title: 'Controls', description: '', options: styles }),
        )).toEqual(['invalid_option', 'invalid_option']);
    });

    test('option values are unique within one list', () => {
        const duplicate = [styles[0], new Option({ value: 'photo', title: 'Another photo' })];
        expect(configErrors(() => createField({ type: 'radio', title: 'Style', description: '', options: duplicate }))).toEqual([
            'duplicate_option',
        ]);
    });

    test('select default must name a declared option', () => {
        expect(configErrors(() => selectField({ title: 'Style', description: '', options: styles, default: 'oil' }))).toEqual([
            'invalid_default',
        ]);
        expect(configErrors(() => selectField({ title: 'Style', description: '', options: styles, default: 'photo' }))).toEqual([]);
    });

    test('multiple select takes a list default', () => {
        const field = selectField({ title: 'Styles', description: '', options: styles, multiple: true, default: ['sketch'] });
        expect(getFieldDefault(field)).toEqual(['sketch']);
        expect(configErrors(() =>
            selectField({ title: 'Styles', description: '', options: styles, multiple: true, default: 'sketch' }),
        )).toEqual(['invalid_default']);
    });

    test('integer kinds require integral bounds and default', () => {
        expect(configErrors(() => integerField({ title: 'Steps', description: '', min: 0.5 }))).toEqual(['invalid_value']);
        expect(configErrors(() => integerField({ title: 'Steps', description: '', default: 2.5 }))).toEqual(['invalid_default']);
    });

    test('numeric default must be inside the bounds', () => {
        expect(configErrors(() => integerField({ title: 'Steps', description: '', min: 1, max: 50, default: 80 }))).toEqual([
            'invalid_default',
        ]);
    });

    test('text length bounds are ordered', () => {
        expect(configErrors(() => textField({ title: 'Name', description: '', min_length: 5, max_length: 2 }))).toEqual([
            'invalid_bounds',
        ]);
    });

    test('color default must be a hex color', () => {
        expect(configErrors(() => colorField({ title: 'Tint', description: '', default: 'red' }))).toEqual(['invalid_default']);
        expect(configErrors(() => colorField({ title: 'Tint', description: '', default: '#ff8800' }))).toEqual([]);
    });

    test('conditionals are validated', () => {
        expect(configErrors(() =>
            textField({ title: 'Name', description: '', show_if: { type: 'if_value', field: '', value: 1 } }),
        )).toEqual(['invalid_conditional']);
    });

    test('every problem is reported at once', () => {
        const result = validateFieldInit({ type: 'number', title: 'N', description: '', min: 3, max: 1, step: 0 });
        expect(result.errors.map((e) => e.code)).toEqual(['invalid_bounds', 'invalid_step']);
    });
});

describe('Field descriptors', () => {
    test('descriptors are branded and frozen', () => {
        const field = textField({ title: 'Name', description: 'Your name' });
        expect(isFieldDescriptor(field)).toBe(true);
        expect(Object.isFrozen(field)).toBe(true);
        expect(isFieldDescriptor({ type: 'text', title: 'Name', description: '' })).toBe(false);
    });

    test('the default is kept off the public keys', () => {
        const field = integerField({ title: 'Steps', description: '', min: 0, max: 10, default: 5 });
        expect('default' in field).toBe(false);
        expect(Object.keys(field)).not.toContain('default');
        expect(getFieldDefault(field)).toBe(5);
    });

    test('checkbox defaults to false', () => {
        expect(getFieldDefault(checkboxField({ title: 'Upscale', description: '' }))).toBe(false);
    });

    test('percentage slider is a 0..1 slider', () => {
        const field = percentageSliderField({ title: 'Denoise', default: 0.75 });
        expect(field.type).toBe(FieldType.SLIDER);
        expect(field.min).toBe(0);
        expect(field.max).toBe(1);
        expect(field.step).toBe(0.01);
        expect(field.format).toBe(FormatType.PERCENTAGE);
        expect(getFieldDefault(field)).toBe(0.75);
    });

    test('prompt fields carry their reserved aliases', () => {
        const prompt = promptField();
        expect(prompt.type).toBe(FieldType.PROMPT);
        expect(prompt.alias).toBe('prompt');
        expect(prompt.title).toBe('Prompt');
        expect(prompt.placeholder).toBe('What do you want to create?');
        expect(getFieldDefault(prompt)).toBe('');

        const negative = negativePromptField({ title: 'Avoid' });
        expect(negative.alias).toBe('negative_prompt');
        expect(negative.title).toBe('Avoid');
    });

    test('createField builds the tagged variant', () => {
        const field = createField({ type: 'number', title: 'Guidance', description: '', min: 1, max: 20, step: 0.5, default: 7.5 });
        expect(field.type).toBe(FieldType.NUMBER);
        expect(getFieldDefault(field)).toBe(7.5);
    });
});
