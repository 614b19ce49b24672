import { describe, expect, test } from 'vitest';
import {
    ContentType,
    Control,
    GeneratorType,
    Option,
    SchemaExtractionError,
    controlsField,
    createResponse,
    defineWorkflow,
    extractSchema,
    ifMinLength,
    ifValue,
    imageContent,
    integerField,
    intensityField,
    normalizeValue,
    promptField,
    selectField,
    textAreaField,
    textField,
} from '../../src/index.js';

const config = { title: 'Painter', version: '1.0.0', description: 'Paints pictures' };

describe('extractSchema', () => {
    test('emits one entry per declared field', () => {
        const workflow = defineWorkflow({
            config,
            params: { x: integerField({ title: 'X', description: 'A number', min: 0, max: 10, default: 5 }) },
            run: ({ x }) => createResponse(ContentType.TEXT, String(x)),
        });

        const schema = workflow.schema();
        expect(schema.title).toBe('Painter');
        expect(schema.version).toBe('1.0.0');
        expect(schema.description).toBe('Paints pictures');
        expect(schema.examples).toEqual([]);
        expect(schema.fields).toHaveLength(1);
        expect(schema.fields[0]).toEqual({
            name: 'x',
            title: 'X',
            type: 'integer',
            description: 'A number',
            options: [],
            min: 0,
            max: 10,
            default: 5,
        });
    });

    test('keeps declaration order and skips plain defaults', () => {
        const workflow = defineWorkflow({
            config,
            params: {
                prompt: promptField(),
                y: 42,
                lookalike: { type: 'text', title: 'Not a field' },
                steps: integerField({ title: 'Steps', description: '', default: 20 }),
            },
            run: () => undefined,
        });

        expect(workflow.schema().fields.map((field) => field.name)).toEqual(['prompt', 'steps']);
    });

    test('serializes nested control advanced fields', () => {
        const controls = controlsField({
            options: [
                new Control({
                    value: 'refine',
                    title: 'Refine',
                    supported_contents: [imageContent()],
                    advanced_fields: [textAreaField({ title: 'Notes', description: 'Extra guidance', alias: 'notes' })],
                }),
            ],
        });
        const workflow = defineWorkflow({
            config,
            params: { prompt: promptField(), controls },
            run: () => undefined,
        });

        const field = workflow.schema().fields[1];
        expect(field).toMatchObject({ name: 'controls', type: 'controls', alias: 'controls', default: [] });
        expect(field?.options).toEqual([
            {
                value: 'refine',
                title: 'Refine',
                advanced_fields: [
                    {
                        name: 'notes',
                        title: 'Notes',
                        type: 'textarea',
                        description: 'Extra guidance',
                        options: [],
                        alias: 'notes',
                    },
                ],
                supported_contents: [{ type: 'image', required: false }],
                required: false,
            },
        ]);
    });

    test('recursion follows nested controls fields to any depth', () => {
        const inner = new Control({
            value: 'detail',
            title: 'Detail',
            supported_contents: [imageContent()],
            advanced_fields: [intensityField()],
        });
        const outer = new Control({
            value: 'compose',
            title: 'Compose',
            supported_contents: [imageContent()],
            advanced_fields: [controlsField({ alias: 'sub_controls', options: [inner] })],
        });
        const workflow = defineWorkflow({
            config,
            params: { controls: controlsField({ options: [outer] }) },
            run: () => undefined,
        });

        expect(workflow.schema().fields[0]).toMatchObject({
            options: [
                {
                    value: 'compose',
                    advanced_fields: [
                        {
                            name: 'sub_controls',
                            type: 'controls',
                            options: [
                                {
                                    value: 'detail',
                                    advanced_fields: [
                                        {
                                            name: 'intensity',
                                            type: 'slider',
                                            format: 'percentage',
                                            min: 0,
                                            max: 1,
                                            default: 1,
                                        },
                                    ],
                                },
                            ],
                        },
                    ],
                },
            ],
        });
    });

    test('rehydrates list defaults and options', () => {
        const workflow = defineWorkflow({
            config,
            params: {
                styles: selectField({
                    title: 'Styles',
                    description: '',
                    multiple: true,
                    options: [new Option({ value: 'photo', title: 'Photo' }), new Option({ value: 'sketch', title: 'Sketch' })],
                    default: ['photo'],
                }),
            },
            run: () => undefined,
        });

        expect(workflow.schema().fields[0]).toEqual({
            name: 'styles',
            title: 'Styles',
            type: 'select',
            description: '',
            options: [
                { value: 'photo', title: 'Photo' },
                { value: 'sketch', title: 'Sketch' },
            ],
            multiple: true,
            default: ['photo'],
        });
    });

    test('carries conditionals verbatim', () => {
        const workflow = defineWorkflow({
            config,
            params: {
                details: textField({
                    title: 'Details',
                    description: '',
                    show_if: [ifValue('mode', 'advanced'), ifMinLength('prompt', 3)],
                    disable_if: ifValue('locked', true),
                }),
            },
            run: () => undefined,
        });

        const field = workflow.schema().fields[0];
        expect(field?.show_if).toEqual([
            { type: 'if_value', field: 'mode', value: 'advanced' },
            { type: 'if_min_length', field: 'prompt', min_length: 3 },
        ]);
        expect(field?.disable_if).toEqual({ type: 'if_value', field: 'locked', value: true });
    });

    test('is stable across calls apart from generated defaults', () => {
        const workflow = defineWorkflow({
            config,
            params: {
                prompt: promptField(),
                seed: integerField({
                    title: 'Seed',
                    description: '',
                    min: 0,
                    max: 100,
                    default_generator_type: GeneratorType.RANDOM_INTEGER,
                }),
            },
            run: () => undefined,
        });

        const first = workflow.schema();
        const second = workflow.schema();
        expect(second.fields[0]).toEqual(first.fields[0]);

        const { default: firstSeed, ...firstRest } = first.fields[1];
        const { default: secondSeed, ...secondRest } = second.fields[1];
        expect(secondRest).toEqual(firstRest);
        expect(firstRest).toMatchObject({ default_generator_type: 'random_integer', min: 0, max: 100 });
        for (const seed of [firstSeed, secondSeed]) {
            expect(typeof seed).toBe('number');
            expect(Number.isInteger(seed)).toBe(true);
            expect(seed).toBeGreaterThanOrEqual(0);
            expect(seed).toBeLessThanOrEqual(100);
        }
    });

    test('passes examples through', () => {
        const examples = [{ title: 'A cat', data: { prompt: 'a cat' } }];
        const workflow = defineWorkflow({
            config: { ...config, examples },
            params: { prompt: promptField() },
            run: () => undefined,
        });
        expect(workflow.schema().examples).toEqual(examples);
        expect(extractSchema({ ...config, examples: 'none', run: workflow.run }).examples).toEqual([]);
    });

    test('returned examples are copies', () => {
        const workflow = defineWorkflow({
            config: { ...config, examples: [{ title: 'A cat', data: { prompt: 'a cat' } }] },
            params: { prompt: promptField() },
            run: () => undefined,
        });

        const first = workflow.schema();
        const example = first.examples[0];
        if (typeof example === 'object' && example !== null && 'data' in example) {
            example.data = { prompt: 'a dog' };
        }
        first.examples.push({ title: 'Extra', data: {} });

        expect(workflow.schema().examples).toEqual([{ title: 'A cat', data: { prompt: 'a cat' } }]);
        expect(workflow.examples).toEqual([{ title: 'A cat', data: { prompt: 'a cat' } }]);
    });

    test('aborts when metadata is not a string', () => {
        const workflow = defineWorkflow({ config, params: { prompt: promptField() }, run: () => undefined });

        expect(() => extractSchema({ ...config, title: 42, run: workflow.run })).toThrow(SchemaExtractionError);
        expect(() => extractSchema({ ...config, version: 1, run: workflow.run })).toThrow('version must be a string');
        expect(() => extractSchema({ ...config, description: null, run: workflow.run })).toThrow(
            'description must be a string',
        );
    });

    test('a run function without a signature yields no fields', () => {
        expect(extractSchema({ ...config, run: () => undefined }).fields).toEqual([]);
    });
});

describe('normalizeValue', () => {
    test('drops null keys but keeps list positions', () => {
        expect(normalizeValue({ a: null, b: 2, c: [1, null, 'x'] })).toEqual({ b: 2, c: [1, null, 'x'] });
    });

    test('nested fields need an alias', () => {
        expect(() => normalizeValue({ extra: textField({ title: 'Extra', description: '' }) })).toThrow(SchemaExtractionError);
    });

    test('nested fields are named after their alias', () => {
        expect(normalizeValue([textField({ title: 'Extra', description: '', alias: 'extra' })])).toEqual([
            { name: 'extra', title: 'Extra', type: 'text', description: '', options: [], alias: 'extra' },
        ]);
    });
});
