import { describe, expect, test } from 'vitest';
import {
    ContentType,
    Control,
    ControlContent,
    FieldConfigurationError,
    Option,
    imageContent,
    integerField,
    maskFromPromptContent,
    textField,
    validateControlContentInit,
    validateControlInit,
    validateOptionInit,
    videoContent,
} from '../../src/index.js';

function configErrors(build: () => unknown): Array<{ path: string; code: string }> {
    try {
        build();
    } catch (e) {
        if (e instanceof FieldConfigurationError) {
            return e.errors.map(({ path, code }) => ({ path, code }));
        }
        throw e;
    }
    return [];
}

describe('Option', () => {
    test('advanced fields must carry an alias', () => {
        const build = () =>
            new Option({
                value: 'detailed',
                title: 'Detailed',
                advanced_fields: [textField({ title: 'Notes', description: '' })],
            });
        expect(build).toThrow(FieldConfigurationError);
        expect(configErrors(build)).toEqual([{ path: 'advanced_fields[0].alias', code: 'missing_alias' }]);
    });

    test('nested aliases are unique within a list', () => {
        const build = () =>
            new Option({
                value: 'detailed',
                title: 'Detailed',
                fields: [
                    integerField({ title: 'Steps', description: '', alias: 'steps' }),
                    integerField({ title: 'More steps', description: '', alias: 'steps' }),
                ],
            });
        expect(configErrors(build)).toEqual([{ path: 'fields[1].alias', code: 'duplicate_alias' }]);
    });

    test('nested entries must be field descriptors', () => {
        const result = validateOptionInit({ value: 'a', title: 'A', fields: [{ type: 'text', alias: 'x' }] });
        expect(result.valid).toBe(false);
        expect(result.errors[0]?.path).toBe('fields[0]');
        expect(result.errors[0]?.code).toBe('invalid_field');
    });

    test('value must be non-empty and max positive', () => {
        const result = validateOptionInit({ value: '', title: 'Empty', max: 0 });
        expect(result.errors.map((e) => e.path)).toEqual(['value', 'max']);
    });

    test('options are frozen', () => {
        const option = new Option({ value: 'photo', title: 'Photo', group: 'Styles', default: true });
        expect(Object.isFrozen(option)).toBe(true);
        expect(option.group).toBe('Styles');
        expect(option.default).toBe(true);
    });
});

describe('Control', () => {
    test('supported contents must not be empty', () => {
        const build = () => new Control({ value: 'reference', title: 'Reference', supported_contents: [] });
        expect(build).toThrow(FieldConfigurationError);
        expect(configErrors(build)).toEqual([{ path: 'supported_contents', code: 'empty_supported_contents' }]);
    });

    test('supported contents must be ControlContent entries', () => {
        const result = validateControlInit({
            value: 'reference',
            title: 'Reference',
            supported_contents: [{ type: 'image', required: true }],
        });
        expect(result.errors).toEqual([
            { path: 'supported_contents[0]', code: 'invalid_content', message: 'must be a ControlContent' },
        ]);
    });

    test('a content kind is listed once', () => {
        const result = validateControlInit({
            value: 'reference',
            title: 'Reference',
            supported_contents: [imageContent(), imageContent({ required: true })],
        });
        expect(result.errors.map((e) => e.code)).toEqual(['duplicate_content']);
    });

    test('content kind must be recognized', () => {
        const result = validateControlContentInit({ type: 'hologram' });
        expect(result.valid).toBe(false);
        expect(result.errors[0]?.code).toBe('invalid_content');
    });

    test('predicates reflect supported contents', () => {
        const control = new Control({
            value: 'inpaint',
            title: 'Inpaint',
            supported_contents: [imageContent({ required: true }), maskFromPromptContent()],
        });

        expect(control.supportsImage()).toBe(true);
        expect(control.supportsMask()).toBe(true);
        expect(control.supportsVideo()).toBe(false);
        expect(control.supportsAudio()).toBe(false);
        expect(control.supportsText()).toBe(false);
        expect(control.supportsThreeD()).toBe(false);
        expect(control.supports(ContentType.MASK_FROM_PROMPT)).toBe(true);
        expect(control.requiredContents().map((content) => content.type)).toEqual([ContentType.IMAGE]);
    });

    test('controls are frozen options', () => {
        const control = new Control({ value: 'clip', title: 'Clip', supported_contents: [videoContent()] });
        expect(control).toBeInstanceOf(Option);
        expect(Object.isFrozen(control)).toBe(true);
        expect(control.required).toBe(false);
        expect(control.supported_contents[0]).toBeInstanceOf(ControlContent);
        expect(control.supported_contents[0]?.required).toBe(false);
    });
});
