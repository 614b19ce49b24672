import { describe, expect, test } from 'vitest';
import { GeneratorType, MAX_SAFE_INTEGER, generate } from '../../src/index.js';

describe('generate', () => {
    test('random integers include both bounds', () => {
        expect(generate(GeneratorType.RANDOM_INTEGER, 1, 6, () => 0)).toBe(1);
        expect(generate(GeneratorType.RANDOM_INTEGER, 1, 6, () => 0.999999)).toBe(6);
        expect(generate(GeneratorType.RANDOM_INTEGER, 1, 6, () => 0.5)).toBe(4);
    });

    test('unbounded integers fall back to the safe ceiling', () => {
        expect(generate(GeneratorType.RANDOM_INTEGER, undefined, undefined, () => 0.5)).toBe(4503599627370496);
        expect(generate(GeneratorType.RANDOM_INTEGER, undefined, undefined, () => 0)).toBe(0);
        expect(generate(GeneratorType.RANDOM_INTEGER, undefined, undefined, () => 0.9999999999999999)).toBeLessThanOrEqual(
            MAX_SAFE_INTEGER,
        );
    });

    test('random decimals scale into the range', () => {
        expect(generate(GeneratorType.RANDOM_DECIMAL, 2, 4, () => 0.25)).toBe(2.5);
        expect(generate(GeneratorType.RANDOM_DECIMAL, undefined, 10, () => 0.5)).toBe(5);
    });

    test('empty ranges throw', () => {
        expect(() => generate(GeneratorType.RANDOM_INTEGER, 1.2, 1.8)).toThrow(RangeError);
        expect(() => generate(GeneratorType.RANDOM_DECIMAL, 5, 1)).toThrow(RangeError);
    });

    test('draws a fresh value each call', () => {
        let calls = 0;
        const random = () => {
            calls += 1;
            return calls === 1 ? 0.1 : 0.9;
        };
        const first = generate(GeneratorType.RANDOM_INTEGER, 0, 9, random);
        const second = generate(GeneratorType.RANDOM_INTEGER, 0, 9, random);
        expect([first, second]).toEqual([1, 9]);
    });

    test('default source stays in range', () => {
        for (let i = 0; i < 50; i++) {
            const value = generate(GeneratorType.RANDOM_INTEGER, 0, 10);
            expect(Number.isInteger(value)).toBe(true);
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThanOrEqual(10);
        }
    });
});
