import { describe, expect, it } from 'vitest';
import { areEqual, hashElement, stringify } from '../src/hash';
import type { Hashable } from '../src/hash';

class Label implements Hashable {
    constructor(readonly text: string) {}
    get hashCode(): number { return this.text.length; }
    equals(other: unknown): boolean { return other instanceof Label && other.text === this.text; }
    toString(): string { return `<${this.text}>`; }
}

describe('hashElement', () => {
    it('returns unsigned 32-bit values', () => {
        for (const v of [0, -1, 2 ** 40, 0.5, -3.25, 'abc', '', true, false, 12n, new Label('x')]) {
            const h = hashElement(v);
            expect(Number.isInteger(h)).toBe(true);
            expect(h).toBeGreaterThanOrEqual(0);
            expect(h).toBeLessThanOrEqual(0xffffffff);
        }
    });

    it('hashes equal numbers alike', () => {
        expect(hashElement(0)).toBe(hashElement(-0));
        expect(hashElement(NaN)).toBe(hashElement(Number.NaN));
        expect(hashElement(1.5)).toBe(hashElement(3 / 2));
    });

    it('delegates to hashCode for objects', () => {
        expect(hashElement(new Label('four'))).toBe(4);
    });

    it('keeps strings stable across calls', () => {
        expect(hashElement('hel' + 'lo')).toBe(hashElement('hello'));
    });
});

describe('areEqual', () => {
    it('compares primitives by value', () => {
        expect(areEqual('a', 'a')).toBe(true);
        expect(areEqual(3, 3)).toBe(true);
        expect(areEqual(5n, 5n)).toBe(true);
        expect(areEqual(true, true)).toBe(true);
    });

    it('treats NaN as equal to itself and 0 as equal to -0', () => {
        expect(areEqual(NaN, NaN)).toBe(true);
        expect(areEqual(0, -0)).toBe(true);
    });

    it('never equates values of different types', () => {
        expect(areEqual(1, '1')).toBe(false);
        expect(areEqual(1n, 1)).toBe(false);
        expect(areEqual(1, true)).toBe(false);
        expect(areEqual(new Label('1'), '1')).toBe(false);
    });

    it('uses equals for objects', () => {
        expect(areEqual(new Label('a'), new Label('a'))).toBe(true);
        expect(areEqual(new Label('a'), new Label('b'))).toBe(false);
    });
});

describe('stringify', () => {
    it('renders one token per element', () => {
        expect(stringify(42)).toBe('42');
        expect(stringify('x')).toBe('x');
        expect(stringify(false)).toBe('false');
        expect(stringify(10n)).toBe('10');
        expect(stringify(new Label('id'))).toBe('<id>');
    });
});
