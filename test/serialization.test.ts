import { describe, it, expect } from 'vitest';
import {
    UniqueSequence,
    StrictUniqueSequence,
    DuplicateElementError,
    sameValueZero,
    sequenceOf,
} from '../src/index';

const isNumber = (v: unknown): v is number => typeof v === 'number';
const isString = (v: unknown): v is string => typeof v === 'string';

function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (err) {
        return err;
    }
    throw new Error('Expected function to throw');
}

describe('serialization', () => {
    describe('toJSON', () => {
        it('stringifies exactly like a plain array', () => {
            expect(JSON.stringify(sequenceOf(1, 2, 3))).toBe('[1,2,3]');
            expect(JSON.stringify({ tags: sequenceOf('a', 'b') })).toBe('{"tags":["a","b"]}');
        });

        it('returns a copy', () => {
            const seq = sequenceOf(1, 2, 3);
            const json = seq.toJSON();
            json.push(4);
            expect(seq.length).toBe(3);
        });
    });

    describe('fromJSON', () => {
        it('trusts its input by default', () => {
            expect(UniqueSequence.fromJSON([1, 1, 2]).asArray()).toEqual([1, 1, 2]);
        });

        it('copies its input', () => {
            const input = [1, 2];
            const seq = UniqueSequence.fromJSON(input);
            input.push(3);
            expect(seq.asArray()).toEqual([1, 2]);
        });

        it('accepts unique input when validating', () => {
            expect(UniqueSequence.fromJSON([1, 2, 3], { validate: true }).asArray()).toEqual([1, 2, 3]);
        });

        it('reports the first duplicate when validating', () => {
            const err = captureError(() => UniqueSequence.fromJSON([1, 2, 1], { validate: true }));
            expect(err).toBeInstanceOf(DuplicateElementError);
            expect(err).toMatchObject({
                name: 'DuplicateElementError',
                message: 'Duplicate element at index 2: 1',
                index: 2,
                element: 1,
            });
        });

        it('reports a repeated undefined when validating', () => {
            const err = captureError(() => UniqueSequence.fromJSON([undefined, undefined], { validate: true }));
            expect(err).toBeInstanceOf(DuplicateElementError);
            expect(err).toMatchObject({ message: 'Duplicate element at index 1: undefined', index: 1 });
        });

        it('describes a duplicate without a prototype', () => {
            const bare: object = Object.create(null);
            const err = captureError(() => UniqueSequence.fromJSON([bare, bare], { validate: true }));
            expect(err).toMatchObject({ message: 'Duplicate element at index 1: [object Object]', element: bare });
        });
    });

    describe('parse', () => {
        it('reads a JSON array', () => {
            expect(UniqueSequence.parse('[3,1,19]', isNumber).asArray()).toEqual([3, 1, 19]);
        });

        it('rejects a payload that is not an array', () => {
            expect(() => UniqueSequence.parse('{"a":1}', isNumber)).toThrow(TypeError);
            expect(() => UniqueSequence.parse('{"a":1}', isNumber)).toThrow('Expected a JSON array');
        });

        it('rejects an element failing the guard', () => {
            expect(() => UniqueSequence.parse('[1,"two"]', isNumber)).toThrow('Unexpected element at index 1');
        });

        it('lets JSON syntax errors through', () => {
            expect(() => UniqueSequence.parse('not json', isNumber)).toThrow(SyntaxError);
        });

        it('validates on request', () => {
            expect(() => UniqueSequence.parse('[1,2,2]', isNumber, { validate: true })).toThrow(DuplicateElementError);
        });

        it('round-trips a sequence', () => {
            const [seq] = UniqueSequence.from([1, 33, 2, 0, 33, 4, 56, 2]);
            const restored = UniqueSequence.parse(JSON.stringify(seq), isNumber, { validate: true });
            expect(restored.asArray()).toEqual([1, 33, 2, 0, 4, 56]);
        });
    });

    describe('StrictUniqueSequence', () => {
        it('fromJSON defaults to sameValueZero', () => {
            const seq = StrictUniqueSequence.fromJSON([1, 2]);
            expect(seq.equality).toBe(sameValueZero);
            expect(seq.asArray()).toEqual([1, 2]);
        });

        it('parse validates on request', () => {
            expect(() => StrictUniqueSequence.parse('["a","a"]', isString, { validate: true })).toThrow(DuplicateElementError);
            expect(StrictUniqueSequence.parse('["a","a"]', isString).length).toBe(2);
        });

        it('stringifies like a plain array', () => {
            const [seq] = StrictUniqueSequence.from(['x', 'y', 'x']);
            expect(JSON.stringify(seq)).toBe('["x","y"]');
        });
    });
});
