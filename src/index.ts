/**
 * @module unique-sequence
 * Insertion-ordered arrays without duplicates.
 */

export {
    UniqueSequence,
    StrictUniqueSequence,
    DuplicateElementError,
    partialEquality,
    equivalence,
    looseEquality,
    sameValueZero,
    emptySequence,
    sequenceOf,
    fromIterable,
} from './unique-sequence';

export type {
    Structural,
    Equality,
    Equivalence,
    SequenceView,
    DeserializeOptions,
} from './unique-sequence';
