/**
 * @module unique-sequence
 * @description
 * Ordered collections that reject duplicates at insertion time.
 *
 * * Architecture:
 * - Storage: a single dense array, insertion order preserved.
 * - Membership: linear scan with the sequence's equality (O(N) per insert, O(N²) bulk).
 * - Two variants: `UniqueSequence` (approximate equality, read-only element access)
 *   and `StrictUniqueSequence` (equivalence relation, mutable element access).
 *
 * * Contracts:
 * - Insertion never throws; duplicates are handed back to the caller.
 * - `get()` / `set()` outside `[0, length)` throw a RangeError.
 * - Elements mutated through `StrictUniqueSequence` are not re-checked.
 */

// ============================================================================
// 1. EQUALITY
// ============================================================================

/**
 * Objects that compare by value.
 * Any element exposing `equals` is compared through it by the built-in relations.
 */
export interface Structural {
    equals(other: unknown): boolean;
}

/**
 * Relation used to detect duplicates.
 * Need not be transitive, nor even reflexive for every value (NaN).
 */
export interface Equality<T> {
    readonly strict: boolean;
    equals(a: T, b: T): boolean;
}

/**
 * An `Equality` that is reflexive, symmetric and transitive.
 * The literal `strict: true` is the type-level marker required by `StrictUniqueSequence`.
 */
export interface Equivalence<T> extends Equality<T> {
    readonly strict: true;
}

function isStructural(v: unknown): v is Structural {
    return typeof v === 'object' && v !== null && 'equals' in v && typeof v.equals === 'function';
}

/** Wraps a comparison function as an approximate equality. */
export function partialEquality<T>(equals: (a: T, b: T) => boolean): Equality<T> {
    return { strict: false, equals };
}

/**
 * Wraps a comparison function as an equivalence relation.
 * Nothing verifies the claim; the caller vouches for it.
 */
export function equivalence<T>(equals: (a: T, b: T) => boolean): Equivalence<T> {
    return { strict: true, equals };
}

/**
 * Default relation of `UniqueSequence`: strict equality (`===`), or `equals()` for
 * Structural values. `NaN` never equals anything, itself included.
 */
export const looseEquality: Equality<unknown> = partialEquality<unknown>((a, b) => {
    if (a === b) return true;
    return isStructural(a) && a.equals(b);
});

/**
 * Default relation of `StrictUniqueSequence`: SameValueZero (`NaN` equals `NaN`,
 * `0` equals `-0`), or `equals()` for Structural values.
 */
export const sameValueZero: Equivalence<unknown> = equivalence<unknown>((a, b) => {
    if (a === b) return true;
    if (a !== a && b !== b) return true; // NaN
    return isStructural(a) && a.equals(b);
});

// ============================================================================
// 2. ERRORS
// ============================================================================

/** Thrown when validated deserialization meets an element already present. */
export class DuplicateElementError<T = unknown> extends Error {
    readonly index: number;
    readonly element: T;

    constructor(index: number, element: T) {
        super(`Duplicate element at index ${index}: ${formatElement(element)}`);
        this.name = 'DuplicateElementError';
        this.index = index;
        this.element = element;
    }
}

// Objects without a prototype have no toString; String() would throw on them.
function formatElement(v: unknown): string {
    if (typeof v === 'object' && v !== null && !('toString' in v && typeof v.toString === 'function')) {
        return Object.prototype.toString.call(v);
    }
    return String(v);
}

function checkIndex(index: number, length: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= length) {
        throw new RangeError(`Index ${index} out of bounds for length ${length}`);
    }
}

// ============================================================================
// 3. READ INTERFACE
// ============================================================================

/** Read-only surface shared by both variants. */
export interface SequenceView<T> extends Iterable<T> {
    readonly length: number;
    isEmpty(): boolean;
    get(index: number): T;
    at(index: number): T | undefined;
    has(element: T): boolean;
    indexOf(element: T): number;
    asArray(): ReadonlyArray<T>;
    toJSON(): T[];
}

/** Options for `fromJSON` and `parse`. */
export interface DeserializeOptions<E> {
    /** Relation for the new sequence. */
    equality?: E;
    /** Scan for duplicates and throw `DuplicateElementError`. Off by default: input is trusted. */
    validate?: boolean;
}

function parseArray<T>(text: string, isElement: (v: unknown) => v is T): T[] {
    const raw: unknown = JSON.parse(text);
    if (!Array.isArray(raw)) {
        throw new TypeError('Expected a JSON array');
    }
    const items: T[] = [];
    for (let i = 0; i < raw.length; i++) {
        const v: unknown = raw[i];
        if (!isElement(v)) {
            throw new TypeError(`Unexpected element at index ${i}`);
        }
        items.push(v);
    }
    return items;
}

// ============================================================================
// 4. UNIQUE SEQUENCE
// ============================================================================

// Backing array access for StrictUniqueSequence; assigned in UniqueSequence's static block.
let storageOf: <T>(sequence: UniqueSequence<T, Equality<T>>) => T[];

/**
 * An array without duplicates, in first-occurrence order.
 *
 * Elements can be read but never mutated in place: the only view handed out is a
 * `ReadonlyArray`. Wrap in a `StrictUniqueSequence` for mutable access.
 *
 * @template T Element type.
 * @template E Relation used to detect duplicates.
 */
export class UniqueSequence<T, E extends Equality<T> = Equality<T>> implements SequenceView<T> {
    #items: T[];
    readonly #equality: E;

    static {
        storageOf = (sequence) => sequence.#items;
    }

    private constructor(items: T[], equality: E) {
        this.#items = items;
        this.#equality = equality;
    }

    /** Creates an empty sequence. */
    static empty<T>(): UniqueSequence<T>;
    static empty<T, E extends Equality<T>>(equality: E): UniqueSequence<T, E>;
    static empty<T>(equality: Equality<T> = looseEquality): UniqueSequence<T> {
        return new UniqueSequence<T>([], equality);
    }

    /**
     * Builds a sequence from `items`, in order.
     * Elements equal to one already accepted are collected instead of inserted.
     * @returns The sequence and the rejected elements, in rejection order.
     */
    static from<T>(items: Iterable<T>): [UniqueSequence<T>, T[]];
    static from<T, E extends Equality<T>>(items: Iterable<T>, equality: E): [UniqueSequence<T, E>, T[]];
    static from<T>(items: Iterable<T>, equality: Equality<T> = looseEquality): [UniqueSequence<T>, T[]] {
        const sequence = new UniqueSequence<T>([], equality);
        const rejected = sequence.extendFrom(items);
        return [sequence, rejected];
    }

    /** Like `from`, dropping the rejected elements. */
    static fromArray<T>(items: Iterable<T>): UniqueSequence<T>;
    static fromArray<T, E extends Equality<T>>(items: Iterable<T>, equality: E): UniqueSequence<T, E>;
    static fromArray<T>(items: Iterable<T>, equality: Equality<T> = looseEquality): UniqueSequence<T> {
        return UniqueSequence.from(items, equality)[0];
    }

    /**
     * Adopts a deserialized array as-is (copied).
     * Uniqueness is assumed unless `options.validate` is set.
     * @throws {DuplicateElementError} With `validate`, on the first repeated element.
     */
    static fromJSON<T, E extends Equality<T>>(
        items: ReadonlyArray<T>,
        options: DeserializeOptions<E> & { equality: E },
    ): UniqueSequence<T, E>;
    static fromJSON<T>(items: ReadonlyArray<T>, options?: DeserializeOptions<Equality<T>>): UniqueSequence<T>;
    static fromJSON<T>(items: ReadonlyArray<T>, options: DeserializeOptions<Equality<T>> = {}): UniqueSequence<T> {
        const equality: Equality<T> = options.equality ?? looseEquality;
        if (!options.validate) {
            return new UniqueSequence<T>(items.slice(), equality);
        }
        const sequence = new UniqueSequence<T>([], equality);
        for (let i = 0; i < items.length; i++) {
            if (sequence.has(items[i])) {
                throw new DuplicateElementError(i, items[i]);
            }
            sequence.#items.push(items[i]);
        }
        return sequence;
    }

    /**
     * Parses a JSON array and adopts it via `fromJSON`.
     * @param isElement Guard every parsed item must pass.
     * @throws {TypeError} If the payload is not an array or an item fails the guard.
     */
    static parse<T, E extends Equality<T>>(
        text: string,
        isElement: (v: unknown) => v is T,
        options: DeserializeOptions<E> & { equality: E },
    ): UniqueSequence<T, E>;
    static parse<T>(
        text: string,
        isElement: (v: unknown) => v is T,
        options?: DeserializeOptions<Equality<T>>,
    ): UniqueSequence<T>;
    static parse<T>(
        text: string,
        isElement: (v: unknown) => v is T,
        options: DeserializeOptions<Equality<T>> = {},
    ): UniqueSequence<T> {
        return UniqueSequence.fromJSON(parseArray(text, isElement), options);
    }

    get equality(): E { return this.#equality; }
    get length(): number { return this.#items.length; }
    isEmpty(): boolean { return this.#items.length === 0; }

    /** @throws {RangeError} If `index` is not a valid position. */
    get(index: number): T {
        checkIndex(index, this.#items.length);
        return this.#items[index];
    }

    at(index: number): T | undefined { return this.#items.at(index); }

    indexOf(element: T): number {
        const arr = this.#items;
        const len = arr.length;
        for (let i = 0; i < len; i++) {
            if (this.#equality.equals(arr[i], element)) return i;
        }
        return -1;
    }

    has(element: T): boolean { return this.indexOf(element) >= 0; }

    /**
     * Appends `element` unless an equal element is present.
     * @returns `undefined` if appended, otherwise `element` itself. A rejected
     * `undefined` element reads the same as success; use `has()` or `extendFrom()` there.
     */
    push(element: T): T | undefined {
        if (this.has(element)) return element;
        this.#items.push(element);
        return undefined;
    }

    pop(): T | undefined { return this.#items.pop(); }

    clear(): void { this.#items.length = 0; }

    /**
     * Pushes every element of `items` in order. Each element is checked against the
     * current contents, elements accepted earlier in this call included.
     * `items` is read in full first, so it may be this sequence or its own view.
     * @returns The rejected elements, in encounter order.
     */
    extendFrom(items: Iterable<T>): T[] {
        const incoming = Array.from(items);
        const duplicates: T[] = [];
        for (const element of incoming) {
            if (this.has(element)) duplicates.push(element);
            else this.#items.push(element);
        }
        return duplicates;
    }

    /** Same as `extendFrom`, without the duplicates. */
    extend(items: Iterable<T>): void {
        this.extendFrom(items);
    }

    asArray(): ReadonlyArray<T> { return this.#items; }

    /** Moves the elements out; the sequence is empty afterwards. */
    intoArray(): T[] {
        const items = this.#items;
        this.#items = [];
        return items;
    }

    /** Iterator over the moved-out elements; the sequence is empty as soon as this returns. */
    drain(): IterableIterator<T> {
        return this.intoArray()[Symbol.iterator]();
    }

    clone(): UniqueSequence<T, E> {
        return new UniqueSequence<T, E>(this.#items.slice(), this.#equality);
    }

    toJSON(): T[] { return this.#items.slice(); }

    *[Symbol.iterator](): Iterator<T> { yield* this.#items; }

    toString(): string {
        return `[${this.#items.map(formatElement).join(', ')}]`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

// ============================================================================
// 5. STRICT UNIQUE SEQUENCE
// ============================================================================

/**
 * A `UniqueSequence` whose relation is an equivalence, with mutable element access.
 *
 * **Caveat**: `set()` and `asMutableArray()` do not re-check uniqueness. Writing an
 * element equal to another one breaks the sequence's invariant.
 */
export class StrictUniqueSequence<T> implements SequenceView<T> {
    readonly #inner: UniqueSequence<T, Equivalence<T>>;

    private constructor(inner: UniqueSequence<T, Equivalence<T>>) {
        this.#inner = inner;
    }

    /** Wraps `sequence` without copying or re-checking it. */
    static wrap<T>(sequence: UniqueSequence<T, Equivalence<T>>): StrictUniqueSequence<T> {
        return new StrictUniqueSequence(sequence);
    }

    static empty<T>(equality: Equivalence<T> = sameValueZero): StrictUniqueSequence<T> {
        return new StrictUniqueSequence(UniqueSequence.empty<T, Equivalence<T>>(equality));
    }

    /** @returns The sequence and the rejected elements, in rejection order. */
    static from<T>(items: Iterable<T>, equality: Equivalence<T> = sameValueZero): [StrictUniqueSequence<T>, T[]] {
        const [inner, rejected] = UniqueSequence.from<T, Equivalence<T>>(items, equality);
        return [new StrictUniqueSequence(inner), rejected];
    }

    static fromJSON<T>(
        items: ReadonlyArray<T>,
        options: DeserializeOptions<Equivalence<T>> = {},
    ): StrictUniqueSequence<T> {
        const equality: Equivalence<T> = options.equality ?? sameValueZero;
        return new StrictUniqueSequence(UniqueSequence.fromJSON(items, { ...options, equality }));
    }

    static parse<T>(
        text: string,
        isElement: (v: unknown) => v is T,
        options: DeserializeOptions<Equivalence<T>> = {},
    ): StrictUniqueSequence<T> {
        return StrictUniqueSequence.fromJSON(parseArray(text, isElement), options);
    }

    /** Returns the wrapped sequence; no copy. */
    unwrap(): UniqueSequence<T, Equivalence<T>> { return this.#inner; }

    get equality(): Equivalence<T> { return this.#inner.equality; }
    get length(): number { return this.#inner.length; }
    isEmpty(): boolean { return this.#inner.isEmpty(); }
    get(index: number): T { return this.#inner.get(index); }
    at(index: number): T | undefined { return this.#inner.at(index); }
    indexOf(element: T): number { return this.#inner.indexOf(element); }
    has(element: T): boolean { return this.#inner.has(element); }
    push(element: T): T | undefined { return this.#inner.push(element); }
    pop(): T | undefined { return this.#inner.pop(); }
    clear(): void { this.#inner.clear(); }
    extendFrom(items: Iterable<T>): T[] { return this.#inner.extendFrom(items); }
    extend(items: Iterable<T>): void { this.#inner.extend(items); }
    asArray(): ReadonlyArray<T> { return this.#inner.asArray(); }
    intoArray(): T[] { return this.#inner.intoArray(); }
    drain(): IterableIterator<T> { return this.#inner.drain(); }
    clone(): StrictUniqueSequence<T> { return new StrictUniqueSequence(this.#inner.clone()); }
    toJSON(): T[] { return this.#inner.toJSON(); }

    /** The backing array itself. Writes go straight to storage, unchecked. */
    asMutableArray(): T[] { return storageOf(this.#inner); }

    /**
     * Replaces the element at `index`, unchecked.
     * @throws {RangeError} If `index` is not a valid position.
     */
    set(index: number, value: T): void {
        const items = storageOf(this.#inner);
        checkIndex(index, items.length);
        items[index] = value;
    }

    [Symbol.iterator](): Iterator<T> { return this.#inner[Symbol.iterator](); }
    toString(): string { return this.#inner.toString(); }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

// ============================================================================
// 6. FACTORIES
// ============================================================================

export function emptySequence<T>(): UniqueSequence<T> { return UniqueSequence.empty<T>(); }
export function sequenceOf<T>(...items: T[]): UniqueSequence<T> { return UniqueSequence.fromArray(items); }
export function fromIterable<T>(iterable: Iterable<T>): UniqueSequence<T> { return UniqueSequence.fromArray(iterable); }
