/**
 * Map keyed by literal value rather than object identity.
 *
 * A plain `Map<Literal, V>` compares keys by reference, so a freshly built
 * `new Literal('A')` would never find an entry. Entries are stored under
 * `Literal.key` and iterate in insertion order.
 */

import { Literal } from '../types/literal.js';

export class LiteralMap<V> implements Iterable<[Literal, V]> {
    private readonly entriesByKey = new Map<string, [Literal, V]>();

    constructor(entries?: Iterable<readonly [Literal, V]>) {
        if (entries) {
            for (const [lit, value] of entries) this.set(lit, value);
        }
    }

    get size(): number {
        return this.entriesByKey.size;
    }

    get(lit: Literal): V | undefined {
        return this.entriesByKey.get(lit.key)?.[1];
    }

    has(lit: Literal): boolean {
        return this.entriesByKey.has(lit.key);
    }

    set(lit: Literal, value: V): this {
        const existing = this.entriesByKey.get(lit.key);
        // keep the first key object so iteration order and identity are stable
        this.entriesByKey.set(lit.key, [existing ? existing[0] : lit, value]);
        return this;
    }

    delete(lit: Literal): boolean {
        return this.entriesByKey.delete(lit.key);
    }

    *keys(): IterableIterator<Literal> {
        for (const [lit] of this.entriesByKey.values()) yield lit;
    }

    *values(): IterableIterator<V> {
        for (const [, value] of this.entriesByKey.values()) yield value;
    }

    *entries(): IterableIterator<[Literal, V]> {
        for (const [lit, value] of this.entriesByKey.values()) yield [lit, value];
    }

    [Symbol.iterator](): IterableIterator<[Literal, V]> {
        return this.entries();
    }

    /**
     * Plain object keyed by the literal's printed form (`A`, `-B`).
     */
    toRecord(): Record<string, V> {
        const record: Record<string, V> = {};
        for (const [lit, value] of this.entries()) {
            record[lit.toString()] = value;
        }
        return record;
    }
}
