/**
 * Literal Type
 *
 * A propositional variable together with a polarity. Literals are frozen
 * values: two literals are equal when both name and sign match, and they are
 * totally ordered by name, then sign (negative before positive).
 */

export class Literal {
    /** Variable name */
    readonly name: string;
    /** true for a positive occurrence, false for a negated one */
    readonly sign: boolean;

    constructor(name: string, sign: boolean = true) {
        this.name = name;
        this.sign = sign;
        Object.freeze(this);
    }

    /**
     * Hash key derived from both fields. The sign prefix keeps `A`/`-A`
     * distinct from a variable literally named `-A`.
     */
    get key(): string {
        return `${this.sign ? '+' : '-'}${this.name}`;
    }

    /**
     * Same variable, opposite polarity.
     */
    negate(): Literal {
        return new Literal(this.name, !this.sign);
    }

    equals(other: Literal): boolean {
        return this.name === other.name && this.sign === other.sign;
    }

    compare(other: Literal): number {
        return compareLiterals(this, other);
    }

    toString(): string {
        return this.sign ? this.name : `-${this.name}`;
    }

    [Symbol.for('nodejs.util.inspect.custom')](): string {
        return this.toString();
    }
}

/**
 * Create a literal. Shorthand for `new Literal(name, sign)`.
 */
export function literal(name: string, sign: boolean = true): Literal {
    return new Literal(name, sign);
}

export function negate(lit: Literal): Literal {
    return lit.negate();
}

/**
 * Total order: name by code unit, then false < true.
 * Usable directly as an `Array.prototype.sort` comparator.
 */
export function compareLiterals(a: Literal, b: Literal): number {
    if (a.name !== b.name) return a.name < b.name ? -1 : 1;
    if (a.sign === b.sign) return 0;
    return a.sign ? 1 : -1;
}
