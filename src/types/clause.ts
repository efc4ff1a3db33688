/**
 * CNF Clause Types
 *
 * Types for representing a propositional knowledge base in Conjunctive
 * Normal Form. A clause is a disjunction of literals; a knowledge base is a
 * conjunction of clauses.
 */

import { Literal, compareLiterals } from './literal.js';

/**
 * A clause is a set of literals (implicitly disjunctive).
 * Build clauses with `clause()` to get the set normalisation.
 */
export type Clause = ReadonlyArray<Literal>;

/**
 * A knowledge base is an ordered sequence of clauses (implicitly conjunctive).
 */
export type KnowledgeBase = ReadonlyArray<Clause>;

/**
 * Entry of a clause after substitution: either a literal that is still
 * unassigned, or the truth constant an assigned literal collapsed to.
 */
export type ClauseEntry = Literal | boolean;

export type PartialClause = ReadonlyArray<ClauseEntry>;

/**
 * Knowledge base whose clauses may hold truth constants.
 * Every `KnowledgeBase` is also a `PartialKnowledgeBase`.
 */
export type PartialKnowledgeBase = ReadonlyArray<PartialClause>;

export function isLiteral(entry: ClauseEntry): entry is Literal {
    return entry instanceof Literal;
}

/**
 * Build a clause from literals, dropping structural duplicates.
 * The result is sorted in literal order.
 */
export function clause(...literals: Literal[]): Clause {
    const unique = new Map<string, Literal>();
    for (const lit of literals) {
        if (!unique.has(lit.key)) unique.set(lit.key, lit);
    }
    return Array.from(unique.values()).sort(compareLiterals);
}

/**
 * Structural clause equality (set semantics).
 */
export function clauseEquals(a: Clause, b: Clause): boolean {
    const left = new Set(a.map(lit => lit.key));
    const right = new Set(b.map(lit => lit.key));
    if (left.size !== right.size) return false;
    for (const key of left) {
        if (!right.has(key)) return false;
    }
    return true;
}
