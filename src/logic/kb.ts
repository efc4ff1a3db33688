/**
 * Knowledge Base Utilities
 *
 * Pure helpers over a CNF knowledge base: literal collection, truth-value
 * substitution, the housekeeping simplification, and the pure/unit/degree
 * heuristics used by the DPLL search. None of them mutate their input.
 */

import { Literal } from '../types/literal.js';
import {
    Clause,
    KnowledgeBase,
    PartialKnowledgeBase,
    isLiteral,
} from '../types/clause.js';

/**
 * All distinct literals occurring in the knowledge base, in first-seen order
 * (clause by clause, left to right).
 */
export function collectLiterals(kb: KnowledgeBase): Literal[] {
    const seen = new Map<string, Literal>();
    for (const c of kb) {
        for (const lit of c) {
            if (!seen.has(lit.key)) seen.set(lit.key, lit);
        }
    }
    return Array.from(seen.values());
}

/**
 * Distinct variable names occurring in the knowledge base, sorted.
 */
export function collectVariables(kb: KnowledgeBase): string[] {
    const names = new Set<string>();
    for (const c of kb) {
        for (const lit of c) names.add(lit.name);
    }
    return Array.from(names).sort();
}

/**
 * Assign `value` to the variable `name`.
 *
 * Every literal over `name` collapses to the constant `lit.sign === value`;
 * other literals are kept. Clause count and order are preserved: satisfied
 * clauses are only dropped later by `simplify`.
 */
export function substitute(name: string, value: boolean, kb: KnowledgeBase): PartialKnowledgeBase {
    return kb.map(c => c.map(lit => (lit.name !== name ? lit : lit.sign === value)));
}

/**
 * Housekeeping step: drop clauses holding `true`, strip `false` entries from
 * the rest. Duplicate literals within a surviving clause collapse to one.
 * A clause whose entries were all `false` survives as an empty clause.
 */
export function simplify(kb: PartialKnowledgeBase): KnowledgeBase {
    const result: Clause[] = [];
    for (const c of kb) {
        if (c.includes(true)) continue;
        const kept = new Map<string, Literal>();
        for (const entry of c) {
            if (isLiteral(entry) && !kept.has(entry.key)) kept.set(entry.key, entry);
        }
        result.push(Array.from(kept.values()));
    }
    return result;
}

/**
 * Whether `lit` occurs in the knowledge base and its negation does not.
 */
export function isPure(lit: Literal, kb: KnowledgeBase): boolean {
    const keys = new Set(collectLiterals(kb).map(l => l.key));
    return keys.has(lit.key) && !keys.has(lit.negate().key);
}

/**
 * Whether some clause consists of exactly `lit`.
 */
export function isUnit(lit: Literal, kb: KnowledgeBase): boolean {
    return kb.some(c => c.length > 0 && c.every(l => l.equals(lit)));
}

/**
 * Number of clauses mentioning `lit` or its negation.
 */
export function degree(lit: Literal, kb: KnowledgeBase): number {
    const negated = lit.negate();
    let count = 0;
    for (const c of kb) {
        if (c.some(l => l.equals(lit) || l.equals(negated))) count++;
    }
    return count;
}
