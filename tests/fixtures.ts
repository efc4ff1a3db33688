/**
 * Shared test fixtures for consistent, DRY testing.
 */
import { Literal } from '../src/types/literal';
import { Clause, KnowledgeBase, clause } from '../src/types/clause';

export const A = new Literal('A');
export const B = new Literal('B');
export const C = new Literal('C');
export const D = new Literal('D');
export const notA = A.negate();
export const notB = B.negate();

// === Common Knowledge Bases ===
export const KBS = {
    single: [clause(A)],
    contradiction: [clause(A), clause(notA)],
    twoClauses: [clause(A, B), clause(notA, C)],
    empty: [],
    emptyClause: [clause()],
    pureA: [clause(A, B), clause(A, notB)],
    // unsatisfiable, needs both branches on A
    allPairs: [clause(A, B), clause(A, notB), clause(notA, B), clause(notA, notB)],
} satisfies Record<string, KnowledgeBase>;

/**
 * Deterministic PRNG (mulberry32) so generated instances are reproducible.
 */
export function seededRandom(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/**
 * Random CNF over `variables` names with clauses of 1..maxWidth literals.
 */
export function randomKnowledgeBase(
    random: () => number,
    variables: number,
    clauses: number,
    maxWidth: number = 3
): KnowledgeBase {
    const names = Array.from({ length: variables }, (_, i) => `x${i}`);
    const kb: Clause[] = [];
    for (let i = 0; i < clauses; i++) {
        const width = 1 + Math.floor(random() * maxWidth);
        const literals: Literal[] = [];
        for (let j = 0; j < width; j++) {
            const name = names[Math.floor(random() * names.length)];
            literals.push(new Literal(name, random() < 0.5));
        }
        kb.push(clause(...literals));
    }
    return kb;
}
