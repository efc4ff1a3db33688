/**
 * DPLL Search
 *
 * Recursive Davis–Putnam–Logemann–Loveland procedure. Each call is one
 * decision level: simplify, check the two terminal states, take a free
 * pure/unit assignment when the heuristic level allows it, otherwise branch
 * on a variable and try `true` before `false`.
 */

import { Literal, compareLiterals } from '../../types/literal.js';
import { KnowledgeBase, PartialKnowledgeBase } from '../../types/clause.js';
import { HEURISTIC_LEVELS, ProgressCallback } from '../../types/options.js';
import {
    collectLiterals,
    degree,
    isPure,
    isUnit,
    simplify,
    substitute,
} from '../../logic/kb.js';

/**
 * State shared by every call of one top-level search.
 * Created by the driver; only the search writes to it.
 */
export interface SearchState {
    /** Winning assignment, filled in once on success */
    readonly model: Map<string, boolean>;
    /** Decisions in chronological order */
    readonly trace: Literal[];
    readonly heuristicLevel: number;
    readonly onProgress?: ProgressCallback;
}

export function createSearchState(heuristicLevel: number, onProgress?: ProgressCallback): SearchState {
    return { model: new Map(), trace: [], heuristicLevel, onProgress };
}

/**
 * Sort by descending degree. Array sort is stable, so the incoming order
 * breaks ties.
 */
function rankByDegree(candidates: Literal[], kb: KnowledgeBase): Literal[] {
    const degrees = new Map(candidates.map(lit => [lit.key, degree(lit, kb)]));
    const degreeOf = (lit: Literal): number => degrees.get(lit.key) ?? 0;
    return [...candidates].sort((a, b) => degreeOf(b) - degreeOf(a));
}

/**
 * Pure or unit literal to assign without branching, if any.
 */
function selectFreeLiteral(kb: KnowledgeBase, state: SearchState): Literal | undefined {
    let candidates = collectLiterals(kb)
        .filter(lit => isPure(lit, kb) || isUnit(lit, kb))
        .sort(compareLiterals);

    if (state.heuristicLevel >= HEURISTIC_LEVELS.RANKED_PURE_UNIT) {
        candidates = rankByDegree(candidates, kb);
    }
    return candidates[0];
}

/**
 * Branching literal. Level 0 takes the first literal in collection order;
 * the caller guarantees the knowledge base holds at least one literal.
 */
function selectBranchLiteral(kb: KnowledgeBase, state: SearchState): Literal {
    const literals = collectLiterals(kb);
    if (state.heuristicLevel >= HEURISTIC_LEVELS.DEGREE) {
        return rankByDegree(literals.sort(compareLiterals), kb)[0];
    }
    return literals[0];
}

function record(state: SearchState, lit: Literal, kind: 'decide' | 'branch'): void {
    state.trace.push(lit);
    state.onProgress?.(undefined, `${kind} ${lit.toString()}`);
}

/**
 * Run DPLL on `kb` under the partial assignment `model`.
 * Returns whether this branch is satisfiable; on success the winning model
 * has been merged into `state.model`.
 */
export function search(
    kb: PartialKnowledgeBase,
    model: ReadonlyMap<string, boolean>,
    state: SearchState
): boolean {
    const clauses = simplify(kb);

    // All clauses satisfied
    if (clauses.length === 0) {
        for (const [name, value] of model) state.model.set(name, value);
        return true;
    }

    // Some clause can no longer be satisfied
    if (clauses.some(c => c.length === 0)) {
        return false;
    }

    if (state.heuristicLevel >= HEURISTIC_LEVELS.PURE_UNIT) {
        const free = selectFreeLiteral(clauses, state);
        if (free) {
            record(state, free, 'decide');
            return search(
                substitute(free.name, free.sign, clauses),
                new Map(model).set(free.name, free.sign),
                state
            );
        }
    }

    const pick = selectBranchLiteral(clauses, state);
    record(state, pick, 'branch');
    return (
        search(substitute(pick.name, true, clauses), new Map(model).set(pick.name, true), state) ||
        search(substitute(pick.name, false, clauses), new Map(model).set(pick.name, false), state)
    );
}
