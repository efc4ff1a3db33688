/**
 * DPLL Engine
 *
 * Entry point for the DPLL solver: the `dpllSatisfiable` driver and the
 * `DPLLEngine` adapter implementing the shared reasoning-engine interface.
 */

import { Literal } from '../../types/literal.js';
import { KnowledgeBase, PartialKnowledgeBase } from '../../types/clause.js';
import { DEFAULTS, ProgressCallback, SolveOptions } from '../../types/options.js';
import { LiteralMap } from '../../logic/literalMap.js';
import { collectVariables } from '../../logic/kb.js';
import { buildSatResult } from '../../utils/response.js';
import { ReasoningEngine, EngineCapabilities, SatResult } from '../interface.js';
import { createSearchState, search } from './search.js';

export { createSearchState, search } from './search.js';
export type { SearchState } from './search.js';

/**
 * `[satisfiable, model, trace]`. Model keys are positive literals; the
 * assigned polarity is the value.
 */
export type DPLLResult = [satisfiable: boolean, model: LiteralMap<boolean>, trace: Literal[]];

/**
 * Decide satisfiability of `kb` with DPLL.
 *
 * @param kb - Knowledge base, e.g. `[clause(A, B), clause(A.negate(), C)]`;
 *   clauses may also hold `true`/`false` constants
 * @param heuristicLevel - 0 none, 1 degree branching, 2 adds pure/unit
 *   assignment, 3 ranks pure/unit candidates by degree
 * @param onProgress - Called once per decision
 */
export function dpllSatisfiable(
    kb: PartialKnowledgeBase,
    heuristicLevel: number = DEFAULTS.heuristicLevel,
    onProgress?: ProgressCallback
): DPLLResult {
    const state = createSearchState(heuristicLevel, onProgress);
    const satisfiable = search(kb, new Map(), state);

    const model = new LiteralMap<boolean>();
    for (const [name, value] of state.model) {
        model.set(new Literal(name), value);
    }
    return [satisfiable, model, state.trace];
}

/**
 * DPLL-based reasoning engine.
 */
export class DPLLEngine implements ReasoningEngine {
    readonly name = 'dpll';
    readonly capabilities: EngineCapabilities = {
        heuristics: true,
        trace: true,
        streaming: true,
    };

    async checkSat(kb: KnowledgeBase, options?: SolveOptions): Promise<SatResult> {
        const startTime = Date.now();
        const state = createSearchState(
            options?.heuristicLevel ?? DEFAULTS.heuristicLevel,
            options?.onProgress
        );
        const sat = search(kb, new Map(), state);

        return buildSatResult({
            sat,
            model: state.model,
            trace: state.trace,
            timeMs: Date.now() - startTime,
            variables: collectVariables(kb).length,
            clauses: kb.length,
        }, options?.verbosity ?? DEFAULTS.verbosity);
    }
}

/**
 * Create a new DPLL engine instance.
 */
export function createDPLLEngine(): DPLLEngine {
    return new DPLLEngine();
}
