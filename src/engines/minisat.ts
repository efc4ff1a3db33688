/**
 * MiniSat Engine
 *
 * SAT solver backend using the logic-solver package (MiniSat compiled to JS).
 * Produces no decision trace; used as a reference to cross-check DPLL.
 */

import Logic from 'logic-solver';
import { KnowledgeBase } from '../types/clause.js';
import { DEFAULTS, SolveOptions } from '../types/options.js';
import { createEngineError } from '../types/errors.js';
import { collectVariables } from '../logic/kb.js';
import { buildSatResult } from '../utils/response.js';
import { ReasoningEngine, EngineCapabilities, SatResult } from './interface.js';

export class MiniSatEngine implements ReasoningEngine {
    readonly name = 'minisat';
    readonly capabilities: EngineCapabilities = {
        heuristics: false,
        trace: false,
        streaming: false,
    };

    /**
     * Check satisfiability of the knowledge base using the SAT solver.
     * Failures inside logic-solver are rethrown as ENGINE_ERROR.
     */
    async checkSat(kb: KnowledgeBase, options?: SolveOptions): Promise<SatResult> {
        const startTime = Date.now();
        const verbosity = options?.verbosity ?? DEFAULTS.verbosity;
        const names = collectVariables(kb);
        const stats = {
            variables: names.length,
            clauses: kb.length,
        };

        // logic-solver reserves some identifiers, so each name gets a plain alias
        const aliases = new Map(names.map((name, i) => [name, `v${i}`]));
        const aliasOf = (name: string): string => aliases.get(name) ?? name;

        if (kb.some(c => c.length === 0)) {
            // Empty clause = unsatisfiable
            return buildSatResult({ ...stats, sat: false, model: new Map(), timeMs: Date.now() - startTime }, verbosity);
        }

        try {
            const solver = new Logic.Solver();
            for (const c of kb) {
                const disjuncts = c.map(lit => (lit.sign ? aliasOf(lit.name) : Logic.not(aliasOf(lit.name))));
                solver.require(Logic.or(...disjuncts));
            }

            const solution = solver.solve();
            const model = new Map<string, boolean>();
            if (solution) {
                const trueVars = new Set(solution.getTrueVars());
                for (const name of names) {
                    model.set(name, trueVars.has(aliasOf(name)));
                }
            }

            return buildSatResult({
                ...stats,
                sat: solution !== null,
                model,
                timeMs: Date.now() - startTime,
            }, verbosity);
        } catch (e) {
            throw createEngineError(this.name, e);
        }
    }
}

/**
 * Create a new MiniSat engine instance.
 */
export function createMiniSatEngine(): MiniSatEngine {
    return new MiniSatEngine();
}
