/**
 * Reasoning Engine Interface
 *
 * Abstract interface for pluggable satisfiability backends.
 * All engine implementations (DPLL, MiniSat) implement this interface.
 */

import { KnowledgeBase } from '../types/clause.js';
import { SolveOptions } from '../types/options.js';
import { SatResult } from '../types/responses.js';

export type { SatResult };

/**
 * Capabilities of a reasoning engine
 */
export interface EngineCapabilities {
    /** Honours `heuristicLevel` */
    heuristics: boolean;
    /** Reports the decision trace */
    trace: boolean;
    /** Supports progress callbacks */
    streaming: boolean;
}

/**
 * Abstract reasoning engine interface.
 * All engine backends must implement this interface.
 */
export interface ReasoningEngine {
    /** Unique name of the engine */
    readonly name: string;
    /** Capabilities of this engine */
    readonly capabilities: EngineCapabilities;

    /**
     * Check satisfiability of a knowledge base.
     * @param kb - Clauses in CNF
     * @param options - Heuristic level, verbosity and progress callback
     */
    checkSat(kb: KnowledgeBase, options?: SolveOptions): Promise<SatResult>;
}
