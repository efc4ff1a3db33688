/**
 * Response types for DPLL Logic
 */

import type { Literal } from './literal.js';

/**
 * Verbosity level for responses
 */
export type Verbosity = 'minimal' | 'standard' | 'detailed';

/**
 * Result of a satisfiability check
 */
export interface SatResult {
    /** Whether the knowledge base is satisfiable */
    sat: boolean;
    /** Variable assignments if satisfiable */
    model?: Map<string, boolean>;
    /** Decisions in the order the search made them (standard and detailed) */
    trace?: Literal[];
    /** Statistics about the computation (detailed only) */
    statistics?: {
        timeMs: number;
        variables: number;
        clauses: number;
        decisions?: number;
    };
}
