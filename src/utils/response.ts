import { Literal } from '../types/literal.js';
import { SatResult, Verbosity } from '../types/responses.js';

export interface BaseSatData {
    sat: boolean;
    model: Map<string, boolean>;
    trace?: Literal[];
    timeMs: number;
    variables: number;
    clauses: number;
}

/**
 * Build a standardized SatResult based on verbosity level.
 * Shared between the DPLL and MiniSat engines.
 */
export function buildSatResult(
    data: BaseSatData,
    verbosity: Verbosity
): SatResult {
    const base: SatResult = { sat: data.sat };
    if (data.sat) {
        base.model = data.model;
    }

    if (verbosity === 'minimal') {
        return base;
    }

    if (data.trace) {
        base.trace = data.trace;
    }

    if (verbosity === 'detailed') {
        base.statistics = {
            timeMs: data.timeMs,
            variables: data.variables,
            clauses: data.clauses,
            decisions: data.trace?.length,
        };
    }

    return base;
}
