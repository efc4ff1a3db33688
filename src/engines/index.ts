/**
 * Engine Module Exports
 *
 * Re-exports all engine-related types and classes.
 */

export type {
    ReasoningEngine,
    EngineCapabilities,
    SatResult,
} from './interface.js';

export {
    DPLLEngine,
    createDPLLEngine,
    dpllSatisfiable,
    createSearchState,
    search,
} from './dpll/index.js';

export type {
    DPLLResult,
    SearchState,
} from './dpll/index.js';

export {
    MiniSatEngine,
    createMiniSatEngine,
} from './minisat.js';

export {
    createEngine,
    listEngines,
    getEngineCapabilities,
} from './registry.js';

export type { EngineEntry } from './registry.js';
