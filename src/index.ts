/**
 * DPLL Logic - Library Entry Point
 *
 * Exports the solver, the knowledge-base utilities and the engine adapters.
 */

// Types and Interfaces
export * from './types/index.js';

// Knowledge base utilities
export {
    collectLiterals,
    collectVariables,
    substitute,
    simplify,
    isPure,
    isUnit,
    degree,
} from './logic/kb.js';
export { LiteralMap } from './logic/literalMap.js';

// Engines
export * from './engines/index.js';

// Utilities
export { parseKnowledgeBase } from './utils/validation.js';
export {
    evaluateLiteral,
    satisfiesClause,
    satisfiesAll,
    findModelByEnumeration,
} from './utils/evaluation.js';
export type { Assignment } from './utils/evaluation.js';
export { allAssignments } from './utils/enumerate.js';
export {
    formatClause,
    formatKnowledgeBase,
    formatModel,
    formatTrace,
} from './utils/formatting.js';
