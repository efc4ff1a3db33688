/**
 * Shared type definitions for DPLL Logic
 */

// Re-export error types
export {
    LogicException,
    createInvalidInputError,
    createEngineNotFoundError,
    createEngineError,
    serializeLogicError,
} from './errors.js';

export type {
    LogicErrorCode,
    LogicError,
    InputIssue,
} from './errors.js';

// Literal model
export {
    Literal,
    literal,
    negate,
    compareLiterals,
} from './literal.js';

// Re-export clause types for CNF
export {
    clause,
    clauseEquals,
    isLiteral,
} from './clause.js';

export type {
    Clause,
    ClauseEntry,
    KnowledgeBase,
    PartialClause,
    PartialKnowledgeBase,
} from './clause.js';

// Re-export response types
export type {
    Verbosity,
    SatResult,
} from './responses.js';

// Re-export options
export {
    DEFAULTS,
    HEURISTIC_LEVELS,
} from './options.js';

export type {
    ProgressCallback,
    SolveOptions,
} from './options.js';
