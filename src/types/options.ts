import type { Verbosity } from './responses.js';

/**
 * Callback for progress updates.
 * @param progress A number between 0 and 1 (if known) or undefined.
 * @param message A descriptive message about the current step.
 */
export type ProgressCallback = (progress: number | undefined, message: string) => void;

/**
 * Heuristic tiers. Checks are `>=` thresholds, so levels above
 * `RANKED_PURE_UNIT` act like it and negative levels act like `NONE`.
 */
export const HEURISTIC_LEVELS = {
    /** Arbitrary branching variable, no free simplification */
    NONE: 0,
    /** Branch on the literal of highest degree */
    DEGREE: 1,
    /** Assign pure and unit literals before branching, alphabetically */
    PURE_UNIT: 2,
    /** Rank pure and unit candidates by degree */
    RANKED_PURE_UNIT: 3,
} as const;

export interface SolveOptions {
    heuristicLevel?: number;
    verbosity?: Verbosity;
    onProgress?: ProgressCallback;
}

export const DEFAULTS = {
    heuristicLevel: HEURISTIC_LEVELS.NONE,
    verbosity: 'standard',
} as const;
