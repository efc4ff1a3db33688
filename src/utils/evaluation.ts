/**
 * Model Evaluation Utilities
 *
 * Evaluate clauses against a truth assignment, and decide satisfiability by
 * exhaustive enumeration for cross-checking small instances.
 */

import { Literal } from '../types/literal.js';
import { Clause, KnowledgeBase } from '../types/clause.js';
import { LiteralMap } from '../logic/literalMap.js';
import { collectVariables } from '../logic/kb.js';
import { allAssignments } from './enumerate.js';

/**
 * Either a name-keyed assignment or a model as returned by `dpllSatisfiable`.
 */
export type Assignment = ReadonlyMap<string, boolean> | LiteralMap<boolean>;

function lookup(assignment: Assignment, name: string): boolean | undefined {
    return assignment instanceof LiteralMap
        ? assignment.get(new Literal(name))
        : assignment.get(name);
}

/**
 * Truth value of a literal, or undefined when its variable is unassigned.
 */
export function evaluateLiteral(lit: Literal, assignment: Assignment): boolean | undefined {
    const value = lookup(assignment, lit.name);
    return value === undefined ? undefined : value === lit.sign;
}

/**
 * Whether some literal of the clause is true under the assignment.
 */
export function satisfiesClause(c: Clause, assignment: Assignment): boolean {
    return c.some(lit => evaluateLiteral(lit, assignment) === true);
}

/**
 * Check if every clause is satisfied by the assignment
 */
export function satisfiesAll(kb: KnowledgeBase, assignment: Assignment): boolean {
    return kb.every(c => satisfiesClause(c, assignment));
}

/**
 * First satisfying assignment over all variables of `kb`, or null.
 * Exponential: only for small knowledge bases.
 */
export function findModelByEnumeration(kb: KnowledgeBase): Map<string, boolean> | null {
    for (const assignment of allAssignments(collectVariables(kb))) {
        if (satisfiesAll(kb, assignment)) return assignment;
    }
    return null;
}
