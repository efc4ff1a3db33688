/**
 * Formatting utilities
 */
import type { Literal } from '../types/literal.js';
import type { Clause, KnowledgeBase } from '../types/clause.js';
import type { Assignment } from './evaluation.js';

export function formatClause(c: Clause): string {
    return `{${c.map(lit => lit.toString()).join(', ')}}`;
}

/**
 * Format knowledge base as `{A, B} ∧ {-A, C}`; the empty one prints as `⊤`.
 */
export function formatKnowledgeBase(kb: KnowledgeBase): string {
    if (kb.length === 0) return '⊤';
    return kb.map(formatClause).join(' ∧ ');
}

/**
 * Format model as one `name = value` line per variable, sorted by name
 */
export function formatModel(model: Assignment): string {
    const lines: string[] = [];
    for (const [key, value] of model.entries()) {
        const name = typeof key === 'string' ? key : key.name;
        lines.push(`${name} = ${value}`);
    }
    return lines.sort().join('\n');
}

export function formatTrace(trace: readonly Literal[]): string {
    return trace.map(lit => lit.toString()).join(' → ');
}
