/**
 * Knowledge Base Validation
 *
 * Converts JSON-shaped input into a knowledge base. Literals are written
 * either as shorthand strings (`"A"`, `"-A"`) or as `{ name, sign }` objects.
 */

import { z } from 'zod';
import { Literal } from '../types/literal.js';
import { KnowledgeBase, clause } from '../types/clause.js';
import { createInvalidInputError } from '../types/errors.js';

const shorthandSchema = z
    .string()
    .regex(/^-?[^-\s]\S*$/, 'Literal must be a name, optionally prefixed by a single "-"')
    .transform(text => (text.startsWith('-') ? new Literal(text.slice(1), false) : new Literal(text)));

const objectSchema = z
    .object({
        name: z.string().min(1, 'Literal name must not be empty'),
        sign: z.boolean().optional(),
    })
    .strict()
    .transform(({ name, sign }) => new Literal(name, sign ?? true));

const literalSchema = z.union([shorthandSchema, objectSchema]);

const clauseSchema = z.array(literalSchema).transform(literals => clause(...literals));

const knowledgeBaseSchema = z.array(clauseSchema);

/**
 * Flatten union failures into the issues of the branch that matched the
 * input's type. A union where every branch rejected the type stays as is.
 */
function expandIssues(issues: z.ZodIssue[]): z.ZodIssue[] {
    return issues.flatMap(issue => {
        if (issue.code !== z.ZodIssueCode.invalid_union) return [issue];
        const matched = issue.unionErrors.find(
            err => err.issues.length > 0 && err.issues[0].code !== z.ZodIssueCode.invalid_type
        );
        return matched ? expandIssues(matched.issues) : [issue];
    });
}

/**
 * Validate and convert `input` into a knowledge base.
 * @throws LogicException with code INVALID_INPUT listing every issue
 */
export function parseKnowledgeBase(input: unknown): KnowledgeBase {
    const parsed = knowledgeBaseSchema.safeParse(input);
    if (!parsed.success) {
        throw createInvalidInputError(expandIssues(parsed.error.issues).map(issue => ({
            path: issue.path.join('.'),
            message: issue.message,
        })));
    }
    return parsed.data;
}
