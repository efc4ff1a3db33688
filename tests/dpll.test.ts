/**
 * DPLL Solver Tests
 *
 * Verdicts, models and decision traces of `dpllSatisfiable` at every
 * heuristic level.
 */

import { dpllSatisfiable } from '../src/engines/dpll';
import { createSearchState, search } from '../src/engines/dpll/search';
import { clause } from '../src/types/clause';
import { Literal } from '../src/types/literal';
import { satisfiesAll, findModelByEnumeration } from '../src/utils/evaluation';
import { formatTrace } from '../src/utils/formatting';
import { A, B, C, D, notA, notB, KBS, randomKnowledgeBase, seededRandom } from './fixtures';

const LEVELS = [0, 1, 2, 3];

describe('dpllSatisfiable', () => {
    describe('scenarios', () => {
        it('should satisfy a single positive unit clause', () => {
            const [sat, model, trace] = dpllSatisfiable(KBS.single);
            expect(sat).toBe(true);
            expect(model.size).toBe(1);
            expect(model.get(new Literal('A'))).toBe(true);
            expect(formatTrace(trace)).toBe('A');
        });

        it('should detect A ∧ ¬A as unsatisfiable', () => {
            for (const level of LEVELS) {
                const [sat, model] = dpllSatisfiable(KBS.contradiction, level);
                expect(sat).toBe(false);
                expect(model.size).toBe(0);
            }
        });

        it('should find a model for {A, B} ∧ {-A, C}', () => {
            for (const level of LEVELS) {
                const [sat, model] = dpllSatisfiable(KBS.twoClauses, level);
                expect(sat).toBe(true);
                expect(satisfiesAll(KBS.twoClauses, model)).toBe(true);
            }
        });

        it('should treat the empty knowledge base as satisfiable', () => {
            const [sat, model, trace] = dpllSatisfiable(KBS.empty);
            expect(sat).toBe(true);
            expect(model.size).toBe(0);
            expect(trace).toEqual([]);
        });

        it('should reject an empty clause without deciding anything', () => {
            for (const level of LEVELS) {
                const [sat, , trace] = dpllSatisfiable(KBS.emptyClause, level);
                expect(sat).toBe(false);
                expect(trace).toEqual([]);
            }
        });

        it('should assign a pure literal first at level 2 and above', () => {
            for (const level of [2, 3]) {
                const [sat, model, trace] = dpllSatisfiable(KBS.pureA, level);
                expect(sat).toBe(true);
                expect(trace).toHaveLength(1);
                expect(trace[0].equals(A)).toBe(true);
                expect(model.get(A)).toBe(true);
                expect(model.has(B)).toBe(false);
            }
        });
    });

    it('should accept clauses that already hold truth constants', () => {
        const [sat, model, trace] = dpllSatisfiable([[true, A], [false, B]]);
        expect(sat).toBe(true);
        expect(model.toRecord()).toEqual({ B: true });
        expect(formatTrace(trace)).toBe('B');
    });

    it('should reject a clause of false constants', () => {
        const [sat, , trace] = dpllSatisfiable([[false], [A]], 2);
        expect(sat).toBe(false);
        expect(trace).toEqual([]);
    });

    describe('model', () => {
        it('should key the model by positive literals and store the polarity as value', () => {
            const [, model] = dpllSatisfiable(KBS.twoClauses, 2);
            expect(model.toRecord()).toEqual({ B: true, A: false });
            for (const key of model.keys()) {
                expect(key.sign).toBe(true);
            }
        });

        it('should leave unconstrained variables out of the model', () => {
            const [, model] = dpllSatisfiable(KBS.twoClauses, 0);
            expect(model.toRecord()).toEqual({ A: true, C: true });
        });
    });

    describe('trace', () => {
        it('level 0 branches on the first literal seen', () => {
            const [, , trace] = dpllSatisfiable(KBS.twoClauses, 0);
            expect(formatTrace(trace)).toBe('A → C');
        });

        it('level 0 records the branch literal at every decision level', () => {
            const [sat, , trace] = dpllSatisfiable(KBS.allPairs, 0);
            expect(sat).toBe(false);
            expect(formatTrace(trace)).toBe('A → B → B');
        });

        it('level 1 branches on the highest-degree literal', () => {
            const kb = [clause(A, B), clause(B, C), clause(notB, D)];
            expect(formatTrace(dpllSatisfiable(kb, 0)[2])).toBe('A → B → D');

            const [sat, model, trace] = dpllSatisfiable(kb, 1);
            expect(sat).toBe(true);
            // -B sorts before B and both have degree 3
            expect(formatTrace(trace)).toBe('-B → D');
            expect(model.toRecord()).toEqual({ B: true, D: true });
        });

        it('level 1 breaks degree ties alphabetically', () => {
            const [, , trace] = dpllSatisfiable(KBS.twoClauses, 1);
            expect(formatTrace(trace)).toBe('-A → C');
        });

        it('level 2 takes pure literals before branching', () => {
            const [, , trace] = dpllSatisfiable(KBS.twoClauses, 2);
            expect(formatTrace(trace)).toBe('B → -A');
        });

        it('level 2 assigns a conflicting unit clause without branching', () => {
            const [sat, , trace] = dpllSatisfiable(KBS.contradiction, 2);
            expect(sat).toBe(false);
            expect(formatTrace(trace)).toBe('-A');
        });

        it('level 3 ranks pure and unit candidates by degree', () => {
            const kb = [clause(A), clause(B, C), clause(B, D)];
            expect(formatTrace(dpllSatisfiable(kb, 2)[2])).toBe('A → B');
            expect(formatTrace(dpllSatisfiable(kb, 3)[2])).toBe('B → A');
        });

        it('treats levels above 3 as 3 and negative levels as 0', () => {
            const kb = [clause(A), clause(B, C), clause(B, D)];
            expect(formatTrace(dpllSatisfiable(kb, 7)[2])).toBe('B → A');
            expect(formatTrace(dpllSatisfiable(KBS.twoClauses, -1)[2])).toBe('A → C');
        });

        it('should report each decision through onProgress', () => {
            const onProgress = jest.fn();
            dpllSatisfiable(KBS.twoClauses, 2, onProgress);
            expect(onProgress.mock.calls).toEqual([
                [undefined, 'decide B'],
                [undefined, 'decide -A'],
            ]);
        });
    });

    describe('properties', () => {
        const random = seededRandom(20240611);
        const instances = Array.from({ length: 60 }, (_, i) =>
            randomKnowledgeBase(random, 3 + (i % 4), 4 + (i % 9))
        );

        it('returns models that satisfy the original knowledge base', () => {
            for (const kb of instances) {
                for (const level of LEVELS) {
                    const [sat, model] = dpllSatisfiable(kb, level);
                    if (sat) {
                        expect(satisfiesAll(kb, model)).toBe(true);
                    }
                }
            }
        });

        it('agrees with exhaustive enumeration', () => {
            for (const kb of instances) {
                const expected = findModelByEnumeration(kb) !== null;
                expect(dpllSatisfiable(kb, 0)[0]).toBe(expected);
            }
        });

        it('gives the same verdict at every heuristic level', () => {
            for (const kb of instances) {
                const verdicts = LEVELS.map(level => dpllSatisfiable(kb, level)[0]);
                expect(new Set(verdicts).size).toBe(1);
            }
        });
    });
});

describe('search', () => {
    it('records the branch literal before recursing', () => {
        const state = createSearchState(0, (_progress, message) => {
            if (message.startsWith('branch')) {
                expect(state.trace.length).toBeGreaterThan(0);
            }
        });
        expect(search([clause(A, B)], new Map(), state)).toBe(true);
        expect(state.trace.map(l => l.toString())).toEqual(['A']);
    });

    it('merges the partial model it was given on success', () => {
        const state = createSearchState(0);
        const satisfied = search([[true, notB]], new Map([['B', true]]), state);
        expect(satisfied).toBe(true);
        expect(state.model).toEqual(new Map([['B', true]]));
        expect(state.trace).toEqual([]);
    });

    it('fails on a clause reduced to false entries', () => {
        const state = createSearchState(3);
        expect(search([[false, false]], new Map(), state)).toBe(false);
        expect(state.model.size).toBe(0);
    });
});
