import { Validator, validatePuzzle } from '../src/engine/Validator';
import { createLogicSolverSession } from '../src/engine/LogicSolverSession';
import { Clue, ClueType } from '../src/engine/Clue';
import { formatTriplet } from '../src/engine/Explainer';
import { SessionOptions, SolverSession } from '../src/engine/SolverSession';
import { ConfigurationError, MalformedPuzzleError, SolverTimeoutError } from '../src/errors';
import { SAMPLE_PUZZLE } from '../src/defaults';
import { MismatchReason, Solution, ValidationStatus } from '../src/types';
import { makePuzzle } from './helpers/fixtures';

// Clues that leave (A, X, P) as the only triplet.
const PIN_AXP: Clue[] = [
    { type: ClueType.AFFIRMATIVE, vector: 'X', asset: 'P' },
    { type: ClueType.NEGATION, actor: 'B', vector: 'X' },
    { type: ClueType.NEGATION, actor: 'C', vector: 'X' },
];

const AXP_D1: Solution = { actor: 'A', vector: 'X', asset: 'P', stolenData: 'D1' };

describe('Validator', () => {
    const validator = new Validator();

    describe('verdicts', () => {
        it('should report several solutions when one negation leaves many triplets open', () => {
            const result = validator.validate(makePuzzle(
                [{ type: ClueType.NEGATION, actor: 'A', vector: 'X' }],
                { actor: 'B', vector: 'X', asset: 'P', stolenData: 'D1' },
            ));
            expect(result.status).toBe(ValidationStatus.NOT_UNIQUE);
            if (result.status === ValidationStatus.NOT_UNIQUE) {
                expect(result.witnesses).toHaveLength(2);
                expect(formatTriplet(result.witnesses[0])).not.toBe(formatTriplet(result.witnesses[1]));
                for (const witness of result.witnesses) {
                    expect(witness.actor === 'A' && witness.vector === 'X').toBe(false);
                }
            }
        });

        it('should accept a puzzle whose clues pin the declared answer', () => {
            const result = validator.validate(makePuzzle([
                { type: ClueType.AFFIRMATIVE, vector: 'X', asset: 'P' },
                { type: ClueType.NEGATION, actor: 'A', vector: 'X' },
                { type: ClueType.NEGATION, actor: 'C', vector: 'X' },
                { type: ClueType.DATA_INFERENCE, vector: 'X', stolenData: 'D1' },
            ], { actor: 'B', vector: 'X', asset: 'P', stolenData: 'D1' }));

            expect(result).toEqual({
                status: ValidationStatus.VALID,
                explanation: 'Puzzle is consistent and uniquely solvable: B used X against the P and stole D1.',
                solution: { actor: 'B', vector: 'X', asset: 'P', stolenData: 'D1' },
            });
        });

        it('should report contradictory affirmative and relational clues with both as the conflict', () => {
            const result = validator.validate(makePuzzle([
                { type: ClueType.AFFIRMATIVE, vector: 'X', asset: 'P' },
                { type: ClueType.RELATIONAL, vector: 'X', asset: 'P' },
            ], AXP_D1));

            expect(result).toEqual({
                status: ValidationStatus.UNSATISFIABLE,
                explanation: 'The clues are contradictory: no combination of actor, vector and asset satisfies all 2 of them. '
                    + 'Conflicting clues: #1 "X was used against the P."; #2 "The actor that used X did not access the P."',
                conflictingClues: [0, 1],
            });
        });

        it('should leave unrelated clues out of the conflict', () => {
            const result = validator.validate(makePuzzle([
                { type: ClueType.NEGATION, actor: 'A', vector: 'Y' },
                { type: ClueType.AFFIRMATIVE, vector: 'X', asset: 'P' },
                { type: ClueType.DATA_INFERENCE, vector: 'X', stolenData: 'D1' },
                { type: ClueType.RELATIONAL, vector: 'X', asset: 'P' },
            ], AXP_D1));

            expect(result.status === ValidationStatus.UNSATISFIABLE && result.conflictingClues).toEqual([1, 3]);
        });

        it('should skip conflict isolation when disabled', () => {
            const result = new Validator({ isolateConflicts: false }).validate(makePuzzle([
                { type: ClueType.AFFIRMATIVE, vector: 'X', asset: 'P' },
                { type: ClueType.RELATIONAL, vector: 'X', asset: 'P' },
            ], AXP_D1));

            expect(result).toEqual({
                status: ValidationStatus.UNSATISFIABLE,
                explanation: 'The clues are contradictory: no combination of actor, vector and asset satisfies all 2 of them.',
                conflictingClues: [],
            });
        });

        it('should report two witnesses for a 3x3x3 puzzle without clues', () => {
            const result = validator.validate(makePuzzle([], AXP_D1));
            expect(result.status).toBe(ValidationStatus.NOT_UNIQUE);
            if (result.status === ValidationStatus.NOT_UNIQUE) {
                expect(result.witnesses).toHaveLength(2);
                expect(result.explanation).toBe(`The clues admit more than one solution, including ${result.witnesses.map(formatTriplet).join(', ')}.`);
            }
        });

        it('should report as many witnesses as the limit allows', () => {
            const result = new Validator({ witnessLimit: 4 }).validate(makePuzzle([], AXP_D1));
            expect(result.status === ValidationStatus.NOT_UNIQUE && result.witnesses.length).toBe(4);
        });

        it('should report a declared triplet that differs from the unique one', () => {
            const declared: Solution = { actor: 'B', vector: 'Y', asset: 'Q', stolenData: 'D1' };
            const result = validator.validate(makePuzzle(PIN_AXP, declared));

            expect(result).toEqual({
                status: ValidationStatus.SOLUTION_MISMATCH,
                explanation: 'The clues imply (A, X, P), but the declared solution is (B, Y, Q).',
                reason: MismatchReason.TRIPLET,
                declared,
                derived: { actor: 'A', vector: 'X', asset: 'P' },
                stolenDataCandidates: [],
            });
        });

        it('should report a declared datum that contradicts a data-inference clue', () => {
            const result = validator.validate(makePuzzle(
                [...PIN_AXP, { type: ClueType.DATA_INFERENCE, vector: 'X', stolenData: 'D2' }],
                AXP_D1,
            ));

            expect(result).toEqual({
                status: ValidationStatus.SOLUTION_MISMATCH,
                explanation: 'The clues imply that D2 was stolen, but the declared stolen data is D1.',
                reason: MismatchReason.STOLEN_DATA,
                declared: AXP_D1,
                derived: { actor: 'A', vector: 'X', asset: 'P' },
                stolenDataCandidates: ['D2'],
            });
        });
    });

    describe('stolen data', () => {
        it('should reject a datum no clue supports', () => {
            const result = validator.validate(makePuzzle(PIN_AXP, AXP_D1));
            expect(result.status === ValidationStatus.SOLUTION_MISMATCH && result.stolenDataCandidates).toEqual([]);
            expect(result.explanation).toBe('The clues do not imply which data was stolen using X, but the declared stolen data is D1.');
        });

        it('should reject a datum only reachable by eliminating the others', () => {
            const result = validator.validate(makePuzzle([
                ...PIN_AXP,
                { type: ClueType.DATA_INFERENCE, vector: 'Y', stolenData: 'D2' },
                { type: ClueType.DATA_INFERENCE, vector: 'Z', stolenData: 'D3' },
            ], AXP_D1));
            expect(result).toEqual({
                status: ValidationStatus.SOLUTION_MISMATCH,
                explanation: 'The clues do not imply which data was stolen using X, but the declared stolen data is D1.',
                reason: MismatchReason.STOLEN_DATA,
                declared: AXP_D1,
                derived: { actor: 'A', vector: 'X', asset: 'P' },
                stolenDataCandidates: [],
            });
        });

        it('should reject a datum claimed by two different vectors', () => {
            const result = validator.validate(makePuzzle([
                ...PIN_AXP,
                { type: ClueType.DATA_INFERENCE, vector: 'X', stolenData: 'D1' },
                { type: ClueType.DATA_INFERENCE, vector: 'Y', stolenData: 'D1' },
            ], AXP_D1));
            expect(result.status === ValidationStatus.SOLUTION_MISMATCH && result.stolenDataCandidates).toEqual([]);
            expect(result.explanation).toBe('The clues do not imply which data was stolen using X, but the declared stolen data is D1.');
        });

        it('should reject when two clues imply different data for the true vector', () => {
            const result = validator.validate(makePuzzle([
                ...PIN_AXP,
                { type: ClueType.DATA_INFERENCE, vector: 'X', stolenData: 'D1' },
                { type: ClueType.DATA_INFERENCE, vector: 'X', stolenData: 'D2' },
            ], AXP_D1));
            expect(result.status === ValidationStatus.SOLUTION_MISMATCH && result.reason).toBe(MismatchReason.STOLEN_DATA);
            expect(result.status === ValidationStatus.SOLUTION_MISMATCH && result.stolenDataCandidates).toEqual(['D1', 'D2']);
        });
    });

    describe('behaviour', () => {
        it('should accept the sample puzzle', () => {
            expect(validator.validate(SAMPLE_PUZZLE).status).toBe(ValidationStatus.VALID);
        });

        it('should return identical results for repeated runs', () => {
            const open = makePuzzle([{ type: ClueType.NEGATION, actor: 'A', vector: 'Y' }], AXP_D1);
            expect(validator.validate(open)).toEqual(validator.validate(open));
            expect(validator.validate(SAMPLE_PUZZLE)).toEqual(validator.validate(SAMPLE_PUZZLE));
        });

        it('should flag three negations as ambiguous', () => {
            const result = validatePuzzle(makePuzzle([
                { type: ClueType.NEGATION, actor: 'A', vector: 'Y' },
                { type: ClueType.NEGATION, actor: 'B', vector: 'Z' },
                { type: ClueType.NEGATION, actor: 'C', vector: 'X' },
            ], { actor: 'A', vector: 'X', asset: 'S2', stolenData: 'D1' }, {
                actors: ['A', 'B', 'C'],
                vectors: ['X', 'Y', 'Z'],
                assets: ['S1', 'S2', 'S3'],
                stolenData: ['D1', 'D2', 'D3'],
            }));
            expect(result.status).toBe(ValidationStatus.NOT_UNIQUE);
        });

        it('should not hand back the caller\'s solution object', () => {
            const puzzle = makePuzzle([...PIN_AXP, { type: ClueType.DATA_INFERENCE, vector: 'X', stolenData: 'D1' }], AXP_D1);
            const result = validator.validate(puzzle);
            expect(result.status === ValidationStatus.VALID && result.solution).toEqual(AXP_D1);
            expect(result.status === ValidationStatus.VALID && result.solution).not.toBe(puzzle.solution);
        });

        it('should throw for a malformed puzzle', () => {
            const puzzle = makePuzzle([{ type: ClueType.NEGATION, actor: 'Q', vector: 'X' }], AXP_D1);
            expect(() => validator.validate(puzzle)).toThrow(MalformedPuzzleError);
        });

        it('should return an inconclusive verdict when the time budget is spent', () => {
            const result = new Validator({ timeoutMs: 0 }).validate(makePuzzle(PIN_AXP, AXP_D1));
            expect(result).toEqual({
                status: ValidationStatus.INCONCLUSIVE,
                explanation: 'Solver exceeded the 0ms budget before reaching a verdict.',
                timeoutMs: 0,
            });
        });

        it('should stay unsatisfiable when conflict isolation runs out of time', () => {
            let opened = 0;
            const factory = (options: SessionOptions): SolverSession => {
                const session = createLogicSolverSession(options);
                opened++;
                if (opened === 1) return session;
                return {
                    assert: clauses => session.assert(clauses),
                    check: () => {
                        throw new SolverTimeoutError(60000);
                    },
                    blockCurrentAssignment: assignment => session.blockCurrentAssignment(assignment),
                };
            };
            const messages: string[] = [];
            const result = new Validator({ solverFactory: factory, timeoutMs: 60000, onTrace: m => messages.push(m) }).validate(makePuzzle([
                { type: ClueType.AFFIRMATIVE, vector: 'X', asset: 'P' },
                { type: ClueType.RELATIONAL, vector: 'X', asset: 'P' },
            ], AXP_D1));

            expect(result.status).toBe(ValidationStatus.UNSATISFIABLE);
            expect(result.status === ValidationStatus.UNSATISFIABLE && result.conflictingClues).toEqual([0, 1]);
            expect(messages).toContain('Conflict isolation stopped after 60000ms.');
        });

        it('should open one session per run from the configured factory', () => {
            const factory = jest.fn(createLogicSolverSession);
            const custom = new Validator({ solverFactory: factory, timeoutMs: Infinity });
            custom.validate(SAMPLE_PUZZLE);
            custom.validate(SAMPLE_PUZZLE);
            expect(factory).toHaveBeenCalledTimes(2);
            expect(factory).toHaveBeenCalledWith({ deadline: undefined, timeoutMs: Infinity });
        });

        it('should trace each stage', () => {
            const messages: string[] = [];
            const traced = new Validator({ onTrace: message => messages.push(message) });
            traced.validate(makePuzzle([...PIN_AXP, { type: ClueType.DATA_INFERENCE, vector: 'X', stolenData: 'D1' }], AXP_D1));

            expect(messages).toEqual([
                'Encoded 27 triplets and 4 clues into 365 clauses.',
                'Solver check #1: satisfiable.',
                'Solver check #2: unsatisfiable.',
                'Unique solution (A, X, P).',
                'Stolen data candidates for X: [D1].',
            ]);
        });
    });

    describe('options', () => {
        it('should reject a negative timeout', () => {
            expect(() => new Validator({ timeoutMs: -1 })).toThrow(ConfigurationError);
        });

        it('should reject a witness limit below 2', () => {
            expect(() => new Validator({ witnessLimit: 1 })).toThrow('witnessLimit must be an integer of at least 2.');
        });
    });
});
