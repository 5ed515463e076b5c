import { MismatchReason, Puzzle, Triplet, ValidationResult, ValidationStatus } from '../types';
import { ConfigurationError, MalformedPuzzleError, SolverTimeoutError } from '../errors';
import { DEFAULT_TIMEOUT_MS, DEFAULT_WITNESS_LIMIT } from '../defaults';
import { ResultRecord, parsePuzzleRecord, toMalformedRecord, toResultRecord } from '../records';
import { Clue } from './Clue';
import { assertWellFormed } from './PuzzleChecker';
import { TripletSpace } from './TripletSpace';
import { encodePuzzle } from './ConstraintEncoder';
import { SolverFactory, SolverSession } from './SolverSession';
import { createLogicSolverSession } from './LogicSolverSession';
import { proveUniqueness } from './UniquenessProver';
import { inferStolenData } from './DataInference';
import {
    explainInconclusive,
    explainNotUnique,
    explainStolenDataMismatch,
    explainTripletMismatch,
    explainUnsatisfiable,
    explainValid,
    formatTriplet,
} from './Explainer';

/**
 * Configuration options for the validator.
 */
export interface ValidatorOptions {
    /**
     * Time budget in milliseconds for one validation run, conflict isolation included.
     * Use Infinity for no limit.
     * Default: 10000ms (10s).
     */
    timeoutMs?: number;
    /**
     * How many witness triplets to report when the puzzle has several solutions. At least 2.
     * Default: 2.
     */
    witnessLimit?: number;
    /**
     * Whether to search for a minimal set of conflicting clues when the puzzle is unsatisfiable.
     * Default: true.
     */
    isolateConflicts?: boolean;
    /**
     * Creates the solver session for each run.
     * Default: MiniSat via logic-solver.
     */
    solverFactory?: SolverFactory;
    /**
     * Callback for trace logs execution details.
     */
    onTrace?: (message: string) => void;
}

/**
 * Decides whether a puzzle is consistent, uniquely solvable, and solved by its declared answer.
 *
 * A Validator holds only its options. Every run opens its own solver session,
 * so one instance can validate any number of puzzles, also concurrently.
 */
export class Validator {
    private timeoutMs: number;
    private witnessLimit: number;
    private isolateConflicts: boolean;
    private solverFactory: SolverFactory;
    private onTrace?: (message: string) => void;

    /**
     * Creates a new Validator instance.
     *
     * @throws {ConfigurationError} If the timeout is negative or the witness limit is below 2.
     */
    constructor(options: ValidatorOptions = {}) {
        const {
            timeoutMs = DEFAULT_TIMEOUT_MS,
            witnessLimit = DEFAULT_WITNESS_LIMIT,
            isolateConflicts = true,
            solverFactory = createLogicSolverSession,
            onTrace,
        } = options;

        if (Number.isNaN(timeoutMs) || timeoutMs < 0) throw new ConfigurationError('timeoutMs must be a non-negative number.');
        if (!Number.isInteger(witnessLimit) || witnessLimit < 2) throw new ConfigurationError('witnessLimit must be an integer of at least 2.');

        this.timeoutMs = timeoutMs;
        this.witnessLimit = witnessLimit;
        this.isolateConflicts = isolateConflicts;
        this.solverFactory = solverFactory;
        this.onTrace = onTrace;
    }

    /**
     * Validates a puzzle.
     *
     * Every verdict, including a solver timeout, is returned rather than thrown.
     *
     * @throws {MalformedPuzzleError} If the puzzle breaks a structural invariant.
     */
    public validate(puzzle: Puzzle): ValidationResult {
        const space = assertWellFormed(puzzle);
        const deadline = Number.isFinite(this.timeoutMs) ? Date.now() + this.timeoutMs : undefined;

        try {
            return this.decide(puzzle, space, deadline);
        } catch (e) {
            if (e instanceof SolverTimeoutError) {
                this.trace(`Timed out after ${this.timeoutMs}ms.`);
                return { status: ValidationStatus.INCONCLUSIVE, explanation: explainInconclusive(this.timeoutMs), timeoutMs: this.timeoutMs };
            }
            throw e;
        }
    }

    /**
     * Asynchronously validates a puzzle (non-blocking wrapper).
     */
    public async validateAsync(puzzle: Puzzle): Promise<ValidationResult> {
        return new Promise((resolve, reject) => {
            setTimeout(() => {
                try {
                    resolve(this.validate(puzzle));
                } catch (e) {
                    reject(e);
                }
            }, 0);
        });
    }

    /**
     * Validates a batch of independent puzzles.
     * A malformed puzzle yields a 'malformed' record instead of aborting the batch.
     *
     * @returns Result records in input order.
     */
    public async validateAll(puzzles: readonly Puzzle[]): Promise<ResultRecord[]> {
        return Promise.all(puzzles.map(puzzle => this.validateAsync(puzzle).then(toResultRecord, (e: unknown) => {
            if (e instanceof MalformedPuzzleError) return toMalformedRecord(e);
            throw e;
        })));
    }

    /**
     * Reads a puzzle record (parsed JSON) and validates it.
     * A record that cannot be read, or describes a malformed puzzle, yields a 'malformed' record.
     */
    public validateRecord(value: unknown): ResultRecord {
        try {
            return toResultRecord(this.validate(parsePuzzleRecord(value)));
        } catch (e) {
            if (e instanceof MalformedPuzzleError) return toMalformedRecord(e);
            throw e;
        }
    }

    private decide(puzzle: Puzzle, space: TripletSpace, deadline?: number): ValidationResult {
        const encoded = encodePuzzle(space, puzzle.clues);
        this.trace(`Encoded ${space.size} triplets and ${puzzle.clues.length} clues into ${encoded.clauses.length} clauses.`);

        const session = this.openSession(deadline);
        session.assert(encoded.clauses);
        const outcome = proveUniqueness(session, space, this.witnessLimit);

        if (outcome.kind === 'unsatisfiable') {
            const conflictingClues = this.isolateConflicts ? this.isolateConflict(space, puzzle.clues, deadline) : [];
            this.trace(`Unsatisfiable. Conflicting clues: [${conflictingClues.join(', ')}].`);
            return {
                status: ValidationStatus.UNSATISFIABLE,
                explanation: explainUnsatisfiable(puzzle.clues, conflictingClues),
                conflictingClues,
            };
        }

        if (outcome.kind === 'multiple') {
            this.trace(`Not unique. Witnesses: ${outcome.witnesses.map(formatTriplet).join(', ')}.`);
            return { status: ValidationStatus.NOT_UNIQUE, explanation: explainNotUnique(outcome.witnesses), witnesses: outcome.witnesses };
        }

        const derived = outcome.triplet;
        const declared = { ...puzzle.solution };
        this.trace(`Unique solution ${formatTriplet(derived)}.`);

        if (!sameTriplet(derived, declared)) {
            return {
                status: ValidationStatus.SOLUTION_MISMATCH,
                explanation: explainTripletMismatch(declared, derived),
                reason: MismatchReason.TRIPLET,
                declared,
                derived,
                stolenDataCandidates: [],
            };
        }

        const candidates = inferStolenData(puzzle.elements, puzzle.clues, derived.vector);
        this.trace(`Stolen data candidates for ${derived.vector}: [${candidates.join(', ')}].`);

        if (candidates.length !== 1 || candidates[0] !== declared.stolenData) {
            return {
                status: ValidationStatus.SOLUTION_MISMATCH,
                explanation: explainStolenDataMismatch(declared, candidates),
                reason: MismatchReason.STOLEN_DATA,
                declared,
                derived,
                stolenDataCandidates: candidates,
            };
        }

        return { status: ValidationStatus.VALID, explanation: explainValid(declared), solution: declared };
    }

    /**
     * Shrinks the clue list to a minimal unsatisfiable subset by deletion:
     * a clue is dropped whenever the rest stays unsatisfiable without it.
     *
     * The verdict is already known, so running out of time here is not fatal:
     * the clues not yet shown to be removable are returned. They still conflict,
     * but may not be minimal.
     *
     * @returns 0-based clue positions in ascending order.
     */
    private isolateConflict(space: TripletSpace, clues: readonly Clue[], deadline?: number): number[] {
        let core = clues.map((_, i) => i);

        try {
            for (const candidate of [...core]) {
                const trial = core.filter(i => i !== candidate);
                const session = this.solverFactory({ deadline, timeoutMs: this.timeoutMs });
                session.assert(encodePuzzle(space, trial.map(i => clues[i])).clauses);
                if (!session.check().satisfiable) {
                    core = trial;
                }
            }
        } catch (e) {
            if (!(e instanceof SolverTimeoutError)) throw e;
            this.trace(`Conflict isolation stopped after ${this.timeoutMs}ms.`);
        }

        return core;
    }

    private openSession(deadline?: number): SolverSession {
        const session = this.solverFactory({ deadline, timeoutMs: this.timeoutMs });
        const trace = this.onTrace;
        if (!trace) return session;

        let checks = 0;
        return {
            assert: clauses => session.assert(clauses),
            check: () => {
                const result = session.check();
                checks++;
                trace(`Solver check #${checks}: ${result.satisfiable ? 'satisfiable' : 'unsatisfiable'}.`);
                return result;
            },
            blockCurrentAssignment: assignment => session.blockCurrentAssignment(assignment),
        };
    }

    private trace(message: string): void {
        this.onTrace?.(message);
    }
}

function sameTriplet(a: Triplet, b: Triplet): boolean {
    return a.actor === b.actor && a.vector === b.vector && a.asset === b.asset;
}

/**
 * Validates a puzzle with a one-off Validator.
 *
 * @throws {MalformedPuzzleError} If the puzzle breaks a structural invariant.
 */
export function validatePuzzle(puzzle: Puzzle, options?: ValidatorOptions): ValidationResult {
    return new Validator(options).validate(puzzle);
}
