import { Clue } from './engine/Clue';

/**
 * How hard the puzzle author meant the puzzle to be. Informational only; the validator never ranks difficulty.
 */
export enum Difficulty {
    EASY = 'easy',
    MEDIUM = 'medium',
    IMPOSSIBLE = 'impossible',
}

/**
 * The four element lists a puzzle is built from.
 * Each list holds 3-6 unique strings. The same string may appear in two different lists.
 */
export interface ElementSet {
    /** Threat actors (e.g., 'GhostShell'). */
    readonly actors: readonly string[];
    /** Attack vectors (e.g., 'Phishing'). */
    readonly vectors: readonly string[];
    /** Compromised assets (e.g., 'Email Server'). */
    readonly assets: readonly string[];
    /** Kinds of data that may have been exfiltrated (e.g., 'Source Code'). */
    readonly stolenData: readonly string[];
}

/**
 * One candidate answer: who did it, how, and to what.
 */
export interface Triplet {
    readonly actor: string;
    readonly vector: string;
    readonly asset: string;
}

/**
 * The answer the puzzle author declares: a triplet plus the stolen datum.
 */
export interface Solution extends Triplet {
    readonly stolenData: string;
}

/**
 * A complete puzzle instance as handed to the validator.
 */
export interface Puzzle {
    readonly title?: string;
    readonly author: string;
    readonly difficulty: Difficulty;
    readonly elements: ElementSet;
    /** Clues in the order the author wrote them. Positions are reported 1-based in explanations. */
    readonly clues: readonly Clue[];
    readonly solution: Solution;
}

/**
 * The verdict of a validation run.
 */
export enum ValidationStatus {
    /** Consistent, uniquely solvable, and solved by the declared answer. */
    VALID = 'valid',
    /** No triplet satisfies every clue. */
    UNSATISFIABLE = 'unsatisfiable',
    /** Two or more triplets satisfy every clue. */
    NOT_UNIQUE = 'not_unique',
    /** The clues imply an answer other than the declared one. */
    SOLUTION_MISMATCH = 'solution_mismatch',
    /** The solver ran out of time before reaching a verdict. */
    INCONCLUSIVE = 'inconclusive',
}

/**
 * Which part of the declared answer disagrees with the clues.
 */
export enum MismatchReason {
    TRIPLET = 'triplet',
    STOLEN_DATA = 'stolen_data',
}

export interface ValidResult {
    status: ValidationStatus.VALID;
    explanation: string;
    solution: Solution;
}

export interface UnsatisfiableResult {
    status: ValidationStatus.UNSATISFIABLE;
    explanation: string;
    /**
     * 0-based positions of a minimal subset of clues that cannot hold together.
     * Empty when conflict isolation is disabled.
     */
    conflictingClues: number[];
}

export interface NotUniqueResult {
    status: ValidationStatus.NOT_UNIQUE;
    explanation: string;
    /** Distinct triplets that all satisfy the clues. Always at least two. */
    witnesses: Triplet[];
}

export interface SolutionMismatchResult {
    status: ValidationStatus.SOLUTION_MISMATCH;
    explanation: string;
    reason: MismatchReason;
    declared: Solution;
    /** The unique triplet the clues imply. */
    derived: Triplet;
    /**
     * Stolen data values consistent with the derived vector and the data-inference clues.
     * Only computed for a STOLEN_DATA mismatch; empty otherwise.
     */
    stolenDataCandidates: string[];
}

export interface InconclusiveResult {
    status: ValidationStatus.INCONCLUSIVE;
    explanation: string;
    timeoutMs: number;
}

export type ValidationResult =
    | ValidResult
    | UnsatisfiableResult
    | NotUniqueResult
    | SolutionMismatchResult
    | InconclusiveResult;
