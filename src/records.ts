import { Difficulty, ElementSet, MismatchReason, Puzzle, Solution, Triplet, ValidationResult, ValidationStatus } from './types';
import { MalformedPuzzleError } from './errors';
import { Clue, ClueType, describeClue } from './engine/Clue';
import { assertWellFormed } from './engine/PuzzleChecker';

/**
 * A clue as stored in a puzzle file. Which element fields are present depends on the type.
 */
export interface ClueRecord {
    type: string;
    actor?: string;
    vector?: string;
    asset?: string;
    stolen_data?: string;
    /**
     * Display sentence. Read only when the element fields are absent, as in files
     * written by the authoring tool; regenerated when writing.
     */
    text?: string;
}

export interface TripletRecord {
    actor: string;
    vector: string;
    asset: string;
}

export interface SolutionRecord extends TripletRecord {
    stolen_data: string;
}

/**
 * A puzzle as stored in a puzzle file.
 */
export interface PuzzleRecord {
    title?: string;
    author: string;
    difficulty: string;
    actors: string[];
    vectors: string[];
    assets: string[];
    stolen_data: string[];
    solution: SolutionRecord;
    clues: ClueRecord[];
}

export type ResultStatus = `${ValidationStatus}` | 'malformed';

/**
 * The serialisable form of a validation verdict consumed by downstream tools.
 */
export interface ResultRecord {
    status: ResultStatus;
    explanation: string;
    /** The solution derived by the solver, when one could be determined. */
    solution?: TripletRecord & { stolen_data?: string };
    /** Witness triplets of a puzzle with several solutions. */
    alternatives?: TripletRecord[];
    /** 0-based positions of the clues that contradict each other. */
    conflicting_clues?: number[];
    reason?: `${MismatchReason}`;
    declared?: SolutionRecord;
    stolen_data_candidates?: string[];
}

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireObject(value: unknown, where: string): UnknownRecord {
    if (!isRecord(value)) {
        throw new MalformedPuzzleError(`${where} must be an object.`);
    }
    return value;
}

function requireString(record: UnknownRecord, key: string, where: string): string {
    const value = record[key];
    if (typeof value !== 'string' || value.trim() === '') {
        throw new MalformedPuzzleError(`${where} is missing string field '${key}'.`);
    }
    return value;
}

function requireStringArray(record: UnknownRecord, key: string): string[] {
    const value = record[key];
    if (!Array.isArray(value)) {
        throw new MalformedPuzzleError(`Puzzle is missing list field '${key}'.`);
    }
    return value.map((entry: unknown, i) => {
        if (typeof entry !== 'string' || entry.trim() === '') {
            throw new MalformedPuzzleError(`Entry ${i + 1} of '${key}' must be a non-empty string.`);
        }
        return entry;
    });
}

const ELEMENT_FIELDS = ['actor', 'vector', 'asset', 'stolen_data'];

function parseClue(value: unknown, position: number, elements: ElementSet): Clue {
    const where = `Clue #${position}`;
    const record = requireObject(value, where);
    const type = requireString(record, 'type', where);

    if (!ELEMENT_FIELDS.some(key => key in record) && typeof record.text === 'string') {
        return parseClueText(type, record.text, where, elements);
    }

    switch (type) {
        case ClueType.NEGATION:
            return {
                type: ClueType.NEGATION,
                actor: requireString(record, 'actor', where),
                vector: requireString(record, 'vector', where),
            };
        case ClueType.AFFIRMATIVE:
            return {
                type: ClueType.AFFIRMATIVE,
                vector: requireString(record, 'vector', where),
                asset: requireString(record, 'asset', where),
            };
        case ClueType.RELATIONAL:
            return {
                type: ClueType.RELATIONAL,
                vector: requireString(record, 'vector', where),
                asset: requireString(record, 'asset', where),
            };
        case ClueType.CONDITIONAL:
            return {
                type: ClueType.CONDITIONAL,
                actor: requireString(record, 'actor', where),
                vector: requireString(record, 'vector', where),
                asset: requireString(record, 'asset', where),
            };
        case ClueType.DATA_INFERENCE:
            return {
                type: ClueType.DATA_INFERENCE,
                vector: requireString(record, 'vector', where),
                stolenData: requireString(record, 'stolen_data', where),
            };
        default:
            throw new MalformedPuzzleError(`${where} has unknown type '${type}'.`);
    }
}

/**
 * Every clue of a type that can be built from the element lists.
 */
function cluesOfType(type: string, where: string, { actors, vectors, assets, stolenData }: ElementSet): Clue[] {
    switch (type) {
        case ClueType.NEGATION:
            return actors.flatMap(actor => vectors.map((vector): Clue => ({ type: ClueType.NEGATION, actor, vector })));
        case ClueType.AFFIRMATIVE:
            return vectors.flatMap(vector => assets.map((asset): Clue => ({ type: ClueType.AFFIRMATIVE, vector, asset })));
        case ClueType.RELATIONAL:
            return vectors.flatMap(vector => assets.map((asset): Clue => ({ type: ClueType.RELATIONAL, vector, asset })));
        case ClueType.CONDITIONAL:
            return actors.flatMap(actor => vectors.flatMap(vector =>
                assets.map((asset): Clue => ({ type: ClueType.CONDITIONAL, actor, vector, asset }))));
        case ClueType.DATA_INFERENCE:
            return vectors.flatMap(vector => stolenData.map((datum): Clue => ({ type: ClueType.DATA_INFERENCE, vector, stolenData: datum })));
        default:
            throw new MalformedPuzzleError(`${where} has unknown type '${type}'.`);
    }
}

// Matching whole sentences keeps element names that contain spaces intact.
function parseClueText(type: string, text: string, where: string, elements: ElementSet): Clue {
    const sentence = text.trim();
    const clue = cluesOfType(type, where, elements).find(c => describeClue(c) === sentence);
    if (!clue) {
        throw new MalformedPuzzleError(`${where} text '${sentence}' is not a ${type} clue over the puzzle's elements.`);
    }
    return clue;
}

/**
 * Reads a puzzle from its file representation.
 * Either the whole puzzle is valid structurally, or nothing is returned.
 *
 * @param value - Parsed JSON.
 * @throws {MalformedPuzzleError} Naming the first field or invariant that is violated.
 */
export function parsePuzzleRecord(value: unknown): Puzzle {
    const record = requireObject(value, 'Puzzle');

    const rawDifficulty = requireString(record, 'difficulty', 'Puzzle');
    const difficulty = Object.values(Difficulty).find(d => d === rawDifficulty);
    if (!difficulty) {
        throw new MalformedPuzzleError(`Puzzle has unknown difficulty '${rawDifficulty}'. Expected one of: ${Object.values(Difficulty).join(', ')}.`);
    }

    let title: string | undefined;
    if (record.title !== undefined) {
        title = requireString(record, 'title', 'Puzzle');
    }

    const solutionRecord = requireObject(record.solution, 'Puzzle solution');
    const solution: Solution = {
        actor: requireString(solutionRecord, 'actor', 'Puzzle solution'),
        vector: requireString(solutionRecord, 'vector', 'Puzzle solution'),
        asset: requireString(solutionRecord, 'asset', 'Puzzle solution'),
        stolenData: requireString(solutionRecord, 'stolen_data', 'Puzzle solution'),
    };

    if (!Array.isArray(record.clues)) {
        throw new MalformedPuzzleError(`Puzzle is missing list field 'clues'.`);
    }

    const author = requireString(record, 'author', 'Puzzle');
    const elements: ElementSet = {
        actors: requireStringArray(record, 'actors'),
        vectors: requireStringArray(record, 'vectors'),
        assets: requireStringArray(record, 'assets'),
        stolenData: requireStringArray(record, 'stolen_data'),
    };

    const puzzle: Puzzle = {
        ...(title !== undefined ? { title } : {}),
        author,
        difficulty,
        elements,
        clues: record.clues.map((clue: unknown, i) => parseClue(clue, i + 1, elements)),
        solution,
    };

    assertWellFormed(puzzle);
    return puzzle;
}

function toClueRecord(clue: Clue): ClueRecord {
    const text = describeClue(clue);
    switch (clue.type) {
        case ClueType.NEGATION:
            return { type: clue.type, actor: clue.actor, vector: clue.vector, text };
        case ClueType.AFFIRMATIVE:
        case ClueType.RELATIONAL:
            return { type: clue.type, vector: clue.vector, asset: clue.asset, text };
        case ClueType.CONDITIONAL:
            return { type: clue.type, actor: clue.actor, vector: clue.vector, asset: clue.asset, text };
        case ClueType.DATA_INFERENCE:
            return { type: clue.type, vector: clue.vector, stolen_data: clue.stolenData, text };
    }
}

function toTripletRecord(triplet: Triplet): TripletRecord {
    return { actor: triplet.actor, vector: triplet.vector, asset: triplet.asset };
}

function toSolutionRecord(solution: Solution): SolutionRecord {
    return { ...toTripletRecord(solution), stolen_data: solution.stolenData };
}

/**
 * Writes a puzzle in its file representation.
 */
export function toPuzzleRecord(puzzle: Puzzle): PuzzleRecord {
    return {
        ...(puzzle.title !== undefined ? { title: puzzle.title } : {}),
        author: puzzle.author,
        difficulty: puzzle.difficulty,
        actors: [...puzzle.elements.actors],
        vectors: [...puzzle.elements.vectors],
        assets: [...puzzle.elements.assets],
        stolen_data: [...puzzle.elements.stolenData],
        solution: toSolutionRecord(puzzle.solution),
        clues: puzzle.clues.map(toClueRecord),
    };
}

/**
 * Converts a verdict to its serialisable form.
 */
export function toResultRecord(result: ValidationResult): ResultRecord {
    switch (result.status) {
        case ValidationStatus.VALID:
            return { status: result.status, explanation: result.explanation, solution: toSolutionRecord(result.solution) };
        case ValidationStatus.UNSATISFIABLE:
            return { status: result.status, explanation: result.explanation, conflicting_clues: [...result.conflictingClues] };
        case ValidationStatus.NOT_UNIQUE:
            return { status: result.status, explanation: result.explanation, alternatives: result.witnesses.map(toTripletRecord) };
        case ValidationStatus.SOLUTION_MISMATCH: {
            const implied = result.stolenDataCandidates.length === 1 ? { stolen_data: result.stolenDataCandidates[0] } : {};
            return {
                status: result.status,
                explanation: result.explanation,
                reason: result.reason,
                solution: { ...toTripletRecord(result.derived), ...implied },
                declared: toSolutionRecord(result.declared),
                stolen_data_candidates: [...result.stolenDataCandidates],
            };
        }
        case ValidationStatus.INCONCLUSIVE:
            return { status: result.status, explanation: result.explanation };
    }
}

/**
 * The record reported for a puzzle that failed its structural checks.
 */
export function toMalformedRecord(error: MalformedPuzzleError): ResultRecord {
    return { status: 'malformed', explanation: error.message };
}
