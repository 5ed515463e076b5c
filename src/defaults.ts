import { Difficulty, Puzzle } from './types';
import { ClueType } from './engine/Clue';

/** Fewest entries allowed in each element list. */
export const MIN_ELEMENTS = 3;

/** Most entries allowed in each element list. */
export const MAX_ELEMENTS = 6;

/** Default time budget for one validation run, in milliseconds. */
export const DEFAULT_TIMEOUT_MS = 10000;

/** Default number of witness triplets reported for a puzzle with several solutions. */
export const DEFAULT_WITNESS_LIMIT = 2;

/**
 * A small, uniquely solvable puzzle (3 actors, 3 vectors, 3 assets).
 * Answer: ZeroShadow used RDP Exploit against the Finance Database and stole Payroll Records.
 */
export const SAMPLE_PUZZLE: Puzzle = {
    title: 'Web 1 - ZeroShadow breach',
    author: 'sample',
    difficulty: Difficulty.EASY,
    elements: {
        actors: ['GhostShell', 'ZeroShadow', 'FluxSignal'],
        vectors: ['Phishing', 'SQL Injection', 'RDP Exploit'],
        assets: ['Email Server', 'HR Portal', 'Finance Database'],
        stolenData: ['Source Code', 'Payroll Records', 'Customer List'],
    },
    clues: [
        { type: ClueType.AFFIRMATIVE, vector: 'RDP Exploit', asset: 'Finance Database' },
        { type: ClueType.NEGATION, actor: 'GhostShell', vector: 'RDP Exploit' },
        { type: ClueType.CONDITIONAL, actor: 'FluxSignal', vector: 'RDP Exploit', asset: 'Email Server' },
        { type: ClueType.DATA_INFERENCE, vector: 'RDP Exploit', stolenData: 'Payroll Records' },
    ],
    solution: {
        actor: 'ZeroShadow',
        vector: 'RDP Exploit',
        asset: 'Finance Database',
        stolenData: 'Payroll Records',
    },
};
