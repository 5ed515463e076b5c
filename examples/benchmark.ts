import { Validator } from '../src/engine/Validator';
import { Clue, ClueType } from '../src/engine/Clue';
import { Difficulty, ElementSet, Puzzle } from '../src/types';
import { performance } from 'perf_hooks';

// Helper to build an n x n x n element set
function generateElements(n: number): ElementSet {
    const list = (prefix: string) => Array.from({ length: n }, (_, i) => `${prefix}${i}`);
    return { actors: list('A'), vectors: list('V'), assets: list('S'), stolenData: list('D') };
}

// Clues that pin the answer to (A0, V0, S0) and D0
function pinningClues(elements: ElementSet): Clue[] {
    const clues: Clue[] = [{ type: ClueType.AFFIRMATIVE, vector: 'V0', asset: 'S0' }];
    for (const actor of elements.actors.slice(1)) {
        clues.push({ type: ClueType.NEGATION, actor, vector: 'V0' });
    }
    clues.push({ type: ClueType.DATA_INFERENCE, vector: 'V0', stolenData: 'D0' });
    return clues;
}

interface TestCase {
    name: string;
    size: number;
    pinned: boolean;
    iters: number;
}

const MATRIX: TestCase[] = [
    { name: 'Small  (3x3x3, pinned)', size: 3, pinned: true, iters: 20 },
    { name: 'Small  (3x3x3, open)  ', size: 3, pinned: false, iters: 20 },
    { name: 'Medium (4x4x4, pinned)', size: 4, pinned: true, iters: 10 },
    { name: 'Large  (5x5x5, pinned)', size: 5, pinned: true, iters: 5 },
    { name: 'Max    (6x6x6, pinned)', size: 6, pinned: true, iters: 3 },
    { name: 'Max    (6x6x6, open)  ', size: 6, pinned: false, iters: 3 },
];

console.log('--- Validation Benchmark ---');

const validator = new Validator({ timeoutMs: 60000 });

for (const test of MATRIX) {
    const elements = generateElements(test.size);
    const puzzle: Puzzle = {
        author: 'benchmark',
        difficulty: Difficulty.MEDIUM,
        elements,
        clues: test.pinned ? pinningClues(elements) : [],
        solution: { actor: 'A0', vector: 'V0', asset: 'S0', stolenData: 'D0' },
    };

    process.stdout.write(`Running ${test.name} ... `);

    const start = performance.now();
    let status = '';
    for (let i = 0; i < test.iters; i++) {
        status = validator.validate(puzzle).status;
    }
    const avg = (performance.now() - start) / test.iters;

    console.log(`${avg.toFixed(2)}ms / puzzle (${status})`);
}

console.log('-----------------------------');
