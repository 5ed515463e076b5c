import { Difficulty, ElementSet, Puzzle, Solution } from '../../src/types';
import { Clue } from '../../src/engine/Clue';

export const ELEMENTS: ElementSet = {
    actors: ['A', 'B', 'C'],
    vectors: ['X', 'Y', 'Z'],
    assets: ['P', 'Q', 'R'],
    stolenData: ['D1', 'D2', 'D3'],
};

export function makePuzzle(clues: Clue[], solution: Solution, elements: ElementSet = ELEMENTS): Puzzle {
    return {
        author: 'tester',
        difficulty: Difficulty.EASY,
        elements,
        clues,
        solution,
    };
}
