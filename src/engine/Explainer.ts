import { Solution, Triplet } from '../types';
import { Clue, describeClue } from './Clue';

export function formatTriplet(triplet: Triplet): string {
    return `(${triplet.actor}, ${triplet.vector}, ${triplet.asset})`;
}

export function explainValid(solution: Solution): string {
    return `Puzzle is consistent and uniquely solvable: ${solution.actor} used ${solution.vector} against the ${solution.asset} and stole ${solution.stolenData}.`;
}

/**
 * @param conflicting - 0-based clue positions; may be empty.
 */
export function explainUnsatisfiable(clues: readonly Clue[], conflicting: number[]): string {
    const summary = `The clues are contradictory: no combination of actor, vector and asset satisfies all ${clues.length} of them.`;
    if (conflicting.length === 0) {
        return summary;
    }

    const listed = conflicting.map(i => `#${i + 1} "${describeClue(clues[i])}"`).join('; ');
    return `${summary} Conflicting clues: ${listed}`;
}

export function explainNotUnique(witnesses: Triplet[]): string {
    return `The clues admit more than one solution, including ${witnesses.map(formatTriplet).join(', ')}.`;
}

export function explainTripletMismatch(declared: Triplet, derived: Triplet): string {
    return `The clues imply ${formatTriplet(derived)}, but the declared solution is ${formatTriplet(declared)}.`;
}

export function explainStolenDataMismatch(declared: Solution, candidates: string[]): string {
    if (candidates.length === 0) {
        return `The clues do not imply which data was stolen using ${declared.vector}, but the declared stolen data is ${declared.stolenData}.`;
    }
    if (candidates.length === 1) {
        return `The clues imply that ${candidates[0]} was stolen, but the declared stolen data is ${declared.stolenData}.`;
    }
    return `The declared stolen data ${declared.stolenData} is not uniquely implied by the clues; still possible: ${candidates.join(', ')}.`;
}

export function explainInconclusive(timeoutMs: number): string {
    return `Solver exceeded the ${timeoutMs}ms budget before reaching a verdict.`;
}
