import { Puzzle } from '../types';
import { MalformedPuzzleError } from '../errors';
import { Clue, ClueType } from './Clue';
import { TripletSpace } from './TripletSpace';

/**
 * Checks every structural invariant of a puzzle and returns its triplet space.
 *
 * @throws {MalformedPuzzleError} On a malformed element list, or when a clue or the
 *  declared solution references an element that is not in its list.
 */
export function assertWellFormed(puzzle: Puzzle): TripletSpace {
    const space = new TripletSpace(puzzle.elements);

    puzzle.clues.forEach((clue, index) => checkClueReferences(space, clue, index + 1));

    const { actor, vector, asset, stolenData } = puzzle.solution;
    requireElement(space.hasActor(actor), 'Solution', 'actor', actor);
    requireElement(space.hasVector(vector), 'Solution', 'vector', vector);
    requireElement(space.hasAsset(asset), 'Solution', 'asset', asset);
    requireElement(space.hasStolenData(stolenData), 'Solution', 'stolen data', stolenData);

    return space;
}

function checkClueReferences(space: TripletSpace, clue: Clue, position: number): void {
    const where = `Clue #${position} (${clue.type})`;

    switch (clue.type) {
        case ClueType.NEGATION:
            requireElement(space.hasActor(clue.actor), where, 'actor', clue.actor);
            requireElement(space.hasVector(clue.vector), where, 'vector', clue.vector);
            break;
        case ClueType.AFFIRMATIVE:
        case ClueType.RELATIONAL:
            requireElement(space.hasVector(clue.vector), where, 'vector', clue.vector);
            requireElement(space.hasAsset(clue.asset), where, 'asset', clue.asset);
            break;
        case ClueType.CONDITIONAL:
            requireElement(space.hasActor(clue.actor), where, 'actor', clue.actor);
            requireElement(space.hasVector(clue.vector), where, 'vector', clue.vector);
            requireElement(space.hasAsset(clue.asset), where, 'asset', clue.asset);
            break;
        case ClueType.DATA_INFERENCE:
            requireElement(space.hasVector(clue.vector), where, 'vector', clue.vector);
            requireElement(space.hasStolenData(clue.stolenData), where, 'stolen data', clue.stolenData);
            break;
    }
}

function requireElement(present: boolean, where: string, kind: string, value: string): void {
    if (!present) {
        throw new MalformedPuzzleError(`${where} references unknown ${kind} '${value}'.`);
    }
}
