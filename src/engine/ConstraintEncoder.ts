import { Clue, ClueType } from './Clue';
import { TripletSpace } from './TripletSpace';

/**
 * A literal is either a positive variable (variable number)
 * or a negative variable (-variable number).
 */
export type Literal = number;

/**
 * A clause is a disjunction (OR) of literals.
 */
export type Clause = Literal[];

/**
 * A puzzle translated into conjunctive normal form.
 */
export interface EncodedPuzzle {
    variableCount: number;
    /** The triplet indicator variables. Blocking and witness extraction range over these. */
    decisionVariables: number[];
    clauses: Clause[];
}

/**
 * Translates the element lists and clues of a puzzle into a CNF formula whose
 * satisfying assignments are exactly the triplets consistent with the clues.
 *
 * Data-inference clues add no clauses: stolen data is not part of the triplet
 * and is checked once the triplet is known.
 *
 * @param space - The triplet space of the puzzle. Clue references must already be checked.
 * @param clues - The clues to encode.
 */
export function encodePuzzle(space: TripletSpace, clues: readonly Clue[]): EncodedPuzzle {
    const decisionVariables = space.variables();
    const clauses: Clause[] = [...exactlyOne(decisionVariables)];

    for (const clue of clues) {
        clauses.push(...encodeClue(space, clue));
    }

    return { variableCount: space.size, decisionVariables, clauses };
}

/**
 * At least one literal is true, and no two are true together (pairwise encoding).
 */
export function exactlyOne(literals: Literal[]): Clause[] {
    const clauses: Clause[] = [[...literals]];
    for (let i = 0; i < literals.length; i++) {
        for (let j = i + 1; j < literals.length; j++) {
            clauses.push([-literals[i], -literals[j]]);
        }
    }
    return clauses;
}

/**
 * Encodes a single clue. Every clause is a unit clause forbidding one triplet,
 * except the affirmative clue's "used against" disjunction.
 */
export function encodeClue(space: TripletSpace, clue: Clue): Clause[] {
    const { actors, assets } = space.elements;
    const clauses: Clause[] = [];
    const forbid = (actor: string, vector: string, asset: string) => {
        clauses.push([-space.variableOf(actor, vector, asset)]);
    };

    switch (clue.type) {
        case ClueType.NEGATION:
            for (const asset of assets) {
                forbid(clue.actor, clue.vector, asset);
            }
            break;
        case ClueType.AFFIRMATIVE:
            // If the vector was used, it was used against this asset...
            for (const actor of actors) {
                for (const asset of assets) {
                    if (asset !== clue.asset) forbid(actor, clue.vector, asset);
                }
            }
            // ...and it was used against it by someone.
            clauses.push(actors.map(actor => space.variableOf(actor, clue.vector, clue.asset)));
            break;
        case ClueType.RELATIONAL:
            for (const actor of actors) {
                forbid(actor, clue.vector, clue.asset);
            }
            break;
        case ClueType.CONDITIONAL:
            for (const asset of assets) {
                if (asset !== clue.asset) forbid(clue.actor, clue.vector, asset);
            }
            break;
        case ClueType.DATA_INFERENCE:
            break;
    }

    return clauses;
}
