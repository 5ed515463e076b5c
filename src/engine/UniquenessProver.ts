import { Triplet } from '../types';
import { SolverSession } from './SolverSession';
import { TripletSpace } from './TripletSpace';

export type UniquenessOutcome =
    | { kind: 'unsatisfiable' }
    | { kind: 'unique'; triplet: Triplet }
    | { kind: 'multiple'; witnesses: Triplet[] };

/**
 * Decides whether the formula loaded into a session has zero, one, or several solutions.
 *
 * Needs at most two checks to tell "exactly one" from "more than one": find a
 * triplet, block it, and check again. With a witness limit above two, blocking
 * continues until that many witnesses are found or none remain.
 *
 * @param session - A session already holding the encoded puzzle.
 * @param space - The triplet space the session's decision variables come from.
 * @param witnessLimit - Maximum number of witnesses to collect when the solution is not unique.
 */
export function proveUniqueness(session: SolverSession, space: TripletSpace, witnessLimit: number = 2): UniquenessOutcome {
    const first = nextTriplet(session, space);
    if (!first) {
        return { kind: 'unsatisfiable' };
    }

    const witnesses: Triplet[] = [first];
    while (witnesses.length < Math.max(witnessLimit, 2)) {
        const next = nextTriplet(session, space);
        if (!next) break;
        witnesses.push(next);
    }

    if (witnesses.length === 1) {
        return { kind: 'unique', triplet: first };
    }
    return { kind: 'multiple', witnesses };
}

/**
 * Lists satisfying triplets by repeated blocking, in the order the solver finds them.
 *
 * @param limit - Stop after this many triplets. Defaults to the whole space.
 */
export function enumerateTriplets(session: SolverSession, space: TripletSpace, limit: number = space.size): Triplet[] {
    const found: Triplet[] = [];
    while (found.length < limit) {
        const next = nextTriplet(session, space);
        if (!next) break;
        found.push(next);
    }
    return found;
}

/**
 * Checks the session, reads the true triplet, and blocks it so the next call finds a different one.
 * Returns null once the session is unsatisfiable.
 */
function nextTriplet(session: SolverSession, space: TripletSpace): Triplet | null {
    const result = session.check();
    if (!result.satisfiable) {
        return null;
    }

    const decisions = new Map<number, boolean>();
    const trueVariables: number[] = [];
    for (const variable of space.variables()) {
        const value = result.assignment.get(variable) ?? false;
        decisions.set(variable, value);
        if (value) trueVariables.push(variable);
    }

    if (trueVariables.length !== 1) {
        throw new Error(`Expected exactly one true triplet variable, found ${trueVariables.length}.`);
    }

    session.blockCurrentAssignment(decisions);
    return space.tripletOf(trueVariables[0]);
}
