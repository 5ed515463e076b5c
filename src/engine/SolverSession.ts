/**
 * SAT Solver Capability
 *
 * The validator consumes boolean satisfiability through this interface so the
 * backend can be swapped. One session serves exactly one validation run.
 */

import { Clause } from './ConstraintEncoder';

/**
 * Result of a satisfiability check.
 * The assignment covers every variable the session has seen in an asserted clause.
 */
export type CheckResult =
    | { satisfiable: true; assignment: Map<number, boolean> }
    | { satisfiable: false };

export interface SolverSession {
    /**
     * Adds clauses that hold for the rest of the session.
     */
    assert(clauses: Clause[]): void;

    /**
     * Checks the asserted clauses.
     * Must be sound and complete for propositional logic.
     *
     * @throws {SolverTimeoutError} If the session's time budget is exhausted.
     */
    check(): CheckResult;

    /**
     * Asserts the negation of a full assignment, so the next check must find a different one.
     */
    blockCurrentAssignment(assignment: Map<number, boolean>): void;
}

export interface SessionOptions {
    /**
     * Epoch milliseconds after which `check()` fails with a timeout.
     * Undefined means unbounded.
     */
    deadline?: number;
    /** Budget the deadline was derived from, reported in timeout errors. */
    timeoutMs?: number;
}

/**
 * Creates a fresh, unshared session.
 */
export type SolverFactory = (options: SessionOptions) => SolverSession;
