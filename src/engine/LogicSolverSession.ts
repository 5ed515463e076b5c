/// <reference path="./logic-solver.d.ts" />
/**
 * MiniSat-based solver session.
 *
 * Uses the logic-solver npm package, which contains MiniSat
 * compiled to JavaScript via Emscripten.
 */

import Logic from 'logic-solver';
import { SolverTimeoutError } from '../errors';
import { Clause } from './ConstraintEncoder';
import { CheckResult, SessionOptions, SolverSession } from './SolverSession';

/**
 * Implementation of SolverSession using logic-solver (MiniSat).
 *
 * logic-solver solves synchronously and cannot be interrupted, so the deadline
 * is enforced around each solve: a check that starts at or after the deadline
 * fails immediately, and one that finishes after it fails once it returns.
 */
export class LogicSolverSession implements SolverSession {
    private solver: Logic.Solver;
    private knownVariables: Set<number> = new Set();
    private deadline?: number;
    private timeoutMs: number;

    constructor(options: SessionOptions = {}) {
        this.solver = new Logic.Solver();
        this.deadline = options.deadline;
        this.timeoutMs = options.timeoutMs ?? 0;
    }

    assert(clauses: Clause[]): void {
        for (const clause of clauses) {
            this.requireClause(clause);
        }
    }

    check(): CheckResult {
        this.enforceDeadline();
        const solution = this.solver.solve();
        this.enforceDeadline();

        if (!solution) {
            return { satisfiable: false };
        }

        const trueVars = new Set(solution.getTrueVars());
        const assignment = new Map<number, boolean>();
        for (const variable of [...this.knownVariables].sort((a, b) => a - b)) {
            assignment.set(variable, trueVars.has(this.nameOf(variable)));
        }

        return { satisfiable: true, assignment };
    }

    blockCurrentAssignment(assignment: Map<number, boolean>): void {
        // ¬(x1 ∧ ¬x2 ∧ ...) ≡ (¬x1 ∨ x2 ∨ ...)
        const clause: Clause = [];
        for (const [variable, value] of assignment) {
            clause.push(value ? -variable : variable);
        }
        this.requireClause(clause);
    }

    private requireClause(clause: Clause): void {
        if (clause.length === 0) {
            // Empty clause means UNSAT
            this.solver.require(Logic.FALSE);
            return;
        }

        const invalid = clause.find(literal => !Number.isInteger(literal) || literal === 0);
        if (invalid !== undefined) {
            throw new RangeError(`Invalid literal: ${invalid}`);
        }

        const terms = clause.map(literal => {
            const variable = Math.abs(literal);
            this.knownVariables.add(variable);
            const name = this.nameOf(variable);
            return literal > 0 ? name : Logic.not(name);
        });

        this.solver.require(Logic.or(...terms));
    }

    private nameOf(variable: number): string {
        return `t${variable}`;
    }

    private enforceDeadline(): void {
        if (this.deadline !== undefined && Date.now() >= this.deadline) {
            throw new SolverTimeoutError(this.timeoutMs);
        }
    }
}

/**
 * Default solver factory.
 */
export function createLogicSolverSession(options: SessionOptions): SolverSession {
    return new LogicSolverSession(options);
}
