/**
 * Base error class for the Breach Puzzle Validator library.
 */
export class BreachPuzzleError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'BreachPuzzleError';
    }
}

/**
 * Thrown when a puzzle breaks a structural invariant (wrong list size, duplicates,
 * dangling references) or a puzzle record cannot be read.
 */
export class MalformedPuzzleError extends BreachPuzzleError {
    constructor(message: string) {
        super(message);
        this.name = 'MalformedPuzzleError';
    }
}

/**
 * Thrown when the validator options are invalid (e.g., a negative timeout).
 */
export class ConfigurationError extends BreachPuzzleError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * Thrown by a solver session whose time budget ran out.
 * The validator turns it into an INCONCLUSIVE verdict.
 */
export class SolverTimeoutError extends BreachPuzzleError {
    constructor(public readonly timeoutMs: number) {
        super(`Solver exceeded the ${timeoutMs}ms budget.`);
        this.name = 'SolverTimeoutError';
    }
}
