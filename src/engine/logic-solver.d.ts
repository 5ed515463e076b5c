/**
 * Type declarations for the logic-solver npm package.
 *
 * The package provides MiniSat compiled to JavaScript via Emscripten and ships no types.
 * Only the members this library calls are declared.
 */

declare module 'logic-solver' {
    namespace Logic {
        const FALSE: string;

        type Formula = object;
        type Term = string | number | Formula;

        function not(operand: Term): Term;
        function or(...operands: Term[]): Formula;

        class Solver {
            constructor();
            require(...args: Term[]): void;
            solve(): Solution | null;
        }

        class Solution {
            getTrueVars(): string[];
        }
    }

    export = Logic;
}
