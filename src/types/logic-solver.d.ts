/**
 * Declarations for the parts of `logic-solver` (MiniSat compiled to
 * JavaScript) that the in-process backend calls. The package ships no types.
 */

declare module "logic-solver" {
  namespace Logic {
    /** A variable name, a negated name (`"-x"`), a variable number, or a formula. */
    type Term = string | number | Formula;

    /** Opaque formula object built by the combinators below. */
    interface Formula {
      readonly type?: string;
    }

    /** Opaque little-endian bit vector representing a non-negative integer. */
    interface Bits {
      readonly bits: Term[];
    }

    const TRUE: string;
    const FALSE: string;

    function not(operand: Term): Term;
    function or(...operands: Array<Term | Term[]>): Formula;
    function and(...operands: Array<Term | Term[]>): Formula;
    function implies(operand1: Term, operand2: Term): Formula;
    function equiv(operand1: Term, operand2: Term): Formula;
    function exactlyOne(...operands: Array<Term | Term[]>): Formula;
    function atMostOne(...operands: Array<Term | Term[]>): Formula;

    function constantBits(wholeNumber: number): Bits;
    function sum(...operands: Array<Term | Bits | Array<Term | Bits>>): Bits;
    function weightedSum(formulas: Term[], weights: number[] | number): Bits;
    function equalBits(bits1: Bits, bits2: Bits): Formula;
    function lessThanOrEqual(bits1: Bits, bits2: Bits): Formula;
    function greaterThanOrEqual(bits1: Bits, bits2: Bits): Formula;

    class Solver {
      constructor();
      getVarNum(variableName: string, noCreate?: boolean): number;
      require(...args: Array<Term | Term[]>): void;
      forbid(...args: Array<Term | Term[]>): void;
      solve(): Solution | null;
      solveAssuming(assumption: Term): Solution | null;
    }

    class Solution {
      getMap(): Record<string, boolean>;
      getTrueVars(): string[];
      evaluate(expression: Term): boolean;
      ignoreUnknownVariables(): this;
    }
  }

  export = Logic;
}
