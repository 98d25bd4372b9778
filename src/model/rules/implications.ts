import * as z from "zod";
import { SolverLiteralSchema } from "../../client.schemas.js";
import type { ConstraintSink } from "../constraint-model.js";
import type { CompilationRule } from "../model-builder.js";
import { formatLiteral } from "../utils.js";

const ImplicationPairSchema = z.object({
  if: SolverLiteralSchema,
  then: SolverLiteralSchema,
});

const ImplicationsSchema = z.object({
  implications: z.array(ImplicationPairSchema),
});

export type ImplicationPair = z.infer<typeof ImplicationPairSchema>;

/**
 * Configuration for {@link createImplicationsRule}.
 *
 * - `implications` (required): `if ⇒ then` pairs over existing variables;
 *   a literal is a variable name or `{ not: name }`
 */
export type ImplicationsConfig = z.input<typeof ImplicationsSchema>;

/**
 * Registers every pair as `if ⇒ then`. Pairs are independent; a
 * contradictory set makes the model infeasible rather than failing here.
 *
 * @example
 * ```ts
 * addImplications(model, [
 *   { if: "a", then: "c" },
 *   { if: not("a"), then: not("c") },
 * ]);
 * ```
 */
export function addImplications(sink: ConstraintSink, pairs: readonly ImplicationPair[]): void {
  for (const pair of pairs) {
    sink.addImplication(pair.if, pair.then);
  }
}

/**
 * Free-form implications over named variables, for constraints the grid
 * rules do not express.
 *
 * @example Link two indicators: a day off for driver 0 forces one for driver 1
 * ```ts
 * createImplicationsRule({
 *   implications: [{ if: "all:0:0:free", then: "all:1:0:free" }],
 * });
 * ```
 */
export function createImplicationsRule(config: ImplicationsConfig): CompilationRule {
  const { implications } = ImplicationsSchema.parse(config);

  return {
    name: "implications",
    compile(b) {
      addImplications(b, implications);
    },
    validate(solution, reporter) {
      for (const pair of implications) {
        if (solution.literal(pair.if) && !solution.literal(pair.then)) {
          reporter.reportRuleViolation({
            rule: "implications",
            message: `${formatLiteral(pair.if)} holds but ${formatLiteral(pair.then)} does not`,
            context: {},
          });
        }
      }
    },
  };
}
