import { InvalidReferenceError } from "../../errors.js";
import type { CompilationRule } from "../model-builder.js";
import { builtInRuleFactories, isRuleName } from "./registry.js";
import type {
  CreateRuleFunction,
  RuleConfigEntry,
  RuleName,
  RuleRegistry,
} from "./rules.types.js";

function buildRule<K extends RuleName>(entry: { name: K } & RuleRegistry[K]): CompilationRule {
  const factory: CreateRuleFunction<RuleRegistry[K]> = builtInRuleFactories[entry.name];
  // Schemas strip the extra `name` key while parsing.
  return factory(entry);
}

/**
 * Builds CompilationRule instances from named configs, in entry order.
 *
 * @throws {InvalidReferenceError} for a name that is not a built-in rule
 */
export function buildRules(entries: readonly RuleConfigEntry[]): CompilationRule[] {
  return entries.map((entry) => {
    if (!isRuleName(entry.name)) {
      throw new InvalidReferenceError(`Unknown rule "${String(entry.name)}"`);
    }
    return buildRule(entry);
  });
}
