import type { RuleViolation, ValidationContext } from "./validation.types.js";

export interface ValidationReporter {
  reportRuleViolation(violation: Omit<RuleViolation, "type" | "id">): void;
  hasViolations(): boolean;
  getViolations(): RuleViolation[];
}

/**
 * Generates a deterministic ID for a rule violation.
 * Format: violation:rule:{rule}:{entity}:{period}:{subPeriod}
 */
function ruleId(rule: string, context: ValidationContext): string {
  const parts = [
    "violation",
    "rule",
    rule,
    context.entity ?? "_",
    context.period ?? "_",
    context.subPeriod ?? "_",
  ];
  return parts.join(":");
}

export class ValidationReporterImpl implements ValidationReporter {
  #violations: RuleViolation[] = [];

  reportRuleViolation(violation: Omit<RuleViolation, "type" | "id">): void {
    const id = ruleId(violation.rule, violation.context);
    this.#violations.push({ id, type: "rule", ...violation });
  }

  hasViolations(): boolean {
    return this.#violations.length > 0;
  }

  getViolations(): RuleViolation[] {
    return [...this.#violations];
  }
}
